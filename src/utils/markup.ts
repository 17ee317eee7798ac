/**
 * Emphasis markup
 *
 * Bank files written by older tools embed `{RED}...{RESET}` style markers in
 * question and answer text. Records keep plain text plus a span list; the
 * markers only exist on disk. Only the tokens below are markup: any other
 * `{WORD}` is ordinary text.
 */

/**
 * A styled run of plain text, `end` exclusive
 */
export interface EmphasisSpan {
  start: number;
  end: number;
  style: string;
}

export interface MarkedText {
  text: string;
  spans: EmphasisSpan[];
}

export const MARKUP_STYLES = [
  'BLACK',
  'RED',
  'GREEN',
  'YELLOW',
  'BLUE',
  'MAGENTA',
  'CYAN',
  'WHITE',
  'BRIGHT_BLACK',
  'BRIGHT_RED',
  'BRIGHT_GREEN',
  'BRIGHT_YELLOW',
  'BRIGHT_BLUE',
  'BRIGHT_MAGENTA',
  'BRIGHT_CYAN',
  'BRIGHT_WHITE',
  'BG_RED',
  'BG_GREEN',
  'BG_YELLOW',
  'BG_BLUE',
  'BG_MAGENTA',
  'BG_CYAN',
  'BG_WHITE',
  'BOLD',
] as const;

export type MarkupStyle = (typeof MARKUP_STYLES)[number];

const TOKEN_PATTERN = /\{([A-Z][A-Z0-9_]*)\}/g;
const RESET_TOKEN = 'RESET';
const BACKSLASH_TOKEN = 'BACKSLASH';
// Written before a literal markup token so it reads back as text
const LBRACE_TOKEN = 'LBRACE';

const STYLE_SET: ReadonlySet<string> = new Set(MARKUP_STYLES);

export function isMarkupStyle(token: string): token is MarkupStyle {
  return STYLE_SET.has(token);
}

function isMarkupToken(token: string): boolean {
  return isMarkupStyle(token) || token === RESET_TOKEN || token === BACKSLASH_TOKEN || token === LBRACE_TOKEN;
}

/**
 * Split marked-up text into plain text and emphasis spans
 * @example
 * parseMarkup('{RED}TCP{RESET} port') // { text: 'TCP port', spans: [{ start: 0, end: 3, style: 'RED' }] }
 */
export function parseMarkup(raw: string): MarkedText {
  const spans: EmphasisSpan[] = [];
  let text = '';
  let open: { start: number; style: string } | null = null;
  let cursor = 0;

  const close = () => {
    if (open && text.length > open.start) {
      spans.push({ start: open.start, end: text.length, style: open.style });
    }
    open = null;
  };

  for (const match of raw.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    text += raw.slice(cursor, index);
    cursor = index + match[0].length;

    const token = match[1];
    if (!isMarkupToken(token)) {
      text += match[0];
    } else if (token === LBRACE_TOKEN) {
      text += '{';
    } else if (token === BACKSLASH_TOKEN) {
      text += '\\';
    } else if (token === RESET_TOKEN) {
      close();
    } else {
      close();
      open = { start: text.length, style: token };
    }
  }
  text += raw.slice(cursor);
  close();

  return { text, spans };
}

/**
 * Escape markup tokens that occur in plain text
 * @example
 * escapeMarkup('{RED} alert') // '{LBRACE}RED} alert'
 */
export function escapeMarkup(text: string): string {
  return text.replace(TOKEN_PATTERN, (token: string, name: string) =>
    isMarkupToken(name) ? `{${LBRACE_TOKEN}}${token.slice(1)}` : token
  );
}

/**
 * Inverse of parseMarkup: re-insert `{STYLE}`/`{RESET}` markers
 */
export function serializeMarkup(text: string, spans: readonly EmphasisSpan[] = []): string {
  if (spans.length === 0) {
    return escapeMarkup(text);
  }
  const ordered = [...spans].sort((a, b) => a.start - b.start);
  let out = '';
  let cursor = 0;
  for (const span of ordered) {
    const start = Math.max(span.start, cursor);
    const end = Math.min(span.end, text.length);
    if (end <= start) {
      continue;
    }
    out += escapeMarkup(text.slice(cursor, start));
    out += `{${span.style}}${escapeMarkup(text.slice(start, end))}{${RESET_TOKEN}}`;
    cursor = end;
  }
  return out + escapeMarkup(text.slice(cursor));
}

/**
 * Plain text with all markers removed
 */
export function stripMarkup(raw: string): string {
  return parseMarkup(raw).text;
}
