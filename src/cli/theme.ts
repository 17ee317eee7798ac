/**
 * Terminal theme
 *
 * ANSI styling for the interactive shell. Emphasis spans stored on records
 * are rendered here and nowhere else.
 */

import { EmphasisSpan, MarkupStyle, isMarkupStyle } from '../utils/markup';

export const ANSI_STYLES: Record<MarkupStyle | 'RESET', string> = {
  RESET: '\x1b[0m',
  BLACK: '\x1b[30m',
  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  BLUE: '\x1b[34m',
  MAGENTA: '\x1b[35m',
  CYAN: '\x1b[36m',
  WHITE: '\x1b[37m',
  BRIGHT_BLACK: '\x1b[90m',
  BRIGHT_RED: '\x1b[91m',
  BRIGHT_GREEN: '\x1b[92m',
  BRIGHT_YELLOW: '\x1b[93m',
  BRIGHT_BLUE: '\x1b[94m',
  BRIGHT_MAGENTA: '\x1b[95m',
  BRIGHT_CYAN: '\x1b[96m',
  BRIGHT_WHITE: '\x1b[97m',
  BG_RED: '\x1b[41m',
  BG_GREEN: '\x1b[42m',
  BG_YELLOW: '\x1b[43m',
  BG_BLUE: '\x1b[44m',
  BG_MAGENTA: '\x1b[45m',
  BG_CYAN: '\x1b[46m',
  BG_WHITE: '\x1b[47m',
  BOLD: '\x1b[1m',
};

export class Theme {
  constructor(private readonly enabled = true) {}

  paint(style: string, text: string): string {
    if (!this.enabled || !isMarkupStyle(style)) {
      return text;
    }
    return `${ANSI_STYLES[style]}${text}${ANSI_STYLES.RESET}`;
  }

  /**
   * Render record text: legacy `\n`/`\t` escapes become real characters and
   * each emphasis span is painted in its style (unknown styles stay plain)
   */
  render(text: string, spans: readonly EmphasisSpan[] = []): string {
    const ordered = [...spans].sort((a, b) => a.start - b.start);
    let out = '';
    let cursor = 0;
    for (const span of ordered) {
      if (span.start < cursor) {
        continue;
      }
      out += text.slice(cursor, span.start);
      out += this.paint(span.style, text.slice(span.start, span.end));
      cursor = span.end;
    }
    out += text.slice(cursor);
    return expandEscapes(out);
  }

  rule(char = '=', width = 48): string {
    return char.repeat(width);
  }
}

export function expandEscapes(text: string): string {
  return text.replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}
