/**
 * Bank Parser
 *
 * Maps CSV rows to QuestionRecords and back. Loading is tolerant: a bad row
 * is skipped (or repaired) with a warning and never fails the whole bank.
 */

import {
  QuestionRecord,
  RecordEmphasis,
  RecordField,
  generateRecordId,
  sortRecords,
} from '../models/question-record.model';
import { parseMarkup, serializeMarkup } from '../utils/markup';
import { CsvRow, formatCsv, isBlankRow, parseCsv, stripBom } from './csv-parser';

/**
 * Column names written to every bank file, in order
 */
export const BANK_HEADER = ['id', 'answer', 'question', 'desc', 'ref'] as const;

export type BankColumn = (typeof BANK_HEADER)[number];

const COLUMN_ALIASES: Record<string, BankColumn> = {
  id: 'id',
  answer: 'answer',
  question: 'question',
  desc: 'desc',
  hint: 'desc',
  description: 'desc',
  ref: 'ref',
  reference: 'ref',
};

export interface ParseWarning {
  line: number;
  message: string;
}

export interface BankParseResult {
  records: QuestionRecord[];
  warnings: ParseWarning[];
  /** Number of records that were given a fresh id */
  repairedIds: number;
}

interface ColumnLayout {
  indexes: Partial<Record<BankColumn, number>>;
  width: number;
}

const POSITIONAL_LAYOUT: ColumnLayout = {
  indexes: { id: 0, answer: 1, question: 2, desc: 3, ref: 4 },
  width: BANK_HEADER.length,
};

/**
 * Read a header row; null when it does not name both answer and question
 */
export function readHeader(row: CsvRow): ColumnLayout | null {
  const indexes: Partial<Record<BankColumn, number>> = {};
  row.fields.forEach((name, index) => {
    const column = COLUMN_ALIASES[name.trim().toLowerCase()];
    if (column && indexes[column] === undefined) {
      indexes[column] = index;
    }
  });
  if (indexes.answer === undefined || indexes.question === undefined) {
    return null;
  }
  return { indexes, width: row.fields.length };
}

function cell(fields: string[], index: number | undefined): string {
  if (index === undefined || index >= fields.length) {
    return '';
  }
  return fields[index].trim();
}

/**
 * Build a record from plain text values, lifting markup into emphasis spans
 */
function buildRecord(
  id: string,
  values: Record<RecordField, string>,
  source: string
): QuestionRecord {
  const emphasis: RecordEmphasis = {};
  const lift = (field: RecordField): string => {
    const marked = parseMarkup(values[field]);
    if (marked.spans.length > 0) {
      emphasis[field] = marked.spans;
    }
    return marked.text;
  };

  const record: QuestionRecord = {
    id,
    answer: lift('answer'),
    question: lift('question'),
    hint: lift('hint'),
    reference: lift('reference'),
    source,
  };
  if (Object.keys(emphasis).length > 0) {
    record.emphasis = emphasis;
  }
  return record;
}

/**
 * Parse the contents of a CSV bank file
 */
export function parseBank(content: string, source: string): BankParseResult {
  const rows = parseCsv(content).filter(row => !isBlankRow(row));
  const warnings: ParseWarning[] = [];
  const records: QuestionRecord[] = [];
  const seenIds = new Set<string>();
  let repairedIds = 0;

  if (rows.length === 0) {
    return { records, warnings, repairedIds };
  }

  let layout = readHeader(rows[0]);
  let dataRows = rows.slice(1);
  if (!layout) {
    warnings.push({ line: rows[0].line, message: 'Missing header row, assuming id,answer,question,desc,ref' });
    layout = POSITIONAL_LAYOUT;
    dataRows = rows;
  }

  for (const row of dataRows) {
    if (row.fields.length > layout.width) {
      warnings.push({
        line: row.line,
        message: `Expected at most ${layout.width} fields, found ${row.fields.length}; row skipped`,
      });
      continue;
    }

    const values: Record<RecordField, string> = {
      answer: cell(row.fields, layout.indexes.answer),
      question: cell(row.fields, layout.indexes.question),
      hint: cell(row.fields, layout.indexes.desc),
      reference: cell(row.fields, layout.indexes.ref),
    };
    if (!values.answer && !values.question) {
      warnings.push({ line: row.line, message: 'Both answer and question are empty; row skipped' });
      continue;
    }

    let id = cell(row.fields, layout.indexes.id);
    if (!id) {
      id = generateRecordId();
      repairedIds++;
      warnings.push({ line: row.line, message: `Missing id, assigned ${id}` });
    } else if (seenIds.has(id)) {
      const duplicate = id;
      id = generateRecordId();
      repairedIds++;
      warnings.push({ line: row.line, message: `Duplicate id ${duplicate}, assigned ${id}` });
    }
    seenIds.add(id);

    records.push(buildRecord(id, values, source));
  }

  return { records, warnings, repairedIds };
}

/**
 * Parse the legacy `id;answer;question` text format (split on the first two
 * delimiters, so the question may itself contain the delimiter)
 */
export function parseLegacyBank(content: string, source: string, delimiter = ';'): BankParseResult {
  const warnings: ParseWarning[] = [];
  const records: QuestionRecord[] = [];
  const lines = stripBom(content).split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) {
      return;
    }
    const first = line.indexOf(delimiter);
    const second = first < 0 ? -1 : line.indexOf(delimiter, first + delimiter.length);
    if (second < 0) {
      warnings.push({ line: index + 1, message: 'Expected id, answer and question; line skipped' });
      return;
    }

    const answer = line.slice(first + delimiter.length, second).trim();
    const question = line.slice(second + delimiter.length).trim();
    if (!answer && !question) {
      warnings.push({ line: index + 1, message: 'Both answer and question are empty; line skipped' });
      return;
    }

    // Legacy ids are positions, re-assigned on every save; never keep them
    records.push(buildRecord(generateRecordId(), { answer, question, hint: '', reference: '' }, source));
  });

  return { records, warnings, repairedIds: records.length };
}

function fieldText(record: QuestionRecord, field: RecordField): string {
  return serializeMarkup(record[field], record.emphasis?.[field]);
}

/**
 * Serialize records to bank file contents, sorted by answer then question
 */
export function serializeBank(records: readonly QuestionRecord[]): string {
  const rows: string[][] = [[...BANK_HEADER]];
  for (const record of sortRecords(records)) {
    rows.push([
      record.id,
      fieldText(record, 'answer'),
      fieldText(record, 'question'),
      fieldText(record, 'hint'),
      fieldText(record, 'reference'),
    ]);
  }
  return formatCsv(rows, { bom: true });
}
