/**
 * Results Export Service
 *
 * End-of-session report (plain text table) and CSV export. The export has a
 * metadata block, a blank line, then one row per answered question.
 */

import * as fs from 'fs';
import * as path from 'path';

import { StorageError, describeError } from '../models/errors';
import { QuizResultEntry, QuizSummary } from '../models/quiz-session.model';
import { formatCsv } from '../parsers/csv-parser';
import { fileTimestamp } from '../utils/clock';

export const RESULT_COLUMNS = ['idx', 'question', 'chosen', 'correct', 'ok', 'desc', 'reference'] as const;

export function formatPercent(percent: number): string {
  return percent.toFixed(1);
}

/**
 * @example
 * progressBar(50, 10) // returns '[=====     ] 50.0%'
 */
export function progressBar(percent: number, width = 30): string {
  const filled = Math.max(0, Math.min(width, Math.floor((width * percent) / 100)));
  return `[${'='.repeat(filled)}${' '.repeat(width - filled)}] ${formatPercent(percent)}%`;
}

function fit(text: string, width: number): string {
  const single = text.replace(/\s+/g, ' ').trim();
  return single.length > width ? `${single.slice(0, width - 1)}…` : single.padEnd(width);
}

/**
 * Text table of the session; one line per answered question plus totals
 */
export function renderReport(summary: QuizSummary, results: readonly QuizResultEntry[]): string[] {
  const rule = '-'.repeat(60);
  const lines = [
    '='.repeat(60),
    'SCORE SHEET',
    `${'#'.padStart(3)}  ${'RESULT'.padEnd(6)}  ${'CORRECT ANSWER'}`,
    rule,
  ];
  for (const result of results) {
    lines.push(`${String(result.index).padStart(3)}  ${(result.ok ? 'OK' : 'WRONG').padEnd(6)}  ${fit(result.correct, 46)}`.trimEnd());
  }
  lines.push(rule);
  lines.push(`Correct: ${summary.score}    Wrong: ${summary.wrong}    Rate: ${formatPercent(summary.percent)}%`);
  lines.push(progressBar(summary.percent));
  return lines;
}

/**
 * Rows of the export file
 */
export function buildExportRows(summary: QuizSummary, results: readonly QuizResultEntry[]): (string | number | boolean)[][] {
  return [
    ['timestamp', summary.finishedAt.toISOString()],
    ['user', summary.user],
    ['total_questions', summary.total],
    ['score', summary.score],
    ['wrong', summary.wrong],
    ['percent', formatPercent(summary.percent)],
    [],
    [...RESULT_COLUMNS],
    ...results.map(result => [
      result.index,
      result.question,
      result.chosen,
      result.correct,
      result.ok,
      result.hint,
      result.reference,
    ]),
  ];
}

/**
 * Write `quiz_results_<YYYYMMDD_HHMMSS>.csv` into `exportDir`; returns its path
 */
export function exportResults(
  summary: QuizSummary,
  results: readonly QuizResultEntry[],
  exportDir: string
): string {
  const stamp = fileTimestamp(summary.finishedAt);
  let filePath = path.join(exportDir, `quiz_results_${stamp}.csv`);
  try {
    fs.mkdirSync(exportDir, { recursive: true });
    for (let n = 2; fs.existsSync(filePath); n++) {
      filePath = path.join(exportDir, `quiz_results_${stamp}_${n}.csv`);
    }
    fs.writeFileSync(filePath, formatCsv(buildExportRows(summary, results), { bom: true }), 'utf-8');
  } catch (err) {
    throw new StorageError(`Failed to export results to ${filePath}: ${describeError(err)}`, filePath, err);
  }
  return filePath;
}
