/**
 * Question Record Model
 *
 * One flashcard. Text fields are plain text; legacy emphasis markers are
 * carried separately in `emphasis` so that matching and sorting never see them.
 */

import { randomUUID } from 'crypto';

import { EmphasisSpan } from '../utils/markup';

/**
 * Editable text fields of a record
 */
export type RecordField = 'question' | 'answer' | 'hint' | 'reference';

export const RECORD_FIELDS: readonly RecordField[] = ['question', 'answer', 'hint', 'reference'];

/**
 * Required fields: may never be set to empty text
 */
export const REQUIRED_FIELDS: readonly RecordField[] = ['question', 'answer'];

/**
 * Emphasis spans keyed by the field they style
 */
export type RecordEmphasis = Partial<Record<RecordField, EmphasisSpan[]>>;

export interface QuestionRecord {
  /** Durable random identifier (UUID); never a position */
  id: string;

  /** Canonical correct answer */
  answer: string;

  /** Prompt text */
  question: string;

  /** Shown on request during a quiz and after answering ('' when absent) */
  hint: string;

  /** Free-text citation or link ('' when absent) */
  reference: string;

  /** Bank the record was loaded from; derived at load time, never persisted */
  source: string;

  emphasis?: RecordEmphasis;
}

/**
 * Input for the add-flow
 */
export interface QuestionDraft {
  question: string;
  answer: string;
  hint?: string;
  reference?: string;
}

export function generateRecordId(): string {
  return randomUUID();
}

/**
 * Build a new record from a draft, trimming every field
 */
export function createQuestionRecord(draft: QuestionDraft, source: string, id = generateRecordId()): QuestionRecord {
  return {
    id,
    answer: draft.answer.trim(),
    question: draft.question.trim(),
    hint: (draft.hint ?? '').trim(),
    reference: (draft.reference ?? '').trim(),
    source,
  };
}

/**
 * Comparison key used by duplicate detection and answer grouping
 */
export function normalizeText(text: string, caseSensitive = false): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return caseSensitive ? collapsed : collapsed.toLowerCase();
}

/**
 * On-disk order: answer, then question, case-insensitive
 */
export function compareRecords(a: QuestionRecord, b: QuestionRecord): number {
  const byAnswer = compareKeys(a.answer, b.answer);
  return byAnswer !== 0 ? byAnswer : compareKeys(a.question, b.question);
}

function compareKeys(a: string, b: string): number {
  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function sortRecords(records: readonly QuestionRecord[]): QuestionRecord[] {
  return [...records].sort(compareRecords);
}

/**
 * True when two records hold the same question/answer pair
 */
export function isDuplicateRecord(
  a: Pick<QuestionRecord, 'question' | 'answer'>,
  b: Pick<QuestionRecord, 'question' | 'answer'>,
  caseSensitive = false
): boolean {
  return (
    normalizeText(a.question, caseSensitive) === normalizeText(b.question, caseSensitive) &&
    normalizeText(a.answer, caseSensitive) === normalizeText(b.answer, caseSensitive)
  );
}
