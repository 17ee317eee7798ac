/**
 * Answer Matcher
 *
 * Compares the text of the chosen option (never its label) with the accepted
 * answers. Both knobs come from `answerMatching` in the configuration:
 * `stripFormatting` removes emphasis markers and collapses whitespace,
 * `caseSensitive` keeps letter case significant.
 */

import type { AnswerMatching } from '../models/config.model';
import { QuestionRecord, normalizeText } from '../models/question-record.model';
import { stripMarkup } from '../utils/markup';

export const DEFAULT_ANSWER_MATCHING: AnswerMatching = {
  caseSensitive: false,
  stripFormatting: true,
};

export function normalizeAnswer(text: string, matching: AnswerMatching = DEFAULT_ANSWER_MATCHING): string {
  const plain = matching.stripFormatting ? normalizeText(stripMarkup(text), true) : text;
  return matching.caseSensitive ? plain : plain.toLowerCase();
}

export function isCorrectAnswer(
  chosen: string,
  accepted: readonly string[],
  matching: AnswerMatching = DEFAULT_ANSWER_MATCHING
): boolean {
  const picked = normalizeAnswer(chosen, matching);
  return accepted.some(answer => normalizeAnswer(answer, matching) === picked);
}

/**
 * Answers of every record asking the same question (the record's own first)
 */
export function acceptedAnswersFor(record: QuestionRecord, data: readonly QuestionRecord[]): string[] {
  const key = normalizeText(record.question);
  const accepted = [record.answer];
  for (const other of data) {
    if (other.id !== record.id && normalizeText(other.question) === key && !accepted.includes(other.answer)) {
      accepted.push(other.answer);
    }
  }
  return accepted;
}
