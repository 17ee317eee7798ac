/**
 * Flashcard Quiz
 *
 * Multiple-choice flashcard quizzes over CSV question banks.
 *
 * Main capabilities:
 * - Store: create, rename and delete banks; add, edit and delete records
 * - Quiz: shuffled pools, keyword-aware distractors, scoring and CSV export
 * - Import: legacy `id;answer;question` text files
 *
 * Entry points:
 * - CLI: `flashcard-quiz` (see src/cli/flashcard.ts)
 * - Programmatic: `new QuestionStore(...)`, `new QuizEngine(...)`
 */

// Models
export * from './models/errors';
export * from './models/config.model';
export * from './models/question-record.model';
export * from './models/quiz-session.model';

// Parsers
export * from './parsers/csv-parser';
export * from './parsers/bank-parser';

// Config
export * from './config/config-loader';

// Services
export * from './services/question-store.service';
export * from './services/distractor.service';
export * from './services/quiz-pool.service';
export * from './services/answer-matcher';
export * from './services/quiz-engine.service';
export * from './services/results-export.service';
export * from './services/audit-log.service';

// Utils
export * from './utils/markup';
export * from './utils/random';
export * from './utils/clock';
export * from './utils/console-logger';
