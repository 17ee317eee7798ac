/**
 * Quiz Engine Service
 *
 * Drives one session through its state machine. Input and output go through
 * two seams so the same engine serves the terminal and the tests:
 * - `QuizPrompter` reads one line at a time (null on end of input)
 * - `QuizPresenter` renders questions, feedback and the final report
 *
 * @example
 * ```typescript
 * const engine = new QuizEngine({ prompter, presenter, settings, audit, logger });
 * const run = await engine.run(store.loadBank('networking').records, config.quiz.defaults.single);
 * console.log(run.summary.score, run.exportPath);
 * ```
 */

import type { AnswerMatching, DifficultyPreset, KeywordConfig } from '../models/config.model';
import { describeError } from '../models/errors';
import { QuestionRecord } from '../models/question-record.model';
import {
  QuizResultEntry,
  QuizSession,
  QuizSummary,
  createQuizSession,
  summarizeResults,
  transition,
} from '../models/quiz-session.model';
import { Clock, currentUser, systemClock } from '../utils/clock';
import { Logger } from '../utils/console-logger';
import { Rng, defaultRng } from '../utils/random';
import { acceptedAnswersFor, isCorrectAnswer } from './answer-matcher';
import { AuditSink, nullAuditSink } from './audit-log.service';
import { OptionSetMode, buildOptions } from './distractor.service';
import { buildPool, resolveOptionCount } from './quiz-pool.service';
import { exportResults } from './results-export.service';

export interface QuizPrompter {
  ask(prompt: string): Promise<string | null>;
}

export interface LabelledOption {
  label: string;
  text: string;
}

export interface QuestionView {
  /** 1-based */
  number: number;
  total: number;
  record: QuestionRecord;
  options: LabelledOption[];
  mode: OptionSetMode;
  hasHint: boolean;
}

export interface QuizPresenter {
  showQuestion(view: QuestionView): void;
  showHint(record: QuestionRecord): void;
  showInvalidInput(input: string): void;
  showFeedback(result: QuizResultEntry, record: QuestionRecord, score: number): void;
  showReport(summary: QuizSummary, results: readonly QuizResultEntry[]): void;
  showExport(filePath: string): void;
  showExportFailed(message: string): void;
  showEmpty(): void;
}

export interface QuizSettings {
  keywords: KeywordConfig;
  answerMatching: AnswerMatching;
  exitTokens: readonly string[];
  hintToken: string;
  exportDir: string;
}

export interface QuizEngineDeps {
  prompter: QuizPrompter;
  presenter: QuizPresenter;
  settings: QuizSettings;
  logger: Logger;
  audit?: AuditSink;
  rng?: Rng;
  clock?: Clock;
  user?: string;
}

export interface QuizRunResult {
  session: QuizSession;
  summary: QuizSummary;
  exportPath?: string;
  exportError?: string;
}

type AnswerInput = { kind: 'option'; option: LabelledOption } | { kind: 'exit' };

/**
 * Option labels: a..z, then aa, ab, ...
 */
export function optionLabel(index: number): string {
  let label = '';
  let n = index;
  do {
    label = String.fromCharCode(97 + (n % 26)) + label;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return label;
}

export class QuizEngine {
  private readonly audit: AuditSink;
  private readonly rng: Rng;
  private readonly clock: Clock;
  private readonly user: string;

  constructor(private readonly deps: QuizEngineDeps) {
    this.audit = deps.audit ?? nullAuditSink;
    this.rng = deps.rng ?? defaultRng;
    this.clock = deps.clock ?? systemClock;
    this.user = deps.user ?? currentUser();
  }

  /**
   * Play one session over `records` and export the results.
   * An exit request ends the session early; the partial results are exported.
   */
  async run(records: readonly QuestionRecord[], preset: DifficultyPreset): Promise<QuizRunResult> {
    const optionCount = resolveOptionCount(preset.optionCount, this.rng);
    const pool = buildPool(records, preset.maxQuestions, this.rng);
    const session = createQuizSession(pool, optionCount, this.clock());

    if (pool.length === 0) {
      this.deps.presenter.showEmpty();
      transition(session, 'finished');
      return { session, summary: this.summarize(session) };
    }

    while (session.cursor < session.pool.length) {
      const record = session.pool[session.cursor];
      transition(session, 'presenting');
      const accepted = acceptedAnswersFor(record, records);
      const view = this.present(session, record, accepted, records);

      transition(session, 'awaiting_answer');
      const input = await this.awaitAnswer(view);
      if (input.kind === 'exit') {
        session.aborted = true;
        break;
      }

      transition(session, 'scored');
      this.score(session, record, accepted, input.option.text);
      session.cursor++;
    }

    transition(session, 'finished');
    return this.finish(session);
  }

  private present(
    session: QuizSession,
    record: QuestionRecord,
    accepted: string[],
    candidates: readonly QuestionRecord[]
  ): QuestionView {
    const optionSet = buildOptions(
      {
        question: record.question,
        correctAnswer: record.answer,
        acceptedAnswers: accepted,
        candidates,
        optionCount: session.optionCount,
      },
      this.deps.settings.keywords,
      this.rng
    );

    const view: QuestionView = {
      number: session.cursor + 1,
      total: session.pool.length,
      record,
      options: optionSet.options.map((text, index) => ({ label: optionLabel(index), text })),
      mode: optionSet.mode,
      hasHint: record.hint.length > 0,
    };
    this.deps.presenter.showQuestion(view);
    return view;
  }

  /**
   * Read lines until one is an option label or an exit request. Invalid
   * input re-prompts without advancing.
   */
  private async awaitAnswer(view: QuestionView): Promise<AnswerInput> {
    const { exitTokens, hintToken } = this.deps.settings;
    const labels = view.options.map(option => option.label).join('/');

    for (;;) {
      const line = await this.deps.prompter.ask(`Answer (${labels}, ${hintToken} for hint, ${exitTokens[0]} to finish): `);
      if (line === null) {
        return { kind: 'exit' };
      }

      const input = line.trim().toLowerCase();
      if (exitTokens.some(token => token.toLowerCase() === input)) {
        return { kind: 'exit' };
      }
      if (input === hintToken.toLowerCase()) {
        this.deps.presenter.showHint(view.record);
        continue;
      }

      const option = view.options.find(candidate => candidate.label === input);
      if (option) {
        return { kind: 'option', option };
      }
      this.deps.presenter.showInvalidInput(line);
    }
  }

  private score(session: QuizSession, record: QuestionRecord, accepted: string[], chosen: string): void {
    const ok = isCorrectAnswer(chosen, accepted, this.deps.settings.answerMatching);
    if (ok) {
      session.score++;
    }

    const result: QuizResultEntry = {
      index: session.results.length + 1,
      recordId: record.id,
      source: record.source,
      question: record.question,
      chosen,
      correct: record.answer,
      ok,
      hint: record.hint,
      reference: record.reference,
    };
    session.results.push(result);

    this.deps.presenter.showFeedback(result, record, session.score);
    this.audit.record(`CHOSEN:${record.id}`, `${chosen} - ${record.question} ${ok ? 'correct +1' : 'wrong'}`);
  }

  private summarize(session: QuizSession): QuizSummary {
    return {
      ...summarizeResults(session.results),
      user: this.user,
      startedAt: session.startedAt,
      finishedAt: this.clock(),
      aborted: session.aborted,
    };
  }

  private finish(session: QuizSession): QuizRunResult {
    const summary = this.summarize(session);
    this.deps.presenter.showReport(summary, session.results);

    try {
      const exportPath = exportResults(summary, session.results, this.deps.settings.exportDir);
      this.deps.presenter.showExport(exportPath);
      return { session, summary, exportPath };
    } catch (err) {
      const exportError = describeError(err);
      this.deps.logger.error('Results export failed', err);
      this.deps.presenter.showExportFailed(exportError);
      return { session, summary, exportError };
    }
  }
}
