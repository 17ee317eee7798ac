/**
 * Service Container - Dependency Injection Container
 *
 * Builds every service once from the loaded configuration and hands them to
 * the CLI handlers. Tests pass their own prompter, console or store.
 */

import type { FlashcardConfig } from '../models/config.model';
import { FileAuditLog, AuditSink } from '../services/audit-log.service';
import { QuizEngine, QuizPrompter } from '../services/quiz-engine.service';
import { QuestionStore } from '../services/question-store.service';
import { Clock, currentUser, systemClock } from '../utils/clock';
import { ConsoleLogger, Logger } from '../utils/console-logger';
import { Rng, defaultRng } from '../utils/random';
import { LinePrompter } from './line-prompter';
import { TerminalPresenter } from './terminal-presenter';
import { Theme } from './theme';

/**
 * Console operations interface (for testability)
 */
export interface IConsole {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
  /** Clear the terminal */
  clear(): void;
}

/**
 * Service container configuration
 */
export interface ServiceContainerConfig {
  config: FlashcardConfig;
  console?: IConsole;
  prompter?: QuizPrompter;
  logger?: Logger;
  audit?: AuditSink;
  store?: QuestionStore;
  theme?: Theme;
  rng?: Rng;
  clock?: Clock;
}

export class ServiceContainer {
  public readonly config: FlashcardConfig;
  public readonly console: IConsole;
  public readonly prompter: QuizPrompter;
  public readonly logger: Logger;
  public readonly audit: AuditSink;
  public readonly store: QuestionStore;
  public readonly theme: Theme;
  public readonly user: string;

  private readonly rng: Rng;
  private readonly clock: Clock;
  private readonly ownPrompter?: LinePrompter;

  constructor(options: ServiceContainerConfig) {
    this.config = options.config;
    this.user = this.config.user ?? currentUser();
    this.rng = options.rng ?? defaultRng;
    this.clock = options.clock ?? systemClock;

    this.console = options.console || this.createRealConsole();
    if (options.prompter) {
      this.prompter = options.prompter;
    } else {
      this.ownPrompter = new LinePrompter();
      this.prompter = this.ownPrompter;
    }
    this.logger = options.logger || new ConsoleLogger('flashcard', this.config.logLevel);
    this.theme = options.theme || new Theme(Boolean(process.stdout.isTTY));
    this.audit =
      options.audit ||
      new FileAuditLog({
        logDir: this.config.paths.logDir,
        logger: this.logger,
        user: this.user,
        retentionDays: this.config.audit.retentionDays,
        clock: this.clock,
      });
    this.store =
      options.store ||
      new QuestionStore({
        questionsDir: this.config.paths.questionsDir,
        extension: this.config.bankExtension,
        duplicatesCaseSensitive: this.config.duplicates.caseSensitive,
        logger: this.logger,
        audit: this.audit,
      });
  }

  /**
   * Clear the screen when the configuration asks for it
   */
  clearScreen(): void {
    if (this.config.clearScreen) {
      this.console.clear();
    }
  }

  /**
   * A fresh engine per play invocation
   */
  createQuizEngine(): QuizEngine {
    return new QuizEngine({
      prompter: this.prompter,
      presenter: new TerminalPresenter({
        console: this.console,
        theme: this.theme,
        debug: this.config.debug,
        clear: () => this.clearScreen(),
      }),
      settings: {
        keywords: this.config.keywords,
        answerMatching: this.config.answerMatching,
        exitTokens: this.config.quiz.exitTokens,
        hintToken: this.config.quiz.hintToken,
        exportDir: this.config.paths.exportDir,
      },
      logger: this.logger,
      audit: this.audit,
      rng: this.rng,
      clock: this.clock,
      user: this.user,
    });
  }

  /**
   * Release stdin when the container created the prompter itself
   */
  close(): void {
    this.ownPrompter?.close();
  }

  private createRealConsole(): IConsole {
    return {
      log: console.log.bind(console),
      error: console.error.bind(console),
      clear: () => process.stdout.write('\x1b[2J\x1b[3J\x1b[H'),
    };
  }
}
