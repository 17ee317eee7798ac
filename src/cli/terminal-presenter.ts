/**
 * Terminal Presenter
 *
 * Renders quiz sessions to the console.
 */

import { QuizResultEntry, QuizSummary } from '../models/quiz-session.model';
import { QuestionRecord } from '../models/question-record.model';
import { QuestionView, QuizPresenter } from '../services/quiz-engine.service';
import { renderReport } from '../services/results-export.service';
import { Theme } from './theme';

export interface PresenterConsole {
  log(...args: unknown[]): void;
}

export interface TerminalPresenterOptions {
  console: PresenterConsole;
  theme: Theme;
  /** Show source bank and record id with each question */
  debug?: boolean;
  /** Called after an answer, before feedback (screen clearing) */
  clear?: () => void;
}

export class TerminalPresenter implements QuizPresenter {
  constructor(private readonly options: TerminalPresenterOptions) {}

  showQuestion(view: QuestionView): void {
    const { console, theme } = this.options;
    const { record } = view;

    console.log(theme.rule());
    console.log(`\n${view.number}/${view.total} ${theme.render(record.question, record.emphasis?.question)}\n`);
    console.log(theme.rule());
    for (const option of view.options) {
      console.log(`${theme.paint('BRIGHT_GREEN', `${option.label})`)} ${theme.render(option.text)}\n`);
    }
    console.log(theme.rule());
    if (view.hasHint) {
      console.log(theme.paint('YELLOW', 'A hint is available.'));
    }
    if (this.options.debug) {
      console.log(`Source bank: ${theme.paint('BRIGHT_YELLOW', record.source)}`);
      console.log(`Question id: ${theme.paint('BRIGHT_YELLOW', record.id)}\n`);
    }
  }

  showHint(record: QuestionRecord): void {
    const { console, theme } = this.options;
    if (record.hint) {
      console.log(`${theme.paint('YELLOW', 'Hint:')} ${theme.render(record.hint, record.emphasis?.hint)}`);
    } else {
      console.log(theme.paint('YELLOW', 'No hint for this question.'));
    }
  }

  showInvalidInput(input: string): void {
    this.options.console.log(`Invalid choice "${input.trim()}", try again.`);
  }

  showFeedback(result: QuizResultEntry, record: QuestionRecord, score: number): void {
    const { console, theme } = this.options;
    this.options.clear?.();

    console.log(theme.rule());
    console.log(`${result.index}. ${theme.render(record.question, record.emphasis?.question)}`);
    console.log(`${theme.paint('YELLOW', 'Chosen:')} ${theme.render(result.chosen)}`);

    const answer = theme.render(record.answer, record.emphasis?.answer);
    if (result.ok) {
      console.log(`${theme.paint('GREEN', 'Correct!')} ${answer}\n`);
    } else {
      console.log(`${theme.paint('RED', 'Wrong!')} Correct answer: ${answer}\n`);
    }
    if (record.hint) {
      console.log(`${theme.paint('YELLOW', 'Description:')}\n${theme.render(record.hint, record.emphasis?.hint)}\n`);
    }
    if (record.reference) {
      console.log(`${theme.paint('CYAN', 'Reference:')}\n${theme.render(record.reference, record.emphasis?.reference)}\n`);
    }
    console.log(theme.paint('BRIGHT_GREEN', `Score so far: ${score}`));
  }

  showReport(summary: QuizSummary, results: readonly QuizResultEntry[]): void {
    if (summary.aborted) {
      this.options.console.log(`\nFinished early after ${summary.total} question(s).\n`);
    }
    for (const line of renderReport(summary, results)) {
      this.options.console.log(line);
    }
  }

  showExport(filePath: string): void {
    this.options.console.log(this.options.theme.paint('BRIGHT_GREEN', `Results exported: ${filePath}`));
  }

  showExportFailed(message: string): void {
    this.options.console.log(this.options.theme.paint('RED', `Export failed: ${message}`));
  }

  showEmpty(): void {
    this.options.console.log('No questions to play.');
  }
}
