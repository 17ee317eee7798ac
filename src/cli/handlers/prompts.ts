/**
 * Prompt helpers shared by the interactive handlers.
 *
 * Every helper returns null when the user types an exit token or input ends,
 * and re-prompts (without limit) on invalid input.
 */

import { FlashcardError, describeError } from '../../models/errors';
import { QuestionRecord } from '../../models/question-record.model';
import { ServiceContainer } from '../service-container';

export function isExitToken(container: ServiceContainer, input: string): boolean {
  const value = input.trim().toLowerCase();
  return container.config.quiz.exitTokens.some(token => token.toLowerCase() === value);
}

/**
 * One trimmed line, or null on exit/end of input
 */
export async function askLine(container: ServiceContainer, prompt: string): Promise<string | null> {
  const line = await container.prompter.ask(prompt);
  if (line === null || isExitToken(container, line)) {
    return null;
  }
  return line.trim();
}

/**
 * Ask for a 1-based position in `items`
 */
export async function askIndex<T>(container: ServiceContainer, items: readonly T[], prompt: string): Promise<T | null> {
  for (;;) {
    const line = await askLine(container, prompt);
    if (line === null) {
      return null;
    }
    const position = Number(line);
    if (Number.isInteger(position) && position >= 1 && position <= items.length) {
      return items[position - 1];
    }
    container.console.log('Invalid choice, try again.');
  }
}

export async function confirm(container: ServiceContainer, prompt: string): Promise<boolean> {
  const line = await askLine(container, `${prompt} (y/n) `);
  return line !== null && line.toLowerCase() === 'y';
}

/**
 * Print the banks with their record counts and let the user pick one
 */
export async function chooseBank(container: ServiceContainer, action: string): Promise<string | null> {
  const banks = printBanks(container);
  if (banks.length === 0) {
    return null;
  }
  return askIndex(container, banks, `\nBank number to ${action} (${container.config.quiz.exitTokens[0]} to go back): `);
}

/**
 * Numbered bank listing; returns the names in listing order
 */
export function printBanks(container: ServiceContainer): string[] {
  const { console, theme, store } = container;
  const banks = store.describeBanks();
  if (banks.length === 0) {
    console.log('No question banks yet.');
    return [];
  }
  console.log(theme.paint('BRIGHT_GREEN', '\nQuestion banks:'));
  banks.forEach((bank, index) => {
    console.log(` ${String(index + 1).padStart(2)}) ${bank.name.padEnd(25)} | ${bank.count} question(s)`);
  });
  return banks.map(bank => bank.name);
}

/**
 * Numbered record listing in on-disk order
 */
export function printRecords(container: ServiceContainer, records: readonly QuestionRecord[]): void {
  const { console, theme } = container;
  if (records.length === 0) {
    console.log('This bank is empty.');
    return;
  }
  console.log('\nQUESTIONS:');
  records.forEach((record, index) => {
    console.log(`\n${theme.paint('BRIGHT_CYAN', `${String(index + 1).padStart(2)}) ${'-'.repeat(60)}`)}`);
    console.log(`${theme.paint('BRIGHT_CYAN', 'Question:')} ${theme.render(record.question, record.emphasis?.question)}`);
    console.log(`${theme.paint('GREEN', 'Answer:')} ${theme.render(record.answer, record.emphasis?.answer)}`);
    if (record.hint) {
      console.log(`${theme.paint('YELLOW', 'Description:')} ${theme.render(record.hint, record.emphasis?.hint)}`);
    }
    if (record.reference) {
      console.log(`${theme.paint('CYAN', 'Reference:')} ${theme.render(record.reference, record.emphasis?.reference)}`);
    }
  });
}

/**
 * List a bank and let the user pick one record by position
 */
export async function chooseRecord(
  container: ServiceContainer,
  bank: string,
  action: string
): Promise<QuestionRecord | null> {
  const { records } = container.store.loadBank(bank);
  printRecords(container, records);
  if (records.length === 0) {
    return null;
  }
  return askIndex(container, records, `\nNumber to ${action} (${container.config.quiz.exitTokens[0]} to go back): `);
}

/**
 * Run one menu action; expected failures are reported and the loop goes on
 */
export async function guarded(container: ServiceContainer, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof FlashcardError) {
      container.console.error(container.theme.paint('RED', err.message));
    } else {
      container.logger.error(`Unexpected error: ${describeError(err)}`, err);
    }
  }
}
