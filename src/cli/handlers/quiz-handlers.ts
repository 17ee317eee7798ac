/**
 * Quiz Command Handlers
 *
 * Play one bank or the union of all banks at a chosen difficulty.
 */

import type { DifficultyPreset } from '../../models/config.model';
import { QuestionRecord } from '../../models/question-record.model';
import { QuizRunResult } from '../../services/quiz-engine.service';
import { ServiceContainer } from '../service-container';
import { askLine, chooseBank } from './prompts';

function describeOptions(preset: DifficultyPreset): string {
  const { optionCount } = preset;
  const count = typeof optionCount === 'number' ? `${optionCount}` : `${optionCount.min}-${optionCount.max}`;
  return `${preset.maxQuestions} card(s), ${count} option(s)`;
}

/**
 * Offer the mode default plus the configured presets. Unknown input
 * re-prompts; exit returns null.
 */
export async function choosePreset(
  container: ServiceContainer,
  fallback: DifficultyPreset
): Promise<DifficultyPreset | null> {
  const presets = [fallback, ...container.config.quiz.presets.filter(preset => preset.key !== fallback.key)];
  container.console.log('');
  for (const preset of presets) {
    container.console.log(`${preset.key} - ${preset.label} [${describeOptions(preset)}]`);
  }

  for (;;) {
    const line = await askLine(
      container,
      `\nChoose a difficulty (${container.config.quiz.exitTokens[0]} to go back): `
    );
    if (line === null) {
      return null;
    }
    const preset = presets.find(candidate => candidate.key === line);
    if (preset) {
      return preset;
    }
    container.console.log('Invalid choice, try again.');
  }
}

async function play(
  container: ServiceContainer,
  records: QuestionRecord[],
  fallback: DifficultyPreset
): Promise<QuizRunResult | null> {
  if (records.length === 0) {
    container.console.log('No questions to play.');
    return null;
  }
  const preset = await choosePreset(container, fallback);
  if (!preset) {
    return null;
  }
  container.clearScreen();
  return container.createQuizEngine().run(records, preset);
}

/**
 * Handle play-one-bank
 */
export async function handlePlayBank(container: ServiceContainer): Promise<QuizRunResult | null> {
  container.console.log(`${'='.repeat(16)} Play one bank ${'='.repeat(16)}`);
  const bank = await chooseBank(container, 'play');
  if (!bank) {
    return null;
  }
  const { records } = container.store.loadBank(bank);
  return play(container, records, container.config.quiz.defaults.single);
}

/**
 * Handle play-all-banks
 */
export async function handlePlayAll(container: ServiceContainer): Promise<QuizRunResult | null> {
  container.console.log(`${'='.repeat(16)} Play all banks ${'='.repeat(16)}`);
  return play(container, container.store.loadAll(), container.config.quiz.defaults.all);
}
