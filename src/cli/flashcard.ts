#!/usr/bin/env node
/**
 * Flashcard Quiz CLI
 *
 * Usage:
 *   flashcard-quiz                      # interactive menu
 *   flashcard-quiz banks                # list banks with their record counts
 *   flashcard-quiz import old.txt --name networking
 *   flashcard-quiz -c ./my-config.yaml  # merge a config file over the defaults
 */

import { Command } from 'commander';

import { loadConfig } from '../config/config-loader';
import { describeError } from '../models/errors';
import { ServiceContainer } from './service-container';
import { handleImport, handleListBanks } from './handlers/file-handlers';
import { runMainMenu } from './menu';

interface GlobalOptions {
  config?: string;
}

function createContainer(program: Command): ServiceContainer {
  const { config } = program.opts<GlobalOptions>();
  return new ServiceContainer({ config: loadConfig({ configPath: config }) });
}

/**
 * Build a container, run `action`, report failures and release stdin
 */
async function runCommand(
  program: Command,
  action: (container: ServiceContainer) => Promise<void> | void
): Promise<void> {
  let container: ServiceContainer | undefined;
  try {
    container = createContainer(program);
    await action(container);
  } catch (err) {
    console.error(`✗ ${describeError(err)}`);
    process.exitCode = 1;
  } finally {
    container?.close();
  }
}

const program = new Command();

program
  .name('flashcard-quiz')
  .description('Multiple-choice flashcard quizzes over CSV question banks')
  .version('1.0.0')
  .option('-c, --config <file>', 'YAML config merged over the built-in defaults');

program
  .command('menu', { isDefault: true })
  .description('Interactive menu: play, manage questions and banks')
  .action(() => runCommand(program, runMainMenu));

program
  .command('banks')
  .description('List question banks and their record counts')
  .action(() => runCommand(program, handleListBanks));

program
  .command('import <file>')
  .description('Convert a legacy "id;answer;question" text file into a bank')
  .option('-n, --name <name>', 'Bank name (defaults to the file name)')
  .option('-d, --delimiter <char>', 'Field delimiter of the legacy file', ';')
  .action((file: string, options: { name?: string; delimiter: string }) =>
    runCommand(program, container => handleImport(container, file, options))
  );

program.parseAsync().catch(err => {
  console.error(`✗ ${describeError(err)}`);
  process.exitCode = 1;
});
