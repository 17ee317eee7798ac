/**
 * Bank File Handlers
 *
 * Create, delete and rename banks (interactive), plus the non-interactive
 * `banks` and `import` commands.
 */

import * as path from 'path';

import { ServiceContainer } from '../service-container';
import { askLine, chooseBank, confirm, guarded, printBanks } from './prompts';

export async function handleCreateBank(container: ServiceContainer): Promise<void> {
  const name = await askLine(container, `New bank name (without ${container.config.bankExtension}): `);
  if (!name) {
    return;
  }
  const bank = container.store.createBank(name);
  container.clearScreen();
  container.console.log(`Created ${bank}${container.config.bankExtension}`);
}

export async function handleDeleteBank(container: ServiceContainer): Promise<void> {
  const bank = await chooseBank(container, 'delete');
  if (!bank) {
    return;
  }
  if (!(await confirm(container, `Delete ${bank}${container.config.bankExtension}?`))) {
    return;
  }
  container.store.deleteBank(bank);
  container.clearScreen();
  container.console.log(`Deleted ${bank}${container.config.bankExtension}`);
}

export async function handleRenameBank(container: ServiceContainer): Promise<void> {
  const bank = await chooseBank(container, 'rename');
  if (!bank) {
    return;
  }
  const newName = await askLine(container, 'New name: ');
  if (!newName) {
    return;
  }
  const renamed = container.store.renameBank(bank, newName);
  container.clearScreen();
  container.console.log(`Renamed ${bank} -> ${renamed}`);
}

const FILE_MENU = [
  { key: '1', label: 'Create bank', run: handleCreateBank },
  { key: '2', label: 'Delete bank', run: handleDeleteBank },
  { key: '3', label: 'Rename bank', run: handleRenameBank },
];

/**
 * Manage-files menu loop
 */
export async function handleManageFiles(container: ServiceContainer): Promise<void> {
  const { console, theme } = container;
  for (;;) {
    console.log(`\n${theme.paint('BRIGHT_CYAN', '=====')} ${theme.paint('BRIGHT_GREEN', 'MANAGE BANKS')} ${theme.paint('BRIGHT_CYAN', '=====')}`);
    printBanks(container);
    console.log('');
    for (const entry of FILE_MENU) {
      console.log(theme.paint('BRIGHT_CYAN', ` ${entry.key}) ${entry.label}`));
    }
    console.log(`\nOr type ${theme.paint('BRIGHT_RED', container.config.quiz.exitTokens[0])} to go back`);

    const choice = await askLine(container, '\nChoice: ');
    if (choice === null) {
      container.clearScreen();
      return;
    }
    const entry = FILE_MENU.find(candidate => candidate.key === choice);
    if (!entry) {
      console.log('Invalid choice.');
      continue;
    }
    await guarded(container, () => entry.run(container));
  }
}

/**
 * `banks` command: one line per bank
 */
export function handleListBanks(container: ServiceContainer): void {
  const banks = container.store.describeBanks();
  if (banks.length === 0) {
    container.console.log(`No banks in ${container.store.questionsDir}`);
    return;
  }
  for (const bank of banks) {
    container.console.log(`${bank.name}\t${bank.count}`);
  }
}

export interface ImportOptions {
  name?: string;
  delimiter: string;
}

/**
 * `import` command: convert a legacy `id;answer;question` text file
 */
export function handleImport(container: ServiceContainer, file: string, options: ImportOptions): void {
  const result = container.store.importLegacyBank(path.resolve(file), options.name, options.delimiter);
  container.console.log(`Imported ${result.imported} question(s) into ${result.bank}${container.config.bankExtension}`);
  if (result.warnings.length > 0) {
    container.console.log(`${result.warnings.length} line(s) skipped`);
  }
}
