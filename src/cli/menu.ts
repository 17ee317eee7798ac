/**
 * Main menu loop
 */

import { ServiceContainer } from './service-container';
import { handleManageFiles } from './handlers/file-handlers';
import { handleManageQuestions } from './handlers/question-handlers';
import { handlePlayAll, handlePlayBank } from './handlers/quiz-handlers';
import { guarded } from './handlers/prompts';

interface MainMenuEntry {
  key: string;
  label: string;
  run: (container: ServiceContainer) => Promise<unknown>;
}

export const MAIN_MENU: MainMenuEntry[] = [
  { key: '1', label: 'Play one bank', run: handlePlayBank },
  { key: '2', label: 'Play all banks', run: handlePlayAll },
  { key: '3', label: 'Manage questions', run: handleManageQuestions },
  { key: '4', label: 'Manage banks', run: handleManageFiles },
];

export const MENU_EXIT_KEY = '0';

/**
 * Show the menu until the user picks 0 or input ends
 */
export async function runMainMenu(container: ServiceContainer): Promise<void> {
  const { console, theme } = container;
  for (;;) {
    console.log(`\n${theme.paint('BRIGHT_CYAN', '=====')} ${theme.paint('BRIGHT_GREEN', 'FLASHCARD QUIZ')} ${theme.paint('BRIGHT_CYAN', '=====')}\n`);
    for (const entry of MAIN_MENU) {
      console.log(theme.paint('BRIGHT_GREEN', ` ${entry.key}) ${entry.label}`));
    }
    console.log(theme.paint('BRIGHT_RED', ` ${MENU_EXIT_KEY}) Exit`));

    const line = await container.prompter.ask('\nChoice: ');
    if (line === null) {
      return;
    }
    const choice = line.trim();
    container.audit.record('MENU', choice);
    if (choice === MENU_EXIT_KEY) {
      return;
    }

    const entry = MAIN_MENU.find(candidate => candidate.key === choice);
    if (!entry) {
      container.clearScreen();
      console.log('Invalid choice');
      continue;
    }
    container.clearScreen();
    await guarded(container, async () => {
      await entry.run(container);
    });
  }
}
