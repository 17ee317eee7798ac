/**
 * Question Management Handlers
 *
 * Add, delete and edit records of one bank. Each action loops on the chosen
 * bank until the user types an exit token.
 */

import { AlreadyExistsError, ValidationError } from '../../models/errors';
import { RECORD_FIELDS, RecordField } from '../../models/question-record.model';
import { ServiceContainer } from '../service-container';
import { askLine, chooseBank, chooseRecord, guarded, printRecords } from './prompts';

export type QuestionAction = 'add' | 'delete' | 'edit' | 'edit-field';

interface QuestionMenuEntry {
  key: string;
  label: string;
  action: QuestionAction;
  field?: RecordField;
}

export const QUESTION_MENU: QuestionMenuEntry[] = [
  { key: '1', label: 'Add questions', action: 'add' },
  { key: '2', label: 'Delete questions', action: 'delete' },
  { key: '3', label: 'Edit whole question', action: 'edit' },
  { key: '4', label: 'Edit question text', action: 'edit-field', field: 'question' },
  { key: '5', label: 'Edit answer', action: 'edit-field', field: 'answer' },
  { key: '6', label: 'Edit description', action: 'edit-field', field: 'hint' },
  { key: '7', label: 'Edit reference', action: 'edit-field', field: 'reference' },
];

const ACTION_VERBS: Record<QuestionAction, string> = {
  add: 'add to',
  delete: 'delete from',
  edit: 'edit',
  'edit-field': 'edit',
};

const FIELD_LABELS: Record<RecordField, string> = {
  question: 'Question',
  answer: 'Answer',
  hint: 'Description',
  reference: 'Reference',
};

/**
 * Add-flow: repeat until exit. Duplicates and empty fields are reported and
 * the loop asks again.
 */
export async function handleAddQuestions(container: ServiceContainer, bank: string): Promise<void> {
  for (;;) {
    printRecords(container, container.store.loadBank(bank).records);

    const question = await askLine(container, '\nQuestion: ');
    if (question === null) return;
    const answer = await askLine(container, 'Answer: ');
    if (answer === null) return;
    if (!question || !answer) {
      container.console.log('Question and answer must not be empty.');
      continue;
    }
    const hint = (await askLine(container, 'Description (optional): ')) ?? '';
    const reference = (await askLine(container, 'Reference (optional): ')) ?? '';

    try {
      container.store.addRecord(bank, { question, answer, hint, reference });
      container.clearScreen();
      container.console.log(container.theme.paint('GREEN', 'Question added.'));
    } catch (err) {
      if (err instanceof AlreadyExistsError) {
        container.clearScreen();
        container.console.log(container.theme.paint('RED', 'This question already exists, skipped.'));
      } else if (err instanceof ValidationError) {
        container.console.log(err.message);
      } else {
        throw err;
      }
    }
  }
}

export async function handleDeleteQuestions(container: ServiceContainer, bank: string): Promise<void> {
  for (;;) {
    const record = await chooseRecord(container, bank, 'delete');
    if (!record) return;
    const removed = container.store.deleteRecord(bank, record.id);
    container.clearScreen();
    container.console.log(`Deleted: ${removed.question}`);
  }
}

/**
 * Edit every field; a blank answer keeps the old value
 */
export async function handleEditQuestions(container: ServiceContainer, bank: string): Promise<void> {
  for (;;) {
    const record = await chooseRecord(container, bank, 'edit');
    if (!record) return;

    const patch: Partial<Record<RecordField, string>> = {};
    for (const field of RECORD_FIELDS) {
      const value = await askLine(container, `New ${FIELD_LABELS[field].toLowerCase()} (was: ${record[field]}): `);
      if (value === null) return;
      patch[field] = value;
    }

    container.store.updateRecord(bank, record.id, patch);
    container.clearScreen();
    container.console.log('Question updated.');
  }
}

/**
 * Edit a single field; a blank answer leaves the record unchanged
 */
export async function handleEditField(container: ServiceContainer, bank: string, field: RecordField): Promise<void> {
  for (;;) {
    const record = await chooseRecord(container, bank, 'edit');
    if (!record) return;

    const value = await askLine(container, `New ${FIELD_LABELS[field].toLowerCase()} (was: ${record[field]}): `);
    if (value === null) return;
    if (!value) {
      container.console.log('Unchanged.');
      continue;
    }

    container.store.updateField(bank, record.id, field, value);
    container.clearScreen();
    container.console.log('Question updated.');
  }
}

async function runQuestionAction(container: ServiceContainer, entry: QuestionMenuEntry): Promise<void> {
  const bank = await chooseBank(container, ACTION_VERBS[entry.action]);
  if (!bank) {
    return;
  }
  switch (entry.action) {
    case 'add':
      return handleAddQuestions(container, bank);
    case 'delete':
      return handleDeleteQuestions(container, bank);
    case 'edit':
      return handleEditQuestions(container, bank);
    case 'edit-field':
      return handleEditField(container, bank, entry.field ?? 'question');
  }
}

/**
 * Manage-questions menu loop
 */
export async function handleManageQuestions(container: ServiceContainer): Promise<void> {
  const { console, theme } = container;
  for (;;) {
    console.log(`\n${theme.paint('BRIGHT_CYAN', '=====')} ${theme.paint('BRIGHT_GREEN', 'MANAGE QUESTIONS')} ${theme.paint('BRIGHT_CYAN', '=====')}\n`);
    for (const entry of QUESTION_MENU) {
      console.log(theme.paint('BRIGHT_GREEN', ` ${entry.key}) ${entry.label}`));
    }
    console.log(`\nOr type ${theme.paint('BRIGHT_RED', container.config.quiz.exitTokens[0])} to go back`);

    const choice = await askLine(container, '\nChoice: ');
    if (choice === null) {
      container.clearScreen();
      return;
    }
    const entry = QUESTION_MENU.find(candidate => candidate.key === choice);
    if (!entry) {
      console.log('Invalid choice.');
      continue;
    }
    await guarded(container, () => runQuestionAction(container, entry));
  }
}
