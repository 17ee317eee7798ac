/**
 * Interactive CLI Tests
 *
 * Drives the main menu and the handlers with a scripted prompter and a
 * recording console against a temporary questions directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { loadConfig } from '../config/config-loader';
import { AuditAction, AuditSink } from '../services/audit-log.service';
import { QuizPrompter } from '../services/quiz-engine.service';
import { silentLogger } from '../utils/console-logger';
import { handleDeleteBank, handleImport, handleListBanks, handleManageFiles } from './handlers/file-handlers';
import {
  handleAddQuestions,
  handleDeleteQuestions,
  handleEditField,
  handleEditQuestions,
  handleManageQuestions,
} from './handlers/question-handlers';
import { choosePreset, handlePlayAll, handlePlayBank } from './handlers/quiz-handlers';
import { runMainMenu } from './menu';
import { IConsole, ServiceContainer } from './service-container';
import { Theme } from './theme';

class QueuePrompter implements QuizPrompter {
  readonly prompts: string[] = [];

  constructor(private readonly lines: string[]) {}

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    const line = this.lines.shift();
    return line === undefined ? null : line;
  }
}

class RecordingConsole implements IConsole {
  readonly lines: string[] = [];
  readonly errors: string[] = [];
  clears = 0;

  log(...args: unknown[]): void {
    this.lines.push(args.map(String).join(' '));
  }
  error(...args: unknown[]): void {
    this.errors.push(args.map(String).join(' '));
  }
  clear(): void {
    this.clears++;
  }
}

class RecordingAudit implements AuditSink {
  readonly entries: { action: AuditAction; detail?: string }[] = [];
  record(action: AuditAction, detail?: string): void {
    this.entries.push({ action, detail });
  }
}

describe('Interactive CLI', () => {
  let tempDir: string;
  let output: RecordingConsole;
  let audit: RecordingAudit;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flashcard-cli-test-'));
    output = new RecordingConsole();
    audit = new RecordingAudit();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function container(lines: string[]): ServiceContainer {
    return new ServiceContainer({
      config: { ...loadConfig({ cwd: tempDir }), user: 'tester' },
      console: output,
      prompter: new QueuePrompter(lines),
      logger: silentLogger,
      audit,
      theme: new Theme(false),
      clock: () => new Date(2025, 0, 31, 9, 5, 7),
    });
  }

  function seedGeo(app: ServiceContainer): void {
    app.store.createBank('geo');
    app.store.addRecord('geo', { question: 'Capital of France?', answer: 'Paris', hint: 'On the Seine' });
    app.store.addRecord('geo', { question: 'Capital of Norway?', answer: 'Oslo' });
    audit.entries.length = 0;
  }

  describe('runMainMenu', () => {
    it('should audit each choice and report invalid ones', async () => {
      await runMainMenu(container(['9', '0']));

      expect(output.lines).toContain('Invalid choice');
      expect(audit.entries).toEqual([
        { action: 'MENU', detail: '9' },
        { action: 'MENU', detail: '0' },
      ]);
    });

    it('should return at end of input', async () => {
      await expect(runMainMenu(container([]))).resolves.toBeUndefined();
    });

    it('should create and rename a bank through the file menu', async () => {
      const app = container(['4', '1', 'geo', '3', '1', 'world', 'exit()', '0']);

      await runMainMenu(app);

      expect(app.store.listBanks()).toEqual(['world']);
      expect(output.lines).toContain('Created geo.csv');
      expect(output.lines).toContain('Renamed geo -> world');
    });

    it('should keep running after a failed action', async () => {
      const app = container(['4', '1', 'geo', 'exit()', '0']);
      app.store.createBank('geo');
      audit.entries.length = 0;

      await runMainMenu(app);

      expect(output.errors).toEqual(['Bank already exists: geo']);
      expect(audit.entries).toEqual([
        { action: 'MENU', detail: '4' },
        { action: 'MENU', detail: '0' },
      ]);
    });
  });

  describe('file handlers', () => {
    it('should delete a bank after confirmation', async () => {
      const app = container(['1', 'y']);
      app.store.createBank('geo');

      await handleDeleteBank(app);

      expect(app.store.listBanks()).toEqual([]);
    });

    it('should keep the bank when not confirmed', async () => {
      const app = container(['1', 'n']);
      app.store.createBank('geo');

      await handleDeleteBank(app);

      expect(app.store.listBanks()).toEqual(['geo']);
    });

    it('should go back from the file menu on exit', async () => {
      const app = container(['exit()']);
      await handleManageFiles(app);
      expect(output.lines).toContain('No question banks yet.');
    });

    it('should list banks with their counts', () => {
      const app = container([]);
      seedGeo(app);

      handleListBanks(app);

      expect(output.lines).toEqual(['geo\t2']);
    });

    it('should import a legacy text file', () => {
      const app = container([]);
      const legacy = path.join(tempDir, 'capitals.txt');
      fs.writeFileSync(legacy, '1;Paris;Capital of France?\nbroken\n2;Rome;Capital of Italy?\n');

      handleImport(app, legacy, { delimiter: ';' });

      expect(output.lines).toEqual(['Imported 2 question(s) into capitals.csv', '1 line(s) skipped']);
      expect(app.store.loadBank('capitals').records.map(record => record.answer)).toEqual(['Paris', 'Rome']);
    });
  });

  describe('question handlers', () => {
    it('should add questions until exit', async () => {
      const app = container(['Capital of Italy?', 'Rome', '', 'atlas', 'exit()']);
      seedGeo(app);

      await handleAddQuestions(app, 'geo');

      const rome = app.store.loadBank('geo').records.find(record => record.answer === 'Rome');
      expect(rome).toMatchObject({ question: 'Capital of Italy?', hint: '', reference: 'atlas' });
      expect(output.lines).toContain('Question added.');
    });

    it('should report a duplicate and keep asking', async () => {
      const app = container(['capital of france?', 'PARIS', '', '', 'exit()']);
      seedGeo(app);

      await handleAddQuestions(app, 'geo');

      expect(output.lines).toContain('This question already exists, skipped.');
      expect(app.store.loadBank('geo').records).toHaveLength(2);
    });

    it('should refuse an empty answer', async () => {
      const app = container(['Capital of Italy?', '', 'exit()']);
      seedGeo(app);

      await handleAddQuestions(app, 'geo');

      expect(output.lines).toContain('Question and answer must not be empty.');
      expect(app.store.loadBank('geo').records).toHaveLength(2);
    });

    it('should delete the record at the chosen position', async () => {
      const app = container(['1', 'exit()']);
      seedGeo(app);

      await handleDeleteQuestions(app, 'geo');

      expect(output.lines).toContain('Deleted: Capital of Norway?');
      expect(app.store.loadBank('geo').records.map(record => record.answer)).toEqual(['Paris']);
    });

    it('should re-prompt on an out-of-range position', async () => {
      const app = container(['7', 'exit()']);
      seedGeo(app);

      await handleDeleteQuestions(app, 'geo');

      expect(output.lines).toContain('Invalid choice, try again.');
      expect(app.store.loadBank('geo').records).toHaveLength(2);
    });

    it('should edit one field', async () => {
      const app = container(['2', 'A river city', 'exit()']);
      seedGeo(app);

      await handleEditField(app, 'geo', 'hint');

      const paris = app.store.loadBank('geo').records.find(record => record.answer === 'Paris');
      expect(paris?.hint).toBe('A river city');
      expect(audit.entries).toEqual([{ action: 'EDIT_Q', detail: 'geo / Q: Capital of France?' }]);
    });

    it('should keep blank answers in a whole-record edit', async () => {
      const app = container(['2', '', 'Lutetia', '', 'Roman name', 'exit()']);
      seedGeo(app);

      await handleEditQuestions(app, 'geo');

      const edited = app.store.loadBank('geo').records.find(record => record.answer === 'Lutetia');
      expect(edited).toMatchObject({ question: 'Capital of France?', hint: 'On the Seine', reference: 'Roman name' });
    });

    it('should run an action chosen from the questions menu', async () => {
      const app = container(['2', '1', '1', 'exit()', 'exit()']);
      seedGeo(app);

      await handleManageQuestions(app);

      expect(app.store.loadBank('geo').records).toHaveLength(1);
    });
  });

  describe('quiz handlers', () => {
    it('should list the default first and match presets by key', async () => {
      const app = container(['7', '3']);

      const preset = await choosePreset(app, app.config.quiz.defaults.all);

      expect(preset?.key).toBe('3');
      expect(output.lines).toContain('0 - Default (all banks) [15 card(s), 4 option(s)]');
      expect(output.lines).toContain('4 - Hardcore (100 cards, 8 to 24 options) [100 card(s), 8-24 option(s)]');
      expect(output.lines).toContain('Invalid choice, try again.');
    });

    it('should play one bank and export the answered questions', async () => {
      const app = container(['1', '0', 'a']);
      seedGeo(app);

      const run = await handlePlayBank(app);

      expect(run?.summary).toMatchObject({ total: 1, score: 1, aborted: true, user: 'tester' });
      expect(run?.exportPath).toBe(path.join(tempDir, 'exports', 'quiz_results_20250131_090507.csv'));
      expect(output.lines).toContain('\nFinished early after 1 question(s).\n');
    });

    it('should return to the menu when a difficulty is not chosen', async () => {
      const app = container(['exit()']);
      seedGeo(app);

      expect(await handlePlayAll(app)).toBeNull();
    });

    it('should say so when there is nothing to play', async () => {
      const app = container([]);

      expect(await handlePlayAll(app)).toBeNull();
      expect(output.lines).toContain('No questions to play.');
    });
  });
});
