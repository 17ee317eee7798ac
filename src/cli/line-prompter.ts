/**
 * Line Prompter
 *
 * Reads one line per prompt from a stream. Lines that arrive before they are
 * asked for (piped input) are queued, so prompts and answers stay strictly
 * ordered. End of input resolves every pending and future prompt with null.
 */

import * as readline from 'readline';

import { QuizPrompter } from '../services/quiz-engine.service';

export class LinePrompter implements QuizPrompter {
  private readonly rl: readline.Interface;
  private readonly queued: string[] = [];
  private readonly waiting: ((line: string | null) => void)[] = [];
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on('line', line => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.queued.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
  }

  ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const line = this.queued.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  close(): void {
    this.rl.close();
  }
}
