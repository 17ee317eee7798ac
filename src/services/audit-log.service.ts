/**
 * Audit Log Service
 *
 * Append-only, write-only record of every mutating action:
 *
 *   2025-01-31T09:05:07.000Z | alice | ADD_Q | networking / Q: What is a switch?
 *
 * One file per local day (`flashcard-YYYY-MM-DD.log`). The application never
 * reads these files back. A failed write is reported through the logger and
 * never aborts the mutation it describes.
 */

import * as fs from 'fs';
import * as path from 'path';

import { Clock, currentUser, dayStamp, systemClock } from '../utils/clock';
import { Logger } from '../utils/console-logger';
import { describeError } from '../models/errors';

export type AuditAction =
  | 'ADD_Q'
  | 'DEL_Q'
  | 'EDIT_Q'
  | 'CREATE_FILE'
  | 'DELETE_FILE'
  | 'RENAME_FILE'
  | 'IMPORT_FILE'
  | 'MENU'
  | `CHOSEN:${string}`;

export interface AuditSink {
  record(action: AuditAction, detail?: string): void;
}

export interface AuditLogOptions {
  logDir: string;
  logger: Logger;
  user?: string;
  retentionDays?: number;
  clock?: Clock;
}

const FILE_PREFIX = 'flashcard-';
const FILE_PATTERN = /^flashcard-(\d{4}-\d{2}-\d{2})\.log$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Collapse line breaks and the field separator so one entry stays one line
 */
export function sanitizeAuditField(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').replace(/\s*\|\s*/g, ' / ').trim();
}

export function formatAuditEntry(timestamp: Date, user: string, action: string, detail: string): string {
  return [timestamp.toISOString(), user, action, detail].map(sanitizeAuditField).join(' | ');
}

export class FileAuditLog implements AuditSink {
  private readonly user: string;
  private readonly retentionDays: number;
  private readonly clock: Clock;
  private currentDay: string | null = null;

  constructor(private readonly options: AuditLogOptions) {
    this.user = options.user ?? currentUser();
    this.retentionDays = options.retentionDays ?? 14;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Path of the file an entry written at `date` goes to
   */
  fileFor(date: Date): string {
    return path.join(this.options.logDir, `${FILE_PREFIX}${dayStamp(date)}.log`);
  }

  record(action: AuditAction, detail = ''): void {
    const now = this.clock();
    try {
      fs.mkdirSync(this.options.logDir, { recursive: true });
      this.rotate(now);
      fs.appendFileSync(this.fileFor(now), `${formatAuditEntry(now, this.user, action, detail)}\n`, 'utf-8');
    } catch (err) {
      this.options.logger.warn(`Audit log write failed: ${describeError(err)}`, { action });
    }
  }

  /**
   * On the first write of a new day, drop files past the retention window
   */
  private rotate(now: Date): void {
    const today = dayStamp(now);
    if (this.currentDay === today) {
      return;
    }
    this.currentDay = today;

    const cutoff = now.getTime() - this.retentionDays * DAY_MS;
    for (const name of fs.readdirSync(this.options.logDir)) {
      const match = FILE_PATTERN.exec(name);
      if (!match) {
        continue;
      }
      const [year, month, day] = match[1].split('-').map(Number);
      if (new Date(year, month - 1, day).getTime() < cutoff) {
        fs.rmSync(path.join(this.options.logDir, name), { force: true });
      }
    }
  }
}

/**
 * Sink that discards entries
 */
export const nullAuditSink: AuditSink = {
  record: () => undefined,
};
