/**
 * Bank Cache
 *
 * Parsed banks keyed by bank name. An entry is only served while the file's
 * mtime matches the one it was parsed from, so edits made by other tools are
 * picked up; the store also invalidates explicitly on every write.
 */

import { QuestionRecord } from '../models/question-record.model';
import { ParseWarning } from '../parsers/bank-parser';

export interface CachedBank {
  mtimeMs: number;
  records: QuestionRecord[];
  warnings: ParseWarning[];
}

export class BankCache {
  private readonly entries = new Map<string, CachedBank>();

  get(name: string, mtimeMs: number): CachedBank | undefined {
    const entry = this.entries.get(name);
    if (!entry) {
      return undefined;
    }
    if (entry.mtimeMs !== mtimeMs) {
      this.entries.delete(name);
      return undefined;
    }
    return entry;
  }

  set(name: string, entry: CachedBank): void {
    this.entries.set(name, entry);
  }

  invalidate(name: string): void {
    this.entries.delete(name);
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }
}
