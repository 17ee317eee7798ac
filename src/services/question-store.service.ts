/**
 * Question Store Service
 *
 * CRUD over one directory of CSV question banks, one file per bank.
 *
 * Every mutation is load -> mutate -> save of the whole bank. Saves write a
 * temp file and rename it over the target while holding an advisory
 * `<file>.lock`, so a crash mid-write never truncates a bank and two
 * processes never interleave writes to the same file.
 *
 * @example
 * ```typescript
 * const store = new QuestionStore({ questionsDir: './questions', logger, audit });
 * store.createBank('networking');
 * const record = store.addRecord('networking', { question: 'Which layer routes packets?', answer: 'Network' });
 * store.updateField('networking', record.id, 'hint', 'OSI layer 3');
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';

import { globSync } from 'glob';

import { BankCache, CachedBank } from '../cache/bank-cache';
import {
  AlreadyExistsError,
  NotFoundError,
  StorageError,
  ValidationError,
  describeError,
} from '../models/errors';
import {
  QuestionDraft,
  QuestionRecord,
  RECORD_FIELDS,
  RecordField,
  REQUIRED_FIELDS,
  createQuestionRecord,
  isDuplicateRecord,
  sortRecords,
} from '../models/question-record.model';
import { ParseWarning, parseBank, parseLegacyBank, serializeBank } from '../parsers/bank-parser';
import { Logger } from '../utils/console-logger';
import { AuditSink, nullAuditSink } from './audit-log.service';

export interface QuestionStoreOptions {
  questionsDir: string;
  logger: Logger;
  audit?: AuditSink;
  extension?: string;
  duplicatesCaseSensitive?: boolean;
  /** Age after which an abandoned lock file is broken */
  staleLockMs?: number;
}

export interface LoadedBank {
  name: string;
  records: QuestionRecord[];
  warnings: ParseWarning[];
}

export interface BankSummary {
  name: string;
  count: number;
}

export interface LegacyImportResult {
  bank: string;
  imported: number;
  warnings: ParseWarning[];
}

const DEFAULT_STALE_LOCK_MS = 30_000;

export class QuestionStore {
  readonly questionsDir: string;
  readonly extension: string;

  private readonly cache = new BankCache();
  private readonly logger: Logger;
  private readonly audit: AuditSink;
  private readonly duplicatesCaseSensitive: boolean;
  private readonly staleLockMs: number;

  constructor(options: QuestionStoreOptions) {
    this.questionsDir = options.questionsDir;
    this.extension = options.extension ?? '.csv';
    this.logger = options.logger;
    this.audit = options.audit ?? nullAuditSink;
    this.duplicatesCaseSensitive = options.duplicatesCaseSensitive ?? false;
    this.staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;

    fs.mkdirSync(this.questionsDir, { recursive: true });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Banks
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Bank names (file names without the extension), sorted
   */
  listBanks(): string[] {
    return globSync(`*${this.extension}`, { cwd: this.questionsDir, nodir: true })
      .map(file => path.basename(file, this.extension))
      .sort((a, b) => a.localeCompare(b));
  }

  describeBanks(): BankSummary[] {
    return this.listBanks().map(name => ({ name, count: this.loadBank(name).records.length }));
  }

  bankExists(name: string): boolean {
    return fs.existsSync(this.bankPath(name));
  }

  /**
   * Absolute path of a bank file; the name is validated first
   */
  bankPath(name: string): string {
    return path.join(this.questionsDir, `${this.normalizeBankName(name)}${this.extension}`);
  }

  createBank(name: string): string {
    const bank = this.normalizeBankName(name);
    if (this.bankExists(bank)) {
      throw new AlreadyExistsError('bank', bank);
    }
    this.saveBank(bank, []);
    this.audit.record('CREATE_FILE', this.bankPath(bank));
    return bank;
  }

  deleteBank(name: string): void {
    const bank = this.requireBank(name);
    const filePath = this.bankPath(bank);
    try {
      fs.rmSync(filePath);
    } catch (err) {
      throw new StorageError(`Failed to delete ${filePath}: ${describeError(err)}`, filePath, err);
    }
    this.cache.invalidate(bank);
    this.audit.record('DELETE_FILE', filePath);
  }

  renameBank(name: string, newName: string): string {
    const bank = this.requireBank(name);
    const target = this.normalizeBankName(newName);
    if (target === bank) {
      return bank;
    }
    if (this.bankExists(target)) {
      throw new AlreadyExistsError('bank', target);
    }

    const from = this.bankPath(bank);
    const to = this.bankPath(target);
    try {
      fs.renameSync(from, to);
    } catch (err) {
      throw new StorageError(`Failed to rename ${from}: ${describeError(err)}`, from, err);
    }
    this.cache.invalidate(bank);
    this.cache.invalidate(target);
    this.audit.record('RENAME_FILE', `${from} -> ${to}`);
    return target;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Load / save
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Parse a bank. Bad rows are skipped or repaired and reported as warnings.
   * The returned records are copies; mutating them does not touch the cache.
   */
  loadBank(name: string): LoadedBank {
    const bank = this.requireBank(name);
    const filePath = this.bankPath(bank);

    const entry = this.readBank(bank, filePath);
    return {
      name: bank,
      records: structuredClone(entry.records),
      warnings: [...entry.warnings],
    };
  }

  /**
   * Union of every bank, for play-all sessions
   */
  loadAll(): QuestionRecord[] {
    return this.listBanks().flatMap(name => this.loadBank(name).records);
  }

  /**
   * Sort and atomically rewrite a bank. Ids are written as-is; positions are
   * never persisted.
   */
  saveBank(name: string, records: readonly QuestionRecord[]): QuestionRecord[] {
    const bank = this.normalizeBankName(name);
    const filePath = this.bankPath(bank);
    const sorted = sortRecords(records).map(record => ({ ...record, source: bank }));

    this.withLock(filePath, () => {
      const tempPath = `${filePath}.tmp`;
      try {
        fs.writeFileSync(tempPath, serializeBank(sorted), 'utf-8');
        fs.renameSync(tempPath, filePath);
      } catch (err) {
        fs.rmSync(tempPath, { force: true });
        throw new StorageError(`Failed to write ${filePath}: ${describeError(err)}`, filePath, err);
      } finally {
        this.cache.invalidate(bank);
      }
    });

    return sorted;
  }

  invalidate(name: string): void {
    this.cache.invalidate(name);
  }

  invalidateAll(): void {
    this.cache.invalidateAll();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Records
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Add a record; rejects empty question/answer and duplicate pairs
   */
  addRecord(name: string, draft: QuestionDraft): QuestionRecord {
    const { name: bank, records } = this.loadBank(name);
    const record = createQuestionRecord(draft, bank);

    for (const field of REQUIRED_FIELDS) {
      if (!record[field]) {
        throw new ValidationError(`${field} must not be empty`, field);
      }
    }
    if (records.some(existing => isDuplicateRecord(existing, record, this.duplicatesCaseSensitive))) {
      throw new AlreadyExistsError('record', record.question);
    }

    this.saveBank(bank, [...records, record]);
    this.audit.record('ADD_Q', `${bank} / Q: ${record.question}`);
    return record;
  }

  deleteRecord(name: string, id: string): QuestionRecord {
    const { name: bank, records } = this.loadBank(name);
    const index = records.findIndex(record => record.id === id);
    if (index < 0) {
      throw new NotFoundError('record', id);
    }

    const [removed] = records.splice(index, 1);
    this.saveBank(bank, records);
    this.audit.record('DEL_Q', `${bank} / Q: ${removed.question}`);
    return removed;
  }

  /**
   * Replace one text field. Emphasis on that field is dropped, since the new
   * value is plain text.
   */
  updateField(name: string, id: string, field: RecordField, value: string): QuestionRecord {
    const patch: Partial<Record<RecordField, string>> = {};
    patch[field] = value;
    return this.updateRecord(name, id, patch, { keepEmpty: false });
  }

  /**
   * Patch several fields at once. By default a blank value keeps the old
   * text, which is how the edit-everything prompt works.
   */
  updateRecord(
    name: string,
    id: string,
    patch: Partial<Record<RecordField, string>>,
    options: { keepEmpty?: boolean } = {}
  ): QuestionRecord {
    const keepEmpty = options.keepEmpty ?? true;
    const { name: bank, records } = this.loadBank(name);
    const record = records.find(candidate => candidate.id === id);
    if (!record) {
      throw new NotFoundError('record', id);
    }

    for (const field of RECORD_FIELDS) {
      const raw = patch[field];
      if (raw === undefined) {
        continue;
      }
      const value = raw.trim();
      if (!value && keepEmpty) {
        continue;
      }
      if (!value && REQUIRED_FIELDS.includes(field)) {
        throw new ValidationError(`${field} must not be empty`, field);
      }
      record[field] = value;
      if (record.emphasis) {
        delete record.emphasis[field];
      }
    }

    this.saveBank(bank, records);
    this.audit.record('EDIT_Q', `${bank} / Q: ${record.question}`);
    return record;
  }

  /**
   * Convert a legacy `id;answer;question` text file into a new CSV bank
   */
  importLegacyBank(filePath: string, name?: string, delimiter = ';'): LegacyImportResult {
    if (!fs.existsSync(filePath)) {
      throw new NotFoundError('bank', filePath);
    }
    const bank = this.normalizeBankName(name ?? path.basename(filePath, path.extname(filePath)));
    if (this.bankExists(bank)) {
      throw new AlreadyExistsError('bank', bank);
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new StorageError(`Failed to read ${filePath}: ${describeError(err)}`, filePath, err);
    }

    const parsed = parseLegacyBank(content, bank, delimiter);
    for (const warning of parsed.warnings) {
      this.logger.warn(`${path.basename(filePath)}:${warning.line}: ${warning.message}`);
    }

    this.saveBank(bank, parsed.records);
    this.audit.record('IMPORT_FILE', `${filePath} -> ${this.bankPath(bank)}`);
    return { bank, imported: parsed.records.length, warnings: parsed.warnings };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Trim, drop a typed extension and reject names that escape the directory
   * or would be hidden from listBanks
   */
  normalizeBankName(name: string): string {
    let bank = name.trim();
    if (bank.toLowerCase().endsWith(this.extension.toLowerCase())) {
      bank = bank.slice(0, -this.extension.length).trim();
    }
    if (!bank) {
      throw new ValidationError('Bank name must not be empty', 'name');
    }
    if (/[\\/\0]/.test(bank) || bank.startsWith('.')) {
      throw new ValidationError(`Invalid bank name: ${name}`, 'name');
    }
    return bank;
  }

  private requireBank(name: string): string {
    const bank = this.normalizeBankName(name);
    if (!this.bankExists(bank)) {
      throw new NotFoundError('bank', bank);
    }
    return bank;
  }

  private readBank(bank: string, filePath: string): CachedBank {
    try {
      const mtimeMs = fs.statSync(filePath).mtimeMs;
      const cached = this.cache.get(bank, mtimeMs);
      if (cached) {
        return cached;
      }

      const parsed = parseBank(fs.readFileSync(filePath, 'utf-8'), bank);
      for (const warning of parsed.warnings) {
        this.logger.warn(`${bank}${this.extension}:${warning.line}: ${warning.message}`);
      }
      const entry = { mtimeMs, records: parsed.records, warnings: parsed.warnings };
      this.cache.set(bank, entry);
      return entry;
    } catch (err) {
      throw new StorageError(`Failed to read ${filePath}: ${describeError(err)}`, filePath, err);
    }
  }

  private withLock(filePath: string, write: () => void): void {
    const lockPath = `${filePath}.lock`;
    const fd = this.acquireLock(lockPath);
    try {
      write();
    } finally {
      fs.closeSync(fd);
      fs.rmSync(lockPath, { force: true });
    }
  }

  private acquireLock(lockPath: string, retried = false): number {
    try {
      return fs.openSync(lockPath, 'wx');
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') {
        throw new StorageError(`Failed to lock ${lockPath}: ${describeError(err)}`, lockPath, err);
      }
    }

    let lockedAt: number;
    try {
      lockedAt = fs.statSync(lockPath).mtimeMs;
    } catch (err) {
      // Released between the open and the stat
      if (!retried && isErrnoException(err) && err.code === 'ENOENT') {
        return this.acquireLock(lockPath, true);
      }
      throw new StorageError(`Failed to inspect lock ${lockPath}: ${describeError(err)}`, lockPath, err);
    }

    const age = Date.now() - lockedAt;
    if (age < this.staleLockMs) {
      throw new StorageError(`Bank is being written by another process: ${lockPath}`, lockPath);
    }

    this.logger.warn(`Breaking stale lock ${lockPath}`);
    fs.rmSync(lockPath, { force: true });
    try {
      return fs.openSync(lockPath, 'wx');
    } catch (err) {
      throw new StorageError(`Failed to lock ${lockPath}: ${describeError(err)}`, lockPath, err);
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
