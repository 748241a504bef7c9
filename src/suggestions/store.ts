import { randomBytes } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { ageInDays, systemClock, toLocalIsoString, type Clock } from './clock.js';
import {
  IdGenerationError,
  InvalidStatusError,
  InvalidSuggestionError,
  StoreWriteError,
  SuggestionNotFoundError
} from './errors.js';
import { isPlainObject, isReviewedStatus, isSuggestionStatus } from './types.js';
import type {
  ClearFilters,
  ExecutionResult,
  ListFilters,
  ReviewedStatus,
  SuggestionMetadata,
  SuggestionRecord,
  SuggestionRow,
  SuggestionStatistics,
  SuggestionStatus
} from './types.js';

export const DEFAULT_STATE_DIR = '.refactor-review';
export const DEFAULT_STORE_FILE = 'suggestions.json';
const DEFAULT_MAX_ID_ATTEMPTS = 32;

export interface RecoveryInfo {
  filePath: string;
  reason: string;
}

export interface SuggestionStoreOptions {
  stateDirName?: string;
  fileName?: string;
  clock?: Clock;
  generateId?: () => string;
  /** Upper bound on id draws before giving up on a collision streak. */
  maxIdAttempts?: number;
  /** Called when an unreadable backing file is discarded and rewritten empty. */
  onRecover?: (info: RecoveryInfo) => void;
}

type LoadResult =
  | { ok: true; suggestions: Map<string, SuggestionRecord> }
  | { ok: false; reason: string };

const defaultIdGenerator = (): string => randomBytes(4).toString('hex');

const isSuggestionRow = (value: unknown): value is SuggestionRow =>
  isPlainObject(value) &&
  typeof value.id === 'string' &&
  typeof value.file_path === 'string' &&
  isPlainObject(value.data) &&
  isSuggestionStatus(value.status) &&
  typeof value.created_at === 'string' &&
  typeof value.updated_at === 'string' &&
  isPlainObject(value.metadata) &&
  (value.execution_result === null || isPlainObject(value.execution_result));

const toRecord = (row: SuggestionRow): SuggestionRecord => ({
  id: row.id,
  filePath: row.file_path,
  data: row.data,
  status: row.status,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  metadata: row.metadata,
  executionResult: row.execution_result
});

const toRow = (record: SuggestionRecord): SuggestionRow => ({
  id: record.id,
  file_path: record.filePath,
  data: record.data,
  status: record.status,
  created_at: record.createdAt,
  updated_at: record.updatedAt,
  metadata: record.metadata,
  execution_result: record.executionResult
});

/**
 * Copy a caller value through JSON so memory holds exactly what the backing
 * file will hold. Values JSON cannot encode (cycles, BigInt) are rejected.
 */
const toJsonRecord = (value: Record<string, unknown>, label: string): Record<string, unknown> => {
  let copy: unknown;
  try {
    copy = JSON.parse(JSON.stringify(value));
  } catch (error) {
    throw new InvalidSuggestionError(
      `${label} cannot be stored as JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isPlainObject(copy)) {
    throw new InvalidSuggestionError(`${label} must serialize to a JSON object`);
  }
  return copy;
};

const createdAtMs = (record: SuggestionRecord): number => {
  const parsed = Date.parse(record.createdAt);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
};

/**
 * File-backed store of refactoring suggestions.
 *
 * Holds every record in memory and rewrites the whole backing file after each
 * mutation. Reads never touch the disk. One instance per backing file: two
 * instances on the same file race and the last write wins.
 */
export class SuggestionStore {
  readonly stateDir: string;
  readonly filePath: string;

  private suggestions = new Map<string, SuggestionRecord>();
  private readonly clock: Clock;
  private readonly generateId: () => string;
  private readonly maxIdAttempts: number;
  private readonly onRecover?: (info: RecoveryInfo) => void;

  constructor(projectRoot: string, options: SuggestionStoreOptions = {}) {
    this.stateDir = path.join(projectRoot, options.stateDirName ?? DEFAULT_STATE_DIR);
    this.filePath = path.join(this.stateDir, options.fileName ?? DEFAULT_STORE_FILE);
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? defaultIdGenerator;
    this.maxIdAttempts = options.maxIdAttempts ?? DEFAULT_MAX_ID_ATTEMPTS;
    this.onRecover = options.onRecover;

    this.ensureStateDir();
    this.load();
  }

  /**
   * Add a new pending suggestion and return its generated id.
   * `data` must be a plain object; anything else is rejected before any state changes.
   */
  create(filePath: string, data: unknown, metadata?: SuggestionMetadata): string {
    if (!isPlainObject(data)) {
      throw new InvalidSuggestionError('Suggestion data must be a structured record (plain object)');
    }

    const storedData = toJsonRecord(data, 'Suggestion data');
    const storedMetadata = toJsonRecord(metadata ?? {}, 'Suggestion metadata');
    const id = this.nextId();
    const now = toLocalIsoString(this.clock());

    this.suggestions.set(id, {
      id,
      filePath,
      data: storedData,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
      metadata: storedMetadata,
      executionResult: null
    });
    this.persist();

    return id;
  }

  get(id: string): SuggestionRecord {
    return structuredClone(this.require(id));
  }

  /** Newest first. Filters combine; a positive `limit` truncates after sorting. */
  list(filters: ListFilters = {}): SuggestionRecord[] {
    const results = [...this.suggestions.values()]
      .filter((record) => !filters.status || record.status === filters.status)
      .filter((record) => !filters.filePath || record.filePath === filters.filePath)
      .sort((a, b) => {
        const diff = createdAtMs(b) - createdAtMs(a);
        return Number.isNaN(diff) ? 0 : diff;
      });

    const limited = filters.limit && filters.limit > 0 ? results.slice(0, filters.limit) : results;
    return limited.map((record) => structuredClone(record));
  }

  /**
   * Move a suggestion to `status` and refresh `updatedAt`, which always ends up
   * later than its previous value. A record never returns to `pending`.
   * A result with no keys (or none at all) keeps the previously stored result.
   */
  updateStatus(id: string, status: ReviewedStatus, executionResult?: ExecutionResult | null): void {
    if (!isReviewedStatus(status)) {
      throw new InvalidStatusError(String(status));
    }

    const record = this.require(id);
    const result =
      executionResult && Object.keys(executionResult).length > 0
        ? toJsonRecord(executionResult, 'Execution result')
        : undefined;

    record.status = status;
    record.updatedAt = this.nextUpdatedAt(record.updatedAt);

    if (result) {
      record.executionResult = result;
    }

    this.persist();
  }

  delete(id: string): void {
    this.require(id);
    this.suggestions.delete(id);
    this.persist();
  }

  /**
   * Remove every suggestion matching the filters (all of them when none are given).
   * Returns the number removed; the file is only rewritten when that is non-zero.
   */
  clear(filters: ClearFilters = {}): number {
    const now = this.clock();
    const olderThanDays = filters.olderThanDays && filters.olderThanDays > 0 ? filters.olderThanDays : undefined;

    const selected = [...this.suggestions.values()]
      .filter((record) => !filters.status || record.status === filters.status)
      .filter((record) => olderThanDays === undefined || ageInDays(record.createdAt, now) >= olderThanDays)
      .map((record) => record.id);

    for (const id of selected) {
      this.suggestions.delete(id);
    }

    if (selected.length > 0) {
      this.persist();
    }

    return selected.length;
  }

  statistics(): SuggestionStatistics {
    const byStatus: Record<SuggestionStatus, number> = {
      pending: 0,
      approved: 0,
      rejected: 0,
      executed: 0,
      failed: 0
    };
    const byFile = new Map<string, number>();

    for (const record of this.suggestions.values()) {
      byStatus[record.status] += 1;
      byFile.set(record.filePath, (byFile.get(record.filePath) ?? 0) + 1);
    }

    return {
      total: this.suggestions.size,
      byStatus,
      byFile: Object.fromEntries(byFile)
    };
  }

  count(): number {
    return this.suggestions.size;
  }

  private require(id: string): SuggestionRecord {
    const record = this.suggestions.get(id);
    if (!record) {
      throw new SuggestionNotFoundError(id);
    }
    return record;
  }

  private nextUpdatedAt(previous: string): string {
    const now = this.clock();
    const previousMs = Date.parse(previous);

    if (!Number.isNaN(previousMs) && now.getTime() <= previousMs) {
      return toLocalIsoString(new Date(previousMs + 1));
    }
    return toLocalIsoString(now);
  }

  private nextId(): string {
    for (let attempt = 1; attempt <= this.maxIdAttempts; attempt += 1) {
      const candidate = this.generateId();
      if (!this.suggestions.has(candidate)) {
        return candidate;
      }
    }

    throw new IdGenerationError(this.maxIdAttempts);
  }

  private ensureStateDir(): void {
    try {
      mkdirSync(this.stateDir, { recursive: true });
    } catch (error) {
      throw new StoreWriteError(`Failed to create state directory ${this.stateDir}`, this.stateDir, { cause: error });
    }
  }

  private load(): void {
    if (!existsSync(this.filePath)) {
      this.persist();
      return;
    }

    const result = this.readBackingFile();
    if (result.ok) {
      this.suggestions = result.suggestions;
      return;
    }

    // Unreadable state is discarded and the file rewritten empty.
    this.suggestions = new Map();
    this.persist();
    this.onRecover?.({ filePath: this.filePath, reason: result.reason });
  }

  private readBackingFile(): LoadResult {
    let parsed: unknown;

    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    if (!isPlainObject(parsed)) {
      return { ok: false, reason: 'top-level value is not an object' };
    }

    const suggestions = new Map<string, SuggestionRecord>();
    for (const [id, row] of Object.entries(parsed)) {
      if (!isSuggestionRow(row) || row.id !== id) {
        return { ok: false, reason: `malformed suggestion entry "${id}"` };
      }
      suggestions.set(id, toRecord(row));
    }

    return { ok: true, suggestions };
  }

  private persist(): void {
    const rows = Object.fromEntries([...this.suggestions].map(([id, record]) => [id, toRow(record)]));

    try {
      writeFileSync(this.filePath, JSON.stringify(rows, null, 2), 'utf-8');
    } catch (error) {
      throw new StoreWriteError(`Failed to save suggestions to ${this.filePath}`, this.filePath, { cause: error });
    }
  }
}
