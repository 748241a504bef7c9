export const SUGGESTION_STATUSES = ['pending', 'approved', 'rejected', 'executed', 'failed'] as const;

/** Lifecycle stage of a refactoring suggestion. */
export type SuggestionStatus = (typeof SUGGESTION_STATUSES)[number];

/** Statuses a record can move to; nothing returns to `pending`. */
export type ReviewedStatus = Exclude<SuggestionStatus, 'pending'>;

/** Opaque structured payload produced by the suggestion generator. */
export type SuggestionData = Record<string, unknown>;

export type SuggestionMetadata = Record<string, unknown>;

export type ExecutionResult = Record<string, unknown>;

export interface SuggestionRecord {
  id: string;
  filePath: string;
  data: SuggestionData;
  status: SuggestionStatus;
  /** ISO-8601, local clock with UTC offset. */
  createdAt: string;
  updatedAt: string;
  metadata: SuggestionMetadata;
  executionResult: ExecutionResult | null;
}

/** On-disk shape of a record inside the backing file. */
export interface SuggestionRow {
  id: string;
  file_path: string;
  data: SuggestionData;
  status: SuggestionStatus;
  created_at: string;
  updated_at: string;
  metadata: SuggestionMetadata;
  execution_result: ExecutionResult | null;
}

export interface ListFilters {
  status?: SuggestionStatus;
  filePath?: string;
  limit?: number;
}

export interface ClearFilters {
  status?: SuggestionStatus;
  olderThanDays?: number;
}

export interface SuggestionStatistics {
  total: number;
  byStatus: Record<SuggestionStatus, number>;
  byFile: Record<string, number>;
}

export const isSuggestionStatus = (value: unknown): value is SuggestionStatus =>
  typeof value === 'string' && SUGGESTION_STATUSES.some((status) => status === value);

export const isReviewedStatus = (value: unknown): value is ReviewedStatus =>
  isSuggestionStatus(value) && value !== 'pending';

/** True for `{...}` values; false for scalars, arrays and null. */
export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
