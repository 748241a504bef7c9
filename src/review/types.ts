import type { SuggestionData, SuggestionStatus } from '../suggestions/types.js';

export interface ExecutionRequest {
  suggestionId: string;
  filePath: string;
  data: SuggestionData;
  dryRun: boolean;
}

/** Outcome reported by the executor; `status: 'success'` marks the suggestion executed. */
export interface ExecutionOutcome {
  status: string;
  [key: string]: unknown;
}

/**
 * Applies an approved suggestion (backup, patch, tests, rollback).
 * Implemented outside this package.
 */
export interface RefactoringExecutor {
  execute(request: ExecutionRequest): Promise<ExecutionOutcome>;
}

export type ApprovalResult = ExecutionOutcome & { suggestionId: string };

export interface RejectionResult {
  suggestionId: string;
  filePath: string;
  message: string;
}

export interface SuggestionSummary {
  id: string;
  filePath: string;
  status: SuggestionStatus;
  createdAt: string;
  summary: string;
}

export interface SuggestionListing {
  suggestions: SuggestionSummary[];
  total: number;
  filteredBy: {
    status: SuggestionStatus | null;
    filePath: string | null;
    limit: number;
  };
}

export interface ClearResult {
  count: number;
  message: string;
  filters: {
    status: SuggestionStatus | null;
    olderThanDays: number | null;
  };
}
