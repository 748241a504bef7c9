import { env, positiveInt } from '../config/env.js';
import { describeError, logger } from '../ops/logger.js';
import { SuggestionStateError } from '../suggestions/errors.js';
import type { SuggestionStore } from '../suggestions/store.js';
import { isPlainObject } from '../suggestions/types.js';
import type { ClearFilters, ListFilters, SuggestionData, SuggestionStatistics } from '../suggestions/types.js';
import type {
  ApprovalResult,
  ClearResult,
  ExecutionOutcome,
  RefactoringExecutor,
  RejectionResult,
  SuggestionListing
} from './types.js';

const NO_SUMMARY = 'No summary available';
const SUMMARY_MAX_LENGTH = 100;

interface ReviewServiceDeps {
  store: SuggestionStore;
  executor: RefactoringExecutor;
  /** Default page size for listSummaries(). */
  listLimit?: number;
}

export interface ApproveOptions {
  /**
   * Ask the executor for a preview only. The suggestion is left untouched:
   * it is not moved to `approved` and no outcome is recorded.
   */
  dryRun?: boolean;
}

export class SuggestionReviewService {
  private readonly listLimit: number;

  constructor(private readonly deps: ReviewServiceDeps) {
    this.listLimit = deps.listLimit ?? positiveInt(env.SUGGESTIONS_LIST_LIMIT, 10);
  }

  /**
   * Approve a suggestion and hand it to the executor.
   * The outcome decides the final status: `executed` on success, `failed` otherwise.
   */
  async approve(id: string, options: ApproveOptions = {}): Promise<ApprovalResult> {
    const dryRun = options.dryRun ?? false;
    const suggestion = this.deps.store.get(id);

    if (suggestion.status === 'approved' || suggestion.status === 'executed') {
      throw new SuggestionStateError(id, suggestion.status);
    }

    if (!dryRun) {
      this.deps.store.updateStatus(id, 'approved');
      logger.info({ suggestionId: id, filePath: suggestion.filePath }, '[Review] suggestion approved');
    }

    let outcome: ExecutionOutcome;
    try {
      outcome = await this.deps.executor.execute({
        suggestionId: id,
        filePath: suggestion.filePath,
        data: suggestion.data,
        dryRun
      });
    } catch (error) {
      logger.error({ suggestionId: id, dryRun, error: describeError(error) }, '[Review] executor threw');
      if (!dryRun) {
        this.deps.store.updateStatus(id, 'failed', {
          status: 'error',
          error: error instanceof Error ? error.message : String(error)
        });
      }
      throw error;
    }

    if (!dryRun) {
      const status = outcome.status === 'success' ? 'executed' : 'failed';
      this.deps.store.updateStatus(id, status, outcome);
      logger.info({ suggestionId: id, status }, '[Review] execution recorded');
    }

    return { ...outcome, suggestionId: id };
  }

  reject(id: string, reason?: string): RejectionResult {
    const suggestion = this.deps.store.get(id);

    this.deps.store.updateStatus(id, 'rejected', reason ? { reason } : undefined);
    logger.info({ suggestionId: id, reason }, '[Review] suggestion rejected');

    return {
      suggestionId: id,
      filePath: suggestion.filePath,
      message: `Suggestion ${id} has been rejected`
    };
  }

  listSummaries(filters: ListFilters = {}): SuggestionListing {
    const limit = filters.limit ?? this.listLimit;
    const suggestions = this.deps.store
      .list({ status: filters.status, filePath: filters.filePath, limit })
      .map((suggestion) => ({
        id: suggestion.id,
        filePath: suggestion.filePath,
        status: suggestion.status,
        createdAt: suggestion.createdAt,
        summary: this.summarize(suggestion.data)
      }));

    return {
      suggestions,
      total: suggestions.length,
      filteredBy: {
        status: filters.status ?? null,
        filePath: filters.filePath ?? null,
        limit
      }
    };
  }

  clear(filters: ClearFilters = {}): ClearResult {
    const count = this.deps.store.clear(filters);
    logger.info({ count, ...filters }, '[Review] suggestions cleared');

    return {
      count,
      message: `Cleared ${count} suggestion(s)`,
      filters: {
        status: filters.status ?? null,
        olderThanDays: filters.olderThanDays ?? null
      }
    };
  }

  statistics(): SuggestionStatistics {
    return this.deps.store.statistics();
  }

  /** Description of the first proposed change in the payload, if it has one. */
  private summarize(data: SuggestionData): string {
    const items = data.suggestions;
    if (!Array.isArray(items) || items.length === 0) return NO_SUMMARY;

    const first: unknown = items[0];
    if (!isPlainObject(first) || typeof first.description !== 'string') return NO_SUMMARY;

    return first.description.slice(0, SUMMARY_MAX_LENGTH);
  }
}
