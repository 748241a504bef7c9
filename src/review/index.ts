import { createSuggestionStore } from '../suggestions/index.js';
import type { SuggestionStore } from '../suggestions/store.js';
import { SuggestionReviewService } from './service.js';
import type { RefactoringExecutor } from './types.js';

export { SuggestionReviewService } from './service.js';
export type { ApproveOptions } from './service.js';
export * from './types.js';

/**
 * Factory: review workflow over the project's suggestion store.
 *
 * @example
 * const review = createSuggestionReviewService(executor);
 * const result = await review.approve('3f9a0c1e');
 */
export const createSuggestionReviewService = (
  executor: RefactoringExecutor,
  store: SuggestionStore = createSuggestionStore()
): SuggestionReviewService => new SuggestionReviewService({ store, executor });
