import { env } from '../config/env.js';
import { logger } from '../ops/logger.js';
import { SuggestionStore, type SuggestionStoreOptions } from './store.js';

export { DEFAULT_STATE_DIR, DEFAULT_STORE_FILE, SuggestionStore } from './store.js';
export type { RecoveryInfo, SuggestionStoreOptions } from './store.js';
export { ageInDays, systemClock, toLocalIsoString } from './clock.js';
export type { Clock } from './clock.js';
export * from './errors.js';
export * from './types.js';

/**
 * Factory: open the suggestion store for a project root (defaults to
 * SUGGESTIONS_PROJECT_ROOT). Discarded corrupt state is reported as a warning.
 *
 * @example
 * const store = createSuggestionStore('/path/to/project');
 * const id = store.create('src/billing.ts', { suggestions: [...] }, { strategy: 'extract' });
 */
export const createSuggestionStore = (
  projectRoot: string = env.SUGGESTIONS_PROJECT_ROOT,
  options: SuggestionStoreOptions = {}
): SuggestionStore =>
  new SuggestionStore(projectRoot, {
    stateDirName: env.SUGGESTIONS_STATE_DIR,
    fileName: env.SUGGESTIONS_FILE,
    onRecover: ({ filePath, reason }) => {
      logger.warn({ filePath, reason }, '[Suggestions] unreadable store discarded, starting empty');
    },
    ...options
  });
