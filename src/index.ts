export * from './suggestions/index.js';
export * from './review/index.js';
export { env } from './config/env.js';
export { logger } from './ops/index.js';
