export { describeError, logger } from './logger.js';
