export { logger, createLogger } from './logger.js';
export { withDeadline, DeadlineExceededError } from './deadline.js';
