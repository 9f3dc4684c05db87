export { logger } from './logger.js';
export { loadSettings } from './config.js';
