export { logger, createLogger, truncateForLog, type Logger } from './logger.js';
export {
  stripCodeFence,
  extractJson,
  extractJsonObject,
  extractJsonArray,
  clamp01,
  truncate,
} from './json.js';
