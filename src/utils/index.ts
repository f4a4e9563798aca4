/**
 * Utils module exports
 */

export { logger } from './logger.js';

export {
  DATE_PATTERN,
  TIME_PATTERN,
  toMinutes,
  roundHours,
  formatDate,
  formatTime,
  today,
  currentTime,
  currentYear,
  currentMonth,
  normalizeMonth,
} from './time.js';

export {
  dateParamSchema,
  timeParamSchema,
  monthParamSchema,
  yearParamSchema,
  resolveTimeParam,
  resolveDateParam,
  formatValidationError,
} from './params.js';
