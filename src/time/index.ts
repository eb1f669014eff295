/**
 * Time Module
 *
 * Millisecond durations and helpers shared by the decay and replay code.
 */

export {
  MS_PER_SECOND,
  MS_PER_MINUTE,
  MS_PER_HOUR,
  MS_PER_DAY,
  MS_PER_WEEK,
  DAYS_PER_MONTH,
  DAYS_PER_YEAR,
  seconds,
  minutes,
  hours,
  days,
  weeks,
  months,
  years,
  toDays,
  elapsedBetween,
  isZeroDuration,
} from './duration';
