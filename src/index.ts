export { UtcOffset } from './offset';
export {
  FixedTimeZone,
  UTC_ZERO,
  name,
  rename,
  compare,
  isBefore,
  formatInZone
} from './fixed-time-zone';
export { parseFixedOffset, matchFixedOffset, formatOffsetName } from './offset-grammar';
export { createLogger } from './logger';
export { UnrecognizedTimeZoneError } from './errors';
export type {
  TimeZone,
  Ordering,
  OffsetSign,
  OffsetBranch,
  OffsetFields,
  OffsetMatch,
  ParsedOffset,
  ZoneInput,
  LoggerOptions,
  RotationStrategy,
  LogLevel
} from './types';
