import type winston from 'winston';
import type { UtcOffset } from './offset';
import type { FixedTimeZone } from './fixed-time-zone';

export type LogLevel =
  | 'error'
  | 'warn'
  | 'info'
  | 'http'
  | 'verbose'
  | 'debug'
  | 'silly';

/**
 * Anything that can act as a time zone: a display name and the offset from UTC.
 */
export interface TimeZone {
  readonly name: string;
  readonly offset: UtcOffset;
}

/** Result of comparing two values, usable as an `Array#sort` comparator. */
export type Ordering = -1 | 0 | 1;

export type OffsetSign = '+' | '-';

/**
 * Grammar alternative that accepted the input, in priority order:
 * `zulu` (`Z`), `utc` (`UTC`, `UTC+6`), `signed-hour` (`+05`),
 * `extended` (`+05:30`, `15:45:21`) and `basic` (`-1330`).
 */
export type OffsetBranch = 'zulu' | 'utc' | 'signed-hour' | 'extended' | 'basic';

/**
 * Digit groups captured from a designator. A second is only present with a
 * minute, and a minute only with an hour.
 */
export type OffsetFields =
  | { hour?: undefined; minute?: undefined; second?: undefined }
  | { hour: string; minute?: undefined; second?: undefined }
  | { hour: string; minute: string; second?: string };

export type OffsetMatch = { branch: OffsetBranch; sign?: OffsetSign } & OffsetFields;

export interface ParsedOffset {
  /** Canonical designator, e.g. `UTC+05:30`. */
  name: string;
  /** Signed total offset from UTC in seconds. */
  seconds: number;
}

export type ZoneInput = string | FixedTimeZone;

export interface RotationStrategy {
  /**
   * Maximum size of a single log file before rotation occurs.
   * Accepts values such as `20m`, `200k`, etc.
   */
  maxSize?: string;
  /**
   * Maximum number of files to keep. Can be specified in days (e.g., `14d`)
   * or as a numeric count (`7`).
   */
  maxFiles?: string;
  /**
   * Pattern used to name rotated files. Defaults to YYYY-MM-DD.
   */
  datePattern?: string;
  zippedArchive?: boolean;
}

export interface LoggerOptions {
  /**
   * Label printed with each record. A `/` nests the log file in a subdirectory.
   */
  moduleName?: string;
  /**
   * Directory to store log files. Created automatically when missing.
   */
  logDirectory?: string;
  level?: LogLevel;
  /**
   * Logging level used specifically for the console transport.
   */
  consoleLevel?: LogLevel;
  includeConsole?: boolean;
  /**
   * Enables or disables the rotating file transport.
   */
  includeFile?: boolean;
  /**
   * Fixed-offset zones to render alongside UTC, as designators such as
   * `UTC+6` or `-0330`, or as already constructed zones.
   */
  zones?: ZoneInput | ZoneInput[];
  rotation?: RotationStrategy;
  /**
   * Custom Winston transports appended to the logger.
   */
  additionalTransports?: winston.transport[];
}

export interface TimestampContext {
  label: string;
  zones: readonly TimeZone[];
}
