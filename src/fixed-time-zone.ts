import moment from 'moment-timezone';
import { UtcOffset } from './offset';
import { parseFixedOffset } from './offset-grammar';
import type { Ordering, TimeZone } from './types';

const MAX_NAME_BYTES = 15;
const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const assertName = (name: string) => {
  if (Buffer.byteLength(name, 'utf8') > MAX_NAME_BYTES) {
    throw new RangeError(
      `Time zone name must fit in ${MAX_NAME_BYTES} UTF-8 bytes, got ${JSON.stringify(name)}`,
    );
  }
};

/**
 * A time zone with the same UTC offset for all of time.
 *
 * @example
 * ```ts
 * FixedTimeZone.parse('UTC+6').name;    // 'UTC+06:00'
 * FixedTimeZone.parse('-1330').name;    // 'UTC-13:30'
 * FixedTimeZone.parse('15:45:21').name; // 'UTC+15:45:21'
 * new FixedTimeZone('EST', -5 * 3600);
 * ```
 */
export class FixedTimeZone implements TimeZone {
  /** Display label of at most 15 UTF-8 bytes; longer labels throw a `RangeError`. */
  readonly name: string;
  readonly offset: UtcOffset;

  constructor(name: string, offset: UtcOffset);
  constructor(name: string, std: number, dst?: number);
  constructor(name: string, offset: UtcOffset | number, dst = 0) {
    assertName(name);
    this.name = name;
    this.offset = offset instanceof UtcOffset ? offset : new UtcOffset(offset, dst);
    Object.freeze(this);
  }

  /**
   * Builds a zone from a designator, named canonically (`UTC±HH:MM[:SS]`).
   * `Z` yields {@link UTC_ZERO} itself.
   *
   * @throws {UnrecognizedTimeZoneError} when the text is not a fixed-offset designator.
   */
  static parse(text: string): FixedTimeZone {
    if (text === UTC_ZERO.name) {
      return UTC_ZERO;
    }
    const { name, seconds } = parseFixedOffset(text);
    return new FixedTimeZone(name, seconds);
  }

  /**
   * Chronological ordering: `a` sorts before `b` when `b`'s offset is
   * numerically smaller than `a`'s. A wall-clock reading in UTC-5 happens
   * before the same reading in UTC-8, so UTC-5 sorts first. Names are ignored.
   */
  static compare(a: TimeZone, b: TimeZone): Ordering {
    return UtcOffset.compare(b.offset, a.offset);
  }

  rename(name: string): FixedTimeZone {
    return new FixedTimeZone(name, this.offset);
  }

  /** Same name and same offset components. */
  equals(other: TimeZone): boolean {
    return this.name === other.name && this.offset.equals(other.offset);
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.name;
  }
}

// https://en.wikipedia.org/wiki/ISO_8601#Coordinated_Universal_Time_(UTC)
export const UTC_ZERO = new FixedTimeZone('Z', 0);

export const name = (zone: TimeZone): string => zone.name;

export const rename = (zone: TimeZone, newName: string): FixedTimeZone =>
  new FixedTimeZone(newName, zone.offset);

export const compare = (a: TimeZone, b: TimeZone): Ordering => FixedTimeZone.compare(a, b);

export const isBefore = (a: TimeZone, b: TimeZone): boolean => compare(a, b) < 0;

/**
 * Renders the wall-clock reading of `instant` in `zone` using a moment format
 * pattern. Offset tokens (`Z`, `ZZ`) are not meaningful in the output.
 */
export const formatInZone = (
  instant: Date | number,
  zone: TimeZone,
  pattern: string = TIMESTAMP_FORMAT,
): string => {
  const epochMs = typeof instant === 'number' ? instant : instant.getTime();
  return moment.utc(epochMs + zone.offset.total * 1000).format(pattern);
};
