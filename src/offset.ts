import type { Ordering } from './types';

const assertSeconds = (value: number, component: string) => {
  if (!Number.isInteger(value)) {
    throw new RangeError(`UTC offset ${component} must be a whole number of seconds, got ${value}`);
  }
};

const pad2 = (value: number) => String(value).padStart(2, '0');

/**
 * Offset from UTC split into a standard component and a daylight saving
 * component, both in seconds.
 */
export class UtcOffset {
  readonly std: number;
  readonly dst: number;

  constructor(std = 0, dst = 0) {
    assertSeconds(std, 'standard component');
    assertSeconds(dst, 'daylight component');
    // normalize -0 so equal offsets stay indistinguishable
    this.std = std + 0;
    this.dst = dst + 0;
    Object.freeze(this);
  }

  /** Effective offset from UTC in seconds. */
  get total(): number {
    return this.std + this.dst;
  }

  /**
   * Orders offsets by their total, ascending.
   */
  static compare(a: UtcOffset, b: UtcOffset): Ordering {
    if (a.total < b.total) {
      return -1;
    }
    return a.total > b.total ? 1 : 0;
  }

  isLessThan(other: UtcOffset): boolean {
    return UtcOffset.compare(this, other) < 0;
  }

  equals(other: UtcOffset): boolean {
    return this.std === other.std && this.dst === other.dst;
  }

  plus(other: UtcOffset): UtcOffset {
    return new UtcOffset(this.std + other.std, this.dst + other.dst);
  }

  /**
   * Renders the total as `±HH:MM`, or `±HH:MM:SS` when seconds are present.
   */
  toString(): string {
    const total = this.total;
    const sign = total < 0 ? '-' : '+';
    const magnitude = Math.abs(total);
    const hour = Math.floor(magnitude / 3600);
    const minute = Math.floor((magnitude % 3600) / 60);
    const second = magnitude % 60;
    const base = `${sign}${pad2(hour)}:${pad2(minute)}`;
    return second === 0 ? base : `${base}:${pad2(second)}`;
  }
}
