import { UnrecognizedTimeZoneError } from './errors';
import type { OffsetBranch, OffsetFields, OffsetMatch, OffsetSign, ParsedOffset } from './types';

type CaptureGroups = Partial<Record<'sign' | 'hour' | 'minute' | 'second', string>>;

const ZULU = 'Z';

// Tried in order; the first pattern matching the whole input wins.
const OFFSET_GRAMMAR: ReadonlyArray<readonly [OffsetBranch, RegExp]> = [
  ['utc', /^UTC(?:(?<sign>[+-])(?<hour>\d{1,2}))?$/],
  ['signed-hour', /^(?<sign>[+-])(?<hour>\d{2})$/],
  ['extended', /^(?:UTC(?=[+-]))?(?<sign>[+-])?(?<hour>\d{2}):(?<minute>\d{2})(?::(?<second>\d{2}))?$/],
  ['basic', /^(?:UTC(?=[+-]))?(?<sign>[+-])?(?<hour>\d{2})(?<minute>\d{2})$/],
];

const toSign = (value?: string): OffsetSign | undefined => {
  if (value === '+' || value === '-') {
    return value;
  }
  return undefined;
};

const toFields = ({ hour, minute, second }: CaptureGroups): OffsetFields | undefined => {
  if (hour === undefined) {
    return minute === undefined && second === undefined ? {} : undefined;
  }
  if (minute === undefined) {
    return second === undefined ? { hour } : undefined;
  }
  return second === undefined ? { hour, minute } : { hour, minute, second };
};

const toNumber = (digits?: string) => (digits === undefined ? 0 : Number.parseInt(digits, 10));

const pad2 = (value: number) => String(value).padStart(2, '0');

/**
 * Finds the grammar alternative accepting the whole of `text`.
 *
 * @returns the branch with its captured digit groups, or `undefined` when no
 * alternative matches.
 */
export const matchFixedOffset = (text: string): OffsetMatch | undefined => {
  if (text === ZULU) {
    return { branch: 'zulu' };
  }

  for (const [branch, pattern] of OFFSET_GRAMMAR) {
    const match = pattern.exec(text);
    if (!match) {
      continue;
    }
    const groups: CaptureGroups = match.groups ?? {};
    const fields = toFields(groups);
    if (!fields) {
      return undefined;
    }
    const sign = toSign(groups.sign);
    return sign === undefined ? { branch, ...fields } : { branch, sign, ...fields };
  }

  return undefined;
};

/**
 * Builds the canonical designator from numeric fields: `UTC` for a zero
 * offset, otherwise `UTC±HH:MM` with `:SS` appended when seconds are non-zero.
 */
export const formatOffsetName = (fields: {
  sign: OffsetSign;
  hour: number;
  minute: number;
  second: number;
}): string => {
  const { sign, hour, minute, second } = fields;
  if (hour === 0 && minute === 0 && second === 0) {
    return 'UTC';
  }
  const base = `UTC${sign}${pad2(hour)}:${pad2(minute)}`;
  return second === 0 ? base : `${base}:${pad2(second)}`;
};

/**
 * Parses a fixed-offset designator such as `Z`, `UTC`, `UTC+6`, `+05`,
 * `-1330` or `15:45:21`.
 *
 * @example
 * ```ts
 * parseFixedOffset('+0530'); // { name: 'UTC+05:30', seconds: 19800 }
 * parseFixedOffset('Z');     // { name: 'Z', seconds: 0 }
 * ```
 *
 * @throws {UnrecognizedTimeZoneError} when no grammar alternative matches.
 */
export const parseFixedOffset = (text: string): ParsedOffset => {
  const match = matchFixedOffset(text);
  if (!match) {
    throw new UnrecognizedTimeZoneError(text);
  }
  if (match.branch === 'zulu') {
    return { name: ZULU, seconds: 0 };
  }

  const sign = match.sign ?? '+';
  const coefficient = sign === '-' ? -1 : 1;
  const hour = toNumber(match.hour);
  const minute = toNumber(match.minute);
  const second = toNumber(match.second);
  const magnitude = hour * 3600 + minute * 60 + second;

  return {
    name: formatOffsetName({ sign, hour, minute, second }),
    seconds: magnitude === 0 ? 0 : coefficient * magnitude,
  };
};

/** @internal */
export const __grammarInternals = {
  toFields,
  toSign,
};
