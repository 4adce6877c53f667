/**
 * Error thrown when a string does not match the fixed-offset time zone grammar.
 */
export class UnrecognizedTimeZoneError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Unrecognized time zone: ${input}`);
    this.name = 'UnrecognizedTimeZoneError';
    this.input = input;
  }
}
