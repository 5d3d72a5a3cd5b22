const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * A flag's ordinal does not fit a 32-bit mask.
 *
 * Raised when a flag value is computed (or an enumeration is declared) with
 * an index that is negative, fractional, or 32 and above.
 */
export class FlagIndexOutOfRangeError extends Error {
  constructor(
    public label: string,
    public index: number
  ) {
    const dev = [
      `Flag '${label}' has index ${index}, outside the supported range 0..31.`,
      '',
      'A flag set is a 32-bit mask, so an enumeration can hold at most 32 flags.',
      '',
      'To fix this:',
      `  1. Split the enumeration into several groups of at most 32 flags`,
      `  2. Check that '${label}' was declared with a whole, non-negative ordinal`,
    ];
    super(format(`Flag '${label}' index ${index} is outside 0..31.`, dev));
    this.name = 'FlagIndexOutOfRangeError';
  }
}

export class InvalidFlagDefinitionError extends Error {
  constructor(public reason: string) {
    const dev = [
      'Invalid flag definition',
      '',
      reason,
      '',
      'Valid definitions:',
      `  - defineFlags('read', 'write', 'execute')`,
      `  - flagsFromEnum(MyNumericEnum)`,
    ];
    super(format(`Invalid flag definition: ${reason}`, dev));
    this.name = 'InvalidFlagDefinitionError';
  }
}
