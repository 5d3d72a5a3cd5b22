import { describe, expect, it } from 'vitest';

import { FlagIndexOutOfRangeError, InvalidFlagDefinitionError } from '../src/errors/errors.js';

describe('error classes', () => {
  it('provides contextual error messages and properties', () => {
    const outOfRange = new FlagIndexOutOfRangeError('overflow', 32);
    expect(outOfRange.label).toBe('overflow');
    expect(outOfRange.index).toBe(32);
    expect(outOfRange.name).toBe('FlagIndexOutOfRangeError');
    expect(outOfRange.message).toContain(
      "Flag 'overflow' has index 32, outside the supported range 0..31."
    );
    expect(outOfRange).toBeInstanceOf(Error);

    const invalid = new InvalidFlagDefinitionError('bad');
    expect(invalid.reason).toBe('bad');
    expect(invalid.name).toBe('InvalidFlagDefinitionError');
    expect(invalid.message.split('\n').slice(0, 3)).toEqual(['Invalid flag definition', '', 'bad']);
  });
});
