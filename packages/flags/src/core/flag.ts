/*
 * Flag
 * ----
 * A member of a closed, ordered enumeration that owns exactly one bit.
 *
 * Bit layout (unsigned 32-bit integer):
 *   Bit n:  set when the flag declared at ordinal n is present
 *
 * Ordinals 0..31 are valid. Values are kept unsigned, so the flag at
 * ordinal 31 is 2147483648 rather than the negative number `1 << 31` gives.
 */
import { FlagIndexOutOfRangeError } from '../errors/errors.js';

/** Number of distinct flags a single flag set can hold. */
export const MAX_FLAGS = 32;

/** Minimum width of the string returned by {@link flagBinary}. */
const BINARY_WIDTH = 8;

/**
 * The contract a consumer's enumerant must meet to be used as a flag.
 *
 * Any object with a stable ordinal and a stable name qualifies; the
 * builders in `api/define-flags` produce richer {@link Flag} objects.
 */
export interface EnumFlag {
  /** Zero-based declaration ordinal */
  readonly index: number;

  /** Declared name, used for human-readable output */
  readonly name: string;
}

/**
 * Frozen flag produced by `defineFlags()` / `flagsFromEnum()`.
 *
 * @template N - Literal type of the declared name
 */
export interface Flag<N extends string = string> extends EnumFlag {
  /** Discriminant for runtime type checking */
  readonly kind: 'flag';

  readonly name: N;

  /** Bit value, `2^index` */
  readonly value: number;

  /** Declared name, verbatim */
  readonly label: N;

  /** Zero-padded binary rendering of `value` */
  readonly binary: string;
}

/**
 * Throw unless `index` is a whole number in `0..31`.
 */
export function assertFlagIndex(label: string, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= MAX_FLAGS) {
    throw new FlagIndexOutOfRangeError(label, index);
  }
}

/**
 * Bit value of a flag: `2^index`, unsigned.
 *
 * @throws FlagIndexOutOfRangeError when the index is outside `0..31`
 *
 * @example
 * ```typescript
 * const Perm = defineFlags('read', 'write');
 * flagValue(Perm.write); // 2
 * flagValue({ index: 31, name: 'top' }); // 2147483648
 * ```
 */
export function flagValue(flag: EnumFlag): number {
  assertFlagIndex(flag.name, flag.index);
  return (1 << flag.index) >>> 0;
}

export function flagLabel(flag: EnumFlag): string {
  return flag.name;
}

/**
 * Binary digits of {@link flagValue}, left-padded to at least 8 characters.
 * Flags at ordinal 8 and above produce longer strings.
 */
export function flagBinary(flag: EnumFlag): string {
  return flagValue(flag).toString(2).padStart(BINARY_WIDTH, '0');
}

/**
 * Create a frozen {@link Flag}. Validates the index up front so an
 * oversized enumeration fails where it is declared.
 */
export function createFlag<N extends string>(name: N, index: number): Flag<N> {
  assertFlagIndex(name, index);
  const base: EnumFlag = { index, name };
  return Object.freeze({
    kind: 'flag',
    index,
    name,
    value: flagValue(base),
    label: name,
    binary: flagBinary(base),
  });
}

/**
 * Runtime type guard to check if a value is a {@link Flag}.
 */
export function isFlag(x: unknown): x is Flag {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Flag).kind === 'flag' &&
    typeof (x as Flag).index === 'number' &&
    typeof (x as Flag).name === 'string' &&
    typeof (x as Flag).value === 'number'
  );
}
