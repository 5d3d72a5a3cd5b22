import { flagLabel, flagValue, type EnumFlag } from './flag.js';

/**
 * An unsigned 32-bit bitmask whose bits mark which flags of one
 * enumeration are present.
 *
 * A flag set does not know its enumeration; operations that list or
 * describe flags take the candidate flags as an argument.
 *
 * Build sets with {@link combineFlags} or {@link addFlag} rather than a raw
 * `|`: once bit 31 is set, `|` yields a negative number, while every
 * operation here returns the unsigned form.
 */
export type FlagSet = number;

/** The empty flag set. */
export const noFlags: FlagSet = 0;

/** Separator used by {@link describeFlags}. */
const DESCRIBE_SEPARATOR = ' | ';

/** Returned by {@link describeFlags} for a set with no matching flags. */
const DESCRIBE_NONE = 'none';

/**
 * True when the bit of `flag` is set.
 *
 * @example
 * ```typescript
 * hasFlag(3, Perm.read); // true
 * hasFlag(2, Perm.read); // false
 * ```
 */
export function hasFlag(set: FlagSet, flag: EnumFlag): boolean {
  return (set & flagValue(flag)) !== 0;
}

/**
 * True when at least one of `flags` is set. An empty list yields `false`.
 */
export function hasAnyFlag(set: FlagSet, flags: readonly EnumFlag[]): boolean {
  return flags.some((flag) => hasFlag(set, flag));
}

/**
 * True when every one of `flags` is set. An empty list yields `true`.
 */
export function hasAllFlags(set: FlagSet, flags: readonly EnumFlag[]): boolean {
  return flags.every((flag) => hasFlag(set, flag));
}

/**
 * Members of `candidates` present in `set`, in the order given.
 *
 * Returns a fresh array; later changes to `candidates` do not affect it.
 *
 * @example
 * ```typescript
 * getFlags(3, Perm.values); // [Perm.read, Perm.write]
 * ```
 */
export function getFlags<F extends EnumFlag>(set: FlagSet, candidates: readonly F[]): F[] {
  return candidates.filter((flag) => hasFlag(set, flag));
}

export function addFlag(set: FlagSet, flag: EnumFlag): FlagSet {
  return (set | flagValue(flag)) >>> 0;
}

export function removeFlag(set: FlagSet, flag: EnumFlag): FlagSet {
  return (set & ~flagValue(flag)) >>> 0;
}

export function toggleFlag(set: FlagSet, flag: EnumFlag): FlagSet {
  return (set ^ flagValue(flag)) >>> 0;
}

/**
 * Apply {@link addFlag} for each flag, left to right.
 */
export function addFlags(set: FlagSet, flags: readonly EnumFlag[]): FlagSet {
  return flags.reduce(addFlag, set >>> 0);
}

/**
 * Apply {@link removeFlag} for each flag, left to right.
 */
export function removeFlags(set: FlagSet, flags: readonly EnumFlag[]): FlagSet {
  return flags.reduce(removeFlag, set >>> 0);
}

/**
 * Apply {@link toggleFlag} for each flag, left to right.
 *
 * Duplicates are not collapsed: a flag listed an even number of times
 * leaves its bit unchanged.
 */
export function toggleFlags(set: FlagSet, flags: readonly EnumFlag[]): FlagSet {
  return flags.reduce(toggleFlag, set >>> 0);
}

/**
 * OR together the values of `flags`. An empty list yields {@link noFlags}.
 *
 * @example
 * ```typescript
 * combineFlags([Perm.read, Perm.write]); // 3
 * ```
 */
export function combineFlags(flags: readonly EnumFlag[]): FlagSet {
  return addFlags(noFlags, flags);
}

/**
 * Mask with every flag of an enumeration set. For ordinals contiguous
 * from 0 this is `2^count - 1`.
 */
export function allFlags(values: readonly EnumFlag[]): FlagSet {
  return combineFlags(values);
}

/**
 * Labels of the flags present in `set`, joined with `' | '`, or `'none'`.
 *
 * @example
 * ```typescript
 * describeFlags(3, Perm.values); // 'read | write'
 * describeFlags(0, Perm.values); // 'none'
 * ```
 */
export function describeFlags(set: FlagSet, candidates: readonly EnumFlag[]): string {
  const present = getFlags(set, candidates);
  if (present.length === 0) {
    return DESCRIBE_NONE;
  }
  return present.map(flagLabel).join(DESCRIBE_SEPARATOR);
}
