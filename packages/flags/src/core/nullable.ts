/*
 * Optional flag sets
 * ------------------
 * Counterparts of the membership queries for a flag set that may be absent,
 * e.g. a column read from optional storage. `null` and `undefined` both
 * count as absent, and every query on an absent set answers `false`.
 *
 * Note that `hasAllFlagsOrFalse(absent, [])` is `false`, while
 * `hasAllFlags(noFlags, [])` is `true`: an absent set carries no
 * information, so nothing is asserted about it.
 */
import type { EnumFlag } from './flag.js';
import { hasAllFlags, hasAnyFlag, hasFlag, noFlags, type FlagSet } from './flag-set.js';

/** A flag set that may be absent. */
export type MaybeFlagSet = FlagSet | null | undefined;

export function hasFlagOrFalse(set: MaybeFlagSet, flag: EnumFlag): boolean {
  return set != null && hasFlag(set, flag);
}

export function hasAnyFlagOrFalse(set: MaybeFlagSet, flags: readonly EnumFlag[]): boolean {
  return set != null && hasAnyFlag(set, flags);
}

export function hasAllFlagsOrFalse(set: MaybeFlagSet, flags: readonly EnumFlag[]): boolean {
  return set != null && hasAllFlags(set, flags);
}

/**
 * The set itself when present, otherwise {@link noFlags}.
 */
export function orNoFlags(set: MaybeFlagSet): FlagSet {
  return set ?? noFlags;
}
