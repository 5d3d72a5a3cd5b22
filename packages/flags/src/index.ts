export { defineFlags, flagsFromEnum } from './api/define-flags.js';
export type { EnumLike, FlagGroup } from './api/define-flags.js';

export {
  MAX_FLAGS,
  assertFlagIndex,
  createFlag,
  flagBinary,
  flagLabel,
  flagValue,
  isFlag,
} from './core/flag.js';
export type { EnumFlag, Flag } from './core/flag.js';

export {
  addFlag,
  addFlags,
  allFlags,
  combineFlags,
  describeFlags,
  getFlags,
  hasAllFlags,
  hasAnyFlag,
  hasFlag,
  noFlags,
  removeFlag,
  removeFlags,
  toggleFlag,
  toggleFlags,
} from './core/flag-set.js';
export type { FlagSet } from './core/flag-set.js';

export { hasAllFlagsOrFalse, hasAnyFlagOrFalse, hasFlagOrFalse, orNoFlags } from './core/nullable.js';
export type { MaybeFlagSet } from './core/nullable.js';

// Errors
export { FlagIndexOutOfRangeError, InvalidFlagDefinitionError } from './errors/errors.js';
