import { createFlag, type Flag } from '../core/flag.js';
import { InvalidFlagDefinitionError } from '../errors/errors.js';

/**
 * An ordered flag enumeration: one {@link Flag} per declared name, plus
 * `values`, every flag in ordinal order.
 *
 * @template N - Union of the declared names
 */
export type FlagGroup<N extends string> = { readonly [K in N]: Flag<K> } & {
  readonly values: readonly Flag<N>[];
};

/**
 * Shape of a TypeScript `enum` object, including the reverse mapping that
 * numeric enums carry.
 */
export type EnumLike = { [key: string]: string | number; [ordinal: number]: string };

/**
 * Names no flag may take: `values` is the ordered list, and `__proto__`
 * would replace the group's prototype instead of adding a key.
 */
const RESERVED_NAMES: ReadonlySet<string> = new Set(['values', '__proto__']);

function buildGroup<N extends string>(declared: ReadonlyArray<readonly [N, number]>): FlagGroup<N> {
  if (declared.length === 0) {
    throw new InvalidFlagDefinitionError('at least one flag must be declared');
  }

  const members = {} as { [K in N]: Flag<K> };
  const owners = new Map<number, string>();
  const flags: Flag<N>[] = [];

  for (const [name, index] of declared) {
    if (RESERVED_NAMES.has(name)) {
      throw new InvalidFlagDefinitionError(`'${name}' is reserved and cannot name a flag`);
    }
    if (Object.prototype.hasOwnProperty.call(members, name)) {
      throw new InvalidFlagDefinitionError(`flag '${name}' is declared more than once`);
    }

    const flag = createFlag(name, index);

    const owner = owners.get(index);
    if (owner !== undefined) {
      throw new InvalidFlagDefinitionError(
        `flag '${name}' reuses index ${index}, already taken by '${owner}'`
      );
    }
    owners.set(index, name);

    members[name] = flag;
    flags.push(flag);
  }

  flags.sort((a, b) => a.index - b.index);

  const group: FlagGroup<N> = { ...members, values: Object.freeze(flags) };
  Object.freeze(group);
  return group;
}

/**
 * Declare an ordered flag enumeration. Each name gets the ordinal of its
 * position, so the first flag is bit 0.
 *
 * @throws InvalidFlagDefinitionError for an empty, duplicated or reserved name list
 * @throws FlagIndexOutOfRangeError when more than 32 names are given
 *
 * @example
 * ```typescript
 * const Perm = defineFlags('read', 'write', 'execute');
 *
 * Perm.execute.value; // 4
 * Perm.values.map((f) => f.label); // ['read', 'write', 'execute']
 * ```
 */
export function defineFlags<N extends string>(...names: N[]): FlagGroup<N> {
  return buildGroup(names.map((name, index) => [name, index] as const));
}

/**
 * Adapt a numeric TypeScript `enum` to a flag enumeration. Each member's
 * numeric value becomes its ordinal; reverse-mapping keys are skipped.
 *
 * @throws InvalidFlagDefinitionError for string-valued members or shared values
 * @throws FlagIndexOutOfRangeError for member values outside `0..31`
 *
 * @example
 * ```typescript
 * enum Color { Red, Green, Blue }
 *
 * const ColorFlags = flagsFromEnum(Color);
 * ColorFlags.Blue.value; // 4
 * ```
 */
export function flagsFromEnum<E extends EnumLike>(enumObject: E): FlagGroup<Extract<keyof E, string>> {
  const declared: Array<readonly [Extract<keyof E, string>, number]> = [];
  const lookup: EnumLike = enumObject;

  (Object.keys(enumObject) as Array<Extract<keyof E, string>>).forEach((key) => {
    const member: string | number = enumObject[key];
    if (typeof member === 'number') {
      declared.push([key, member]);
      return;
    }
    // Numeric enums map each ordinal back to its name.
    if (lookup[member] === Number(key)) {
      return;
    }
    throw new InvalidFlagDefinitionError(`enum member '${key}' must have a numeric value`);
  });

  return buildGroup(declared);
}
