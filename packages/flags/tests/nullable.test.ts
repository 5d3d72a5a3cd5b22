import { describe, expect, it } from 'vitest';

import { defineFlags } from '../src/api/define-flags.js';
import { hasAllFlags, noFlags } from '../src/core/flag-set.js';
import {
  hasAllFlagsOrFalse,
  hasAnyFlagOrFalse,
  hasFlagOrFalse,
  orNoFlags,
  type MaybeFlagSet,
} from '../src/core/nullable.js';

const { one, two, three, four } = defineFlags('one', 'two', 'three', 'four');

const absent: MaybeFlagSet = null;
const missing: MaybeFlagSet = undefined;

describe('hasFlagOrFalse()', () => {
  it('is false for an absent set', () => {
    expect(hasFlagOrFalse(absent, one)).toBe(false);
    expect(hasFlagOrFalse(missing, one)).toBe(false);
  });

  it('delegates for a present set', () => {
    expect(hasFlagOrFalse(3, one)).toBe(true);
    expect(hasFlagOrFalse(3, three)).toBe(false);
  });
});

describe('hasAnyFlagOrFalse()', () => {
  it('is false for an absent set', () => {
    expect(hasAnyFlagOrFalse(absent, [one, two])).toBe(false);
    expect(hasAnyFlagOrFalse(missing, [one, two])).toBe(false);
  });

  it('is false for an absent set and an empty list', () => {
    expect(hasAnyFlagOrFalse(absent, [])).toBe(false);
    expect(hasAnyFlagOrFalse(missing, [])).toBe(false);
  });

  it('delegates for a present set', () => {
    expect(hasAnyFlagOrFalse(1, [one, two])).toBe(true);
    expect(hasAnyFlagOrFalse(1, [three, four])).toBe(false);
  });
});

describe('hasAllFlagsOrFalse()', () => {
  it('is false for an absent set', () => {
    expect(hasAllFlagsOrFalse(absent, [one, two])).toBe(false);
    expect(hasAllFlagsOrFalse(missing, [one, two])).toBe(false);
  });

  it('delegates for a present set', () => {
    expect(hasAllFlagsOrFalse(3, [one, two])).toBe(true);
    expect(hasAllFlagsOrFalse(3, [one, three])).toBe(false);
  });

  it('stays false for an absent set and an empty list', () => {
    expect(hasAllFlagsOrFalse(absent, [])).toBe(false);
    expect(hasAllFlagsOrFalse(missing, [])).toBe(false);
    expect(hasAllFlags(noFlags, [])).toBe(true);
    expect(hasAllFlagsOrFalse(noFlags, [])).toBe(true);
  });
});

describe('orNoFlags()', () => {
  it('falls back to noFlags for an absent set', () => {
    expect(orNoFlags(absent)).toBe(noFlags);
    expect(orNoFlags(missing)).toBe(0);
  });

  it('returns a present set unchanged', () => {
    expect(orNoFlags(5)).toBe(5);
    expect(orNoFlags(0)).toBe(0);
  });
});
