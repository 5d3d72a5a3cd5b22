/**
 * Flag Operation Benchmark
 *
 * Measures the hot paths a caller hits when flags are checked per request:
 * single-bit membership, bulk mutation, and the label-building describe path.
 */
import { Bench } from 'tinybench';

import {
  addFlags,
  defineFlags,
  describeFlags,
  getFlags,
  hasAllFlags,
  hasFlag,
  toggleFlags,
} from '../src/index.js';

const Perm = defineFlags(
  'read',
  'write',
  'execute',
  'share',
  'delete',
  'admin',
  'audit',
  'export'
);

const granted = addFlags(0, [Perm.read, Perm.write, Perm.share, Perm.audit]);
const required = [Perm.read, Perm.write];
const plainFlag = { index: 4, name: 'delete' };

const bench = new Bench({ time: 500 });

bench
  .add('hasFlag (frozen flag)', () => {
    hasFlag(granted, Perm.write);
  })
  .add('hasFlag (plain enumerant)', () => {
    hasFlag(granted, plainFlag);
  })
  .add('hasAllFlags (2 flags)', () => {
    hasAllFlags(granted, required);
  })
  .add('addFlags (all 8)', () => {
    addFlags(0, Perm.values);
  })
  .add('toggleFlags (all 8)', () => {
    toggleFlags(granted, Perm.values);
  })
  .add('getFlags', () => {
    getFlags(granted, Perm.values);
  })
  .add('describeFlags', () => {
    describeFlags(granted, Perm.values);
  });

console.log(`[phase] running ${bench.tasks.length} tasks...`);
await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Flag Operation Results');
console.log('='.repeat(80) + '\n');
console.table(bench.table());

const getNs = (name: string): number => {
  const task = bench.tasks.find((t) => t.name === name);
  return (task?.result?.period ?? 0) * 1_000_000;
};

const frozen = getNs('hasFlag (frozen flag)');
const plain = getNs('hasFlag (plain enumerant)');
console.log(`\nPlain enumerant overhead: ${(plain - frozen).toFixed(1)}ns`);
