import {
  addFlag,
  allFlags,
  combineFlags,
  defineFlags,
  describeFlags,
  flagsFromEnum,
  getFlags,
  hasFlag,
  hasFlagOrFalse,
  noFlags,
  orNoFlags,
  removeFlag,
  toggleFlag,
  type MaybeFlagSet,
} from '../src/index.js';

const EnumX = defineFlags('one', 'two', 'three', 'four');

console.log(EnumX.one.value); // 1
console.log(EnumX.two.value); // 2
console.log(EnumX.three.value); // 4
console.log(EnumX.four.value); // 8
console.log(combineFlags([EnumX.one, EnumX.two])); // 3
console.log(combineFlags([EnumX.one, EnumX.three])); // 5
console.log(EnumX.one.binary); // 00000001

console.log(hasFlag(1, EnumX.one)); // true
console.log(hasFlag(1, EnumX.two)); // false
console.log(hasFlag(3, EnumX.two)); // true

console.log(getFlags(3, EnumX.values).map((f) => f.label)); // [ 'one', 'two' ]
console.log(describeFlags(3, EnumX.values)); // one | two
console.log(describeFlags(noFlags, EnumX.values)); // none

console.log(combineFlags([EnumX.one, EnumX.two])); // 3
console.log(allFlags(EnumX.values)); // 15

let set = addFlag(noFlags, EnumX.one); // 1
set = addFlag(set, EnumX.three); // 5
set = removeFlag(set, EnumX.one); // 4
set = toggleFlag(set, EnumX.four); // 12
console.log(describeFlags(set, EnumX.values)); // three | four

const stored: MaybeFlagSet = null;
console.log(hasFlagOrFalse(stored, EnumX.one)); // false
console.log(orNoFlags(stored)); // 0

enum Weekday {
  Monday,
  Tuesday,
  Wednesday,
}

const Days = flagsFromEnum(Weekday);
console.log(describeFlags(combineFlags([Days.Monday, Days.Wednesday]), Days.values)); // Monday | Wednesday
