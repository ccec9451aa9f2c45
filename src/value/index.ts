export { Value, isValue, valueEquals, describeValue } from './value.js';
export type {
  NullValue,
  IntegerValue,
  RealValue,
  TextValue,
  BlobValue,
  ValueType,
  ValueInput,
} from './value.js';
export { toDriverParam, fromDriverValue } from './adapter.js';
export type { DriverParam } from './adapter.js';
