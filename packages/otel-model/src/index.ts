// Public barrel for @otel-derive/model: the attribute types generated conversions target.
export { Key } from './Key.js'
export { KeyValue, toAttributes } from './KeyValue.js'
export { StringValue } from './StringValue.js'
export { Value } from './Value.js'
export type { ArrayValue, ValueSource, ValueTag } from './Value.js'
