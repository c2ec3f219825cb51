import type { AttributeValue } from '@opentelemetry/api'

import { StringValue } from './StringValue.js'

export type ArrayValue =
  | { readonly _tag: 'Bool'; readonly items: ReadonlyArray<boolean> }
  | { readonly _tag: 'I64'; readonly items: ReadonlyArray<number> }
  | { readonly _tag: 'F64'; readonly items: ReadonlyArray<number> }
  | { readonly _tag: 'String'; readonly items: ReadonlyArray<string> }

export type Value =
  | { readonly _tag: 'Bool'; readonly value: boolean }
  | { readonly _tag: 'I64'; readonly value: number }
  | { readonly _tag: 'F64'; readonly value: number }
  | { readonly _tag: 'String'; readonly value: StringValue }
  | { readonly _tag: 'Array'; readonly value: ArrayValue }

export type ValueTag = Value['_tag']

/**
 * Everything `Value.from` accepts: the intermediate shapes a user type can be
 * converted into on its way to becoming a Value.
 */
export type ValueSource =
  | boolean
  | number
  | string
  | StringValue
  | ReadonlyArray<boolean>
  | ReadonlyArray<number>
  | ReadonlyArray<string>

const TAGS: ReadonlySet<string> = new Set<ValueTag>(['Bool', 'I64', 'F64', 'String', 'Array'])

const isValue = (input: unknown): input is Value =>
  typeof input === 'object' &&
  input !== null &&
  !Array.isArray(input) &&
  '_tag' in input &&
  typeof input._tag === 'string' &&
  TAGS.has(input._tag) &&
  'value' in input

const isArraySource = (
  source: ValueSource | Value,
): source is ReadonlyArray<boolean> | ReadonlyArray<number> | ReadonlyArray<string> => Array.isArray(source)

const isBoolArray = (items: ReadonlyArray<unknown>): items is ReadonlyArray<boolean> =>
  items.every((x) => typeof x === 'boolean')

const isNumberArray = (items: ReadonlyArray<unknown>): items is ReadonlyArray<number> =>
  items.every((x) => typeof x === 'number')

const fromNumber = (n: number): Value => (Number.isSafeInteger(n) ? { _tag: 'I64', value: n } : { _tag: 'F64', value: n })

const arrayOf = (items: ReadonlyArray<boolean> | ReadonlyArray<number> | ReadonlyArray<string>): ArrayValue => {
  // An empty array has no element type to go by; it is kept as an empty string array.
  if (items.length === 0) return { _tag: 'String', items: [] }
  if (isBoolArray(items)) return { _tag: 'Bool', items: Array.from(items) }
  if (isNumberArray(items)) {
    return items.every((n) => Number.isSafeInteger(n))
      ? { _tag: 'I64', items: Array.from(items) }
      : { _tag: 'F64', items: Array.from(items) }
  }
  return { _tag: 'String', items: Array.from(items, (x) => String(x)) }
}

const from = (source: ValueSource | Value): Value => {
  if (typeof source === 'boolean') return { _tag: 'Bool', value: source }
  if (typeof source === 'number') return fromNumber(source)
  if (typeof source === 'string') return { _tag: 'String', value: StringValue.from(source) }
  if (source instanceof StringValue) return { _tag: 'String', value: source }
  if (isArraySource(source)) return { _tag: 'Array', value: arrayOf(source) }
  return source
}

const arrayAsString = (array: ArrayValue): string => {
  switch (array._tag) {
    case 'String':
      return `[${array.items.map((s) => JSON.stringify(s)).join(',')}]`
    case 'Bool':
      return `[${array.items.map((b) => (b ? 'true' : 'false')).join(',')}]`
    case 'I64':
    case 'F64':
      return `[${array.items.map((n) => String(n)).join(',')}]`
  }
}

const asString = (value: Value): string => {
  switch (value._tag) {
    case 'Bool':
      return value.value ? 'true' : 'false'
    case 'I64':
    case 'F64':
      return String(value.value)
    case 'String':
      return value.value.asString()
    case 'Array':
      return arrayAsString(value.value)
  }
}

const sameItems = <A>(xs: ReadonlyArray<A>, ys: ReadonlyArray<A>): boolean =>
  xs.length === ys.length && xs.every((x, i) => x === ys[i])

const arrayEquals = (a: ArrayValue, b: ArrayValue): boolean => {
  switch (a._tag) {
    case 'Bool':
      return b._tag === 'Bool' && sameItems(a.items, b.items)
    case 'I64':
      return b._tag === 'I64' && sameItems(a.items, b.items)
    case 'F64':
      return b._tag === 'F64' && sameItems(a.items, b.items)
    case 'String':
      return b._tag === 'String' && sameItems(a.items, b.items)
  }
}

const equals = (a: Value, b: Value): boolean => {
  switch (a._tag) {
    case 'Bool':
      return b._tag === 'Bool' && a.value === b.value
    case 'I64':
      return b._tag === 'I64' && a.value === b.value
    case 'F64':
      return b._tag === 'F64' && a.value === b.value
    case 'String':
      return b._tag === 'String' && a.value.equals(b.value)
    case 'Array':
      return b._tag === 'Array' && arrayEquals(a.value, b.value)
  }
}

const arrayToAttributeValue = (array: ArrayValue): AttributeValue => {
  switch (array._tag) {
    case 'Bool':
      return Array.from(array.items)
    case 'I64':
    case 'F64':
      return Array.from(array.items)
    case 'String':
      return Array.from(array.items)
  }
}

const toAttributeValue = (value: Value): AttributeValue => {
  switch (value._tag) {
    case 'Bool':
    case 'I64':
    case 'F64':
      return value.value
    case 'String':
      return value.value.asString()
    case 'Array':
      return arrayToAttributeValue(value.value)
  }
}

export const Value = {
  from,
  isValue,
  asString,
  equals,
  toAttributeValue,
  bool: (value: boolean): Value => ({ _tag: 'Bool', value }),
  i64: (value: number): Value => ({ _tag: 'I64', value: Math.trunc(value) }),
  f64: (value: number): Value => ({ _tag: 'F64', value }),
  string: (value: string | StringValue): Value => ({ _tag: 'String', value: StringValue.from(value) }),
} as const
