import type { Attributes } from '@opentelemetry/api'

import { Key } from './Key.js'
import { Value, type ValueSource } from './Value.js'

/**
 * A telemetry attribute: a Key paired with a Value.
 */
export class KeyValue {
  readonly key: Key
  readonly value: Value

  constructor(key: Key | string, value: Value | ValueSource) {
    this.key = Key.from(key)
    this.value = Value.from(value)
  }

  equals(that: KeyValue): boolean {
    return this.key.equals(that.key) && Value.equals(this.value, that.value)
  }

  toString(): string {
    return `${this.key.asString()}=${Value.asString(this.value)}`
  }
}

/**
 * Flattens pairs into the record shape span and metric APIs take. A later
 * pair wins over an earlier one with the same key.
 */
export const toAttributes = (pairs: Iterable<KeyValue>): Attributes => {
  const out: Attributes = {}
  for (const pair of pairs) {
    out[pair.key.asString()] = Value.toAttributeValue(pair.value)
  }
  return out
}
