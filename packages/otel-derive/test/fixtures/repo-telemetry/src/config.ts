import { Key, Value } from '@otel-derive/model'

export const CONFIG_KEY = 'config'

/** @derive KeyValue */
export class Config {
  constructor(readonly enabled: boolean) {}
}

export const configIntoKey = (_value: Readonly<Config>): Key => Key.from(CONFIG_KEY)

export const configIntoValue = (value: Readonly<Config>): Value => Value.from(value.enabled)
