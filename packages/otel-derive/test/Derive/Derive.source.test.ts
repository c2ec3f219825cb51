import { describe, expect, it } from 'vitest'

import { deriveSource, formatDiagnostic, type DeriveFileResult } from '../../src/index.js'

const lines = (...xs: ReadonlyArray<string>): string => `${xs.join('\n')}\n`

const moduleText = (result: DeriveFileResult): string | undefined => (result.ok ? result.module?.text : undefined)

const diagnosticsOf = (result: DeriveFileResult) => {
  if (result.ok) throw new Error('expected the source to be rejected')
  return result.diagnostics
}

describe('deriveSource: keys', () => {
  it('defaults the key to the lowercased type name and honours an override', () => {
    const result = deriveSource({
      fileName: 'auto.ts',
      text: lines(
        '/** @derive Key */',
        'export class Auto {}',
        '',
        '/**',
        ' * @derive Key',
        ' * @otel(key = "custom")',
        ' */',
        'export class Overriden {}',
      ),
    })

    expect(moduleText(result)).toBe(
      lines(
        '// Generated by @otel-derive/engine from auto.ts. Do not edit.',
        "import * as otel from '@otel-derive/model'",
        '',
        "import type { Auto, Overriden } from './auto.js'",
        '',
        "export const autoIntoKey = (_value: Readonly<Auto>): otel.Key => otel.Key.from('auto')",
        '',
        'export const autoIntoKeyOwned = (value: Auto): otel.Key => autoIntoKey(value)',
        '',
        "export const overridenIntoKey = (_value: Readonly<Overriden>): otel.Key => otel.Key.from('custom')",
        '',
        'export const overridenIntoKeyOwned = (value: Overriden): otel.Key => overridenIntoKey(value)',
      ),
    )
  })

  it('places the companion module beside its source', () => {
    const result = deriveSource({ fileName: 'src/http/request.ts', text: lines('/** @derive Key */', 'export interface Request {}') })
    expect(result.ok && result.module?.outFile).toBe('src/http/request.otel.ts')
    expect(moduleText(result)).toContain("import type { Request } from './request.js'")
  })

  it('honours the model module and suffix overrides', () => {
    const result = deriveSource({
      fileName: 'auto.ts',
      text: lines('/** @derive Key */', 'export type Auto = { readonly id: string }'),
      modelModule: '@acme/otel',
      outSuffix: '.attrs.ts',
    })
    expect(result.ok && result.module?.outFile).toBe('auto.attrs.ts')
    expect(moduleText(result)).toContain("import * as otel from '@acme/otel'")
  })
})

describe('deriveSource: values', () => {
  it('chains Value through a user conversion into the variant', () => {
    const result = deriveSource({
      fileName: 'counter.ts',
      text: lines(
        '/**',
        ' * @derive Value',
        ' * @otel(variant = i64)',
        ' */',
        'export class Counter {',
        '  constructor(readonly count: number) {}',
        '}',
        '',
        'export const counterIntoI64 = (value: Readonly<Counter>): number => value.count',
      ),
    })

    expect(moduleText(result)).toBe(
      lines(
        '// Generated by @otel-derive/engine from counter.ts. Do not edit.',
        "import * as otel from '@otel-derive/model'",
        '',
        "import { type Counter, counterIntoI64 } from './counter.js'",
        '',
        'export const counterIntoValue = (value: Readonly<Counter>): otel.Value => otel.Value.from(counterIntoI64(value))',
        '',
        'export const counterIntoValueOwned = (value: Counter): otel.Value => counterIntoValue(value)',
      ),
    )
  })

  it('composes all four capabilities on one type through the generated conversions', () => {
    const result = deriveSource({
      fileName: 'request.ts',
      text: lines(
        '/**',
        ' * @derive Key, Value, StringValue, KeyValue',
        ' * @otel(key = "req", variant = StringValue)',
        ' */',
        'export class Request {',
        '  constructor(readonly query: string) {}',
        '  toString(): string {',
        '    return this.query',
        '  }',
        '}',
      ),
    })

    expect(moduleText(result)).toBe(
      lines(
        '// Generated by @otel-derive/engine from request.ts. Do not edit.',
        "import * as otel from '@otel-derive/model'",
        '',
        "import type { Request } from './request.js'",
        '',
        "export const requestIntoKey = (_value: Readonly<Request>): otel.Key => otel.Key.from('req')",
        '',
        'export const requestIntoKeyOwned = (value: Request): otel.Key => requestIntoKey(value)',
        '',
        'export const requestIntoValue = (value: Readonly<Request>): otel.Value => otel.Value.from(requestIntoStringValue(value))',
        '',
        'export const requestIntoValueOwned = (value: Request): otel.Value => requestIntoValue(value)',
        '',
        'export const requestIntoStringValue = (value: Readonly<Request>): otel.StringValue => otel.StringValue.from(String(value))',
        '',
        'export const requestIntoStringValueOwned = (value: Request): otel.StringValue => requestIntoStringValue(value)',
        '',
        'export const requestIntoKeyValue = (value: Readonly<Request>): otel.KeyValue => new otel.KeyValue(requestIntoKey(value), requestIntoValue(value))',
        '',
        'export const requestIntoKeyValueOwned = (value: Request): otel.KeyValue => requestIntoKeyValue(value)',
      ),
    )
  })

  it('imports user conversions for KeyValue when the type derives neither part', () => {
    const result = deriveSource({ fileName: 'config.ts', text: lines('/** @derive KeyValue */', 'export class Config {}') })
    expect(moduleText(result)).toContain("import { type Config, configIntoKey, configIntoValue } from './config.js'")
    expect(moduleText(result)).toContain(
      'export const configIntoKeyValue = (value: Readonly<Config>): otel.KeyValue => new otel.KeyValue(configIntoKey(value), configIntoValue(value))',
    )
  })

  it('derives StringValue for enums', () => {
    const result = deriveSource({
      fileName: 'method.ts',
      text: lines('/** @derive StringValue */', "export enum Method { Get = 'get', Post = 'post' }"),
    })
    expect(result.ok && result.module?.typeNames).toEqual(['Method'])
    expect(moduleText(result)).toContain(
      'export const methodIntoStringValue = (value: Readonly<Method>): otel.StringValue => otel.StringValue.from(String(value))',
    )
  })

  it('merges several @derive tags on one declaration', () => {
    const result = deriveSource({
      fileName: 'auto.ts',
      text: lines('/**', ' * @derive Key', ' * @derive StringValue', ' */', 'export class Auto {}'),
    })
    expect(result.ok && result.module?.conversions.map((c) => c.capability)).toEqual(['Key', 'StringValue'])
  })
})

describe('deriveSource: names shared with the model', () => {
  it('keeps a user type named like a model type apart from the model namespace', () => {
    const result = deriveSource({ fileName: 'key.ts', text: lines('/** @derive Key */', 'export class Key {}') })
    expect(moduleText(result)).toBe(
      lines(
        '// Generated by @otel-derive/engine from key.ts. Do not edit.',
        "import * as otel from '@otel-derive/model'",
        '',
        "import type { Key } from './key.js'",
        '',
        "export const keyIntoKey = (_value: Readonly<Key>): otel.Key => otel.Key.from('key')",
        '',
        'export const keyIntoKeyOwned = (value: Key): otel.Key => keyIntoKey(value)',
      ),
    )
  })

  it('picks another namespace when a source import is called otel', () => {
    const text = moduleText(deriveSource({ fileName: 'otel.ts', text: lines('/** @derive Key */', 'export interface otel {}') }))
    expect(text).toContain("import * as otelModel from '@otel-derive/model'")
    expect(text).toContain("export const otelIntoKey = (_value: Readonly<otel>): otelModel.Key => otelModel.Key.from('otel')")
  })
})

describe('deriveSource: files without derivations', () => {
  it('produces no module for unannotated files', () => {
    expect(deriveSource({ fileName: 'plain.ts', text: lines('export class Plain {}') })).toEqual({ ok: true })
  })

  it('produces no module when only @otel is present', () => {
    expect(deriveSource({ fileName: 'opts.ts', text: lines('/** @otel(key = "x") */', 'export class Opts {}') })).toEqual({ ok: true })
  })
})

describe('deriveSource: diagnostics', () => {
  it('requires a variant for Value, reported at the capability', () => {
    const [d, ...rest] = diagnosticsOf(
      deriveSource({ fileName: 'counter.ts', text: lines('/**', ' * @derive Value', ' */', 'export class Counter {}') }),
    )
    expect(rest).toEqual([])
    expect(d).toMatchObject({
      code: 'MissingRequiredOption',
      reasonCode: 'otel.option.missing_required',
      file: 'counter.ts',
      span: { start: { line: 2, column: 12 } },
    })
    expect(d && formatDiagnostic(d)).toBe(
      [
        'counter.ts:2:12 - error MissingRequiredOption: deriving `Value` for `Counter` requires the `variant` option',
        '  hint: add e.g. `@otel(variant = StringValue)` naming the type it converts through on its way to a Value',
      ].join('\n'),
    )
  })

  it('rejects Value as its own variant', () => {
    const diagnostics = diagnosticsOf(
      deriveSource({ fileName: 'x.ts', text: lines('/**', ' * @derive Value', ' * @otel(variant = Value)', ' */', 'export class X {}') }),
    )
    expect(diagnostics.map((d) => d.reasonCode)).toEqual(['otel.option.self_variant'])
  })

  it('rejects functions and constants', () => {
    const diagnostics = diagnosticsOf(
      deriveSource({
        fileName: 'items.ts',
        text: lines('/** @derive Key */', 'export function handler() {}', '', '/** @derive Key */', 'export const limit = 5'),
      }),
    )
    expect(diagnostics.map((d) => [d.code, d.message, d.span.start.line, d.span.start.column])).toEqual([
      ['UnsupportedItemKind', 'conversions can only be derived for a class, interface, type alias or enum, not a function', 2, 1],
      ['UnsupportedItemKind', 'conversions can only be derived for a class, interface, type alias or enum, not a constant', 5, 1],
    ])
  })

  it('rejects types that are not exported, at their name', () => {
    const [d] = diagnosticsOf(deriveSource({ fileName: 'hidden.ts', text: lines('/** @derive Key */', 'class Hidden {}') }))
    expect(d).toMatchObject({
      code: 'UnsupportedItemKind',
      reasonCode: 'item.not_exported',
      message: 'type `Hidden` must be exported to derive conversions for it',
      span: { start: { line: 2, column: 7 } },
    })
  })

  it('rejects default exports, at their name', () => {
    const [d, ...rest] = diagnosticsOf(deriveSource({ fileName: 'foo.ts', text: lines('/** @derive Key */', 'export default class Foo {}') }))
    expect(rest).toEqual([])
    expect(d).toMatchObject({
      code: 'UnsupportedItemKind',
      reasonCode: 'item.default_export',
      message: 'type `Foo` is a default export; conversions can only be derived for named exports',
      span: { start: { line: 2, column: 22 } },
    })
  })

  it('rejects generic types at their type parameters', () => {
    const [d, ...rest] = diagnosticsOf(
      deriveSource({
        fileName: 'box.ts',
        text: lines('/** @derive Key, StringValue */', 'export class Box<T> {', '  constructor(readonly item: T) {}', '}'),
      }),
    )
    expect(rest).toEqual([])
    expect(d).toMatchObject({
      code: 'UnsupportedItemKind',
      reasonCode: 'item.generic',
      message: 'conversions cannot be derived for generic type `Box`',
      span: { start: { line: 2, column: 18 } },
    })
  })

  it('accepts an alias that fixes the type arguments of a generic type', () => {
    const result = deriveSource({
      fileName: 'box.ts',
      text: lines('export class Box<T> {', '  constructor(readonly item: T) {}', '}', '', '/** @derive Key */', 'export type StringBox = Box<string>'),
    })
    expect(moduleText(result)).toContain(
      "export const stringBoxIntoKey = (_value: Readonly<StringBox>): otel.Key => otel.Key.from('stringbox')",
    )
  })

  it('rejects two types whose conversions would share names', () => {
    const [d, ...rest] = diagnosticsOf(
      deriveSource({ fileName: 'url.ts', text: lines('/** @derive Key */', 'export class URL {}', '', '/** @derive Key */', 'export class Url {}') }),
    )
    expect(rest).toEqual([])
    expect(d).toMatchObject({
      code: 'ConversionNameClash',
      reasonCode: 'item.name_clash',
      message: 'conversions for `Url` would be named `urlInto...` like those already derived for `URL`',
      span: { start: { line: 5, column: 14 } },
    })
  })

  it('reports option problems with their position in the file', () => {
    const [d] = diagnosticsOf(
      deriveSource({ fileName: 'auto.ts', text: lines('/**', ' * @derive Key', ' * @otel(colour = "red")', ' */', 'export class Auto {}') }),
    )
    expect(d).toMatchObject({ code: 'UnknownOption', span: { start: { line: 3, column: 10 } } })
  })

  it('fails the whole file and sorts diagnostics by position', () => {
    const result = deriveSource({
      fileName: 'mixed.ts',
      text: lines(
        '/** @derive Key */',
        'export class Fine {}',
        '',
        '/** @derive Debug */',
        'export class Odd {}',
        '',
        '/**',
        ' * @derive Key',
        ' * @otel(key = "a")',
        ' * @otel(key = "b")',
        ' */',
        'export class Twice {}',
      ),
    })
    expect(diagnosticsOf(result).map((d) => [d.code, d.span.start.line])).toEqual([
      ['UnknownCapability', 4],
      ['DuplicateOption', 10],
    ])
  })
})
