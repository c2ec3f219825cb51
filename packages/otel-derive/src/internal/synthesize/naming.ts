import type { Capability } from '../grammar/deriveList.js'

/**
 * Lowercases the leading run of capitals, keeping the last one when it starts
 * the next word: `Counter` → `counter`, `HTTPRequest` → `httpRequest`,
 * `URL` → `url`.
 */
export const camelTypeName = (name: string): string => {
  const run = /^[A-Z]+/.exec(name)?.[0]
  if (!run) return name
  if (run.length === name.length) return name.toLowerCase()
  if (run.length > 1 && /[a-z]/.test(name.charAt(run.length))) {
    return `${run.slice(0, -1).toLowerCase()}${run.slice(-1)}${name.slice(run.length)}`
  }
  return `${run.toLowerCase()}${name.slice(run.length)}`
}

export const pascalTarget = (segments: ReadonlyArray<string>): string =>
  segments.map((s) => `${s.charAt(0).toUpperCase()}${s.slice(1)}`).join('')

/** `<camelType>Into<PascalTarget>`: the name a reference conversion from `typeName` into `target` goes by. */
export const conversionName = (typeName: string, target: ReadonlyArray<string>): string =>
  `${camelTypeName(typeName)}Into${pascalTarget(target)}`

export const capabilityConversionName = (typeName: string, capability: Capability): string =>
  conversionName(typeName, [capability])

export const ownedConversionName = (typeName: string, capability: Capability): string =>
  `${capabilityConversionName(typeName, capability)}Owned`

export const quoteString = (value: string): string =>
  `'${value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/\0/g, '\\0')}'`
