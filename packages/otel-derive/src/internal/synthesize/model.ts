import type { TypeDescriptor } from '../descriptor.js'
import type { Capability } from '../grammar/deriveList.js'
import { capabilityConversionName, conversionName, ownedConversionName } from './naming.js'

export type ModelSymbol = 'Key' | 'KeyValue' | 'StringValue' | 'Value'

export type FunctionSource = {
  readonly name: string
  readonly parameter: string
  readonly parameterType: string
  /** A model type, qualified by the renderer with the model namespace. */
  readonly returnType: ModelSymbol
  /** Body expression; `model` is the namespace the model module is imported as. */
  readonly body: (model: string) => string
}

/**
 * The by-reference and by-value conversions of one type into one capability.
 * `byValue` only ever forwards to `byReference`.
 */
export type GeneratedConversion = {
  readonly typeName: string
  readonly capability: Capability
  readonly byReference: FunctionSource
  readonly byValue: FunctionSource
  /** Conversions the user must export from the source module. */
  readonly userImports: ReadonlyArray<string>
}

export type SynthesisContext = {
  readonly descriptor: TypeDescriptor
  /** Every capability derived for the same type, so compositions can call the generated conversions. */
  readonly derived: ReadonlySet<Capability>
}

export type ResolvedCall = {
  readonly name: string
  readonly userImport?: string
}

/**
 * The reference conversion from the annotated type into `target`: the
 * generated one when the type derives `target` itself, the user's otherwise.
 */
export const resolveConversion = (context: SynthesisContext, target: ReadonlyArray<string>): ResolvedCall => {
  const [only, ...rest] = target
  const local = rest.length === 0 ? Array.from(context.derived).find((c) => c === only) : undefined
  if (local) return { name: capabilityConversionName(context.descriptor.name, local) }
  const name = conversionName(context.descriptor.name, target)
  return { name, userImport: name }
}

export const makeConversion = (
  context: SynthesisContext,
  capability: Capability,
  reference: { readonly parameter: string; readonly body: (model: string) => string },
  calls: ReadonlyArray<ResolvedCall> = [],
): GeneratedConversion => {
  const typeName = context.descriptor.name
  const byReference: FunctionSource = {
    name: capabilityConversionName(typeName, capability),
    parameter: reference.parameter,
    parameterType: `Readonly<${typeName}>`,
    returnType: capability,
    body: reference.body,
  }
  return {
    typeName,
    capability,
    byReference,
    byValue: {
      name: ownedConversionName(typeName, capability),
      parameter: 'value',
      parameterType: typeName,
      returnType: capability,
      body: () => `${byReference.name}(value)`,
    },
    userImports: calls.flatMap((c) => (c.userImport ? [c.userImport] : [])),
  }
}
