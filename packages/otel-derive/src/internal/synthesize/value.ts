import type { VariantOption } from '../grammar/attributeOptions.js'
import { makeConversion, resolveConversion, type GeneratedConversion, type SynthesisContext } from './model.js'

/** `Value.from(<type into variant>(value))`: a chained conversion and nothing else. */
export const synthesizeValue = (context: SynthesisContext, variant: VariantOption): GeneratedConversion => {
  const intoVariant = resolveConversion(context, variant.reference.segments)
  return makeConversion(
    context,
    'Value',
    { parameter: 'value', body: (model) => `${model}.Value.from(${intoVariant.name}(value))` },
    [intoVariant],
  )
}
