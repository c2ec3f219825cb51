import { makeConversion, resolveConversion, type GeneratedConversion, type SynthesisContext } from './model.js'

export const synthesizeKeyValue = (context: SynthesisContext): GeneratedConversion => {
  const intoKey = resolveConversion(context, ['Key'])
  const intoValue = resolveConversion(context, ['Value'])
  return makeConversion(
    context,
    'KeyValue',
    { parameter: 'value', body: (model) => `new ${model}.KeyValue(${intoKey.name}(value), ${intoValue.name}(value))` },
    [intoKey, intoValue],
  )
}
