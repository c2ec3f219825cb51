import { makeConversion, type GeneratedConversion, type SynthesisContext } from './model.js'

export const synthesizeStringValue = (context: SynthesisContext): GeneratedConversion =>
  makeConversion(context, 'StringValue', { parameter: 'value', body: (model) => `${model}.StringValue.from(String(value))` })
