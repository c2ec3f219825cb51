import { makeConversion, type GeneratedConversion, type SynthesisContext } from './model.js'
import { quoteString } from './naming.js'

export const synthesizeKey = (context: SynthesisContext, key: string): GeneratedConversion =>
  makeConversion(context, 'Key', { parameter: '_value', body: (model) => `${model}.Key.from(${quoteString(key)})` })
