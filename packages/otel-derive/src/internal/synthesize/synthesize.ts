import type { ValidatedRequest } from '../validate.js'
import { synthesizeKey } from './key.js'
import { synthesizeKeyValue } from './keyValue.js'
import type { GeneratedConversion, SynthesisContext } from './model.js'
import { synthesizeStringValue } from './stringValue.js'
import { synthesizeValue } from './value.js'

export const synthesize = (context: SynthesisContext, request: ValidatedRequest): GeneratedConversion => {
  switch (request.capability) {
    case 'Key':
      return synthesizeKey(context, request.key)
    case 'Value':
      return synthesizeValue(context, request.variant)
    case 'StringValue':
      return synthesizeStringValue(context)
    case 'KeyValue':
      return synthesizeKeyValue(context)
  }
}
