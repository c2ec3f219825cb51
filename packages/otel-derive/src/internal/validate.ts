import { fail, problem, succeed, type Checked } from './diagnostic.js'
import type { TypeDescriptor } from './descriptor.js'
import { typeReferenceText, type AttributeOptions, type VariantOption } from './grammar/attributeOptions.js'
import type { CapabilityRequest } from './grammar/deriveList.js'
import { DiagnosticCodes, ReasonCodes } from './reasonCodes.js'

/**
 * What a capability's synthesizer may rely on once validation passed: the
 * key is resolved for Key, the variant is present for Value.
 */
export type ValidatedRequest =
  | { readonly capability: 'Key'; readonly key: string }
  | { readonly capability: 'Value'; readonly variant: VariantOption }
  | { readonly capability: 'StringValue' }
  | { readonly capability: 'KeyValue' }

/** The key a type gets without a `key` option: its name, lowercased as a whole. */
export const defaultKeyOf = (typeName: string): string => typeName.toLowerCase()

export const validateRequest = (
  request: CapabilityRequest,
  descriptor: TypeDescriptor,
  options: AttributeOptions,
): Checked<ValidatedRequest> => {
  switch (request.capability) {
    case 'Key':
      return succeed({ capability: 'Key', key: options.key?.value ?? defaultKeyOf(descriptor.name) })

    case 'Value': {
      const variant = options.variant
      if (!variant) {
        return fail(
          problem(
            DiagnosticCodes.missingRequiredOption,
            ReasonCodes.optionMissingRequired,
            `deriving \`Value\` for \`${descriptor.name}\` requires the \`variant\` option`,
            request.range,
            'add e.g. `@otel(variant = StringValue)` naming the type it converts through on its way to a Value',
          ),
        )
      }
      if (typeReferenceText(variant.reference) === 'Value') {
        return fail(
          problem(
            DiagnosticCodes.malformedOption,
            ReasonCodes.optionSelfVariant,
            '`variant` must name an intermediate type, not `Value` itself',
            variant.reference.range,
          ),
        )
      }
      return succeed({ capability: 'Value', variant })
    }

    case 'StringValue':
      return succeed({ capability: 'StringValue' })

    case 'KeyValue':
      return succeed({ capability: 'KeyValue' })
  }
}
