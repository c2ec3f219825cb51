export const DiagnosticCodes = {
  missingRequiredOption: 'MissingRequiredOption',
  unknownOption: 'UnknownOption',
  malformedOption: 'MalformedOption',
  syntaxError: 'SyntaxError',
  unsupportedItemKind: 'UnsupportedItemKind',
  duplicateOption: 'DuplicateOption',
  unknownCapability: 'UnknownCapability',
  duplicateCapability: 'DuplicateCapability',
  conversionNameClash: 'ConversionNameClash',
} as const

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes]

export const ReasonCodes = {
  // Annotation grammar
  syntaxUnexpectedToken: 'otel.syntax.unexpected_token',
  syntaxUnterminatedString: 'otel.syntax.unterminated_string',
  syntaxTrailingText: 'otel.syntax.trailing_text',
  syntaxEmptyList: 'otel.syntax.empty_list',

  // Options
  optionUnknown: 'otel.option.unknown',
  optionDuplicate: 'otel.option.duplicate',
  optionMalformed: 'otel.option.malformed',
  optionEmptyKey: 'otel.option.empty_key',
  optionMissingRequired: 'otel.option.missing_required',
  optionSelfVariant: 'otel.option.self_variant',

  // @derive list
  capabilityUnknown: 'derive.capability.unknown',
  capabilityDuplicate: 'derive.capability.duplicate',

  // Annotated item
  itemUnsupportedKind: 'item.unsupported_kind',
  itemAnonymous: 'item.anonymous',
  itemNotExported: 'item.not_exported',
  itemDefaultExport: 'item.default_export',
  itemGeneric: 'item.generic',
  itemNameClash: 'item.name_clash',
} as const

export type ReasonCode = (typeof ReasonCodes)[keyof typeof ReasonCodes]
