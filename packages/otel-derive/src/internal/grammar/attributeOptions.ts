import { fail, problem, succeed, type Checked, type Problem } from '../diagnostic.js'
import { DiagnosticCodes, ReasonCodes } from '../reasonCodes.js'
import type { Range } from '../span.js'
import { describeToken, tokenize, type Token } from './lexer.js'

export type TypeReference = {
  readonly segments: ReadonlyArray<string>
  readonly range: Range
}

export type KeyOption = {
  readonly value: string
  /** Covers `key = "..."`. */
  readonly range: Range
}

export type VariantOption = {
  readonly reference: TypeReference
  /** Covers `variant = Type`. */
  readonly range: Range
}

export type AttributeOptions = {
  readonly key?: KeyOption
  readonly variant?: VariantOption
}

export type OptionName = keyof AttributeOptions

export const OPTION_NAMES: ReadonlyArray<OptionName> = ['key', 'variant']

export const EMPTY_OPTIONS: AttributeOptions = {}

export const typeReferenceText = (reference: TypeReference): string => reference.segments.join('.')

const isOptionName = (name: string): name is OptionName => name === 'key' || name === 'variant'

type OptionValue =
  | { readonly kind: 'string'; readonly value: string; readonly range: Range }
  | { readonly kind: 'number'; readonly value: string; readonly range: Range }
  | { readonly kind: 'type'; readonly reference: TypeReference }

const valueRange = (value: OptionValue): Range => (value.kind === 'type' ? value.reference.range : value.range)

const describeValue = (value: OptionValue): string => {
  switch (value.kind) {
    case 'string':
      return `string ${JSON.stringify(value.value)}`
    case 'number':
      return `number ${value.value}`
    case 'type':
      return `type reference \`${typeReferenceText(value.reference)}\``
  }
}

class SyntaxFailure {
  constructor(readonly problem: Problem) {}
}

const syntaxError = (token: Token, expected: string): SyntaxFailure => {
  if (token.kind === 'unterminated') {
    return new SyntaxFailure(
      problem(
        DiagnosticCodes.syntaxError,
        ReasonCodes.syntaxUnterminatedString,
        'unterminated string literal in `@otel` annotation',
        token.range,
        'close the string with the quote it was opened with, on the same line',
      ),
    )
  }
  return new SyntaxFailure(
    problem(
      DiagnosticCodes.syntaxError,
      ReasonCodes.syntaxUnexpectedToken,
      `expected ${expected} in \`@otel\` annotation, found ${describeToken(token)}`,
      token.range,
    ),
  )
}

class Cursor {
  private index = 0

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)] ?? { kind: 'eof', text: '', range: { start: 0, end: 0 } }
  }

  next(): Token {
    const token = this.peek()
    if (token.kind !== 'eof') this.index += 1
    return token
  }

  expect(kind: Token['kind'], expected: string): Token {
    const token = this.peek()
    if (token.kind !== kind) throw syntaxError(token, expected)
    return this.next()
  }
}

const parseTypeReference = (cursor: Cursor, first: Token): TypeReference => {
  const segments = [first.text]
  let end = first.range.end
  while (cursor.peek().kind === '.') {
    cursor.next()
    const segment = cursor.expect('ident', 'an identifier after `.`')
    segments.push(segment.text)
    end = segment.range.end
  }
  return { segments, range: { start: first.range.start, end } }
}

const parseValue = (cursor: Cursor, optionName: string): OptionValue => {
  const token = cursor.peek()
  switch (token.kind) {
    case 'string':
      cursor.next()
      return { kind: 'string', value: token.text, range: token.range }
    case 'number':
      cursor.next()
      return { kind: 'number', value: token.text, range: token.range }
    case 'ident':
      cursor.next()
      return { kind: 'type', reference: parseTypeReference(cursor, token) }
    default:
      throw syntaxError(token, `a value for \`${optionName}\``)
  }
}

const checkKey = (value: OptionValue, range: Range): KeyOption | Problem => {
  if (value.kind !== 'string') {
    return problem(
      DiagnosticCodes.malformedOption,
      ReasonCodes.optionMalformed,
      `option \`key\` expects a string literal, found ${describeValue(value)}`,
      valueRange(value),
      'write the key in quotes, e.g. key = "http.request"',
    )
  }
  if (value.value.length === 0) {
    return problem(
      DiagnosticCodes.malformedOption,
      ReasonCodes.optionEmptyKey,
      'option `key` must not be empty',
      value.range,
      'remove the option to use the lowercased type name, or give a non-empty key',
    )
  }
  return { value: value.value, range }
}

const checkVariant = (value: OptionValue, range: Range): VariantOption | Problem => {
  if (value.kind !== 'type') {
    return problem(
      DiagnosticCodes.malformedOption,
      ReasonCodes.optionMalformed,
      `option \`variant\` expects a type reference, found ${describeValue(value)}`,
      valueRange(value),
      'name the intermediate type without quotes, e.g. variant = StringValue',
    )
  }
  return { reference: value.reference, range }
}

const isProblem = (x: KeyOption | VariantOption | Problem): x is Problem => 'code' in x

/**
 * Parses one `otel(...)` block. `text` starts at the `otel` keyword and `base`
 * is its offset in the source file.
 *
 * Syntax errors stop the parse; option-level errors (unknown, duplicate or
 * malformed options) are collected so one run reports all of them.
 */
export const parseAttributeOptions = (text: string, base: number): Checked<AttributeOptions> => {
  const cursor = new Cursor(tokenize(text, base))
  const problems: Problem[] = []
  const seen = new Set<string>()
  let key: KeyOption | undefined
  let variant: VariantOption | undefined

  try {
    const head = cursor.next()
    if (head.kind !== 'ident' || head.text !== 'otel') throw syntaxError(head, '`otel`')
    cursor.expect('(', '`(` after `otel`')

    if (cursor.peek().kind === ')') {
      throw new SyntaxFailure(
        problem(
          DiagnosticCodes.syntaxError,
          ReasonCodes.syntaxEmptyList,
          '`@otel` annotation has no options',
          cursor.peek().range,
          `give at least one of: ${OPTION_NAMES.join(', ')}; or remove the annotation`,
        ),
      )
    }

    while (true) {
      const name = cursor.expect('ident', 'an option name')
      cursor.expect('=', `\`=\` after \`${name.text}\``)
      const value = parseValue(cursor, name.text)
      const range = { start: name.range.start, end: valueRange(value).end }

      if (!isOptionName(name.text)) {
        problems.push(
          problem(
            DiagnosticCodes.unknownOption,
            ReasonCodes.optionUnknown,
            `unknown option \`${name.text}\` in \`@otel\` annotation`,
            name.range,
            `supported options: ${OPTION_NAMES.join(', ')}`,
          ),
        )
      } else if (seen.has(name.text)) {
        problems.push(
          problem(
            DiagnosticCodes.duplicateOption,
            ReasonCodes.optionDuplicate,
            `duplicate option \`${name.text}\` in \`@otel\` annotation`,
            name.range,
          ),
        )
      } else {
        seen.add(name.text)
        const checked = name.text === 'key' ? checkKey(value, range) : checkVariant(value, range)
        if (isProblem(checked)) problems.push(checked)
        else if ('reference' in checked) variant = checked
        else key = checked
      }

      const separator = cursor.next()
      if (separator.kind === ')') break
      if (separator.kind !== ',') throw syntaxError(separator, '`,` or `)`')
    }

    const rest = cursor.peek()
    if (rest.kind !== 'eof') {
      throw new SyntaxFailure(
        problem(
          DiagnosticCodes.syntaxError,
          ReasonCodes.syntaxTrailingText,
          `unexpected ${describeToken(rest)} after \`@otel(...)\``,
          rest.range,
          'put each annotation on its own JSDoc tag',
        ),
      )
    }
  } catch (cause) {
    if (cause instanceof SyntaxFailure) return fail(cause.problem)
    throw cause
  }

  if (problems.length > 0) return fail(...problems)
  return succeed({ ...(key ? { key } : null), ...(variant ? { variant } : null) })
}

/**
 * Folds the blocks of one declaration into a single options record. An option
 * set by two blocks is a duplicate, reported at the later one.
 */
export const mergeAttributeOptions = (blocks: ReadonlyArray<AttributeOptions>): Checked<AttributeOptions> => {
  const problems: Problem[] = []
  let merged: AttributeOptions = EMPTY_OPTIONS

  const duplicate = (name: OptionName, range: Range): Problem =>
    problem(
      DiagnosticCodes.duplicateOption,
      ReasonCodes.optionDuplicate,
      `duplicate option \`${name}\` across \`@otel\` annotations`,
      range,
    )

  for (const block of blocks) {
    if (block.key) {
      if (merged.key) problems.push(duplicate('key', block.key.range))
      else merged = { ...merged, key: block.key }
    }
    if (block.variant) {
      if (merged.variant) problems.push(duplicate('variant', block.variant.range))
      else merged = { ...merged, variant: block.variant }
    }
  }

  return problems.length > 0 ? fail(...problems) : succeed(merged)
}
