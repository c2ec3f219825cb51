import { fail, problem, succeed, type Checked, type Problem } from '../diagnostic.js'
import { DiagnosticCodes, ReasonCodes } from '../reasonCodes.js'
import type { Range } from '../span.js'
import { describeToken, tokenize } from './lexer.js'

export const CAPABILITIES = ['Key', 'Value', 'StringValue', 'KeyValue'] as const

export type Capability = (typeof CAPABILITIES)[number]

export type CapabilityRequest = {
  readonly capability: Capability
  readonly range: Range
}

const isCapability = (name: string): name is Capability => CAPABILITIES.some((c) => c === name)

/**
 * Parses the body of a `@derive` tag: capability names separated by commas.
 * `text` starts right after the tag name.
 */
export const parseDeriveList = (text: string, base: number, tagRange: Range): Checked<ReadonlyArray<CapabilityRequest>> => {
  const tokens = tokenize(text, base)
  const requests: CapabilityRequest[] = []
  const problems: Problem[] = []

  const first = tokens[0]
  if (!first || first.kind === 'eof') {
    return fail(
      problem(
        DiagnosticCodes.syntaxError,
        ReasonCodes.syntaxEmptyList,
        '`@derive` lists no capabilities',
        tagRange,
        `list one or more of: ${CAPABILITIES.join(', ')}`,
      ),
    )
  }

  for (let i = 0; i < tokens.length; i += 2) {
    const name = tokens[i]
    if (!name) break

    if (name.kind !== 'ident') {
      return fail(
        problem(
          DiagnosticCodes.syntaxError,
          ReasonCodes.syntaxUnexpectedToken,
          `expected a capability name in \`@derive\`, found ${describeToken(name)}`,
          name.range,
        ),
      )
    }

    if (!isCapability(name.text)) {
      problems.push(
        problem(
          DiagnosticCodes.unknownCapability,
          ReasonCodes.capabilityUnknown,
          `unknown capability \`${name.text}\` in \`@derive\``,
          name.range,
          `supported capabilities: ${CAPABILITIES.join(', ')}`,
        ),
      )
    } else if (requests.some((r) => r.capability === name.text)) {
      problems.push(
        problem(
          DiagnosticCodes.duplicateCapability,
          ReasonCodes.capabilityDuplicate,
          `capability \`${name.text}\` is derived twice`,
          name.range,
        ),
      )
    } else {
      requests.push({ capability: name.text, range: name.range })
    }

    const separator = tokens[i + 1]
    if (!separator || separator.kind === 'eof') break
    if (separator.kind !== ',') {
      return fail(
        problem(
          DiagnosticCodes.syntaxError,
          ReasonCodes.syntaxUnexpectedToken,
          `expected \`,\` between capabilities in \`@derive\`, found ${describeToken(separator)}`,
          separator.range,
        ),
      )
    }
  }

  return problems.length > 0 ? fail(...problems) : succeed(requests)
}
