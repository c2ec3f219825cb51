import path from 'node:path'

import type { SourceFile } from 'ts-morph'

import { buildTypeDescriptor, type TypeDescriptor } from './descriptor.js'
import { companionPathOf, sortByLocation, sourceSpecifierOf } from './files.js'
import type { Diagnostic, Problem } from './diagnostic.js'
import { renderModule } from './emit/renderModule.js'
import { mergeAttributeOptions, parseAttributeOptions, type AttributeOptions } from './grammar/attributeOptions.js'
import { CAPABILITIES, parseDeriveList, type Capability, type CapabilityRequest } from './grammar/deriveList.js'
import { DiagnosticCodes, ReasonCodes } from './reasonCodes.js'
import { scanAnnotatedItems, type AnnotatedItem } from './scanAnnotatedItems.js'
import { spanOfRange } from './span.js'
import { synthesize } from './synthesize/synthesize.js'
import type { GeneratedConversion } from './synthesize/model.js'
import { camelTypeName } from './synthesize/naming.js'
import { validateRequest } from './validate.js'

export type DerivedModule = {
  /** Source file, relative to the repo root (or as given). */
  readonly file: string
  readonly outFile: string
  readonly typeNames: ReadonlyArray<string>
  readonly conversions: ReadonlyArray<GeneratedConversion>
  readonly text: string
}

export type DeriveFileResult =
  | { readonly ok: true; readonly module?: DerivedModule }
  | { readonly ok: false; readonly diagnostics: ReadonlyArray<Diagnostic> }

export type DeriveFileArgs = {
  readonly sourceFile: SourceFile
  readonly file: string
  readonly modelModule: string
  readonly outSuffix: string
}

const mergeRequests = (lists: ReadonlyArray<ReadonlyArray<CapabilityRequest>>): { requests: CapabilityRequest[]; problems: Problem[] } => {
  const requests: CapabilityRequest[] = []
  const problems: Problem[] = []
  for (const request of lists.flat()) {
    if (requests.some((r) => r.capability === request.capability)) {
      problems.push({
        code: DiagnosticCodes.duplicateCapability,
        reasonCode: ReasonCodes.capabilityDuplicate,
        message: `capability \`${request.capability}\` is derived twice`,
        range: request.range,
      })
    } else {
      requests.push(request)
    }
  }
  return { requests, problems }
}

const byCapabilityOrder = (a: CapabilityRequest, b: CapabilityRequest): number =>
  CAPABILITIES.indexOf(a.capability) - CAPABILITIES.indexOf(b.capability)

/**
 * Runs one annotated item through the pipeline: descriptor, `@derive` list,
 * `@otel` options, then validate-and-synthesize per requested capability.
 * A capability that fails validation produces no conversion.
 */
const deriveItem = (item: AnnotatedItem): { conversions: GeneratedConversion[]; problems: Problem[]; descriptor?: TypeDescriptor } => {
  const descriptor = buildTypeDescriptor(item.node)
  if (!descriptor.ok) return { conversions: [], problems: [...descriptor.problems] }

  const problems: Problem[] = []

  const lists: Array<ReadonlyArray<CapabilityRequest>> = []
  for (const tag of item.derive) {
    const parsed = parseDeriveList(tag.text.slice('derive'.length), tag.base + 'derive'.length, tag.range)
    if (parsed.ok) lists.push(parsed.value)
    else problems.push(...parsed.problems)
  }
  const merged = mergeRequests(lists)
  problems.push(...merged.problems)

  const blocks: AttributeOptions[] = []
  for (const tag of item.otel) {
    const parsed = parseAttributeOptions(tag.text, tag.base)
    if (parsed.ok) blocks.push(parsed.value)
    else problems.push(...parsed.problems)
  }
  const options = mergeAttributeOptions(blocks)
  if (!options.ok) problems.push(...options.problems)

  if (problems.length > 0 || !options.ok) return { conversions: [], problems, descriptor: descriptor.value }

  const requests = merged.requests.sort(byCapabilityOrder)
  const derived = new Set<Capability>(requests.map((r) => r.capability))
  const context = { descriptor: descriptor.value, derived }
  const conversions: GeneratedConversion[] = []

  for (const request of requests) {
    const validated = validateRequest(request, descriptor.value, options.value)
    if (!validated.ok) {
      problems.push(...validated.problems)
      continue
    }
    conversions.push(synthesize(context, validated.value))
  }

  return { conversions, problems, descriptor: descriptor.value }
}

const nameClash = (later: TypeDescriptor, earlier: TypeDescriptor, prefix: string): Problem => ({
  code: DiagnosticCodes.conversionNameClash,
  reasonCode: ReasonCodes.itemNameClash,
  message: `conversions for \`${later.name}\` would be named \`${prefix}Into...\` like those already derived for \`${earlier.name}\``,
  range: later.range,
  hint:
    later.name === earlier.name
      ? `derive conversions on one declaration of \`${later.name}\` only`
      : `rename \`${later.name}\` or move it to its own file`,
})

/**
 * Derives every annotated type of one source file. Any problem fails the
 * whole file: no module is produced alongside diagnostics.
 */
export const deriveFile = (args: DeriveFileArgs): DeriveFileResult => {
  const conversions: GeneratedConversion[] = []
  const typeNames: string[] = []
  const problems: Problem[] = []

  const byConversionPrefix = new Map<string, TypeDescriptor>()

  for (const item of scanAnnotatedItems(args.sourceFile)) {
    const result = deriveItem(item)
    problems.push(...result.problems)
    if (!result.descriptor || result.conversions.length === 0) continue

    const prefix = camelTypeName(result.descriptor.name)
    const earlier = byConversionPrefix.get(prefix)
    if (earlier) {
      problems.push(nameClash(result.descriptor, earlier, prefix))
      continue
    }
    byConversionPrefix.set(prefix, result.descriptor)
    conversions.push(...result.conversions)
    typeNames.push(result.descriptor.name)
  }

  if (problems.length > 0) {
    const diagnostics = problems.map(
      (p): Diagnostic => ({
        code: p.code,
        reasonCode: p.reasonCode,
        message: p.message,
        file: args.file,
        span: spanOfRange(args.sourceFile, p.range),
        ...(p.hint ? { hint: p.hint } : null),
      }),
    )
    return { ok: false, diagnostics: sortByLocation(diagnostics) }
  }

  if (conversions.length === 0) return { ok: true }

  const outFile = companionPathOf(args.file, args.outSuffix)
  return {
    ok: true,
    module: {
      file: args.file,
      outFile,
      typeNames,
      conversions,
      text: renderModule({
        sourceFile: path.posix.basename(args.file),
        sourceSpecifier: sourceSpecifierOf(args.file),
        modelModule: args.modelModule,
        conversions,
      }),
    },
  }
}
