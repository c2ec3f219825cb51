import type { FunctionSource, GeneratedConversion } from '../synthesize/model.js'

export const GENERATED_HEADER_PREFIX = '// Generated by @otel-derive/engine'

export type RenderModuleArgs = {
  /** Source file name as shown in the header. */
  readonly sourceFile: string
  /** Specifier the companion module imports the source module through, e.g. `./request.js`. */
  readonly sourceSpecifier: string
  readonly modelModule: string
  readonly conversions: ReadonlyArray<GeneratedConversion>
}

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

const uniqueSorted = (xs: Iterable<string>): ReadonlyArray<string> => Array.from(new Set(xs)).sort(compare)

const MODEL_NAMESPACE = 'otel'

/** `otel`, unless the module already binds that name through its source import. */
const modelNamespaceFor = (taken: ReadonlySet<string>): string => {
  let name = MODEL_NAMESPACE
  while (taken.has(name)) name = `${name}Model`
  return name
}

const renderFunction = (fn: FunctionSource, model: string): string =>
  `export const ${fn.name} = (${fn.parameter}: ${fn.parameterType}): ${model}.${fn.returnType} => ${fn.body(model)}`

const renderSourceImport = (types: ReadonlyArray<string>, values: ReadonlyArray<string>, specifier: string): string =>
  values.length === 0
    ? `import type { ${types.join(', ')} } from '${specifier}'`
    : `import { ${[...types.map((t) => `type ${t}`), ...values].join(', ')} } from '${specifier}'`

/**
 * Renders the companion module for one source file. Output depends only on
 * the arguments: imports are sorted and conversions keep the given order.
 * The model is imported as a namespace so user types may share its names.
 */
export const renderModule = (args: RenderModuleArgs): string => {
  const types = uniqueSorted(args.conversions.map((c) => c.typeName))
  const userImports = uniqueSorted(args.conversions.flatMap((c) => c.userImports))
  const model = modelNamespaceFor(new Set([...types, ...userImports]))

  const lines: string[] = [
    `${GENERATED_HEADER_PREFIX} from ${args.sourceFile}. Do not edit.`,
    `import * as ${model} from '${args.modelModule}'`,
    '',
    renderSourceImport(types, userImports, args.sourceSpecifier),
  ]

  for (const conversion of args.conversions) {
    lines.push('', renderFunction(conversion.byReference, model), '', renderFunction(conversion.byValue, model))
  }

  return `${lines.join('\n')}\n`
}
