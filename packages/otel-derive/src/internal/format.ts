import type { Diagnostic } from './diagnostic.js'

/** `file:line:column - error Code: message`, with the hint on an indented line. */
export const formatDiagnostic = (d: Diagnostic): string => {
  const head = `${d.file}:${d.span.start.line}:${d.span.start.column} - error ${d.code}: ${d.message}`
  return d.hint ? `${head}\n  hint: ${d.hint}` : head
}
