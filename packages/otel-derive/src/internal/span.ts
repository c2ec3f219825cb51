import type { SourceFile } from 'ts-morph'

export type Pos = { readonly line: number; readonly column: number; readonly offset: number }
export type Span = { readonly start: Pos; readonly end: Pos }

/** Half-open character range `[start, end)` into a file's text, before it is located. */
export type Range = { readonly start: number; readonly end: number }

export const posAtOffset = (sourceFile: SourceFile, offset: number): Pos => {
  const lc = sourceFile.getLineAndColumnAtPos(offset)
  return { line: lc.line, column: lc.column, offset }
}

export const spanOfRange = (sourceFile: SourceFile, range: Range): Span => ({
  start: posAtOffset(sourceFile, range.start),
  end: posAtOffset(sourceFile, range.end),
})
