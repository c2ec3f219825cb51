import { Node, type JSDoc, type SourceFile } from 'ts-morph'

import type { Range } from './span.js'

export type AnnotationTagName = 'derive' | 'otel'

export type AnnotationTag = {
  readonly name: AnnotationTagName
  /** Text after the `@`, up to the next tag or the end of the comment. */
  readonly text: string
  /** Offset of `text` in the file. */
  readonly base: number
  /** Range of `@name`. */
  readonly range: Range
}

export type AnnotatedItem = {
  readonly node: Node
  readonly derive: ReadonlyArray<AnnotationTag>
  readonly otel: ReadonlyArray<AnnotationTag>
}

const isAnnotationTagName = (name: string): name is AnnotationTagName => name === 'derive' || name === 'otel'

const tagsOf = (fullText: string, doc: JSDoc): ReadonlyArray<AnnotationTag> => {
  const located = doc
    .getTags()
    .map((tag) => {
      const name = tag.getTagName()
      return { name, at: fullText.lastIndexOf(`@${name}`, tag.getStart()) }
    })
    .filter((t) => t.at >= 0)
    .sort((a, b) => a.at - b.at)

  const out: AnnotationTag[] = []
  located.forEach((tag, i) => {
    if (!isAnnotationTagName(tag.name)) return
    const end = located[i + 1]?.at ?? doc.getEnd()
    out.push({
      name: tag.name,
      text: fullText.slice(tag.at + 1, end),
      base: tag.at + 1,
      range: { start: tag.at, end: tag.at + 1 + tag.name.length },
    })
  })
  return out
}

/**
 * Top-level statements whose JSDoc carries `@derive` or `@otel`, whatever
 * kind of statement they are; rejecting the wrong kinds is left to the
 * descriptor builder.
 */
export const scanAnnotatedItems = (sourceFile: SourceFile): ReadonlyArray<AnnotatedItem> => {
  const fullText = sourceFile.getFullText()
  const items: AnnotatedItem[] = []

  for (const statement of sourceFile.getStatements()) {
    if (!Node.isJSDocable(statement)) continue
    const tags = statement.getJsDocs().flatMap((doc) => tagsOf(fullText, doc))
    const derive = tags.filter((t) => t.name === 'derive')
    const otel = tags.filter((t) => t.name === 'otel')
    if (derive.length === 0 && otel.length === 0) continue
    items.push({ node: statement, derive, otel })
  }

  return items
}
