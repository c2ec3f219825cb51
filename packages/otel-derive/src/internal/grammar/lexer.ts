import type { Range } from '../span.js'

export type TokenKind = 'ident' | 'string' | 'number' | '(' | ')' | ',' | '=' | '.' | 'eof' | 'unknown' | 'unterminated'

export type Token = {
  readonly kind: TokenKind
  /** Identifier name, decoded string literal, or the raw character for punctuation. */
  readonly text: string
  readonly range: Range
}

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  '(': '(',
  ')': ')',
  ',': ',',
  '=': '=',
  '.': '.',
}

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
}

const isIdentStart = (ch: string): boolean => /[A-Za-z_$]/.test(ch)
const isIdentPart = (ch: string): boolean => /[A-Za-z0-9_$]/.test(ch)
const isSpace = (ch: string): boolean => ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r'

/**
 * Tokenizes annotation text lifted out of a JSDoc comment. `base` is the
 * offset of `text` inside its source file, so every range points back at the
 * original token. A `*` that starts a comment line is decoration and skipped
 * like whitespace, and the comment terminator `*\/` ends the input.
 */
export const tokenize = (text: string, base: number): ReadonlyArray<Token> => {
  const tokens: Token[] = []
  let i = 0
  let lineStart = false

  const at = (start: number, end: number): Range => ({ start: base + start, end: base + end })

  while (i < text.length) {
    const ch = text.charAt(i)

    if (isSpace(ch)) {
      if (ch === '\n') lineStart = true
      i += 1
      continue
    }

    if (ch === '*' && text.charAt(i + 1) === '/') break

    if (ch === '*' && lineStart) {
      lineStart = false
      i += 1
      continue
    }
    lineStart = false

    const punct = PUNCTUATION[ch]
    if (punct) {
      tokens.push({ kind: punct, text: ch, range: at(i, i + 1) })
      i += 1
      continue
    }

    if (isIdentStart(ch)) {
      const start = i
      while (i < text.length && isIdentPart(text.charAt(i))) i += 1
      tokens.push({ kind: 'ident', text: text.slice(start, i), range: at(start, i) })
      continue
    }

    if (/[0-9]/.test(ch)) {
      const start = i
      while (i < text.length && /[0-9A-Za-z_.]/.test(text.charAt(i))) i += 1
      tokens.push({ kind: 'number', text: text.slice(start, i), range: at(start, i) })
      continue
    }

    if (ch === '"' || ch === "'") {
      const start = i
      const quote = ch
      let value = ''
      let closed = false
      i += 1
      while (i < text.length) {
        const c = text.charAt(i)
        if (c === quote) {
          closed = true
          i += 1
          break
        }
        if (c === '\n') break
        if (c === '\\') {
          const next = text.charAt(i + 1)
          if (next === 'u' && /^[0-9A-Fa-f]{4}$/.test(text.slice(i + 2, i + 6))) {
            value += String.fromCharCode(Number.parseInt(text.slice(i + 2, i + 6), 16))
            i += 6
            continue
          }
          const escaped = ESCAPES[next]
          value += escaped ?? next
          i += 2
          continue
        }
        value += c
        i += 1
      }
      tokens.push({ kind: closed ? 'string' : 'unterminated', text: value, range: at(start, i) })
      continue
    }

    tokens.push({ kind: 'unknown', text: ch, range: at(i, i + 1) })
    i += 1
  }

  tokens.push({ kind: 'eof', text: '', range: at(i, i) })
  return tokens
}

export const describeToken = (token: Token): string => {
  switch (token.kind) {
    case 'eof':
      return 'end of annotation'
    case 'string':
      return `string ${JSON.stringify(token.text)}`
    case 'unterminated':
      return 'unterminated string'
    case 'number':
      return `number ${token.text}`
    default:
      return `\`${token.text}\``
  }
}
