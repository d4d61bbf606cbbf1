/**
 * Scanner: turns recipe source into a lazy sequence of tokens.
 *
 * Every character of the input belongs to exactly one token and the last
 * token is always a zero-width `eof`.
 */

export type SymbolKind =
  | "="
  | "@"
  | "#"
  | "~"
  | "?"
  | "+"
  | "-"
  | "/"
  | "*"
  | "&"
  | "|"
  | "%"
  | ":"
  | "."
  | "{"
  | "}"
  | "("
  | ")"
  | ">"

export type TokenKind =
  | SymbolKind
  | "meta"
  | "int"
  | "float"
  | "word"
  | "punctuation"
  | "escaped"
  | "whitespace"
  | "newline"
  | "lineComment"
  | "blockComment"
  | "eof"

export interface Token {
  kind: TokenKind
  start: number
  end: number
  line: number
  column: number
}

const SYMBOLS: ReadonlySet<string> = new Set([
  "=",
  "@",
  "#",
  "~",
  "?",
  "+",
  "-",
  "/",
  "*",
  "&",
  "|",
  "%",
  ":",
  ".",
  "{",
  "}",
  "(",
  ")",
  ">",
])

function isSymbol(ch: string): ch is SymbolKind {
  return SYMBOLS.has(ch)
}

function isAsciiDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9"
}

function isInlineSpace(ch: string): boolean {
  return ch === " " || ch === "\t"
}

function isPunctuation(ch: string): boolean {
  return /[\p{P}\p{S}]/u.test(ch) && !isSymbol(ch) && ch !== "\\" && ch !== "_"
}

function endsWord(ch: string): boolean {
  return (
    isInlineSpace(ch) || ch === "\n" || ch === "\r" || ch === "\\" || isSymbol(ch) || isPunctuation(ch)
  )
}

/** Lazily scan `source` into tokens, from offset `start` on. */
export function* tokenize(source: string, start = 0): Generator<Token, void, undefined> {
  let pos = Math.max(0, Math.min(start, source.length))
  const before = source.slice(0, pos)
  const lastBreak = before.lastIndexOf("\n")
  let line = before.split("\n").length
  let column = pos - lastBreak

  const make = (kind: TokenKind, end: number): Token => {
    const token: Token = { kind, start: pos, end, line, column }
    for (let i = pos; i < end; i += 1) {
      if (source[i] === "\n") {
        line += 1
        column = 1
      } else {
        column += 1
      }
    }
    pos = end
    return token
  }

  while (pos < source.length) {
    const ch = source[pos] ?? ""
    const next = source[pos + 1] ?? ""

    if (ch === "\n") {
      yield make("newline", pos + 1)
      continue
    }
    if (ch === "\r") {
      yield make("newline", next === "\n" ? pos + 2 : pos + 1)
      continue
    }
    if (isInlineSpace(ch)) {
      let end = pos + 1
      while (end < source.length && isInlineSpace(source[end] ?? "")) end += 1
      yield make("whitespace", end)
      continue
    }
    if (ch === "-" && next === "-") {
      let end = pos + 2
      while (end < source.length && source[end] !== "\n" && source[end] !== "\r") end += 1
      yield make("lineComment", end)
      continue
    }
    if (ch === "[" && next === "-") {
      const close = source.indexOf("-]", pos + 2)
      yield make("blockComment", close === -1 ? source.length : close + 2)
      continue
    }
    if (ch === ">" && next === ">") {
      yield make("meta", pos + 2)
      continue
    }
    if (ch === "\\") {
      yield make(pos + 1 < source.length ? "escaped" : "punctuation", Math.min(pos + 2, source.length))
      continue
    }
    if (isSymbol(ch)) {
      yield make(ch, pos + 1)
      continue
    }
    if (isPunctuation(ch)) {
      // keep surrogate pairs together
      const width = (source.codePointAt(pos) ?? 0) > 0xffff ? 2 : 1
      yield make("punctuation", pos + width)
      continue
    }

    let end = pos
    while (end < source.length && !endsWord(source[end] ?? "")) end += 1
    const text = source.slice(pos, end)
    if (/^[0-9]+$/.test(text)) {
      if (source[end] === "." && isAsciiDigit(source[end + 1] ?? "")) {
        let fracEnd = end + 1
        while (fracEnd < source.length && isAsciiDigit(source[fracEnd] ?? "")) fracEnd += 1
        // only a float when the digits are not glued to letters
        if (fracEnd >= source.length || endsWord(source[fracEnd] ?? "")) {
          yield make("float", fracEnd)
          continue
        }
      }
      yield make("int", end)
      continue
    }
    yield make("word", end)
  }

  yield { kind: "eof", start: pos, end: pos, line, column }
}

/**
 * Restartable token sequence: every iteration scans the source again.
 */
export class TokenStream implements Iterable<Token> {
  constructor(
    readonly source: string,
    readonly start = 0,
  ) {}

  [Symbol.iterator](): Iterator<Token> {
    return tokenize(this.source, this.start)
  }
}

/** Source text of a token */
export function tokenText(source: string, token: Token): string {
  return source.slice(token.start, token.end)
}
