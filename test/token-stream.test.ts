import { describe, expect, test } from "vitest"
import { TokenStream, tokenize, tokenText } from "../src/parser/token-stream"

function kinds(source: string): string[] {
  return [...tokenize(source)].map(t => t.kind)
}

describe("tokenize", () => {
  test("component with a decimal quantity and a comment", () => {
    expect(kinds("@flour{1.5%kg} -- note")).toEqual([
      "@",
      "word",
      "{",
      "float",
      "%",
      "word",
      "}",
      "whitespace",
      "lineComment",
      "eof",
    ])
  })

  test("digits glued to letters stay a word", () => {
    const source = "item1.5 3rd 12"
    const tokens = [...tokenize(source)]
    expect(tokens.map(t => [t.kind, tokenText(source, t)])).toEqual([
      ["word", "item1"],
      [".", "."],
      ["int", "5"],
      ["whitespace", " "],
      ["word", "3rd"],
      ["whitespace", " "],
      ["int", "12"],
      ["eof", ""],
    ])
  })

  test("metadata marker, escapes and block comments", () => {
    expect(kinds(">> a: b")).toEqual(["meta", "whitespace", "word", ":", "whitespace", "word", "eof"])
    expect(kinds("\\@x")).toEqual(["escaped", "word", "eof"])
    expect(kinds("a [- hidden -] b")).toEqual(["word", "whitespace", "blockComment", "whitespace", "word", "eof"])
  })

  test("tracks lines and columns", () => {
    const tokens = [...tokenize("a\nbc")]
    expect(tokens.map(t => [t.kind, t.line, t.column])).toEqual([
      ["word", 1, 1],
      ["newline", 1, 2],
      ["word", 2, 1],
      ["eof", 2, 3],
    ])
  })

  test("covers the whole input without gaps", () => {
    const source = "Add @salt & pepper{} ~{5%min} — done! \r\nnext [- open"
    const tokens = [...tokenize(source)]
    let offset = 0
    for (const token of tokens) {
      expect(token.start).toBe(offset)
      offset = token.end
    }
    expect(offset).toBe(source.length)
    expect(tokens.map(t => tokenText(source, t)).join("")).toBe(source)
  })

  test("unterminated block comment runs to the end", () => {
    const tokens = [...tokenize("a [- never closed")]
    expect(tokens.map(t => t.kind)).toEqual(["word", "whitespace", "blockComment", "eof"])
  })

  test("scanning can start past the beginning", () => {
    expect([...tokenize("[-a\ncd", 4)]).toEqual([
      { kind: "word", start: 4, end: 6, line: 2, column: 1 },
      { kind: "eof", start: 6, end: 6, line: 2, column: 3 },
    ])
  })
})

describe("TokenStream", () => {
  test("every iteration starts over", () => {
    const stream = new TokenStream("@eggs{2}")
    const first = [...stream]
    const second = [...stream]
    expect(second).toEqual(first)
    expect(first).toHaveLength(6)
  })
})
