import type { SourceReport } from "../report"
import type { Extensions, Located, RecipeModifiers, Span, Value } from "../types"
import type { ComponentEvent, ComponentKind, IntermediateRef, QuantityNode } from "./events"
import { parseValue, parseValueWithUnit } from "./quantity"
import type { Token, TokenKind } from "./token-stream"
import { tokenText } from "./token-stream"

/**
 * Tokens of one block plus what is needed to report on them
 */
export interface BlockContext {
  source: string
  tokens: readonly Token[]
  extensions: Extensions
  report: SourceReport
}

/**
 * Outcome of parsing a component at a marker.
 *
 * `degraded` means the tokens up to `end` are plain text and a warning was
 * reported. `notComponent` means the marker itself is plain text.
 */
export type ComponentParse =
  | { type: "component"; event: ComponentEvent; end: number }
  | { type: "degraded"; end: number }
  | { type: "notComponent" }

const NAME_TOKENS: ReadonlySet<TokenKind> = new Set<TokenKind>(["word", "int", "float", "escaped"])

const RESERVED_AFTER_NAME: ReadonlySet<TokenKind> = new Set<TokenKind>(["@", "#", "~", "&", "|", "%", "="])

export function markerKind(kind: TokenKind): ComponentKind | null {
  switch (kind) {
    case "@":
      return "ingredient"
    case "#":
      return "cookware"
    case "~":
      return "timer"
    default:
      return null
  }
}

function modifierFlag(kind: TokenKind, component: ComponentKind): keyof RecipeModifiers | null {
  switch (kind) {
    case "@":
      return component === "ingredient" ? "recipe" : null
    case "&":
      return "reference"
    case "-":
      return "hidden"
    case "?":
      return "optional"
    case "+":
      return "new"
    default:
      return null
  }
}

// ---------------------------------------------------------------------------
// Token helpers
// ---------------------------------------------------------------------------

export function isLineEnd(token: Token | undefined): boolean {
  return token === undefined || token.kind === "newline" || token.kind === "eof"
}

function isBlank(token: Token | undefined): boolean {
  return (
    token !== undefined &&
    (token.kind === "whitespace" ||
      token.kind === "newline" ||
      token.kind === "lineComment" ||
      token.kind === "blockComment")
  )
}

/** Text of the tokens with comments dropped and escapes resolved */
export function tokensText(source: string, tokens: readonly Token[]): string {
  let out = ""
  for (const token of tokens) {
    if (token.kind === "lineComment" || token.kind === "blockComment") continue
    out += token.kind === "escaped" ? source.slice(token.start + 1, token.end) : tokenText(source, token)
  }
  return out
}

export function trimTokens(tokens: readonly Token[]): readonly Token[] {
  let start = 0
  let end = tokens.length
  while (start < end && isBlank(tokens[start])) start += 1
  while (end > start && isBlank(tokens[end - 1])) end -= 1
  return tokens.slice(start, end)
}

export function spanOf(tokens: readonly Token[], fallback: number): Span {
  const first = tokens[0]
  const last = tokens[tokens.length - 1]
  return first && last ? { start: first.start, end: last.end } : { start: fallback, end: fallback }
}

function locatedText(source: string, tokens: readonly Token[], fallback: number): Located<string> {
  const trimmed = trimTokens(tokens)
  return { value: tokensText(source, trimmed), span: spanOf(trimmed, fallback) }
}

function article(word: string): string {
  return /^[aeiou]/.test(word) ? "An" : "A"
}

function findInLine(tokens: readonly Token[], from: number, kind: TokenKind): number {
  for (let i = from; i < tokens.length; i += 1) {
    const token = tokens[i]
    if (isLineEnd(token)) return -1
    if (token?.kind === kind) return i
  }
  return -1
}

/** Index of the `{` that ends a long name starting at `from`, or -1 */
function findLongNameEnd(tokens: readonly Token[], from: number): number {
  for (let i = from; i < tokens.length; i += 1) {
    const token = tokens[i]
    if (!token || isLineEnd(token)) return -1
    switch (token.kind) {
      case "{":
        return i
      case "}":
      case "@":
      case "#":
      case "~":
        return -1
    }
  }
  return -1
}

// ---------------------------------------------------------------------------
// Component rules
// ---------------------------------------------------------------------------

type RuleResult<T> = { ok: true; value: T; end: number } | { ok: false; end: number }

function parseIntermediateRef(ctx: BlockContext, open: number): RuleResult<IntermediateRef> {
  const { tokens, source } = ctx
  let pos = open + 1
  let kind: IntermediateRef["kind"] = "step"
  const prefix = tokens[pos]
  if (prefix?.kind === "~") {
    kind = "relativeStep"
    pos += 1
  } else if (prefix?.kind === "=") {
    kind = "section"
    pos += 1
  }
  const number = tokens[pos]
  const close = tokens[pos + 1]
  const first = tokens[open]
  if (!first || number?.kind !== "int" || close?.kind !== ")") {
    return { ok: false, end: open + 1 }
  }
  return {
    ok: true,
    value: {
      kind,
      value: Number(tokenText(source, number)),
      span: { start: first.start, end: close.end },
    },
    end: pos + 2,
  }
}

function parseQuantityBlock(
  ctx: BlockContext,
  kind: ComponentKind,
  inner: readonly Token[],
  fallback: number,
): QuantityNode | null {
  const { source, report, extensions } = ctx
  const tokens = trimTokens(inner)
  if (tokens.length === 0) return null

  let fixed = false
  let body = tokens
  const first = body[0]
  if (first?.kind === "=") {
    body = trimTokens(body.slice(1))
    if (kind === "timer") {
      report.warning("parser", "A timer cannot have a fixed quantity, it will be ignored", spanOf([first], 0), {
        labels: [{ span: spanOf([first], 0), message: "this is ignored" }],
        help: "Timers are never scaled",
      })
    } else {
      fixed = true
    }
  }

  const span = spanOf(tokens, fallback)
  const separator = body.findIndex(t => t.kind === "%")
  const valueTokens = trimTokens(separator === -1 ? body : body.slice(0, separator))
  if (valueTokens.length === 0) {
    report.warning("parser", `Invalid ${kind} quantity: missing value`, span, {
      labels: [{ span, message: "expected a value" }],
    })
    return null
  }

  const valueSpan = spanOf(valueTokens, fallback)
  let rawValue = tokensText(source, valueTokens)
  const parsed = parseValue(rawValue)
  for (const warning of parsed.warnings) {
    report.warning("parser", warning, valueSpan, { labels: [{ span: valueSpan }] })
  }

  let value: Value = parsed.value
  let unit: Located<string> | null = null
  const separatorToken = body[separator]
  if (separatorToken) {
    const unitTokens = trimTokens(body.slice(separator + 1))
    unit =
      unitTokens.length > 0
        ? locatedText(source, unitTokens, separatorToken.end)
        : { value: "", span: { start: separatorToken.end, end: separatorToken.end } }
  } else if (
    extensions.advancedUnits &&
    kind !== "cookware" &&
    value.type === "text" &&
    parsed.warnings.length === 0
  ) {
    const split = parseValueWithUnit(rawValue)
    if (split) {
      value = split.value
      unit = { value: split.unit, span: { start: valueSpan.end - split.unit.length, end: valueSpan.end } }
      rawValue = rawValue.slice(0, rawValue.length - split.unit.length).trimEnd()
    }
  }

  if (kind === "cookware" && unit !== null) {
    report.warning("parser", "A cookware cannot have a unit, it will be ignored", unit.span, {
      labels: [{ span: unit.span, message: "this is ignored" }],
      help: "Cookware quantities are plain counts",
    })
    unit = null
  }
  if (kind === "timer" && unit === null) {
    report.warning("parser", "Invalid timer quantity: missing unit", span, {
      labels: [{ span, message: "expected a unit" }],
      help: "A timer needs a unit to know the duration",
    })
  }

  return { value, rawValue, unit, fixed, span }
}

/**
 * Parse the component whose marker (`@`, `#` or `~`) is at `at`.
 *
 * `marker modifiers? (longName alias? '{' quantity? '}' | singleWord) '*'? note?`
 */
export function parseComponent(ctx: BlockContext, at: number): ComponentParse {
  const { tokens, source, extensions, report } = ctx
  const marker = tokens[at]
  const kind = marker ? markerKind(marker.kind) : null
  const next = tokens[at + 1]
  if (!marker || !kind || !next || next.kind === "whitespace" || isLineEnd(next)) {
    return { type: "notComponent" }
  }

  const container = kind
  const lastEnd = (end: number): number => tokens[end - 1]?.end ?? marker.end
  const degrade = (end: number, message: string, span: Span, help?: string): ComponentParse => {
    report.warning("parser", message, span, {
      labels: [{ span: { start: marker.start, end: lastEnd(end) } }],
      help,
    })
    return { type: "degraded", end }
  }

  let pos = at + 1

  // modifiers
  let modifiers: RecipeModifiers = {}
  let modifiersSpan: Span | null = null
  let intermediate: IntermediateRef | null = null
  if (extensions.componentModifiers) {
    const start = pos
    for (let token = tokens[pos]; token; token = tokens[pos]) {
      const flag = modifierFlag(token.kind, kind)
      if (!flag) break
      if (modifiers[flag]) {
        report.warning("parser", `Duplicate ${container} modifier: ${tokenText(source, token)}`, spanOf([token], 0), {
          labels: [{ span: spanOf([token], 0) }],
          help: "Remove duplicate modifiers",
        })
      }
      modifiers[flag] = true
      pos += 1
      if (
        flag === "reference" &&
        kind === "ingredient" &&
        extensions.intermediatePreparations &&
        tokens[pos]?.kind === "("
      ) {
        const ref = parseIntermediateRef(ctx, pos)
        if (!ref.ok) {
          return degrade(
            ref.end,
            "Invalid ingredient modifier: an intermediate reference is written &(N), &(~N) or &(=N)",
            { start: marker.start, end: lastEnd(ref.end) },
          )
        }
        intermediate = ref.value
        pos = ref.end
      }
    }
    const first = tokens[start]
    if (pos > start && first) modifiersSpan = { start: first.start, end: lastEnd(pos) }
  }

  const afterModifiers = tokens[pos]
  if (!afterModifiers || afterModifiers.kind === "whitespace" || isLineEnd(afterModifiers)) {
    return degrade(pos, `${article(container)} ${container} is missing: name`, {
      start: marker.start,
      end: lastEnd(pos),
    })
  }

  if (kind === "timer" && modifiersSpan) {
    report.warning("parser", "A timer cannot have modifiers, they will be ignored", modifiersSpan, {
      labels: [{ span: modifiersSpan, message: "this is ignored" }],
    })
    modifiers = {}
    modifiersSpan = null
  }

  // name
  let nameTokens: readonly Token[]
  let braceAt: number
  if (afterModifiers.kind === "{") {
    nameTokens = []
    braceAt = pos
  } else {
    braceAt = findLongNameEnd(tokens, pos)
    if (braceAt !== -1) {
      nameTokens = tokens.slice(pos, braceAt)
    } else {
      let end = pos
      while (end < tokens.length && NAME_TOKENS.has(tokens[end]?.kind ?? "eof")) end += 1
      if (end === pos) {
        if (modifiersSpan) {
          return degrade(pos, `${article(container)} ${container} is missing: name`, {
            start: marker.start,
            end: lastEnd(pos),
          })
        }
        return { type: "notComponent" }
      }
      nameTokens = tokens.slice(pos, end)
      checkSingleWordName(ctx, container, nameTokens, end)
      if (kind === "timer") {
        return degrade(end, "A timer is missing: quantity", { start: marker.start, end: lastEnd(end) }, "Add a duration: ~name{10%minutes}")
      }
      pos = end
      const event = buildEvent(ctx, kind, at, pos, {
        nameTokens,
        modifiers,
        modifiersSpan,
        intermediate,
        quantity: null,
      })
      return finishWithNote(ctx, kind, event, pos)
    }
  }

  const open = tokens[braceAt]
  const close = findInLine(tokens, braceAt, "}")
  if (!open || close === -1) {
    let lineEnd = braceAt
    while (lineEnd < tokens.length && !isLineEnd(tokens[lineEnd])) lineEnd += 1
    return degrade(
      lineEnd,
      `Invalid ${container}: missing closing '}'`,
      { start: marker.start, end: lastEnd(lineEnd) },
      "Close the quantity with '}'",
    )
  }

  const quantity = parseQuantityBlock(ctx, kind, tokens.slice(braceAt + 1, close), open.end)
  pos = close + 1

  if (kind === "ingredient" && tokens[pos]?.kind === "*") {
    const star = tokens[pos]
    if (quantity) {
      quantity.fixed = true
    } else if (star) {
      report.warning("parser", "An ingredient cannot be fixed without a quantity, it will be ignored", spanOf([star], 0), {
        labels: [{ span: spanOf([star], 0), message: "this is ignored" }],
      })
    }
    pos += 1
  }

  if (kind === "timer" && quantity === null) {
    return degrade(pos, "A timer is missing: quantity", { start: marker.start, end: lastEnd(pos) }, "Add a duration: ~name{10%minutes}")
  }

  if (kind !== "timer" && trimTokens(nameTokens).length === 0) {
    return degrade(pos, `${article(container)} ${container} is missing: name`, {
      start: marker.start,
      end: lastEnd(pos),
    })
  }

  const event = buildEvent(ctx, kind, at, pos, { nameTokens, modifiers, modifiersSpan, intermediate, quantity })
  if (!event) {
    return degrade(pos, `${article(container)} ${container} is missing: name`, {
      start: marker.start,
      end: lastEnd(pos),
    })
  }
  return finishWithNote(ctx, kind, event, pos)
}

function checkSingleWordName(
  ctx: BlockContext,
  container: ComponentKind,
  nameTokens: readonly Token[],
  end: number,
): void {
  const { tokens, source, report } = ctx
  const following = tokens[end]
  const last = nameTokens[nameTokens.length - 1]
  const first = nameTokens[0]
  if (!following || !last || !first) return
  const nameSpan = { start: first.start, end: last.end }

  if (following.kind === "." && tokens[end + 1]?.kind === "int" && /[0-9]$/.test(tokenText(source, last))) {
    const decimal = tokens[end + 1]
    report.warning("parser", `Ambiguous ${container} name: it is followed by a decimal number`, nameSpan, {
      labels: [
        { span: nameSpan, message: "the name ends here" },
        { span: { start: following.start, end: decimal?.end ?? following.end }, message: "this is not part of it" },
      ],
      help: "Use braces to mark where the name ends",
    })
    return
  }

  if (RESERVED_AFTER_NAME.has(following.kind)) {
    const symbol = tokenText(source, following)
    report.warning("parser", `Invalid ${container} name: '${symbol}' cannot follow a single word name`, nameSpan, {
      labels: [{ span: { start: following.start, end: following.end }, message: "unexpected symbol" }],
      help: "Use braces for names with symbols",
    })
  }
}

interface ComponentParts {
  nameTokens: readonly Token[]
  modifiers: RecipeModifiers
  modifiersSpan: Span | null
  intermediate: IntermediateRef | null
  quantity: QuantityNode | null
}

function buildEvent(
  ctx: BlockContext,
  kind: ComponentKind,
  at: number,
  end: number,
  parts: ComponentParts,
): ComponentEvent | null {
  const { tokens, source, extensions } = ctx
  const marker = tokens[at]
  const last = tokens[end - 1]
  if (!marker || !last) return null

  let name: Located<string> | null = null
  let alias: Located<string> | null = null
  const pipe = parts.nameTokens.findIndex(t => t.kind === "|")
  const nameTokens = trimTokens(parts.nameTokens)
  if (nameTokens.length > 0) {
    const nameEnd = nameTokens[nameTokens.length - 1]?.end ?? marker.end
    if (extensions.componentAliases && kind !== "timer" && pipe !== -1) {
      name = locatedText(source, parts.nameTokens.slice(0, pipe), nameEnd)
      const aliasText = locatedText(source, parts.nameTokens.slice(pipe + 1), nameEnd)
      alias = aliasText.value ? aliasText : null
      if (!name.value) return null
    } else {
      name = locatedText(source, nameTokens, nameEnd)
    }
  }

  const span = { start: marker.start, end: last.end }
  return {
    type: kind,
    component: {
      kind,
      name,
      alias,
      modifiers: parts.modifiers,
      modifiersSpan: parts.modifiersSpan,
      intermediate: parts.intermediate,
      quantity: parts.quantity,
      note: null,
    },
    raw: source.slice(span.start, span.end),
    span,
  }
}

function finishWithNote(
  ctx: BlockContext,
  kind: ComponentKind,
  event: ComponentEvent | null,
  pos: number,
): ComponentParse {
  if (!event) return { type: "notComponent" }
  const { tokens, source, extensions } = ctx
  if (!extensions.componentNotes || kind === "timer" || tokens[pos]?.kind !== "(") {
    return { type: "component", event, end: pos }
  }
  const close = findInLine(tokens, pos, ")")
  const closing = tokens[close]
  if (close === -1 || !closing) return { type: "component", event, end: pos }

  const note = locatedText(source, tokens.slice(pos + 1, close), closing.start)
  event.component.note = note.value ? note : null
  event.span = { start: event.span.start, end: closing.end }
  event.raw = source.slice(event.span.start, event.span.end)
  return { type: "component", event, end: close + 1 }
}
