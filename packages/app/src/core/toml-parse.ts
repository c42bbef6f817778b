import * as Either from "effect/Either"

import type { ParseResult } from "./adapter.js"
import type { ParseError, UnsupportedFeature } from "./errors.js"
import { parseError, unsupportedFeature } from "./errors.js"
import { isInt64 } from "./number.js"
import type { Scanner } from "./scanner.js"
import { advance, atEnd, describeChar, lookingAt, makeScanner, peek, positionAt } from "./scanner.js"
import type { MappingValue, Value } from "./value.js"
import { bool, float, integer, mapping, sequence, string } from "./value.js"

// CHANGE: read TOML 1.0 documents into a Value mapping
// WHY: TOML keeps integers and floats apart; the reader must not merge them
// REF: req-toml-1
// FORMAT THEOREM: ∀d valid without date-times: parseToml(d) = Right(m) ∧ m._tag = "Mapping"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a key or table is defined at most once; inline tables and static arrays are sealed
// COMPLEXITY: O(n) in document size

const MAX_DEPTH = 512

type Parsed<A> = Either.Either<A, ParseError | UnsupportedFeature>

// implicit: created as a header prefix; header: opened by [name]; dotted: created by a.b = v
type TableKind = "implicit" | "header" | "dotted" | "inline"

interface TableNode {
  readonly _tag: "Table"
  kind: TableKind
  readonly entries: Map<string, TomlNode>
}

interface ArrayTablesNode {
  readonly _tag: "ArrayTables"
  readonly tables: Array<TableNode>
}

interface ValueNode {
  readonly _tag: "Value"
  readonly value: Value
}

type TomlNode = TableNode | ArrayTablesNode | ValueNode

const makeTable = (kind: TableKind): TableNode => ({ _tag: "Table", kind, entries: new Map() })

const ok: Parsed<undefined> = Either.right(undefined)

const fail = (scanner: Scanner, message: string, offset = scanner.index): Parsed<never> =>
  Either.left(parseError("toml", message, positionAt(scanner.text, offset)))

const bareKeyPattern = /[A-Za-z0-9_-]+/uy
const plainKey = /^[A-Za-z0-9_-]+$/u

const displayKey = (keys: ReadonlyArray<string>): string =>
  keys.map((key) => plainKey.test(key) ? key : JSON.stringify(key)).join(".")

const isControl = (char: string): boolean => {
  const code = char.charCodeAt(0)
  return (code < 0x20 && char !== "\t") || code === 0x7f
}

const skipSpaces = (scanner: Scanner): void => {
  while (peek(scanner) === " " || peek(scanner) === "\t") {
    advance(scanner)
  }
}

const atNewline = (scanner: Scanner): boolean => peek(scanner) === "\n" || lookingAt(scanner, "\r\n")

const skipNewline = (scanner: Scanner): void => {
  advance(scanner, peek(scanner) === "\r" ? 2 : 1)
}

const skipComment = (scanner: Scanner): Parsed<undefined> => {
  advance(scanner)
  while (!atEnd(scanner) && !atNewline(scanner)) {
    if (isControl(peek(scanner))) {
      return fail(scanner, "Control characters are not allowed in comments")
    }
    advance(scanner)
  }
  return ok
}

// Blank lines, indentation and comments between statements or array items.
const skipTrivia = (scanner: Scanner): Parsed<undefined> => {
  for (;;) {
    skipSpaces(scanner)
    if (peek(scanner) === "#") {
      const comment = skipComment(scanner)
      if (Either.isLeft(comment)) {
        return comment
      }
      continue
    }
    if (!atNewline(scanner)) {
      return ok
    }
    skipNewline(scanner)
  }
}

const expectLineEnd = (scanner: Scanner): Parsed<undefined> => {
  skipSpaces(scanner)
  if (peek(scanner) === "#") {
    const comment = skipComment(scanner)
    if (Either.isLeft(comment)) {
      return comment
    }
  }
  if (atEnd(scanner)) {
    return ok
  }
  if (!atNewline(scanner)) {
    return fail(scanner, `Expected end of line but found ${describeChar(peek(scanner))}`)
  }
  skipNewline(scanner)
  return ok
}

const simpleEscapes: ReadonlyMap<string, string> = new Map([
  ["b", "\b"],
  ["t", "\t"],
  ["n", "\n"],
  ["f", "\f"],
  ["r", "\r"],
  ["\"", "\""],
  ["\\", "\\"]
])

const hexDigits = /^[0-9A-Fa-f]+$/u

const parseEscape = (scanner: Scanner): Parsed<string> => {
  const code = peek(scanner, 1)
  const simple = simpleEscapes.get(code)
  if (simple !== undefined) {
    advance(scanner, 2)
    return Either.right(simple)
  }
  if (code === "u" || code === "U") {
    const length = code === "u" ? 4 : 8
    const digits = scanner.text.slice(scanner.index + 2, scanner.index + 2 + length)
    if (digits.length !== length || !hexDigits.test(digits)) {
      return fail(scanner, `Invalid unicode escape, expected ${length} hex digits`)
    }
    const point = Number.parseInt(digits, 16)
    if (point > 0x10ffff || (point >= 0xd800 && point <= 0xdfff)) {
      return fail(scanner, `\\${code}${digits} is not a Unicode scalar value`)
    }
    advance(scanner, 2 + length)
    return Either.right(String.fromCodePoint(point))
  }
  return fail(scanner, `Invalid escape sequence \\${code}`)
}

const parseBasicString = (scanner: Scanner): Parsed<string> => {
  const start = scanner.index
  advance(scanner)
  let result = ""
  for (;;) {
    const char = peek(scanner)
    if (char === "" || char === "\n" || char === "\r") {
      return fail(scanner, "Unterminated string", start)
    }
    if (char === "\"") {
      advance(scanner)
      return Either.right(result)
    }
    if (char === "\\") {
      const escaped = parseEscape(scanner)
      if (Either.isLeft(escaped)) {
        return escaped
      }
      result += escaped.right
      continue
    }
    if (isControl(char)) {
      return fail(scanner, "Control characters must be escaped in strings")
    }
    result += char
    advance(scanner)
  }
}

const parseLiteralString = (scanner: Scanner): Parsed<string> => {
  const start = scanner.index
  advance(scanner)
  let result = ""
  for (;;) {
    const char = peek(scanner)
    if (char === "" || char === "\n" || char === "\r") {
      return fail(scanner, "Unterminated literal string", start)
    }
    if (char === "'") {
      advance(scanner)
      return Either.right(result)
    }
    if (isControl(char)) {
      return fail(scanner, "Control characters are not allowed in literal strings")
    }
    result += char
    advance(scanner)
  }
}

const countQuotes = (scanner: Scanner, quote: string): number => {
  let count = 0
  while (peek(scanner, count) === quote) {
    count += 1
  }
  return count
}

// A backslash followed only by whitespace up to the line end swallows the
// newline and all leading whitespace of the following lines.
const trimLineEnding = (scanner: Scanner): boolean => {
  let offset = scanner.index + 1
  while (scanner.text.charAt(offset) === " " || scanner.text.charAt(offset) === "\t") {
    offset += 1
  }
  const rest = scanner.text.charAt(offset)
  if (rest !== "\n" && !(rest === "\r" && scanner.text.charAt(offset + 1) === "\n")) {
    return false
  }
  advance(scanner, offset - scanner.index)
  while (peek(scanner) === " " || peek(scanner) === "\t" || atNewline(scanner)) {
    advance(scanner, lookingAt(scanner, "\r\n") ? 2 : 1)
  }
  return true
}

const parseMultiline = (scanner: Scanner, quote: "\"" | "'"): Parsed<string> => {
  const start = scanner.index
  advance(scanner, 3)
  if (atNewline(scanner)) {
    skipNewline(scanner)
  }
  let result = ""
  for (;;) {
    if (atEnd(scanner)) {
      return fail(scanner, "Unterminated multi-line string", start)
    }
    const char = peek(scanner)
    if (char === quote && lookingAt(scanner, quote.repeat(3))) {
      const quotes = countQuotes(scanner, quote)
      if (quotes > 5) {
        return fail(scanner, "Too many quotes at the end of a multi-line string")
      }
      advance(scanner, quotes)
      return Either.right(result + quote.repeat(quotes - 3))
    }
    if (char === "\\" && quote === "\"") {
      if (trimLineEnding(scanner)) {
        continue
      }
      const escaped = parseEscape(scanner)
      if (Either.isLeft(escaped)) {
        return escaped
      }
      result += escaped.right
      continue
    }
    if (atNewline(scanner)) {
      skipNewline(scanner)
      result += "\n"
      continue
    }
    if (isControl(char)) {
      return fail(scanner, "Control characters are not allowed in multi-line strings")
    }
    result += char
    advance(scanner)
  }
}

const parseStringValue = (scanner: Scanner): Parsed<string> => {
  const quote = peek(scanner)
  if (quote === "\"") {
    return lookingAt(scanner, "\"\"\"") ? parseMultiline(scanner, "\"") : parseBasicString(scanner)
  }
  return lookingAt(scanner, "'''") ? parseMultiline(scanner, "'") : parseLiteralString(scanner)
}

const parseSimpleKey = (scanner: Scanner): Parsed<string> => {
  const char = peek(scanner)
  if (char === "\"" || char === "'") {
    if (lookingAt(scanner, char.repeat(3))) {
      return fail(scanner, "Multi-line strings cannot be used as keys")
    }
    return char === "\"" ? parseBasicString(scanner) : parseLiteralString(scanner)
  }
  bareKeyPattern.lastIndex = scanner.index
  const bare = bareKeyPattern.exec(scanner.text)?.[0]
  if (bare === undefined) {
    return fail(scanner, `Expected a key but found ${describeChar(char)}`)
  }
  advance(scanner, bare.length)
  return Either.right(bare)
}

const parseKey = (scanner: Scanner): Parsed<Array<string>> => {
  const keys: Array<string> = []
  for (;;) {
    skipSpaces(scanner)
    const key = parseSimpleKey(scanner)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    keys.push(key.right)
    skipSpaces(scanner)
    if (peek(scanner) !== ".") {
      return Either.right(keys)
    }
    advance(scanner)
  }
}

const tokenPattern = /[A-Za-z0-9_+.-]+/uy
const datePattern = /\d{4}-\d{2}-\d{2}|\d{2}:\d{2}/uy
const prefixedInteger = /^0(?:x[0-9A-Fa-f](?:_?[0-9A-Fa-f])*|o[0-7](?:_?[0-7])*|b[01](?:_?[01])*)$/u
const decimalInteger = /^[+-]?(?:0|[1-9](?:_?\d)*)$/u
const decimalFloat = /^[+-]?(?:0|[1-9](?:_?\d)*)(?:\.\d(?:_?\d)*)?(?:[eE][+-]?\d(?:_?\d)*)?$/u
const special = /^([+-]?)(inf|nan)$/u

const checkedInteger = (token: string, digits: string): Either.Either<Value, string> => {
  const value = BigInt(digits)
  return isInt64(value)
    ? Either.right(integer(value))
    : Either.left(`Integer ${token} is outside the signed 64-bit range`)
}

const scalarFromToken = (token: string): Either.Either<Value, string> => {
  if (token === "true" || token === "false") {
    return Either.right(bool(token === "true"))
  }
  const specialMatch = special.exec(token)
  if (specialMatch !== null) {
    if (specialMatch[2] === "nan") {
      return Either.right(float(Number.NaN))
    }
    return Either.right(float(specialMatch[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY))
  }
  const digits = token.replaceAll("_", "")
  if (prefixedInteger.test(token)) {
    return checkedInteger(token, digits)
  }
  if (decimalInteger.test(token)) {
    return checkedInteger(token, digits.startsWith("+") ? digits.slice(1) : digits)
  }
  if (decimalFloat.test(token)) {
    return Either.right(float(Number(digits)))
  }
  return Either.left(`Invalid value ${JSON.stringify(token)}`)
}

const parseScalar = (scanner: Scanner): Parsed<Value> => {
  datePattern.lastIndex = scanner.index
  if (datePattern.test(scanner.text)) {
    return Either.left(
      unsupportedFeature("toml", "parse", "date-time values", positionAt(scanner.text, scanner.index))
    )
  }
  tokenPattern.lastIndex = scanner.index
  const token = tokenPattern.exec(scanner.text)?.[0]
  if (token === undefined) {
    const char = peek(scanner)
    return fail(scanner, char === "" || atNewline(scanner) ? "Expected a value" : `Unexpected ${describeChar(char)}`)
  }
  const scalar = scalarFromToken(token)
  if (Either.isLeft(scalar)) {
    return fail(scanner, scalar.left)
  }
  advance(scanner, token.length)
  return Either.right(scalar.right)
}

const nodeToValue = (node: TomlNode): Value => {
  switch (node._tag) {
    case "Value":
      return node.value
    case "Table":
      return tableToValue(node)
    case "ArrayTables":
      return sequence(node.tables.map(tableToValue))
  }
}

const tableToValue = (table: TableNode): MappingValue =>
  mapping(Array.from(table.entries, ([key, node]) => ({ key, value: nodeToValue(node) })))

const describeNode = (node: TomlNode): string => {
  switch (node._tag) {
    case "Value":
      return node.value._tag === "Mapping" ? "inline table" : node.value._tag === "Sequence" ? "array" : "value"
    case "Table":
      return "table"
    case "ArrayTables":
      return "array of tables"
  }
}

const splitLast = (keys: ReadonlyArray<string>): [ReadonlyArray<string>, string] | undefined => {
  const last = keys.at(-1)
  return last === undefined ? undefined : [keys.slice(0, -1), last]
}

const assignKeyValue = (
  scanner: Scanner,
  table: TableNode,
  keys: ReadonlyArray<string>,
  value: Value,
  offset: number
): Parsed<undefined> => {
  const split = splitLast(keys)
  if (split === undefined) {
    return fail(scanner, "Empty key", offset)
  }
  const [prefix, last] = split
  let target = table
  for (const [index, key] of prefix.entries()) {
    const existing = target.entries.get(key)
    if (existing === undefined) {
      const created = makeTable("dotted")
      target.entries.set(key, created)
      target = created
      continue
    }
    if (existing._tag === "Table" && existing.kind === "dotted") {
      target = existing
      continue
    }
    return fail(
      scanner,
      `Cannot extend ${describeNode(existing)} '${displayKey(keys.slice(0, index + 1))}' with dotted keys`,
      offset
    )
  }
  if (target.entries.has(last)) {
    return fail(scanner, `Duplicate key '${displayKey(keys)}'`, offset)
  }
  target.entries.set(last, { _tag: "Value", value })
  return ok
}

const parseKeyValue = (scanner: Scanner, table: TableNode, depth: number): Parsed<undefined> => {
  const offset = scanner.index
  const keys = parseKey(scanner)
  if (Either.isLeft(keys)) {
    return Either.left(keys.left)
  }
  if (peek(scanner) !== "=") {
    return fail(scanner, `Expected '=' after key but found ${describeChar(peek(scanner))}`)
  }
  advance(scanner)
  skipSpaces(scanner)
  const value = parseValue(scanner, depth)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  return assignKeyValue(scanner, table, keys.right, value.right, offset)
}

const parseArray = (scanner: Scanner, depth: number): Parsed<Value> => {
  advance(scanner)
  const items: Array<Value> = []
  for (;;) {
    const leading = skipTrivia(scanner)
    if (Either.isLeft(leading)) {
      return Either.left(leading.left)
    }
    if (peek(scanner) === "]") {
      advance(scanner)
      return Either.right(sequence(items))
    }
    const item = parseValue(scanner, depth + 1)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
    const trailing = skipTrivia(scanner)
    if (Either.isLeft(trailing)) {
      return Either.left(trailing.left)
    }
    const next = peek(scanner)
    if (next === "]") {
      advance(scanner)
      return Either.right(sequence(items))
    }
    if (next !== ",") {
      return fail(scanner, `Expected ',' or ']' in array but found ${describeChar(next)}`)
    }
    advance(scanner)
  }
}

const parseInlineTable = (scanner: Scanner, depth: number): Parsed<Value> => {
  advance(scanner)
  const table = makeTable("inline")
  skipSpaces(scanner)
  if (peek(scanner) === "}") {
    advance(scanner)
    return Either.right(tableToValue(table))
  }
  for (;;) {
    const entry = parseKeyValue(scanner, table, depth + 1)
    if (Either.isLeft(entry)) {
      return Either.left(entry.left)
    }
    skipSpaces(scanner)
    const next = peek(scanner)
    if (next === "}") {
      advance(scanner)
      return Either.right(tableToValue(table))
    }
    if (next !== ",") {
      return fail(
        scanner,
        atNewline(scanner)
          ? "Inline tables must be written on a single line"
          : `Expected ',' or '}' in inline table but found ${describeChar(next)}`
      )
    }
    advance(scanner)
    skipSpaces(scanner)
    if (peek(scanner) === "}") {
      return fail(scanner, "Trailing comma in inline table")
    }
  }
}

const parseValue = (scanner: Scanner, depth: number): Parsed<Value> => {
  if (depth > MAX_DEPTH) {
    return fail(scanner, `Nesting deeper than ${MAX_DEPTH} levels`)
  }
  const char = peek(scanner)
  if (char === "\"" || char === "'") {
    return Either.map(parseStringValue(scanner), string)
  }
  if (char === "[") {
    return parseArray(scanner, depth)
  }
  if (char === "{") {
    return parseInlineTable(scanner, depth)
  }
  return parseScalar(scanner)
}

// Walk the prefix of a header, creating implicit tables and entering the
// last element of arrays of tables.
const descend = (
  scanner: Scanner,
  root: TableNode,
  prefix: ReadonlyArray<string>,
  offset: number
): Parsed<TableNode> => {
  let target = root
  for (const [index, key] of prefix.entries()) {
    const existing = target.entries.get(key)
    if (existing === undefined) {
      const created = makeTable("implicit")
      target.entries.set(key, created)
      target = created
      continue
    }
    if (existing._tag === "Table") {
      target = existing
      continue
    }
    const lastTable = existing._tag === "ArrayTables" ? existing.tables.at(-1) : undefined
    if (lastTable === undefined) {
      return fail(
        scanner,
        `Cannot extend ${describeNode(existing)} '${displayKey(prefix.slice(0, index + 1))}'`,
        offset
      )
    }
    target = lastTable
  }
  return Either.right(target)
}

const openTable = (
  scanner: Scanner,
  parent: TableNode,
  keys: ReadonlyArray<string>,
  last: string,
  offset: number
): Parsed<TableNode> => {
  const existing = parent.entries.get(last)
  if (existing === undefined) {
    const created = makeTable("header")
    parent.entries.set(last, created)
    return Either.right(created)
  }
  if (existing._tag === "Table" && existing.kind === "implicit") {
    existing.kind = "header"
    return Either.right(existing)
  }
  if (existing._tag === "Table") {
    return fail(scanner, `Table [${displayKey(keys)}] is defined more than once`, offset)
  }
  return fail(scanner, `Cannot redefine ${describeNode(existing)} '${displayKey(keys)}' as a table`, offset)
}

const openArrayTable = (
  scanner: Scanner,
  parent: TableNode,
  keys: ReadonlyArray<string>,
  last: string,
  offset: number
): Parsed<TableNode> => {
  const existing = parent.entries.get(last)
  const created = makeTable("header")
  if (existing === undefined) {
    parent.entries.set(last, { _tag: "ArrayTables", tables: [created] })
    return Either.right(created)
  }
  if (existing._tag === "ArrayTables") {
    existing.tables.push(created)
    return Either.right(created)
  }
  return fail(scanner, `Cannot append to ${describeNode(existing)} '${displayKey(keys)}'`, offset)
}

const parseHeader = (scanner: Scanner, root: TableNode): Parsed<TableNode> => {
  const offset = scanner.index
  const isArray = lookingAt(scanner, "[[")
  advance(scanner, isArray ? 2 : 1)
  const keys = parseKey(scanner)
  if (Either.isLeft(keys)) {
    return Either.left(keys.left)
  }
  const close = isArray ? "]]" : "]"
  if (!lookingAt(scanner, close)) {
    return fail(scanner, `Expected '${close}' to close the table header but found ${describeChar(peek(scanner))}`)
  }
  advance(scanner, close.length)
  const split = splitLast(keys.right)
  if (split === undefined) {
    return fail(scanner, "Empty table header", offset)
  }
  const [prefix, last] = split
  const parent = descend(scanner, root, prefix, offset)
  if (Either.isLeft(parent)) {
    return parent
  }
  return isArray
    ? openArrayTable(scanner, parent.right, keys.right, last, offset)
    : openTable(scanner, parent.right, keys.right, last, offset)
}

/**
 * Parse a TOML 1.0 document.
 *
 * @param text - Document text; a leading byte order mark is ignored.
 * @returns Mapping of the root table; ParseError with line/column for invalid
 * documents; UnsupportedFeature for date and time literals.
 *
 * @pure true
 * @invariant the result is always a Mapping
 * @complexity O(n)
 */
export const parseToml = (text: string): ParseResult => {
  const scanner = makeScanner(text)
  if (text.charCodeAt(0) === 0xfeff) {
    advance(scanner)
  }
  const root = makeTable("header")
  let current = root
  for (;;) {
    const trivia = skipTrivia(scanner)
    if (Either.isLeft(trivia)) {
      return Either.left(trivia.left)
    }
    if (atEnd(scanner)) {
      return Either.right(tableToValue(root))
    }
    if (peek(scanner) === "[") {
      const table = parseHeader(scanner, root)
      if (Either.isLeft(table)) {
        return Either.left(table.left)
      }
      current = table.right
    } else {
      const entry = parseKeyValue(scanner, current, 0)
      if (Either.isLeft(entry)) {
        return Either.left(entry.left)
      }
    }
    const lineEnd = expectLineEnd(scanner)
    if (Either.isLeft(lineEnd)) {
      return Either.left(lineEnd.left)
    }
  }
}
