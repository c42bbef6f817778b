import * as Either from "effect/Either"

import type { EmitOptions, EmitResult, FormatAdapter, ParseResult } from "./adapter.js"
import type { ParseError, UnrepresentableError, ValuePath } from "./errors.js"
import { parseError, unrepresentable } from "./errors.js"
import { classifyDecimal, formatFloat } from "./number.js"
import type { Scanner } from "./scanner.js"
import { advance, atEnd, currentPosition, describeChar, makeScanner, peek } from "./scanner.js"
import type { MappingEntry, Value } from "./value.js"
import { bool, float, integer, mapping, nullValue, sequence, string } from "./value.js"

// CHANGE: read and write JSON without losing the Integer/Float distinction
// WHY: JSON.parse maps 1 and 1.0 to the same number and rounds large integers
// REF: req-json-1
// FORMAT THEOREM: ∀v without non-finite floats: parseJson(emitJson(v)) ≡ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: duplicate object keys resolve last-wins; errors carry line/column
// COMPLEXITY: O(n) in document size

const MAX_DEPTH = 512

type Parsed<A> = Either.Either<A, ParseError>

const fail = (scanner: Scanner, message: string): Parsed<never> =>
  Either.left(parseError("json", message, currentPosition(scanner)))

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

const skipWhitespace = (scanner: Scanner): void => {
  while (isWhitespace(peek(scanner))) {
    advance(scanner)
  }
}

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const hex4 = /^[0-9A-Fa-f]{4}$/u

const readEscape = (scanner: Scanner): Parsed<string> => {
  const escape = peek(scanner)
  const simple = simpleEscapes[escape]
  if (simple !== undefined) {
    advance(scanner)
    return Either.right(simple)
  }
  if (escape === "u") {
    const digits = scanner.text.slice(scanner.index + 1, scanner.index + 5)
    if (!hex4.test(digits)) {
      return fail(scanner, "Invalid unicode escape, expected four hex digits")
    }
    advance(scanner, 5)
    return Either.right(String.fromCharCode(Number.parseInt(digits, 16)))
  }
  return fail(scanner, `Invalid escape sequence \\${escape}`)
}

const parseString = (scanner: Scanner): Parsed<string> => {
  const start = currentPosition(scanner)
  advance(scanner)
  let result = ""
  for (;;) {
    const char = peek(scanner)
    if (char === "") {
      return Either.left(parseError("json", "Unterminated string", start))
    }
    if (char === "\"") {
      advance(scanner)
      return Either.right(result)
    }
    if (char === "\\") {
      advance(scanner)
      const escaped = readEscape(scanner)
      if (Either.isLeft(escaped)) {
        return escaped
      }
      result += escaped.right
      continue
    }
    if (char.charCodeAt(0) < 0x20) {
      return fail(scanner, "Unescaped control character in string")
    }
    result += char
    advance(scanner)
  }
}

const numberPattern = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/uy

const parseNumber = (scanner: Scanner): Parsed<Value> => {
  numberPattern.lastIndex = scanner.index
  const match = numberPattern.exec(scanner.text)
  const literal = match?.[0] ?? ""
  const following = scanner.text.charAt(scanner.index + literal.length)
  if (literal.length === 0 || /[0-9.eE+-]/u.test(following)) {
    return fail(scanner, "Invalid number literal")
  }
  const classified = classifyDecimal(literal)
  if (classified._tag === "Float" && !Number.isFinite(classified.value)) {
    return fail(scanner, `Number ${literal} is outside the range of a double`)
  }
  advance(scanner, literal.length)
  return Either.right(classified._tag === "Integer" ? integer(classified.value) : float(classified.value))
}

const parseKeyword = (scanner: Scanner, keyword: string, value: Value): Parsed<Value> => {
  if (!scanner.text.startsWith(keyword, scanner.index)) {
    return fail(scanner, `Unexpected ${describeChar(peek(scanner))}`)
  }
  advance(scanner, keyword.length)
  return Either.right(value)
}

const parseArray = (scanner: Scanner, depth: number): Parsed<Value> => {
  advance(scanner)
  skipWhitespace(scanner)
  const items: Array<Value> = []
  if (peek(scanner) === "]") {
    advance(scanner)
    return Either.right(sequence(items))
  }
  for (;;) {
    skipWhitespace(scanner)
    if (peek(scanner) === "]") {
      return fail(scanner, "Trailing comma in array")
    }
    const item = parseValue(scanner, depth + 1)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
    skipWhitespace(scanner)
    const next = peek(scanner)
    if (next === "]") {
      advance(scanner)
      return Either.right(sequence(items))
    }
    if (next !== ",") {
      return fail(scanner, `Expected ',' or ']' but found ${describeChar(next)}`)
    }
    advance(scanner)
  }
}

const parseObject = (scanner: Scanner, depth: number): Parsed<Value> => {
  advance(scanner)
  skipWhitespace(scanner)
  const entries: Array<MappingEntry> = []
  if (peek(scanner) === "}") {
    advance(scanner)
    return Either.right(mapping(entries))
  }
  for (;;) {
    skipWhitespace(scanner)
    const keyStart = peek(scanner)
    if (keyStart === "}") {
      return fail(scanner, "Trailing comma in object")
    }
    if (keyStart !== "\"") {
      return fail(scanner, `Expected string key but found ${describeChar(keyStart)}`)
    }
    const key = parseString(scanner)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    skipWhitespace(scanner)
    if (peek(scanner) !== ":") {
      return fail(scanner, `Expected ':' after object key but found ${describeChar(peek(scanner))}`)
    }
    advance(scanner)
    skipWhitespace(scanner)
    const value = parseValue(scanner, depth + 1)
    if (Either.isLeft(value)) {
      return value
    }
    entries.push({ key: key.right, value: value.right })
    skipWhitespace(scanner)
    const next = peek(scanner)
    if (next === "}") {
      advance(scanner)
      return Either.right(mapping(entries))
    }
    if (next !== ",") {
      return fail(scanner, `Expected ',' or '}' but found ${describeChar(next)}`)
    }
    advance(scanner)
  }
}

const parseValue = (scanner: Scanner, depth: number): Parsed<Value> => {
  if (depth > MAX_DEPTH) {
    return fail(scanner, `Nesting deeper than ${MAX_DEPTH} levels`)
  }
  const char = peek(scanner)
  if (char === "{") {
    return parseObject(scanner, depth)
  }
  if (char === "[") {
    return parseArray(scanner, depth)
  }
  if (char === "\"") {
    return Either.map(parseString(scanner), string)
  }
  if (char === "-" || (char >= "0" && char <= "9")) {
    return parseNumber(scanner)
  }
  if (char === "t") {
    return parseKeyword(scanner, "true", bool(true))
  }
  if (char === "f") {
    return parseKeyword(scanner, "false", bool(false))
  }
  if (char === "n") {
    return parseKeyword(scanner, "null", nullValue)
  }
  return fail(scanner, char === "" ? "Unexpected end of input" : `Unexpected ${describeChar(char)}`)
}

/**
 * Parse JSON text into a Value.
 *
 * @param text - Document text; a leading byte order mark is ignored.
 * @returns Value or ParseError with line/column.
 *
 * @pure true
 * @invariant exactly one top-level value, surrounded only by whitespace
 * @complexity O(n)
 */
export const parseJson = (text: string): ParseResult => {
  const scanner = makeScanner(text)
  if (text.charCodeAt(0) === 0xfeff) {
    advance(scanner)
  }
  skipWhitespace(scanner)
  if (atEnd(scanner)) {
    return fail(scanner, "Empty document")
  }
  const value = parseValue(scanner, 0)
  if (Either.isLeft(value)) {
    return value
  }
  skipWhitespace(scanner)
  if (!atEnd(scanner)) {
    return fail(scanner, `Unexpected ${describeChar(peek(scanner))} after top-level value`)
  }
  return value
}

type Emitted = Either.Either<string, UnrepresentableError>

const emitFloat = (value: number, path: ValuePath): Emitted =>
  Number.isFinite(value)
    ? Either.right(formatFloat(value))
    : Either.left(unrepresentable("json", "Float", path, `${String(value)} has no JSON form`))

const wrap = (
  parts: ReadonlyArray<string>,
  open: string,
  close: string,
  indent: number,
  level: number
): string => {
  if (parts.length === 0) {
    return open + close
  }
  if (indent === 0) {
    return open + parts.join(",") + close
  }
  const inner = " ".repeat(indent * (level + 1))
  const outer = " ".repeat(indent * level)
  return `${open}\n${parts.map((part) => inner + part).join(",\n")}\n${outer}${close}`
}

const emitValue = (value: Value, path: ValuePath, indent: number, level: number): Emitted => {
  switch (value._tag) {
    case "Null":
      return Either.right("null")
    case "Bool":
      return Either.right(value.value ? "true" : "false")
    case "Integer":
      return Either.right(value.value.toString())
    case "Float":
      return emitFloat(value.value, path)
    case "String":
      return Either.right(JSON.stringify(value.value))
    case "Sequence": {
      const parts: Array<string> = []
      for (const [index, item] of value.items.entries()) {
        const emitted = emitValue(item, [...path, index], indent, level + 1)
        if (Either.isLeft(emitted)) {
          return emitted
        }
        parts.push(emitted.right)
      }
      return Either.right(wrap(parts, "[", "]", indent, level))
    }
    case "Mapping": {
      const separator = indent === 0 ? ":" : ": "
      const parts: Array<string> = []
      for (const entry of value.entries) {
        const emitted = emitValue(entry.value, [...path, entry.key], indent, level + 1)
        if (Either.isLeft(emitted)) {
          return emitted
        }
        parts.push(JSON.stringify(entry.key) + separator + emitted.right)
      }
      return Either.right(wrap(parts, "{", "}", indent, level))
    }
  }
}

/**
 * Emit a Value as JSON text.
 *
 * @param value - Tree to serialize.
 * @param options - `indent` 0 for compact output, n > 0 for n-space pretty printing.
 * @returns JSON text ending with a newline, or UnrepresentableError for NaN/Infinity.
 *
 * @pure true
 * @invariant mapping key order is preserved
 * @complexity O(n)
 */
export const emitJson = (value: Value, options: EmitOptions): EmitResult =>
  Either.map(emitValue(value, [], Math.max(0, options.indent), 0), (text) => `${text}\n`)

export const jsonAdapter: FormatAdapter = {
  format: "json",
  parse: parseJson,
  emit: emitJson
}
