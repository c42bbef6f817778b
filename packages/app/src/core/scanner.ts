import type { SourcePosition } from "./errors.js"

// CHANGE: share a character cursor between the hand-written JSON and TOML readers
// WHY: both grammars report failures with line/column computed from one offset
// REF: req-scanner-1
// FORMAT THEOREM: ∀o ≤ |text|: positionAt(text, o).line = 1 + |{i < o : text[i] = "\n"}|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: index only moves forward
// COMPLEXITY: O(1) per step, O(n) for positionAt

export interface Scanner {
  readonly text: string
  index: number
}

export const makeScanner = (text: string): Scanner => ({ text, index: 0 })

export const peek = (scanner: Scanner, offset = 0): string => scanner.text.charAt(scanner.index + offset)

export const atEnd = (scanner: Scanner): boolean => scanner.index >= scanner.text.length

export const lookingAt = (scanner: Scanner, token: string): boolean => scanner.text.startsWith(token, scanner.index)

export const advance = (scanner: Scanner, count = 1): void => {
  scanner.index = Math.min(scanner.text.length, scanner.index + count)
}

/**
 * Convert an offset into a 1-based line and column.
 *
 * @pure true
 * @invariant columns count UTF-16 code units from the last line feed
 * @complexity O(n)
 */
export const positionAt = (text: string, offset: number): SourcePosition => {
  let line = 1
  let lineStart = 0
  const end = Math.min(offset, text.length)
  for (let index = 0; index < end; index += 1) {
    if (text.charCodeAt(index) === 10) {
      line += 1
      lineStart = index + 1
    }
  }
  return { line, column: end - lineStart + 1 }
}

export const currentPosition = (scanner: Scanner): SourcePosition => positionAt(scanner.text, scanner.index)

export const describeChar = (char: string): string => char === "" ? "end of input" : JSON.stringify(char)
