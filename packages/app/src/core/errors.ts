import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { Format } from "./format.js"
import type { ValueType } from "./value.js"

// CHANGE: unify error algebra for conversion, I/O and CLI failures
// WHY: provide typed failures for program flow, exit codes and stderr messages
// REF: req-errors-1
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every rendered message names the failing stage or side and its cause
// COMPLEXITY: O(1)/O(1)

export type Side = "input" | "output"
export type Stage = "parse" | "emit"
export type IoOperation = "read" | "write"

export interface SourcePosition {
  readonly line: number
  readonly column: number
}

export type UnsupportedFormat = {
  readonly _tag: "UnsupportedFormat"
  readonly side: Side
  readonly requested: string
}

export type ParseError = {
  readonly _tag: "ParseError"
  readonly format: Format
  readonly message: string
  readonly position?: SourcePosition
}

export type UnsupportedFeature = {
  readonly _tag: "UnsupportedFeature"
  readonly format: Format
  readonly stage: Stage
  readonly feature: string
  readonly position?: SourcePosition
}

export type UnrepresentableError = {
  readonly _tag: "UnrepresentableError"
  readonly format: Format
  readonly valueType: ValueType
  readonly path: string
  readonly reason: string
}

export type IoError = {
  readonly _tag: "IoError"
  readonly operation: IoOperation
  readonly path: string
  readonly message: string
}

export type ConversionError = UnsupportedFormat | ParseError | UnsupportedFeature | UnrepresentableError

export type AppError = CliError | ConversionError | IoError

export type ValuePath = ReadonlyArray<string | number>

export const unsupportedFormat = (side: Side, requested: string): UnsupportedFormat => ({
  _tag: "UnsupportedFormat",
  side,
  requested
})

export const parseError = (
  format: Format,
  message: string,
  position?: SourcePosition
): ParseError =>
  position === undefined
    ? { _tag: "ParseError", format, message }
    : { _tag: "ParseError", format, message, position }

export const unsupportedFeature = (
  format: Format,
  stage: Stage,
  feature: string,
  position?: SourcePosition
): UnsupportedFeature =>
  position === undefined
    ? { _tag: "UnsupportedFeature", format, stage, feature }
    : { _tag: "UnsupportedFeature", format, stage, feature, position }

const plainSegment = /^[A-Za-z_][A-Za-z0-9_-]*$/u

/**
 * Render a path into a Value tree, e.g. `$.servers[0].name`.
 *
 * @pure true
 * @complexity O(n)
 */
export const formatValuePath = (path: ValuePath): string =>
  path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`
    }
    return plainSegment.test(segment) ? `${acc}.${segment}` : `${acc}[${JSON.stringify(segment)}]`
  }, "$")

export const unrepresentable = (
  format: Format,
  valueType: ValueType,
  path: ValuePath,
  reason: string
): UnrepresentableError => ({
  _tag: "UnrepresentableError",
  format,
  valueType,
  path: formatValuePath(path),
  reason
})

export const ioError = (operation: IoOperation, path: string, message: string): IoError => ({
  _tag: "IoError",
  operation,
  path,
  message
})

const formatPosition = (position: SourcePosition | undefined): string =>
  position === undefined ? "" : ` at line ${position.line}, column ${position.column}`

/**
 * Render any application error as a single human-readable line.
 *
 * @param error - Failure raised anywhere in the program.
 * @returns Message for stderr, without trailing newline.
 *
 * @pure true
 * @invariant conversion errors name the stage, the format and the cause
 * @complexity O(1)
 */
export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}\nRun "scribe --help" for usage.`),
    Match.tag(
      "UnsupportedFormat",
      (value) => `error: unsupported ${value.side} format "${value.requested}" (expected json, yaml or toml)`
    ),
    Match.tag(
      "ParseError",
      (value) => `error: parse failed (${value.format})${formatPosition(value.position)}: ${value.message}`
    ),
    Match.tag(
      "UnsupportedFeature",
      (value) =>
        `error: ${value.stage} failed (${value.format})${
          formatPosition(value.position)
        }: unsupported feature: ${value.feature}`
    ),
    Match.tag(
      "UnrepresentableError",
      (value) =>
        `error: emit failed (${value.format}): cannot represent ${value.valueType} at ${value.path}: ${value.reason}`
    ),
    Match.tag("IoError", (value) => `error: cannot ${value.operation} ${value.path}: ${value.message}`),
    Match.exhaustive
  )

/**
 * Exit code for a failure: 2 for usage errors, 1 otherwise.
 *
 * @pure true
 */
export const exitCodeFor = (error: AppError): number => error._tag === "CliError" ? 2 : 1
