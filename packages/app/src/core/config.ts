import * as Either from "effect/Either"

import type { EmitOptions } from "./adapter.js"
import type { CliArgs, CliError } from "./cli.js"
import { cliError } from "./cli.js"
import type { UnsupportedFormat } from "./errors.js"
import { unsupportedFormat } from "./errors.js"
import type { Format } from "./format.js"
import { defaultExtension, extensionOf, formatFromPath, parseFormatName, replaceExtension } from "./format.js"

// CHANGE: resolve paths, formats and emit options before any file is touched
// WHY: flags override extensions; failures here must not leave files behind
// REF: req-config-plan-1
// FORMAT THEOREM: ∀cli: resolve(cli).inputFormat = name(cli.from) ?? ext(cli.inputPath)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: outputPath ≠ inputPath
// COMPLEXITY: O(n) in path length

export interface ConversionPlan {
  readonly inputPath: string
  readonly outputPath: string
  readonly inputFormat: Format
  readonly outputFormat: Format
  readonly emitOptions: EmitOptions
  readonly quiet: boolean
  readonly verbose: boolean
}

export type PlanError = CliError | UnsupportedFormat

type Side = UnsupportedFormat["side"]

// Unknown extensions are reported by name; paths without one by the path itself.
const fromPath = (path: string, side: Side): Either.Either<Format, UnsupportedFormat> => {
  const format = formatFromPath(path)
  return format === undefined
    ? Either.left(unsupportedFormat(side, extensionOf(path) ?? path))
    : Either.right(format)
}

const fromName = (name: string, side: Side): Either.Either<Format, UnsupportedFormat> => {
  const format = parseFormatName(name)
  return format === undefined ? Either.left(unsupportedFormat(side, name)) : Either.right(format)
}

const resolveOutputPath = (
  cli: CliArgs,
  inputPath: string,
  requested: Format | undefined
): Either.Either<string, CliError> => {
  if (cli.outputPath !== undefined) {
    return Either.right(cli.outputPath)
  }
  if (requested === undefined) {
    return Either.left(cliError("Missing output path: pass one or choose a format with --format"))
  }
  return Either.right(replaceExtension(inputPath, defaultExtension(requested)))
}

/**
 * Turn parsed flags into a conversion plan.
 *
 * @param cli - Parsed CLI arguments.
 * @returns ConversionPlan, CliError for missing or clashing paths, or
 * UnsupportedFormat for an unknown format name or extension.
 *
 * @pure true
 * @invariant --from beats the input extension; --format beats the output extension
 * @complexity O(n)
 */
export const resolveConversionPlan = (cli: CliArgs): Either.Either<ConversionPlan, PlanError> =>
  Either.gen(function*() {
    const inputPath = cli.inputPath
    if (inputPath === undefined) {
      return yield* Either.left(cliError("Missing input path"))
    }
    const inputFormat = yield* (cli.from === undefined ? fromPath(inputPath, "input") : fromName(cli.from, "input"))
    const requested = cli.format === undefined ? undefined : yield* fromName(cli.format, "output")
    const outputPath = yield* resolveOutputPath(cli, inputPath, requested)
    const outputFormat = requested ?? (yield* fromPath(outputPath, "output"))
    if (outputPath === inputPath) {
      return yield* Either.left(cliError(`Output path ${outputPath} is the same as the input path`))
    }
    return {
      inputPath,
      outputPath,
      inputFormat,
      outputFormat,
      emitOptions: { indent: cli.indent },
      quiet: cli.quiet,
      verbose: cli.verbose
    }
  })
