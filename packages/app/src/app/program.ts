import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ConversionPlan } from "../core/config.js"
import { resolveConversionPlan } from "../core/config.js"
import { convert } from "../core/convert.js"
import { type AppError, exitCodeFor, renderError } from "../core/errors.js"
import { renderSuccess, renderUsage, renderVersion } from "../core/report.js"
import { readDocument, writeDocument } from "../shell/document.js"

// CHANGE: orchestrate one conversion with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: the output file is written only after the document converted
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly plan: ConversionPlan | undefined
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const runConversion = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const plan = yield* _(fromEither(resolveConversionPlan(cli)))
    yield* _(
      Effect.logDebug(
        `plan: ${plan.inputPath} (${plan.inputFormat}) -> ${plan.outputPath} (${plan.outputFormat}), indent ${plan.emitOptions.indent}`
      )
    )
    const input = yield* _(readDocument(plan.inputPath))
    yield* _(
      convert(
        input,
        plan.inputFormat,
        (bytes) => writeDocument(plan.outputPath, bytes),
        plan.outputFormat,
        plan.emitOptions
      )
    )
    if (!plan.quiet) {
      yield* _(writeStdout(renderSuccess(plan)))
    }
    return { exitCode: 0, plan }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with exit code and the executed plan.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant help and version never touch the file system
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    if (cli.help) {
      yield* _(writeStdout(renderUsage()))
      return { exitCode: 0, plan: undefined }
    }
    if (cli.version) {
      yield* _(writeStdout(renderVersion()))
      return { exitCode: 0, plan: undefined }
    }
    return yield* _(
      runConversion(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })

/**
 * Run the CLI and turn any failure into a stderr message and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant usage errors exit with 2, conversion and I/O errors with 1
 */
export const runCliReporting = (
  argv: ReadonlyArray<string>
): Effect.Effect<number, never, FileSystemService> =>
  runCli(argv).pipe(
    Effect.map((result) => result.exitCode),
    Effect.catchAll((error) => Effect.as(writeStderr(renderError(error)), exitCodeFor(error)))
  )
