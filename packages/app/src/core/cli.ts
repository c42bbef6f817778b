import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

// CHANGE: parse `scribe <input> [output] [options]` into typed arguments
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → |positionals(argv)| ≤ 2
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; value flags take `--name v`, `--name=v`, `-f v` or `-f=v`
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly inputPath: string | undefined
  readonly outputPath: string | undefined
  readonly from: string | undefined
  readonly format: string | undefined
  readonly indent: number
  readonly quiet: boolean
  readonly verbose: boolean
  readonly help: boolean
  readonly version: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const MAX_INDENT = 8

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

const defaultArgs: CliArgs = {
  inputPath: undefined,
  outputPath: undefined,
  from: undefined,
  format: undefined,
  indent: 0,
  quiet: false,
  verbose: false,
  help: false,
  version: false
}

const IndentSchema = S.NumberFromString.pipe(S.int(), S.between(0, MAX_INDENT))

const decodeIndent = S.decodeUnknownEither(IndentSchema)

const parseIndent = (value: string): Either.Either<number, CliError> =>
  Either.mapLeft(
    decodeIndent(value),
    (error) => cliError(`Invalid value for --indent: ${TreeFormatter.formatErrorSync(error)}`)
  )

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseSwitch = (
  flagName: string,
  inlineValue: string | undefined,
  next: CliArgs
): Either.Either<ParsedFlag, CliError> =>
  inlineValue === undefined
    ? Either.right({ next, consumed: 1 })
    : Either.left(cliError(`Flag --${flagName} does not take a value`))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: ReadonlyMap<string, FlagParser> = new Map<string, FlagParser>([
  [
    "format",
    (current, inlineValue, nextValue) =>
      parseValueFlag("format", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, format: value }))
  ],
  [
    "from",
    (current, inlineValue, nextValue) =>
      parseValueFlag("from", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, from: value }))
  ],
  [
    "indent",
    (current, inlineValue, nextValue) =>
      parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
        Either.map(parseIndent(value), (indent) => ({ ...args, indent })))
  ],
  ["quiet", (current, inlineValue) => parseSwitch("quiet", inlineValue, { ...current, quiet: true })],
  ["verbose", (current, inlineValue) => parseSwitch("verbose", inlineValue, { ...current, verbose: true })],
  ["help", (current, inlineValue) => parseSwitch("help", inlineValue, { ...current, help: true })],
  ["version", (current, inlineValue) => parseSwitch("version", inlineValue, { ...current, version: true })]
])

const aliases: ReadonlyMap<string, string> = new Map([
  ["f", "format"],
  ["to", "format"],
  ["q", "quiet"],
  ["h", "help"],
  ["v", "version"]
])

interface FlagName {
  readonly name: string
  readonly inlineValue: string | undefined
}

const splitFlag = (raw: string): FlagName => {
  const body = raw.startsWith("--") ? raw.slice(2) : raw.slice(1)
  const equals = body.indexOf("=")
  return equals === -1
    ? { name: body, inlineValue: undefined }
    : { name: body.slice(0, equals), inlineValue: body.slice(equals + 1) }
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const { inlineValue, name } = splitFlag(raw)
  const shortForm = !raw.startsWith("--")
  if (shortForm && name.length !== 1) {
    return Either.left(cliError(`Unknown flag: -${name}`))
  }
  const canonical = aliases.get(name) ?? (shortForm ? undefined : name)
  const parser = canonical === undefined ? undefined : flagParsers.get(canonical)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: ${shortForm ? "-" : "--"}${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const addPositional = (args: CliArgs, value: string): Either.Either<CliArgs, CliError> => {
  if (args.inputPath === undefined) {
    return Either.right({ ...args, inputPath: value })
  }
  if (args.outputPath === undefined) {
    return Either.right({ ...args, outputPath: value })
  }
  return Either.left(cliError(`Unexpected positional argument: ${value}`))
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 0
  let flagsEnded = false
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!flagsEnded && current === "--") {
      flagsEnded = true
      index += 1
      continue
    }
    if (flagsEnded || !isFlag(current)) {
      const positioned = addPositional(args, current)
      if (Either.isLeft(positioned)) {
        return positioned
      }
      args = positioned.right
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array (the first two entries are skipped).
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant positionals fill inputPath, then outputPath; `--` ends flag parsing
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => parseArguments(argv.slice(2), defaultArgs)
