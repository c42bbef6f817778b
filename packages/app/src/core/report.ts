import type { ConversionPlan } from "./config.js"

// CHANGE: render the texts the CLI prints on success
// WHY: keep stdout wording pure and shared between the program and its tests
// REF: req-report-1
// PURITY: CORE
// INVARIANT: every rendered text ends without a trailing newline

export const version = "0.1.0"

const usageLines: ReadonlyArray<string> = [
  "Usage: scribe <input-path> [output-path] [options]",
  "",
  "Convert a document between JSON, YAML and TOML.",
  "Formats are inferred from file extensions unless overridden.",
  "",
  "Options:",
  "  -f, --format, --to <format>  output format (json, yaml, toml)",
  "      --from <format>          input format (json, yaml, toml)",
  "      --indent <n>             indentation width 0..8 (default 0)",
  "  -q, --quiet                  do not print the success line",
  "      --verbose                log each conversion stage",
  "  -h, --help                   show this help",
  "  -v, --version                show the version"
]

export const renderUsage = (): string => usageLines.join("\n")

export const renderVersion = (): string => `scribe ${version}`

/**
 * Success line printed after the output file is written.
 *
 * @pure true
 */
export const renderSuccess = (plan: Pick<ConversionPlan, "inputPath" | "outputPath">): string =>
  `Wrote ${plan.inputPath} to ${plan.outputPath}`
