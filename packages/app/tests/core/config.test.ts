import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { cliError } from "../../src/core/cli.js"
import { resolveConversionPlan } from "../../src/core/config.js"
import { unsupportedFormat } from "../../src/core/errors.js"

const cli = (overrides: Partial<CliArgs>): CliArgs => ({
  inputPath: undefined,
  outputPath: undefined,
  from: undefined,
  format: undefined,
  indent: 0,
  quiet: false,
  verbose: false,
  help: false,
  version: false,
  ...overrides
})

describe("resolveConversionPlan", () => {
  it.effect("infers both formats from extensions", () =>
    Effect.sync(() => {
      expect(resolveConversionPlan(cli({ inputPath: "config.JSON", outputPath: "out/config.yml", indent: 2 }))).toEqual(
        Either.right({
          inputPath: "config.JSON",
          outputPath: "out/config.yml",
          inputFormat: "json",
          outputFormat: "yaml",
          emitOptions: { indent: 2 },
          quiet: false,
          verbose: false
        })
      )
    }))

  it.effect("lets flags override extensions", () =>
    Effect.sync(() => {
      const plan = resolveConversionPlan(
        cli({ inputPath: "data.txt", outputPath: "data.out", from: "yaml", format: "toml" })
      )
      expect(Either.map(plan, (value) => [value.inputFormat, value.outputFormat])).toEqual(
        Either.right(["yaml", "toml"])
      )
    }))

  it.effect("allows the same format on both sides", () =>
    Effect.sync(() => {
      const plan = resolveConversionPlan(cli({ inputPath: "compact.json", outputPath: "pretty.json", indent: 2 }))
      expect(Either.map(plan, (value) => [value.inputFormat, value.outputFormat, value.emitOptions.indent])).toEqual(
        Either.right(["json", "json", 2])
      )
    }))

  it.effect("derives the output path from --format", () =>
    Effect.sync(() => {
      const outputOf = (inputPath: string, format: string) =>
        Either.map(resolveConversionPlan(cli({ inputPath, format })), (plan) => plan.outputPath)
      expect(outputOf("dir/app.toml", "yaml")).toEqual(Either.right("dir/app.yml"))
      expect(outputOf("app.yaml", "json")).toEqual(Either.right("app.json"))
      expect(outputOf("archive.v1.json", "toml")).toEqual(Either.right("archive.v1.toml"))
    }))

  it.effect("rejects missing and clashing paths", () =>
    Effect.sync(() => {
      expect(resolveConversionPlan(cli({}))).toEqual(Either.left(cliError("Missing input path")))
      expect(resolveConversionPlan(cli({ inputPath: "a.json" }))).toEqual(
        Either.left(cliError("Missing output path: pass one or choose a format with --format"))
      )
      expect(resolveConversionPlan(cli({ inputPath: "a.json", format: "json" }))).toEqual(
        Either.left(cliError("Output path a.json is the same as the input path"))
      )
    }))

  it.effect("reports unknown formats by extension, path or name", () =>
    Effect.sync(() => {
      expect(resolveConversionPlan(cli({ inputPath: "a.xml", outputPath: "b.json" }))).toEqual(
        Either.left(unsupportedFormat("input", "xml"))
      )
      expect(resolveConversionPlan(cli({ inputPath: "a.json", outputPath: "Makefile" }))).toEqual(
        Either.left(unsupportedFormat("output", "Makefile"))
      )
      expect(resolveConversionPlan(cli({ inputPath: "a.json", format: "ini" }))).toEqual(
        Either.left(unsupportedFormat("output", "ini"))
      )
      expect(resolveConversionPlan(cli({ inputPath: "a.json", outputPath: "b.toml", from: "csv" }))).toEqual(
        Either.left(unsupportedFormat("input", "csv"))
      )
    }))
})
