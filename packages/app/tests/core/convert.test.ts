import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { convert, transcode } from "../../src/core/convert.js"
import { parseError, unrepresentable, unsupportedFormat } from "../../src/core/errors.js"

const encode = (text: string): Uint8Array => new TextEncoder().encode(text)

const decodedOutput = (result: ReturnType<typeof transcode>): Either.Either<string, string> =>
  Either.match(result, {
    onLeft: (error) => Either.left(error._tag),
    onRight: (value) => Either.right(new TextDecoder().decode(value.bytes))
  })

describe("transcode", () => {
  it.effect("converts JSON to YAML", () =>
    Effect.sync(() => {
      const input = encode("{\"name\":\"test\",\"port\":8080,\"ratio\":1.0,\"tags\":[\"a\",\"b\"]}")
      expect(decodedOutput(transcode(input, "json", "yaml"))).toEqual(
        Either.right("name: test\nport: 8080\nratio: 1.0\ntags:\n  - a\n  - b\n")
      )
    }))

  it.effect("converts YAML to TOML", () =>
    Effect.sync(() => {
      expect(decodedOutput(transcode(encode("title: x\nowner:\n  name: y\n"), "yaml", "toml"))).toEqual(
        Either.right("title = \"x\"\n\n[owner]\nname = \"y\"\n")
      )
    }))

  it.effect("converts TOML to JSON keeping integers and floats apart", () =>
    Effect.sync(() => {
      expect(decodedOutput(transcode(encode("a = 1\nb = 1.0\n"), "toml", "json"))).toEqual(
        Either.right("{\"a\":1,\"b\":1.0}\n")
      )
    }))

  it.effect("passes emit options to the output adapter", () =>
    Effect.sync(() => {
      expect(decodedOutput(transcode(encode("a:\n  - 1\n"), "yaml", "json", { indent: 2 }))).toEqual(
        Either.right("{\n  \"a\": [\n    1\n  ]\n}\n")
      )
    }))

  it.effect("re-indents within one format", () =>
    Effect.sync(() => {
      expect(decodedOutput(transcode(encode("{\"a\":[1,2.5]}"), "json", "json", { indent: 2 }))).toEqual(
        Either.right("{\n  \"a\": [\n    1,\n    2.5\n  ]\n}\n")
      )
    }))

  it.effect("resolves format aliases and reports the canonical names", () =>
    Effect.sync(() => {
      const result = transcode(encode("a: 1\n"), "YML", "json")
      expect(Either.map(result, (value) => [value.inputFormat, value.outputFormat])).toEqual(
        Either.right(["yaml", "json"])
      )
    }))

  it.effect("rejects unknown formats by side", () =>
    Effect.sync(() => {
      expect(transcode(encode("{}"), "xml", "json")).toEqual(Either.left(unsupportedFormat("input", "xml")))
      expect(transcode(encode("{}"), "json", "xml")).toEqual(Either.left(unsupportedFormat("output", "xml")))
    }))

  it.effect("parses before resolving the output format", () =>
    Effect.sync(() => {
      expect(decodedOutput(transcode(encode("{"), "json", "xml"))).toEqual(Either.left("ParseError"))
    }))

  it.effect("rejects input that is not UTF-8", () =>
    Effect.sync(() => {
      expect(transcode(new Uint8Array([0xff, 0xfe, 0x00]), "json", "yaml")).toEqual(
        Either.left(parseError("json", "Input is not valid UTF-8"))
      )
    }))

  it.effect("reports values the output format cannot hold", () =>
    Effect.sync(() => {
      expect(transcode(encode("[1,2,3]"), "json", "toml")).toEqual(
        Either.left(unrepresentable("toml", "Sequence", [], "a TOML document must be a table at the root"))
      )
    }))
})

describe("cross-format conversions", () => {
  const through = (text: string, from: string, to: string) =>
    Either.map(transcode(encode(text), from, to), (value) => new TextDecoder().decode(value.bytes))

  it.effect("keeps structure, order and types through YAML and back", () =>
    Effect.sync(() => {
      const yamlText = through("{\"a\": 1, \"b\": [true, null, \"x\"]}", "json", "yaml")
      expect(yamlText).toEqual(Either.right("a: 1\nb:\n  - true\n  - null\n  - x\n"))
      expect(Either.flatMap(yamlText, (text) => through(text, "yaml", "json"))).toEqual(
        Either.right("{\"a\":1,\"b\":[true,null,\"x\"]}\n")
      )
    }))

  it.effect("emits root sequences to YAML but not TOML", () =>
    Effect.sync(() => {
      expect(through("[1,2,3]", "json", "yaml")).toEqual(Either.right("- 1\n- 2\n- 3\n"))
      expect(Either.isLeft(through("[1,2,3]", "json", "toml"))).toBe(true)
    }))

  it.effect("keeps quoted YAML scalars as strings", () =>
    Effect.sync(() => {
      expect(through("\"yes\"\n", "yaml", "json")).toEqual(Either.right("\"yes\"\n"))
    }))

  it.effect("turns TOML arrays of tables into JSON arrays", () =>
    Effect.sync(() => {
      expect(through("[[a]]\nb = 1\n\n[[a]]\nb = 2", "toml", "json")).toEqual(
        Either.right("{\"a\":[{\"b\":1},{\"b\":2}]}\n")
      )
    }))
})

describe("convert", () => {
  it.effect("hands the output bytes to the sink once", () =>
    Effect.gen(function*(_) {
      const written: Array<string> = []
      const sink = (bytes: Uint8Array) => Effect.sync(() => void written.push(new TextDecoder().decode(bytes)))
      const result = yield* _(convert(encode("a = 1\n"), "toml", sink, "yaml"))
      expect(result.outputFormat).toBe("yaml")
      expect(written).toEqual(["a: 1\n"])
    }))

  it.effect("never calls the sink when conversion fails", () =>
    Effect.gen(function*(_) {
      const written: Array<Uint8Array> = []
      const sink = (bytes: Uint8Array) => Effect.sync(() => void written.push(bytes))
      const error = yield* _(Effect.flip(convert(encode("{\"a\":null}"), "json", sink, "toml")))
      expect(error).toEqual(unrepresentable("toml", "Null", ["a"], "TOML has no null value"))
      expect(written).toEqual([])
    }))
})
