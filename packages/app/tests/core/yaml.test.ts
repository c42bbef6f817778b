import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { emitYaml, parseYaml } from "../../src/core/yaml.js"
import { bool, float, integer, mapping, nullValue, sequence, string } from "../../src/core/value.js"
import type { Value } from "../../src/core/value.js"

const leftTag = (text: string): string | undefined => {
  const parsed = parseYaml(text)
  return Either.isLeft(parsed) ? parsed.left._tag : undefined
}

const unsupportedFeatureOf = (text: string): string | undefined => {
  const parsed = parseYaml(text)
  return Either.isLeft(parsed) && parsed.left._tag === "UnsupportedFeature" ? parsed.left.feature : undefined
}

describe("parseYaml", () => {
  it.effect("applies implicit typing to plain scalars", () =>
    Effect.sync(() => {
      const text = "a: 1\nb: 1.0\nc: true\nd: ~\ne: hello\nf: '1'\ng: 0x1F\n"
      expect(parseYaml(text)).toEqual(
        Either.right(
          mapping([
            { key: "a", value: integer(1n) },
            { key: "b", value: float(1) },
            { key: "c", value: bool(true) },
            { key: "d", value: nullValue },
            { key: "e", value: string("hello") },
            { key: "f", value: string("1") },
            { key: "g", value: integer(31n) }
          ])
        )
      )
    }))

  it.effect("reads an empty stream as null", () =>
    Effect.sync(() => {
      expect(parseYaml("")).toEqual(Either.right(nullValue))
    }))

  it.effect("turns int64 overflow into a float", () =>
    Effect.sync(() => {
      expect(parseYaml("n: 99999999999999999999\n")).toEqual(
        Either.right(mapping([{ key: "n", value: float(1e20) }]))
      )
    }))

  it.effect("stringifies scalar keys", () =>
    Effect.sync(() => {
      expect(parseYaml("1: a\ntrue: b\n1.5: c\n")).toEqual(
        Either.right(
          mapping([
            { key: "1", value: string("a") },
            { key: "true", value: string("b") },
            { key: "1.5", value: string("c") }
          ])
        )
      )
    }))

  it.effect("expands aliases", () =>
    Effect.sync(() => {
      const base = mapping([{ key: "x", value: integer(1n) }])
      expect(parseYaml("base: &b\n  x: 1\ncopy: *b\n")).toEqual(
        Either.right(mapping([{ key: "base", value: base }, { key: "copy", value: base }]))
      )
    }))

  it.effect("resolves repeated keys last-wins", () =>
    Effect.sync(() => {
      expect(parseYaml("a: 1\nb: 2\na: 3\n")).toEqual(
        Either.right(mapping([{ key: "a", value: integer(3n) }, { key: "b", value: integer(2n) }]))
      )
    }))

  it.effect("rejects features the value model cannot hold", () =>
    Effect.sync(() => {
      expect(unsupportedFeatureOf("a: 1\n---\nb: 2\n")).toBe("multi-document stream")
      expect(unsupportedFeatureOf("&a [*a]\n")).toBe("recursive alias")
      expect(unsupportedFeatureOf("? [a, b]\n: 1\n")).toBe("complex mapping key")
    }))

  it.effect("stops alias expansion that grows past the node budget", () =>
    Effect.sync(() => {
      const lines = ["l0: &l0 [x, x]"]
      for (let level = 1; level <= 20; level += 1) {
        lines.push(`l${level}: &l${level} [*l${level - 1}, *l${level - 1}]`)
      }
      expect(unsupportedFeatureOf(`${lines.join("\n")}\n`)).toBe("excessive aliasing")
    }))

  it.effect("expands shallow alias chains in full", () =>
    Effect.sync(() => {
      const pair = sequence([string("x"), string("x")])
      expect(parseYaml("l0: &l0 [x, x]\nl1: &l1 [*l0, *l0]\n")).toEqual(
        Either.right(mapping([{ key: "l0", value: pair }, { key: "l1", value: sequence([pair, pair]) }]))
      )
    }))

  it.effect("resolves an alias to the closest preceding anchor", () =>
    Effect.sync(() => {
      expect(parseYaml("a: &x 1\nb: *x\nc: &x 2\nd: *x\n")).toEqual(
        Either.right(
          mapping([
            { key: "a", value: integer(1n) },
            { key: "b", value: integer(1n) },
            { key: "c", value: integer(2n) },
            { key: "d", value: integer(2n) }
          ])
        )
      )
    }))

  it.effect("rejects tabs used as indentation", () =>
    Effect.sync(() => {
      expect(leftTag("a:\n\tb: 1\n")).toBe("ParseError")
    }))

  it.effect("reports syntax errors with a position", () =>
    Effect.sync(() => {
      const parsed = parseYaml("a: [1, 2\n")
      expect(leftTag("a: [1, 2\n")).toBe("ParseError")
      if (Either.isLeft(parsed) && parsed.left._tag === "ParseError") {
        expect(parsed.left.format).toBe("yaml")
        expect(parsed.left.position).toBeDefined()
      }
    }))
})

describe("emitYaml", () => {
  it.effect("emits block style and quotes ambiguous strings", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "a", value: integer(1n) },
        { key: "b", value: sequence([bool(true), nullValue, string("x")]) },
        { key: "s", value: string("true") },
        { key: "f", value: float(1) }
      ])
      expect(emitYaml(value, { indent: 0 })).toEqual(
        Either.right("a: 1\nb:\n  - true\n  - null\n  - x\ns: \"true\"\nf: 1.0\n")
      )
    }))

  it.effect("spells non-finite floats the YAML way", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "p", value: float(Number.POSITIVE_INFINITY) },
        { key: "n", value: float(Number.NEGATIVE_INFINITY) },
        { key: "q", value: float(Number.NaN) }
      ])
      expect(emitYaml(value, { indent: 0 })).toEqual(Either.right("p: .inf\nn: -.inf\nq: .nan\n"))
    }))

  it.effect("honours the indent width", () =>
    Effect.sync(() => {
      const value = mapping([{ key: "a", value: mapping([{ key: "b", value: integer(1n) }]) }])
      expect(emitYaml(value, { indent: 4 })).toEqual(Either.right("a:\n    b: 1\n"))
    }))

  it.effect("emits scalars and empty collections at the root", () =>
    Effect.sync(() => {
      expect(emitYaml(integer(42n), { indent: 0 })).toEqual(Either.right("42\n"))
      expect(emitYaml(mapping([]), { indent: 0 })).toEqual(Either.right("{}\n"))
      expect(emitYaml(sequence([]), { indent: 0 })).toEqual(Either.right("[]\n"))
    }))

  it.effect("round-trips values whose plain form is ambiguous", () =>
    Effect.sync(() => {
      const values: ReadonlyArray<Value> = [
        mapping([
          { key: "yes", value: string("yes") },
          { key: "null", value: string("null") },
          { key: "num", value: string("1.0") },
          { key: "int", value: integer(-9223372036854775808n) },
          { key: "neg", value: float(-0) },
          { key: "big", value: float(1e21) },
          { key: "text", value: string("line one\nline two") },
          { key: "empty", value: string("") }
        ]),
        string("~"),
        float(2.5)
      ]
      for (const value of values) {
        expect(Either.flatMap(emitYaml(value, { indent: 0 }), parseYaml)).toEqual(Either.right(value))
      }
    }))
})
