import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { unrepresentable } from "../../src/core/errors.js"
import { INT64_MAX, INT64_MIN } from "../../src/core/number.js"
import { emitToml } from "../../src/core/toml-emit.js"
import { parseToml } from "../../src/core/toml-parse.js"
import { bool, float, integer, mapping, nullValue, sequence, string } from "../../src/core/value.js"

const flat = { indent: 0 }

describe("emitToml", () => {
  it.effect("writes plain values, tables and arrays of tables in order", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "title", value: string("x") },
        { key: "owner", value: mapping([{ key: "name", value: string("y") }]) },
        {
          key: "items",
          value: sequence([mapping([{ key: "id", value: integer(1n) }]), mapping([{ key: "id", value: integer(2n) }])])
        },
        { key: "count", value: integer(3n) }
      ])
      expect(emitToml(value, flat)).toEqual(
        Either.right(
          "title = \"x\"\ncount = 3\n\n[owner]\nname = \"y\"\n\n[[items]]\nid = 1\n\n[[items]]\nid = 2\n"
        )
      )
    }))

  it.effect("omits headers of tables that only hold sub-tables", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "a", value: mapping([{ key: "b", value: mapping([{ key: "c", value: integer(1n) }]) }]) }
      ])
      expect(emitToml(value, flat)).toEqual(Either.right("[a.b]\nc = 1\n"))
    }))

  it.effect("keeps empty tables and empty documents", () =>
    Effect.sync(() => {
      expect(emitToml(mapping([{ key: "a", value: mapping([]) }]), flat)).toEqual(Either.right("[a]\n"))
      expect(emitToml(mapping([]), flat)).toEqual(Either.right(""))
    }))

  it.effect("nests tables under array-of-tables elements", () =>
    Effect.sync(() => {
      const value = mapping([
        {
          key: "items",
          value: sequence([
            mapping([
              { key: "id", value: integer(1n) },
              { key: "meta", value: mapping([{ key: "tag", value: string("x") }]) }
            ])
          ])
        }
      ])
      expect(emitToml(value, flat)).toEqual(Either.right("[[items]]\nid = 1\n\n[items.meta]\ntag = \"x\"\n"))
    }))

  it.effect("writes mixed arrays inline", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "xs", value: sequence([integer(1n), integer(2n)]) },
        { key: "empty", value: sequence([]) },
        { key: "mixed", value: sequence([mapping([{ key: "a", value: integer(1n) }]), integer(2n)]) },
        { key: "nested", value: sequence([sequence([integer(1n)]), sequence([])]) },
        { key: "blank", value: sequence([mapping([]), integer(1n)]) }
      ])
      expect(emitToml(value, flat)).toEqual(
        Either.right("xs = [1, 2]\nempty = []\nmixed = [{ a = 1 }, 2]\nnested = [[1], []]\nblank = [{}, 1]\n")
      )
    }))

  it.effect("spells floats so they read back as floats", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "a", value: float(1) },
        { key: "b", value: float(Number.POSITIVE_INFINITY) },
        { key: "c", value: float(Number.NEGATIVE_INFINITY) },
        { key: "d", value: float(Number.NaN) },
        { key: "e", value: float(1e21) },
        { key: "f", value: float(-0) }
      ])
      const emitted = emitToml(value, flat)
      expect(emitted).toEqual(Either.right("a = 1.0\nb = inf\nc = -inf\nd = nan\ne = 1e+21\nf = -0.0\n"))
      expect(Either.flatMap(emitted, parseToml)).toEqual(Either.right(value))
    }))

  it.effect("quotes keys and escapes strings", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "a b", value: integer(1n) },
        { key: "s", value: string("say \"hi\"\\\n\t\u0001") },
        { key: "x.y", value: mapping([{ key: "k", value: integer(2n) }]) }
      ])
      const emitted = emitToml(value, flat)
      expect(emitted).toEqual(
        Either.right("\"a b\" = 1\ns = \"say \\\"hi\\\"\\\\\\n\\t\\u0001\"\n\n[\"x.y\"]\nk = 2\n")
      )
      expect(Either.flatMap(emitted, parseToml)).toEqual(Either.right(value))
    }))

  it.effect("indents nested tables when asked", () =>
    Effect.sync(() => {
      const value = mapping([
        {
          key: "a",
          value: mapping([
            { key: "x", value: integer(1n) },
            { key: "b", value: mapping([{ key: "y", value: integer(2n) }]) }
          ])
        }
      ])
      const emitted = emitToml(value, { indent: 2 })
      expect(emitted).toEqual(Either.right("[a]\n  x = 1\n\n  [a.b]\n    y = 2\n"))
      expect(Either.flatMap(emitted, parseToml)).toEqual(Either.right(value))
    }))

  it.effect("reads back every emitted tree unchanged", () =>
    Effect.sync(() => {
      // plain values precede tables, which precede arrays of tables, as the emitter orders them
      const value = mapping([
        { key: "title", value: string("round trip") },
        { key: "min", value: integer(INT64_MIN) },
        { key: "max", value: integer(INT64_MAX) },
        { key: "zero", value: float(-0) },
        { key: "big", value: float(Number.POSITIVE_INFINITY) },
        { key: "small", value: float(Number.NEGATIVE_INFINITY) },
        { key: "missing", value: float(Number.NaN) },
        { key: "quoted key", value: sequence([integer(1n), sequence([]), mapping([])]) },
        { key: "empty", value: mapping([]) },
        {
          key: "owner",
          value: mapping([
            { key: "name", value: string("y") },
            { key: "address", value: mapping([{ key: "city", value: string("z") }]) }
          ])
        },
        {
          key: "servers",
          value: sequence([
            mapping([
              { key: "name", value: string("a") },
              { key: "ports", value: sequence([integer(80n), integer(443n)]) },
              { key: "meta", value: mapping([{ key: "x.y", value: bool(true) }]) },
              {
                key: "disks",
                value: sequence([
                  mapping([{ key: "size", value: integer(1n) }]),
                  mapping([
                    { key: "size", value: integer(2n) },
                    { key: "opts", value: mapping([{ key: "fast", value: bool(false) }]) }
                  ])
                ])
              }
            ]),
            mapping([{ key: "name", value: string("b") }])
          ])
        }
      ])
      for (const indent of [0, 2, 4]) {
        expect(Either.flatMap(emitToml(value, { indent }), parseToml)).toEqual(Either.right(value))
      }
    }))

  it.effect("rejects null with the path to the value", () =>
    Effect.sync(() => {
      const value = mapping([
        { key: "a", value: mapping([{ key: "b", value: sequence([integer(1n), nullValue]) }]) }
      ])
      expect(emitToml(value, flat)).toEqual(
        Either.left(unrepresentable("toml", "Null", ["a", "b", 1], "TOML has no null value"))
      )
    }))

  it.effect("rejects a root that is not a mapping", () =>
    Effect.sync(() => {
      expect(emitToml(sequence([integer(1n)]), flat)).toEqual(
        Either.left(unrepresentable("toml", "Sequence", [], "a TOML document must be a table at the root"))
      )
    }))
})
