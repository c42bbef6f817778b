import type * as Either from "effect/Either"

import type { ParseError, UnrepresentableError, UnsupportedFeature } from "./errors.js"
import type { Format } from "./format.js"
import type { Value } from "./value.js"

// CHANGE: define the parse/emit contract implemented once per format
// WHY: the conversion driver dispatches through a format → adapter table
// REF: req-adapter-1
// FORMAT THEOREM: ∀a ∈ Adapters, v representable in a.format: a.parse(a.emit(v)) ≡ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: adapters never throw; failures travel in the Either channel
// COMPLEXITY: O(1)/O(1)

export interface EmitOptions {
  /**
   * Indentation width. `0` keeps each format's default layout: compact JSON,
   * two-space YAML, flat TOML.
   */
  readonly indent: number
}

export const defaultEmitOptions: EmitOptions = { indent: 0 }

export type ParseResult = Either.Either<Value, ParseError | UnsupportedFeature>

export type EmitResult = Either.Either<string, UnrepresentableError>

export interface FormatAdapter {
  readonly format: Format
  readonly parse: (text: string) => ParseResult
  readonly emit: (value: Value, options: EmitOptions) => EmitResult
}
