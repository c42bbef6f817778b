// CHANGE: centralize numeric rules shared by the format adapters
// WHY: JSON, YAML and TOML must agree on the Integer/Float split and on float text
// REF: req-number-1
// FORMAT THEOREM: ∀x finite: Number(formatFloat(x)) = x ∧ formatFloat(x) matches /[.eE]/
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integers outside [-2^63, 2^63-1] never become Integer
// COMPLEXITY: O(n) in literal length

export const INT64_MIN = -(2n ** 63n)
export const INT64_MAX = 2n ** 63n - 1n

export const isInt64 = (value: bigint): boolean => value >= INT64_MIN && value <= INT64_MAX

export type DecimalLiteral =
  | { readonly _tag: "Integer"; readonly value: bigint }
  | { readonly _tag: "Float"; readonly value: number }

/**
 * Decide the representation of an already validated decimal literal.
 *
 * @param text - Literal such as `-12`, `3.5` or `1e9`.
 * @returns Integer when the literal has no fraction or exponent and fits in int64, Float otherwise.
 *
 * @pure true
 * @invariant presence of `.`, an exponent or int64 overflow forces Float
 * @complexity O(n)
 */
export const classifyDecimal = (text: string): DecimalLiteral => {
  if (/[.eE]/u.test(text)) {
    return { _tag: "Float", value: Number(text) }
  }
  const value = BigInt(text)
  return isInt64(value) ? { _tag: "Integer", value } : { _tag: "Float", value: Number(text) }
}

/**
 * Render a finite float so that it reads back as the same float.
 *
 * @param value - Finite IEEE-754 double.
 * @returns Shortest round-trip text, always carrying a `.` or an exponent.
 *
 * @pure true
 * @invariant -0 keeps its sign
 * @complexity O(1)
 */
export const formatFloat = (value: number): string => {
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  const text = String(value)
  return /[.eE]/u.test(text) ? text : `${text}.0`
}
