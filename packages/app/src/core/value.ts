import { isInt64 } from "./number.js"

// CHANGE: introduce the intermediate Value model shared by every format adapter
// WHY: adapters only meet through this type; parse builds it, emit consumes it
// REF: req-value-1
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Null,Bool,Integer,Float,String,Sequence,Mapping}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Mapping keys are unique; Integer values lie within signed 64-bit range
// COMPLEXITY: O(1) per constructor, O(n) for mapping()

export type NullValue = { readonly _tag: "Null" }
export type BoolValue = { readonly _tag: "Bool"; readonly value: boolean }
export type IntegerValue = { readonly _tag: "Integer"; readonly value: bigint }
export type FloatValue = { readonly _tag: "Float"; readonly value: number }
export type StringValue = { readonly _tag: "String"; readonly value: string }
export type SequenceValue = { readonly _tag: "Sequence"; readonly items: ReadonlyArray<Value> }
export type MappingValue = { readonly _tag: "Mapping"; readonly entries: ReadonlyArray<MappingEntry> }

export interface MappingEntry {
  readonly key: string
  readonly value: Value
}

export type Value =
  | NullValue
  | BoolValue
  | IntegerValue
  | FloatValue
  | StringValue
  | SequenceValue
  | MappingValue

export type ValueType = Value["_tag"]

export const nullValue: NullValue = { _tag: "Null" }

export const bool = (value: boolean): BoolValue => ({ _tag: "Bool", value })

/**
 * Build an Integer. Callers guarantee the int64 range; see integerFromBigInt
 * for values that may overflow.
 */
export const integer = (value: bigint): IntegerValue => ({ _tag: "Integer", value })

export const float = (value: number): FloatValue => ({ _tag: "Float", value })

export const string = (value: string): StringValue => ({ _tag: "String", value })

export const sequence = (items: ReadonlyArray<Value>): SequenceValue => ({ _tag: "Sequence", items })

/**
 * Build a Mapping from raw entries, collapsing duplicate keys.
 *
 * @param entries - Entries in source order, possibly with repeated keys.
 * @returns Mapping with unique keys.
 *
 * @pure true
 * @invariant a repeated key keeps its first position and its last value
 * @complexity O(n)
 */
export const mapping = (entries: ReadonlyArray<MappingEntry>): MappingValue => {
  const positions = new Map<string, number>()
  const result: Array<MappingEntry> = []
  for (const entry of entries) {
    const position = positions.get(entry.key)
    if (position === undefined) {
      positions.set(entry.key, result.length)
      result.push(entry)
    } else {
      result[position] = entry
    }
  }
  return { _tag: "Mapping", entries: result }
}

/**
 * Integer when the value fits in signed 64 bits, otherwise Float.
 *
 * @pure true
 * @complexity O(1)
 */
export const integerFromBigInt = (value: bigint): IntegerValue | FloatValue =>
  isInt64(value) ? integer(value) : float(Number(value))

export const isMapping = (value: Value): value is MappingValue => value._tag === "Mapping"

export const typeName = (value: Value): ValueType => value._tag
