import * as Either from "effect/Either"
import {
  Document,
  isAlias,
  isMap,
  isNode,
  isScalar,
  isSeq,
  Pair,
  parseAllDocuments,
  Scalar,
  visit,
  YAMLMap,
  YAMLSeq
} from "yaml"
import type { Alias, Node, ScalarTag } from "yaml"

import type { EmitOptions, EmitResult, FormatAdapter, ParseResult } from "./adapter.js"
import type { ParseError, SourcePosition, UnsupportedFeature } from "./errors.js"
import { parseError, unsupportedFeature } from "./errors.js"
import { formatFloat } from "./number.js"
import { positionAt } from "./scanner.js"
import type { MappingEntry, Value } from "./value.js"
import { bool, float, integerFromBigInt, mapping, nullValue, sequence, string } from "./value.js"

// CHANGE: bridge the yaml document AST and the Value model
// WHY: the yaml library already implements YAML 1.2 scanning, anchors and quoting rules
// REF: req-yaml-1
// FORMAT THEOREM: ∀v: parseYaml(emitYaml(v)) ≡ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integers are read as bigint so 1 and 1.0 stay distinct
// COMPLEXITY: O(n + e) where e ≤ MAX_ALIAS_NODES counts nodes produced by alias expansion

type Parsed<A> = Either.Either<A, ParseError | UnsupportedFeature>

// Node budget for alias expansion; nested aliases can otherwise grow the tree exponentially.
const MAX_ALIAS_NODES = 100_000

interface WalkContext {
  readonly text: string
  readonly targets: ReadonlyMap<Alias, Node>
  readonly active: Set<Node>
  aliasDepth: number
  expanded: number
}

// An alias refers to the closest preceding node carrying its anchor.
const collectAliasTargets = (doc: Document.Parsed): ReadonlyMap<Alias, Node> => {
  const anchors = new Map<string, Node>()
  const targets = new Map<Alias, Node>()
  visit(doc, {
    Node: (_key, node) => {
      if (isAlias(node)) {
        const target = anchors.get(node.source)
        if (target !== undefined) {
          targets.set(node, target)
        }
      } else if (node.anchor !== undefined) {
        anchors.set(node.anchor, node)
      }
    }
  })
  return targets
}

const nodePosition = (context: WalkContext, node: unknown): SourcePosition | undefined => {
  if (!isNode(node) || node.range === undefined || node.range === null) {
    return undefined
  }
  return positionAt(context.text, node.range[0])
}

const unsupported = (context: WalkContext, node: unknown, feature: string): Parsed<never> =>
  Either.left(unsupportedFeature("yaml", "parse", feature, nodePosition(context, node)))

const renderYamlFloat = (value: number): string => {
  if (Number.isNaN(value)) {
    return ".nan"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? ".inf" : "-.inf"
  }
  return formatFloat(value)
}

const scalarValue = (context: WalkContext, scalar: Scalar): Parsed<Value> => {
  const payload = scalar.value
  if (payload === null || payload === undefined) {
    return Either.right(nullValue)
  }
  if (typeof payload === "boolean") {
    return Either.right(bool(payload))
  }
  if (typeof payload === "bigint") {
    return Either.right(integerFromBigInt(payload))
  }
  if (typeof payload === "number") {
    return Either.right(float(payload))
  }
  if (typeof payload === "string") {
    return Either.right(string(payload))
  }
  return unsupported(context, scalar, `scalar of type ${typeof payload}`)
}

const scalarKey = (context: WalkContext, scalar: Scalar): Parsed<string> => {
  const payload = scalar.value
  if (payload === null || payload === undefined) {
    return Either.right("null")
  }
  if (typeof payload === "string") {
    return Either.right(payload)
  }
  if (typeof payload === "boolean" || typeof payload === "bigint") {
    return Either.right(String(payload))
  }
  if (typeof payload === "number") {
    return Either.right(renderYamlFloat(payload))
  }
  return unsupported(context, scalar, `mapping key of type ${typeof payload}`)
}

const resolveAlias = (context: WalkContext, alias: Alias): Parsed<Node> => {
  const target = context.targets.get(alias)
  if (target === undefined) {
    return Either.left(parseError("yaml", `Unresolved alias *${alias.source}`, nodePosition(context, alias)))
  }
  if (context.active.has(target)) {
    return unsupported(context, alias, "recursive alias")
  }
  return Either.right(target)
}

const keyText = (context: WalkContext, key: unknown): Parsed<string> => {
  if (key === null || key === undefined) {
    return Either.right("null")
  }
  if (isAlias(key)) {
    return Either.flatMap(resolveAlias(context, key), (target) => keyText(context, target))
  }
  if (isScalar(key)) {
    return scalarKey(context, key)
  }
  return unsupported(context, key, "complex mapping key")
}

const withActive = <A>(context: WalkContext, node: Node, body: () => Parsed<A>): Parsed<A> => {
  context.active.add(node)
  const result = body()
  context.active.delete(node)
  return result
}

const sequenceValue = (context: WalkContext, seq: YAMLSeq): Parsed<Value> => {
  const items: Array<Value> = []
  for (const item of seq.items) {
    const value = toValue(context, item)
    if (Either.isLeft(value)) {
      return value
    }
    items.push(value.right)
  }
  return Either.right(sequence(items))
}

const mappingValue = (context: WalkContext, map: YAMLMap): Parsed<Value> => {
  const entries: Array<MappingEntry> = []
  for (const pair of map.items) {
    const key = keyText(context, pair.key)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const value = toValue(context, pair.value)
    if (Either.isLeft(value)) {
      return value
    }
    entries.push({ key: key.right, value: value.right })
  }
  return Either.right(mapping(entries))
}

const expandAlias = (context: WalkContext, alias: Alias): Parsed<Value> =>
  Either.flatMap(resolveAlias(context, alias), (target) => {
    context.aliasDepth += 1
    const value = toValue(context, target)
    context.aliasDepth -= 1
    return value
  })

const toValue = (context: WalkContext, node: unknown): Parsed<Value> => {
  if (context.aliasDepth > 0) {
    context.expanded += 1
    if (context.expanded > MAX_ALIAS_NODES) {
      return unsupported(context, node, "excessive aliasing")
    }
  }
  if (node === null || node === undefined) {
    return Either.right(nullValue)
  }
  if (isAlias(node)) {
    return expandAlias(context, node)
  }
  if (isScalar(node)) {
    return scalarValue(context, node)
  }
  if (isSeq(node)) {
    return withActive(context, node, () => sequenceValue(context, node))
  }
  if (isMap(node)) {
    return withActive(context, node, () => mappingValue(context, node))
  }
  return unsupported(context, node, "unknown node type")
}

/**
 * Parse a single-document YAML stream into a Value.
 *
 * @param text - YAML 1.2 source.
 * @returns Value, ParseError for malformed input, UnsupportedFeature for
 * multi-document streams, recursive aliases, collection keys and alias
 * expansions beyond MAX_ALIAS_NODES nodes.
 *
 * @pure true
 * @invariant an empty stream yields Null
 * @complexity O(n)
 */
export const parseYaml = (text: string): ParseResult => {
  const docs = parseAllDocuments(text, { intAsBigInt: true, uniqueKeys: false, prettyErrors: false })
  const [doc, ...rest] = docs
  if (doc === undefined) {
    return Either.right(nullValue)
  }
  const error = doc.errors[0]
  if (error !== undefined) {
    return Either.left(parseError("yaml", error.message, positionAt(text, error.pos[0])))
  }
  if (rest.length > 0) {
    const second = rest[0]
    const position = second?.range === undefined ? undefined : positionAt(text, second.range[0])
    return Either.left(unsupportedFeature("yaml", "parse", "multi-document stream", position))
  }
  const context: WalkContext = {
    text,
    targets: collectAliasTargets(doc),
    active: new Set(),
    aliasDepth: 0,
    expanded: 0
  }
  return toValue(context, doc.contents)
}

class YamlFloat {
  constructor(readonly value: number) {}
}

// Floats are wrapped so the stringifier never picks the int tag for 1.0.
const floatTag: ScalarTag = {
  identify: (value) => value instanceof YamlFloat,
  default: true,
  tag: "tag:yaml.org,2002:float",
  resolve: (source) => Number(source),
  stringify: (item) => item.value instanceof YamlFloat ? renderYamlFloat(item.value.value) : String(item.value)
}

const toNode = (value: Value): Node => {
  switch (value._tag) {
    case "Null":
      return new Scalar(null)
    case "Bool":
    case "Integer":
    case "String":
      return new Scalar(value.value)
    case "Float":
      return new Scalar(new YamlFloat(value.value))
    case "Sequence": {
      const seq = new YAMLSeq<Node>()
      seq.items.push(...value.items.map(toNode))
      return seq
    }
    case "Mapping": {
      const map = new YAMLMap<Scalar<string>, Node>()
      for (const entry of value.entries) {
        map.items.push(new Pair(new Scalar(entry.key), toNode(entry.value)))
      }
      return map
    }
  }
}

/**
 * Emit a Value as a block-style YAML document.
 *
 * @param options - `indent` sets the block indentation width, 0 keeps 2.
 * @returns YAML text ending with a newline; never fails.
 *
 * @pure true
 * @invariant strings whose plain form reads as another type are quoted
 * @complexity O(n)
 */
export const emitYaml = (value: Value, options: EmitOptions): EmitResult => {
  const doc = new Document(undefined, { customTags: [floatTag], compat: "yaml-1.1" })
  doc.contents = toNode(value)
  const indent = Number.isInteger(options.indent) && options.indent > 0 ? options.indent : 2
  return Either.right(doc.toString({ indent, lineWidth: 0 }))
}

export const yamlAdapter: FormatAdapter = {
  format: "yaml",
  parse: parseYaml,
  emit: emitYaml
}
