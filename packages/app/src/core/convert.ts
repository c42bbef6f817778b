import { Effect } from "effect"
import * as Either from "effect/Either"

import type { EmitOptions } from "./adapter.js"
import { defaultEmitOptions } from "./adapter.js"
import { lookupAdapter } from "./adapters.js"
import type { ConversionError } from "./errors.js"
import { parseError } from "./errors.js"
import type { Format } from "./format.js"

// CHANGE: drive one conversion from input bytes to output bytes
// WHY: keep parse → emit → write ordering in one place so no partial output is ever written
// REF: req-convert-1
// FORMAT THEOREM: ∀b,i,o: convert(b,i,sink,o) calls sink ⇔ transcode(b,i,o) = Right(bytes)
// PURITY: CORE (transcode), SHELL (convert)
// EFFECT: Effect<Transcoded, ConversionError | E, R> where the sink is Effect<void, E, R>
// INVARIANT: the sink runs at most once, after a successful emit
// COMPLEXITY: O(n) in document size

export interface Transcoded {
  readonly bytes: Uint8Array
  readonly inputFormat: Format
  readonly outputFormat: Format
}

const decodeUtf8 = (bytes: Uint8Array, format: Format): Either.Either<string, ConversionError> =>
  Either.try({
    try: () => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
    catch: () => parseError(format, "Input is not valid UTF-8")
  })

/**
 * Convert bytes between formats without performing any I/O.
 *
 * @param inputBytes - Raw UTF-8 document.
 * @param inputFormat - Format name for the input side.
 * @param outputFormat - Format name for the output side.
 * @param options - Emit options for the output adapter.
 * @returns Encoded output with the resolved formats, or the first failure.
 *
 * @pure true
 * @invariant the output adapter is resolved only after the input parsed
 * @complexity O(n)
 */
export const transcode = (
  inputBytes: Uint8Array,
  inputFormat: string,
  outputFormat: string,
  options: EmitOptions = defaultEmitOptions
): Either.Either<Transcoded, ConversionError> =>
  Either.gen(function*() {
    const input = yield* lookupAdapter(inputFormat, "input")
    const text = yield* decodeUtf8(inputBytes, input.format)
    const value = yield* input.parse(text)
    const output = yield* lookupAdapter(outputFormat, "output")
    const emitted = yield* output.emit(value, options)
    return {
      bytes: new TextEncoder().encode(emitted),
      inputFormat: input.format,
      outputFormat: output.format
    }
  })

/**
 * Convert a document and hand the encoded result to a sink.
 *
 * @param sink - Receives the output bytes; called only when emission succeeded.
 *
 * @pure false
 * @effect whatever the sink performs
 * @invariant failing conversions never reach the sink
 * @complexity O(n)
 */
export const convert = <E, R>(
  inputBytes: Uint8Array,
  inputFormat: string,
  sink: (bytes: Uint8Array) => Effect.Effect<void, E, R>,
  outputFormat: string,
  options: EmitOptions = defaultEmitOptions
): Effect.Effect<Transcoded, ConversionError | E, R> =>
  Effect.gen(function*(_) {
    const result = yield* _(transcode(inputBytes, inputFormat, outputFormat, options))
    yield* _(Effect.logDebug(`emitted ${result.bytes.length} bytes of ${result.outputFormat}`))
    yield* _(sink(result.bytes))
    return result
  })
