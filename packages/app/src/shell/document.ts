import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { IoError } from "../core/errors.js"
import { ioError } from "../core/errors.js"

// CHANGE: read input documents and write converted output through the platform FileSystem
// WHY: isolate filesystem IO from the pure conversion core
// REF: req-document-io-1
// FORMAT THEOREM: ∀p: read(p) fails ⇒ error.path = p
// PURITY: SHELL
// EFFECT: Effect<Uint8Array | void, IoError, FileSystem>
// INVARIANT: bytes pass through untouched; decoding happens in the core
// COMPLEXITY: O(n)

export const readDocument = (
  path: string
): Effect.Effect<Uint8Array, IoError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(fs.readFile(path).pipe(Effect.mapError((error) => ioError("read", path, error.message))))
    yield* _(Effect.logDebug(`read ${bytes.length} bytes from ${path}`))
    return bytes
  })

export const writeDocument = (
  path: string,
  bytes: Uint8Array
): Effect.Effect<void, IoError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(fs.writeFile(path, bytes).pipe(Effect.mapError((error) => ioError("write", path, error.message))))
    yield* _(Effect.logDebug(`wrote ${bytes.length} bytes to ${path}`))
  })
