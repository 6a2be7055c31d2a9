import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { DecoderLike } from "../core/decodable.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { decodeEffect } from "./decode-effect.js"
import { parseJsonText } from "./json-text.js"

// CHANGE: read JSON documents from disk and optionally decode them
// WHY: isolate filesystem IO from the pure decoding core
// REF: req-json-file-1
// FORMAT THEOREM: ∀p, d: decodeJsonFile(p, d) = read(p) >>= parse >>= d
// PURITY: SHELL
// EFFECT: Effect<Json, AppError, FileSystem>
// INVARIANT: IO, parse and decode failures keep distinct tags
// COMPLEXITY: O(n)

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(Effect.logDebug(`reading ${path}`))
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(parseJsonText(path, raw))
  })

export const decodeJsonFile = <A>(
  path: string,
  decoder: DecoderLike<A>
): Effect.Effect<A, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const document = yield* _(readJsonFile(path))
    return yield* _(decodeEffect(path, decoder, document))
  })
