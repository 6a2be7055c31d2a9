import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { AppError } from "../core/errors.js"
import { parseTextError } from "../core/errors.js"
import { formatDecodeError } from "../core/format.js"
import { fromUnknown } from "../core/from-unknown.js"
import type { Json } from "../core/json.js"

// CHANGE: parse JSON text into the value tree consumed by decoders
// WHY: text parsing is a separate failure domain from decoding
// REF: req-json-text-1
// FORMAT THEOREM: ∀s: parse(s) = Right(j) → j = JSON.parse(s)
// PURITY: SHELL
// EFFECT: Effect<Json, AppError>
// INVARIANT: malformed text fails with ParseError, never with a DecodeError
// COMPLEXITY: O(n)

// Objects are rebuilt by fromUnknown, which keeps every own key including "__proto__".
const JsonTextSchema = Schema.parseJson(Schema.Unknown)

/**
 * Parse JSON text.
 *
 * @param source - Label of the text's origin, used in the error.
 * @param raw - JSON text.
 * @returns Effect with the value tree or a ParseError.
 *
 * @pure false
 * @effect Logger
 * @complexity O(n)
 */
export const parseJsonText = (source: string, raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonTextSchema)(raw),
    Effect.mapError((error) => parseTextError(source, ParseResult.TreeFormatter.formatErrorSync(error))),
    Effect.flatMap((parsed) =>
      Either.match(fromUnknown(parsed), {
        onLeft: (error): Effect.Effect<Json, AppError> => Effect.fail(parseTextError(source, formatDecodeError(error))),
        onRight: (value): Effect.Effect<Json, AppError> => Effect.succeed(value)
      })
    ),
    Effect.tap(() => Effect.logDebug(`parsed ${raw.length} characters`)),
    Effect.annotateLogs("source", source)
  )
