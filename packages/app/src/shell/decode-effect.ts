import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { DecodeResult } from "../core/decode-result.js"
import type { DecoderLike } from "../core/decodable.js"
import { decodeWith } from "../core/decodable.js"
import type { DecodeFailure } from "../core/errors.js"
import { decodeFailure } from "../core/errors.js"
import { formatDecodeError } from "../core/format.js"
import type { Json } from "../core/json.js"

// CHANGE: bridge decode results into the Effect error channel
// WHY: callers in the shell compose decoding with I/O and surface failures
// REF: req-decode-effect-1
// FORMAT THEOREM: ∀r: fromDecodeResult(r) fails ↔ r is Left
// PURITY: SHELL
// EFFECT: Effect<A, DecodeFailure>
// INVARIANT: the DecodeError is carried unchanged inside DecodeFailure
// COMPLEXITY: O(1)

export const fromDecodeResult = <A>(source: string, result: DecodeResult<A>): Effect.Effect<A, DecodeFailure> =>
  Either.isRight(result)
    ? Effect.succeed(result.right)
    : Effect.logWarning(`decode failed\n${formatDecodeError(result.left)}`).pipe(
      Effect.annotateLogs("source", source),
      Effect.zipRight(Effect.fail(decodeFailure(source, result.left)))
    )

export const decodeEffect = <A>(
  source: string,
  decoder: DecoderLike<A>,
  value: Json
): Effect.Effect<A, DecodeFailure> => fromDecodeResult(source, decodeWith(decoder, value))
