import * as Either from "effect/Either"

import { typeMismatch } from "./decode-error.js"
import type { DecodeResult } from "./decode-result.js"
import type { Decoder } from "./decodable.js"
import type { Json } from "./json.js"
import { describeValue } from "./json.js"
import { asBoolean, asNull, asNumber, asString } from "./value.js"

// CHANGE: provide built-in decoders for scalar values
// WHY: composite decoders bottom out in these
// REF: req-decodable-2
// FORMAT THEOREM: ∀v: string(v) = Right(s) ↔ typeof v = "string"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: failures are TypeMismatch with an empty path
// COMPLEXITY: O(1)/O(1)

export const boolean: Decoder<boolean> = asBoolean

export const number: Decoder<number> = asNumber

export const string: Decoder<string> = asString

export const nullValue: Decoder<null> = asNull

export const json: Decoder<Json> = (value) => Either.right(value)

export const integer: Decoder<number> = (value) =>
  typeof value === "number" && Number.isSafeInteger(value)
    ? Either.right(value)
    : Either.left(typeMismatch("integer", describeValue(value)))

export const nonEmptyString: Decoder<string> = (value) =>
  typeof value === "string" && value.length > 0
    ? Either.right(value)
    : Either.left(typeMismatch("non-empty string", describeValue(value)))

type Literal = string | number | boolean | null

const renderLiterals = (values: ReadonlyArray<Literal>): string =>
  values.map((value) => JSON.stringify(value)).join(" | ")

/**
 * Decode one of a fixed set of raw values, e.g. the members of a string enum.
 *
 * @example literal("draft", "published")
 *
 * @pure true
 * @complexity O(k) where k = number of literals
 */
export const literal = <const L extends readonly [Literal, ...Array<Literal>]>(
  ...values: L
): Decoder<L[number]> =>
(value): DecodeResult<L[number]> => {
  for (const candidate of values) {
    if (candidate === value) {
      return Either.right(candidate)
    }
  }
  return Either.left(typeMismatch(renderLiterals(values), describeValue(value)))
}
