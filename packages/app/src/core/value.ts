import * as Either from "effect/Either"

import { typeMismatch } from "./decode-error.js"
import type { DecodeResult } from "./decode-result.js"
import type { Json, JsonArray, JsonKind, JsonObject } from "./json.js"
import { describeValue, isJsonArray, isJsonObject, kindOf } from "./json.js"

// CHANGE: view a value as one concrete variant
// WHY: this is the single place where raw shape mismatches become TypeMismatch errors
// REF: req-value-model-2
// FORMAT THEOREM: ∀v, k: as_k(v) = Right(v) ↔ kindOf(v) = k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: failures carry an empty path; callers prefix it
// COMPLEXITY: O(1)/O(1)

const mismatch = <A>(expected: JsonKind | string, value: Json): DecodeResult<A> =>
  Either.left(typeMismatch(expected, describeValue(value)))

export const asNull = (value: Json): DecodeResult<null> =>
  value === null ? Either.right(null) : mismatch("null", value)

export const asBoolean = (value: Json): DecodeResult<boolean> =>
  typeof value === "boolean" ? Either.right(value) : mismatch("boolean", value)

export const asNumber = (value: Json): DecodeResult<number> =>
  typeof value === "number" && Number.isFinite(value) ? Either.right(value) : mismatch("number", value)

export const asString = (value: Json): DecodeResult<string> =>
  typeof value === "string" ? Either.right(value) : mismatch("string", value)

export const asArray = (value: Json): DecodeResult<JsonArray> =>
  isJsonArray(value) ? Either.right(value) : mismatch("array", value)

export const asObject = (value: Json): DecodeResult<JsonObject> =>
  isJsonObject(value) ? Either.right(value) : mismatch("object", value)

export const asKind = (kind: JsonKind, value: Json): DecodeResult<Json> =>
  kindOf(value) === kind ? Either.right(value) : mismatch(kind, value)
