import { Match } from "effect"
import * as Either from "effect/Either"

import { array } from "./collections.js"
import type { Aggregation } from "./decode-result.js"
import type { Decoder } from "./decodable.js"
import type { Json } from "./json.js"
import { boolean, integer, json, nullValue, number, string } from "./primitives.js"
import { asArray, asObject } from "./value.js"

// CHANGE: name the decoders the CLI can apply to a looked-up value
// WHY: `--as number[]` must select a decoder without runtime type lookup
// REF: req-cli-target-1
// FORMAT THEOREM: ∀t: targetDecoder(t) decodes exactly the values of kind t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a trailing [] wraps the base decoder in array()
// COMPLEXITY: O(1)/O(1)

export type TargetKind = "json" | "string" | "number" | "integer" | "boolean" | "null" | "array" | "object"

export interface Target {
  readonly kind: TargetKind
  readonly many: boolean
}

export const targetKinds: ReadonlyArray<TargetKind> = [
  "json",
  "string",
  "number",
  "integer",
  "boolean",
  "null",
  "array",
  "object"
]

const isTargetKind = (value: string): value is TargetKind => targetKinds.some((kind) => kind === value)

export const parseTarget = (raw: string): Either.Either<Target, string> => {
  const many = raw.endsWith("[]")
  const name = many ? raw.slice(0, -2) : raw
  return isTargetKind(name)
    ? Either.right({ kind: name, many })
    : Either.left(`Unknown target: ${raw} (expected one of ${targetKinds.join(", ")}, optionally suffixed with [])`)
}

export const renderTarget = (target: Target): string => `${target.kind}${target.many ? "[]" : ""}`

const baseDecoder = (kind: TargetKind): Decoder<Json> =>
  Match.value(kind).pipe(
    Match.when("json", (): Decoder<Json> => json),
    Match.when("string", (): Decoder<Json> => string),
    Match.when("number", (): Decoder<Json> => number),
    Match.when("integer", (): Decoder<Json> => integer),
    Match.when("boolean", (): Decoder<Json> => boolean),
    Match.when("null", (): Decoder<Json> => nullValue),
    Match.when("array", (): Decoder<Json> => asArray),
    Match.when("object", (): Decoder<Json> => asObject),
    Match.exhaustive
  )

export const targetDecoder = (target: Target, aggregation: Aggregation): Decoder<Json> =>
  target.many ? array(baseDecoder(target.kind), aggregation) : baseDecoder(target.kind)
