import * as Either from "effect/Either"

import type { PathSegment } from "./decode-error.js"
import { prefixPath, typeMismatch } from "./decode-error.js"
import type { DecodeResult } from "./decode-result.js"
import { traverse } from "./decode-result.js"
import type { Json } from "./json.js"

// CHANGE: accept arbitrary runtime data at the input boundary
// WHY: values built by other parsers or by code must be checked before decoders see them
// REF: req-from-unknown-1
// FORMAT THEOREM: ∀x: fromUnknown(x) = Right(j) → j is a finite, acyclic Json tree
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rejections carry the path of the offending member
// COMPLEXITY: O(n) where n = number of nodes

const isPlainObject = (input: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(input)
  return prototype === Object.prototype || prototype === null
}

const describeUnknown = (input: unknown): string => {
  if (input === undefined) {
    return "undefined"
  }
  if (typeof input === "number") {
    return `number ${String(input)}`
  }
  if (typeof input === "object" && input !== null) {
    return `object ${input.constructor?.name ?? "Object"}`
  }
  return typeof input
}

const reject = (input: unknown): DecodeResult<Json> => Either.left(typeMismatch("JSON value", describeUnknown(input)))

const withSegment = (segment: PathSegment, result: DecodeResult<Json>): DecodeResult<Json> =>
  Either.mapLeft(result, (error) => prefixPath(segment, error))

const convert = (input: unknown, ancestors: ReadonlySet<object>): DecodeResult<Json> => {
  if (input === null || typeof input === "boolean" || typeof input === "string") {
    return Either.right(input)
  }
  if (typeof input === "number") {
    return Number.isFinite(input) ? Either.right(input) : reject(input)
  }
  if (typeof input !== "object") {
    return reject(input)
  }
  if (ancestors.has(input)) {
    return Either.left(typeMismatch("acyclic JSON value", "circular reference"))
  }
  const nested = new Set(ancestors).add(input)
  if (Array.isArray(input)) {
    const items: ReadonlyArray<unknown> = input
    return traverse(items, (item, index) => withSegment(index, convert(item, nested)))
  }
  if (!isPlainObject(input)) {
    return reject(input)
  }
  // fromEntries defines own properties, so a "__proto__" key stays a key.
  return Either.map(
    traverse(Object.entries(input), ([key, member]) =>
      Either.map(withSegment(key, convert(member, nested)), (value): readonly [string, Json] => [key, value])),
    (entries): Json => Object.fromEntries(entries)
  )
}

/**
 * Check arbitrary data and view it as a JSON value tree.
 *
 * Rejects undefined, functions, symbols, bigints, non-finite numbers,
 * non-plain objects (Date, Map, class instances) and circular references.
 *
 * @param input - Any runtime value.
 * @returns The same data typed as Json, or the first rejection, path-qualified.
 *
 * @pure true
 * @invariant accepted arrays and objects are returned as fresh copies
 * @complexity O(n)
 */
export const fromUnknown = (input: unknown): DecodeResult<Json> => convert(input, new Set())
