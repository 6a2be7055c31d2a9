import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Path, PathSegment } from "./decode-error.js"
import { missingIndex, missingKey, prefixPathAll, wrongContainer } from "./decode-error.js"
import type { DecodeResult } from "./decode-result.js"
import type { Json } from "./json.js"
import { describeValue, isJsonArray, isJsonObject } from "./json.js"

// CHANGE: navigate into object/array values by key, index or chain of both
// WHY: each field decoder starts from the sub-value found at its declared path
// REF: req-traverse-1
// FORMAT THEOREM: ∀v, p: lookup(v, p) = Left(e) → path(e) is a prefix-extension of the walked segments
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: optional lookup forgives absence and null only, never a wrong container
// COMPLEXITY: O(d) where d = path length

export type KeyPath = PathSegment | Path

export const toPath = (keyPath: KeyPath): Path =>
  typeof keyPath === "string" || typeof keyPath === "number" ? [keyPath] : keyPath

const hasOwn = (value: object, key: string): boolean => Object.prototype.hasOwnProperty.call(value, key)

/**
 * Read a key of an object value.
 *
 * @returns The sub-value, MissingKey at [key], or WrongContainer at [].
 *
 * @pure true
 * @complexity O(1)
 */
export const lookupKey = (value: Json, key: string): DecodeResult<Json> => {
  if (!isJsonObject(value)) {
    return Either.left(wrongContainer(key, describeValue(value)))
  }
  if (!hasOwn(value, key)) {
    return Either.left(missingKey(key))
  }
  const found = value[key]
  return found === undefined ? Either.left(missingKey(key)) : Either.right(found)
}

/**
 * Read an index of an array value.
 *
 * @returns The element, MissingIndex at [index], or WrongContainer at [].
 *
 * @pure true
 * @complexity O(1)
 */
export const lookupIndex = (value: Json, index: number): DecodeResult<Json> => {
  if (!isJsonArray(value)) {
    return Either.left(wrongContainer(index, describeValue(value)))
  }
  const found = Number.isInteger(index) && index >= 0 ? value[index] : undefined
  return found === undefined ? Either.left(missingIndex(index, value.length)) : Either.right(found)
}

export const lookupSegment = (value: Json, segment: PathSegment): DecodeResult<Json> =>
  typeof segment === "number" ? lookupIndex(value, segment) : lookupKey(value, segment)

/**
 * Walk a key path from a parent value.
 *
 * @param value - Parent value.
 * @param keyPath - A key, an index, or a chain of both; [] yields the value itself.
 * @returns The sub-value, or a failure whose path starts with the segments walked so far.
 *
 * @pure true
 * @invariant lookup(v, [a, b]) = lookup(v, a) >>= (x => lookup(x, b)) with errors prefixed by a
 * @complexity O(d)
 */
export const lookup = (value: Json, keyPath: KeyPath): DecodeResult<Json> => {
  const path = toPath(keyPath)
  let current = value
  for (const [depth, segment] of path.entries()) {
    const next = lookupSegment(current, segment)
    if (Either.isLeft(next)) {
      return Either.left(prefixPathAll(path.slice(0, depth), next.left))
    }
    current = next.right
  }
  return Either.right(current)
}

const isAbsence = (error: { readonly _tag: string }): boolean =>
  error._tag === "MissingKey" || error._tag === "MissingIndex"

/**
 * Walk a key path where absence is not an error.
 *
 * A missing key or index at any depth, or a null met along the way or at the
 * end, yields None. A value of the wrong container kind still fails.
 *
 * @pure true
 * @invariant lookupOptional(v, p) = Left(e) → e is WrongContainer
 * @complexity O(d)
 */
export const lookupOptional = (value: Json, keyPath: KeyPath): DecodeResult<Option.Option<Json>> => {
  const path = toPath(keyPath)
  let current = value
  for (const [depth, segment] of path.entries()) {
    if (current === null) {
      return Either.right(Option.none())
    }
    const next = lookupSegment(current, segment)
    if (Either.isLeft(next)) {
      return isAbsence(next.left)
        ? Either.right(Option.none())
        : Either.left(prefixPathAll(path.slice(0, depth), next.left))
    }
    current = next.right
  }
  return Either.right(current === null ? Option.none() : Option.some(current))
}
