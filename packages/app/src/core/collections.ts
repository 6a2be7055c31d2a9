import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { missingIndex, prefixPath } from "./decode-error.js"
import type { Aggregation, DecodeResult } from "./decode-result.js"
import { defaultAggregation, traverse, zipWith } from "./decode-result.js"
import type { Decoder, DecoderLike } from "./decodable.js"
import { toDecoder } from "./decodable.js"
import type { Json } from "./json.js"
import { asArray, asObject } from "./value.js"

// CHANGE: lift any decoder to arrays, dictionaries and nullable values
// WHY: collections of decodable types become decodable with no special cases
// REF: req-array-of-1, req-dictionary-of-1
// FORMAT THEOREM: ∀d, xs: array(d)(xs) = Right(ys) → |ys| = |xs| ∧ ∀i: d(xs[i]) = Right(ys[i])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a failing element's error is prefixed with its index (or key)
// COMPLEXITY: O(n) where n = number of elements

/**
 * Decode an array whose every element decodes with `element`.
 *
 * @param element - Element decoder.
 * @param aggregation - fail-fast stops at the first failing element.
 *
 * @pure true
 * @invariant all-or-nothing: one failing element fails the whole array
 * @complexity O(n)
 */
export const array = <A>(
  element: DecoderLike<A>,
  aggregation: Aggregation = defaultAggregation
): Decoder<ReadonlyArray<A>> => {
  const decodeElement = toDecoder(element)
  return (value) =>
    Either.flatMap(asArray(value), (items) =>
      traverse(
        items,
        (item, index) => Either.mapLeft(decodeElement(item), (error) => prefixPath(index, error)),
        aggregation
      ))
}

/**
 * Decode an object whose every value decodes with `entry`; keys pass through.
 *
 * @pure true
 * @invariant result keys = input keys
 * @complexity O(n)
 */
export const dictionary = <A>(
  entry: DecoderLike<A>,
  aggregation: Aggregation = defaultAggregation
): Decoder<Readonly<Record<string, A>>> => {
  const decodeEntry = toDecoder(entry)
  return (value) =>
    Either.flatMap(asObject(value), (object) =>
      Either.map(
        traverse(
          Object.entries(object),
          ([key, item]) =>
            Either.map(
              Either.mapLeft(decodeEntry(item), (error) => prefixPath(key, error)),
              (decoded): readonly [string, A] => [key, decoded]
            ),
          aggregation
        ),
        (entries) => Object.fromEntries(entries)
      ))
}

/**
 * Decode null as None and anything else with `inner`.
 *
 * @pure true
 * @complexity O(1) plus inner
 */
export const nullable = <A>(inner: DecoderLike<A>): Decoder<Option.Option<A>> => {
  const decodeInner = toDecoder(inner)
  return (value) => (value === null ? Either.right(Option.none()) : Either.map(decodeInner(value), Option.some))
}

/**
 * Decode an array keeping only the elements that decode; elements that fail
 * are dropped. The value itself must still be an array.
 *
 * @pure true
 * @invariant output length ≤ input length
 * @complexity O(n)
 */
export const compactArray = <A>(element: DecoderLike<A>): Decoder<ReadonlyArray<A>> => {
  const decodeElement = toDecoder(element)
  return (value) =>
    Either.map(asArray(value), (items) => {
      const kept: Array<A> = []
      for (const item of items) {
        const decoded = decodeElement(item)
        if (Either.isRight(decoded)) {
          kept.push(decoded.right)
        }
      }
      return kept
    })
}

const decodeAt = <A>(items: ReadonlyArray<Json>, index: number, decoder: Decoder<A>): DecodeResult<A> => {
  const item = items[index]
  return item === undefined
    ? Either.left(missingIndex(index, items.length))
    : Either.mapLeft(decoder(item), (error) => prefixPath(index, error))
}

/**
 * Decode a two-element array into a typed pair. Extra elements are ignored.
 *
 * @pure true
 * @complexity O(1)
 */
export const tuple2 = <A, B>(
  first: DecoderLike<A>,
  second: DecoderLike<B>,
  aggregation: Aggregation = defaultAggregation
): Decoder<readonly [A, B]> => {
  const decodeFirst = toDecoder(first)
  const decodeSecond = toDecoder(second)
  return (value) =>
    Either.flatMap(asArray(value), (items) =>
      zipWith(
        decodeAt(items, 0, decodeFirst),
        decodeAt(items, 1, decodeSecond),
        (a, b): readonly [A, B] => [a, b],
        aggregation
      ))
}
