import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { custom, prefixPathAll } from "./decode-error.js"
import type { Aggregation, DecodeResult } from "./decode-result.js"
import { defaultAggregation } from "./decode-result.js"
import type { Decoder, DecoderLike } from "./decodable.js"
import { toDecoder } from "./decodable.js"
import { array, dictionary } from "./collections.js"
import type { Json } from "./json.js"
import { describeValue } from "./json.js"
import type { KeyPath } from "./traverse.js"
import { lookup, lookupOptional, toPath } from "./traverse.js"

// CHANGE: expose field lookups and decoder combinators used to write domain decoders
// WHY: a domain type's decode is assembled from these with no imperative branching
// REF: req-combinators-1
// FORMAT THEOREM: ∀v, p, d: required(v, p, d) = lookup(v, p) >>= d with errors prefixed by p
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: optional lookups forgive absence and null, never a type mismatch
// COMPLEXITY: O(d + cost(decoder))

const decodeAtPath = <A>(value: Json, keyPath: KeyPath, decoder: Decoder<A>): DecodeResult<A> =>
  Either.flatMap(lookup(value, keyPath), (found) =>
    Either.mapLeft(decoder(found), (error) => prefixPathAll(toPath(keyPath), error)))

/**
 * Look up a required field and decode it.
 *
 * @param value - Parent value.
 * @param keyPath - Key, index or chain.
 * @param decoder - Decoder for the field's value.
 * @returns The decoded field, or a failure whose path starts at the parent.
 *
 * @pure true
 * @complexity O(d + cost(decoder))
 */
export const required = <A>(value: Json, keyPath: KeyPath, decoder: DecoderLike<A>): DecodeResult<A> =>
  decodeAtPath(value, keyPath, toDecoder(decoder))

/**
 * Look up an optional field and decode it when present and not null.
 *
 * @returns Some(decoded), None when absent or null, or a failure when present with the wrong shape.
 *
 * @pure true
 * @complexity O(d + cost(decoder))
 */
export const optional = <A>(
  value: Json,
  keyPath: KeyPath,
  decoder: DecoderLike<A>
): DecodeResult<Option.Option<A>> => {
  const decode = toDecoder(decoder)
  return Either.flatMap(lookupOptional(value, keyPath), (found) =>
    Option.match(found, {
      onNone: () => Either.right(Option.none()),
      onSome: (present) =>
        Either.mapBoth(decode(present), {
          onLeft: (error) => prefixPathAll(toPath(keyPath), error),
          onRight: Option.some
        })
    }))
}

export const requiredArray = <A>(
  value: Json,
  keyPath: KeyPath,
  element: DecoderLike<A>,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<ReadonlyArray<A>> => required(value, keyPath, array(element, aggregation))

export const optionalArray = <A>(
  value: Json,
  keyPath: KeyPath,
  element: DecoderLike<A>,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<Option.Option<ReadonlyArray<A>>> => optional(value, keyPath, array(element, aggregation))

export const requiredDictionary = <A>(
  value: Json,
  keyPath: KeyPath,
  entry: DecoderLike<A>,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<Readonly<Record<string, A>>> => required(value, keyPath, dictionary(entry, aggregation))

export const optionalDictionary = <A>(
  value: Json,
  keyPath: KeyPath,
  entry: DecoderLike<A>,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<Option.Option<Readonly<Record<string, A>>>> =>
  optional(value, keyPath, dictionary(entry, aggregation))

export const field = <A>(keyPath: KeyPath, decoder: DecoderLike<A>): Decoder<A> => {
  const decode = toDecoder(decoder)
  return (value) => decodeAtPath(value, keyPath, decode)
}

export const optionalField = <A>(keyPath: KeyPath, decoder: DecoderLike<A>): Decoder<Option.Option<A>> =>
(value) => optional(value, keyPath, decoder)

/**
 * Optional field falling back to a default when absent or null.
 *
 * @pure true
 * @complexity O(d + cost(decoder))
 */
export const withDefault = <A>(keyPath: KeyPath, decoder: DecoderLike<A>, fallback: A): Decoder<A> =>
(value) => Either.map(optional(value, keyPath, decoder), Option.getOrElse(() => fallback))

/**
 * Try `first`; when it fails try `second`. When both fail the error of
 * `second` is returned.
 *
 * @pure true
 * @invariant alternative(a, b)(v) = a(v) whenever a(v) succeeds
 * @complexity O(cost(a) + cost(b))
 */
export const alternative = <A, B>(first: DecoderLike<A>, second: DecoderLike<B>): Decoder<A | B> => {
  const decodeFirst = toDecoder(first)
  const decodeSecond = toDecoder(second)
  return (value) => {
    const result: DecodeResult<A | B> = decodeFirst(value)
    return Either.isRight(result) ? result : decodeSecond(value)
  }
}

/**
 * Try each decoder in order; the first success wins. When every one fails
 * the error of the last one is returned.
 *
 * @pure true
 * @invariant oneOf(a, b, c) = alternative(alternative(a, b), c)
 * @complexity O(Σ cost(d_i))
 */
export const oneOf = <A>(first: DecoderLike<A>, ...rest: ReadonlyArray<DecoderLike<A>>): Decoder<A> => {
  let combined = toDecoder(first)
  for (const next of rest) {
    combined = alternative(combined, next)
  }
  return combined
}

export const mapDecoder = <A, B>(decoder: DecoderLike<A>, f: (value: A) => B): Decoder<B> => {
  const decode = toDecoder(decoder)
  return (value) => Either.map(decode(value), f)
}

/**
 * Decode a value whose shape depends on an earlier decoded part, e.g. a
 * discriminator field selecting the variant's decoder.
 *
 * @pure true
 * @complexity O(cost(first) + cost(next))
 */
export const chain = <A, B>(first: DecoderLike<A>, next: (decoded: A) => DecoderLike<B>): Decoder<B> => {
  const decodeFirst = toDecoder(first)
  return (value) => Either.flatMap(decodeFirst(value), (decoded) => toDecoder(next(decoded))(value))
}

/**
 * Accept only decoded values satisfying `predicate`; others fail with a
 * Custom error carrying `message`.
 *
 * @pure true
 * @complexity O(cost(decoder))
 */
export function refine<A, B extends A>(
  decoder: DecoderLike<A>,
  predicate: (value: A) => value is B,
  message: string
): Decoder<B>
export function refine<A>(decoder: DecoderLike<A>, predicate: (value: A) => boolean, message: string): Decoder<A>
export function refine<A>(decoder: DecoderLike<A>, predicate: (value: A) => boolean, message: string): Decoder<A> {
  const decode = toDecoder(decoder)
  return (value) =>
    Either.flatMap(decode(value), (decoded) =>
      predicate(decoded) ? Either.right(decoded) : Either.left(custom(message, describeValue(value))))
}

export const succeedWith = <A>(constant: A): Decoder<A> => () => Either.right(constant)

export const failWith = (message: string): Decoder<never> => (value) =>
  Either.left(custom(message, describeValue(value)))
