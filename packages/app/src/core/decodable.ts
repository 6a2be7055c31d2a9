import type { DecodeResult } from "./decode-result.js"
import type { Json } from "./json.js"

// CHANGE: define the per-type decoding contract
// WHY: any type exposing decode composes wherever a field value is expected
// REF: req-decodable-1
// FORMAT THEOREM: ∀T, v: Decodable<T>.decode(v) ∈ DecodeResult<T>
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoders are pure and stateless
// COMPLEXITY: O(1)/O(1)

export type Decoder<A> = (value: Json) => DecodeResult<A>

/**
 * Contract implemented by a domain type, usually as a same-named constant:
 *
 * @example
 * export interface Author { readonly name: string; readonly email: Option<string> }
 * export const Author: Decodable<Author> = {
 *   decode: (json) =>
 *     lift2((name: string, email: Option<string>): Author => ({ name, email }))(
 *       required(json, "name", string),
 *       optional(json, "email", string)
 *     )
 * }
 */
export interface Decodable<A> {
  readonly decode: Decoder<A>
}

export type DecoderLike<A> = Decoder<A> | Decodable<A>

export type TypeOf<D> = D extends DecoderLike<infer A> ? A : never

export const toDecoder = <A>(decoder: DecoderLike<A>): Decoder<A> =>
  typeof decoder === "function" ? decoder : (value) => decoder.decode(value)

export const decodeWith = <A>(decoder: DecoderLike<A>, value: Json): DecodeResult<A> => toDecoder(decoder)(value)

/**
 * Defer building a decoder until first use, for recursive and mutually
 * recursive types.
 *
 * @pure true
 * @invariant the thunk is evaluated at most once
 * @complexity O(1) amortized
 */
export const lazy = <A>(thunk: () => DecoderLike<A>): Decoder<A> => {
  let resolved: Decoder<A> | undefined
  return (value) => {
    if (resolved === undefined) {
      resolved = toDecoder(thunk())
    }
    return resolved(value)
  }
}
