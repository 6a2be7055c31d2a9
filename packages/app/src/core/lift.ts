import type { Aggregation, DecodeResult } from "./decode-result.js"
import { defaultAggregation, zipWith } from "./decode-result.js"

// CHANGE: lift N-ary constructors into decode results for arities 2 through 8
// WHY: a record decoder is one constructor applied to its fields' results
// REF: req-lift-1
// FORMAT THEOREM: liftN(f)(succeed(a1), …, succeed(aN)) = succeed(f(a1, …, aN))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fail-fast returns the error of the leftmost failing argument
// COMPLEXITY: O(N)

// Arguments are combined left-nested, so argument order is declaration order
// for both fail-fast and accumulate-all.

const tuple2 = <A, B>(a: A, b: B): readonly [A, B] => [a, b]

export const lift2 = <A, B, R>(
  f: (a: A, b: B) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(ra: DecodeResult<A>, rb: DecodeResult<B>): DecodeResult<R> => zipWith(ra, rb, f, aggregation)

export const lift3 = <A, B, C, R>(
  f: (a: A, b: B, c: C) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(ra: DecodeResult<A>, rb: DecodeResult<B>, rc: DecodeResult<C>): DecodeResult<R> =>
  zipWith(zipWith(ra, rb, tuple2, aggregation), rc, ([a, b], c) => f(a, b, c), aggregation)

export const lift4 = <A, B, C, D, R>(
  f: (a: A, b: B, c: C, d: D) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(
  ra: DecodeResult<A>,
  rb: DecodeResult<B>,
  rc: DecodeResult<C>,
  rd: DecodeResult<D>
): DecodeResult<R> =>
  zipWith(
    lift3((a: A, b: B, c: C) => [a, b, c] as const, aggregation)(ra, rb, rc),
    rd,
    ([a, b, c], d) => f(a, b, c, d),
    aggregation
  )

export const lift5 = <A, B, C, D, E, R>(
  f: (a: A, b: B, c: C, d: D, e: E) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(
  ra: DecodeResult<A>,
  rb: DecodeResult<B>,
  rc: DecodeResult<C>,
  rd: DecodeResult<D>,
  re: DecodeResult<E>
): DecodeResult<R> =>
  zipWith(
    lift4((a: A, b: B, c: C, d: D) => [a, b, c, d] as const, aggregation)(ra, rb, rc, rd),
    re,
    ([a, b, c, d], e) => f(a, b, c, d, e),
    aggregation
  )

export const lift6 = <A, B, C, D, E, F, R>(
  f: (a: A, b: B, c: C, d: D, e: E, f: F) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(
  ra: DecodeResult<A>,
  rb: DecodeResult<B>,
  rc: DecodeResult<C>,
  rd: DecodeResult<D>,
  re: DecodeResult<E>,
  rf: DecodeResult<F>
): DecodeResult<R> =>
  zipWith(
    lift5((a: A, b: B, c: C, d: D, e: E) => [a, b, c, d, e] as const, aggregation)(ra, rb, rc, rd, re),
    rf,
    ([a, b, c, d, e], last) => f(a, b, c, d, e, last),
    aggregation
  )

export const lift7 = <A, B, C, D, E, F, G, R>(
  f: (a: A, b: B, c: C, d: D, e: E, f: F, g: G) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(
  ra: DecodeResult<A>,
  rb: DecodeResult<B>,
  rc: DecodeResult<C>,
  rd: DecodeResult<D>,
  re: DecodeResult<E>,
  rf: DecodeResult<F>,
  rg: DecodeResult<G>
): DecodeResult<R> =>
  zipWith(
    lift6((a: A, b: B, c: C, d: D, e: E, g: F) => [a, b, c, d, e, g] as const, aggregation)(
      ra,
      rb,
      rc,
      rd,
      re,
      rf
    ),
    rg,
    ([a, b, c, d, e, g], last) => f(a, b, c, d, e, g, last),
    aggregation
  )

export const lift8 = <A, B, C, D, E, F, G, H, R>(
  f: (a: A, b: B, c: C, d: D, e: E, f: F, g: G, h: H) => R,
  aggregation: Aggregation = defaultAggregation
) =>
(
  ra: DecodeResult<A>,
  rb: DecodeResult<B>,
  rc: DecodeResult<C>,
  rd: DecodeResult<D>,
  re: DecodeResult<E>,
  rf: DecodeResult<F>,
  rg: DecodeResult<G>,
  rh: DecodeResult<H>
): DecodeResult<R> =>
  zipWith(
    lift7((a: A, b: B, c: C, d: D, e: E, g: F, h: G) => [a, b, c, d, e, g, h] as const, aggregation)(
      ra,
      rb,
      rc,
      rd,
      re,
      rf,
      rg
    ),
    rh,
    ([a, b, c, d, e, g, h], last) => f(a, b, c, d, e, g, h, last),
    aggregation
  )
