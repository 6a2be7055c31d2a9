import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { DecodeError } from "./decode-error.js"
import { mergeErrors } from "./decode-error.js"

// CHANGE: model the outcome of every decode step as Either<A, DecodeError>
// WHY: failures stay values that compose through map/apply/flatMap
// REF: req-decode-result-1
// FORMAT THEOREM: ∀r: isSuccess(r) ⊕ isFailure(r)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fail-fast keeps the leftmost failing operand's error unmodified
// COMPLEXITY: O(1) per combination (O(n) when merging n leaves)

export type DecodeResult<A> = Either.Either<A, DecodeError>

/**
 * How failures of independent operands are combined.
 *
 * - `fail-fast`: the leftmost failing operand's error is returned as is.
 * - `accumulate-all`: every failing operand contributes its leaves to one
 *   Composite, in left-to-right order.
 */
export type Aggregation = "fail-fast" | "accumulate-all"

export const defaultAggregation: Aggregation = "fail-fast"

export const succeed = <A>(value: A): DecodeResult<A> => Either.right(value)

export const fail = <A = never>(error: DecodeError): DecodeResult<A> => Either.left(error)

export const isSuccess = <A>(result: DecodeResult<A>): result is Either.Right<DecodeError, A> =>
  Either.isRight(result)

export const isFailure = <A>(result: DecodeResult<A>): result is Either.Left<DecodeError, A> =>
  Either.isLeft(result)

export const map = <A, B>(result: DecodeResult<A>, f: (value: A) => B): DecodeResult<B> =>
  Either.map(result, f)

export const mapError = <A>(
  result: DecodeResult<A>,
  f: (error: DecodeError) => DecodeError
): DecodeResult<A> => Either.mapLeft(result, f)

export const flatMap = <A, B>(
  result: DecodeResult<A>,
  f: (value: A) => DecodeResult<B>
): DecodeResult<B> => Either.flatMap(result, f)

/**
 * Combine two independent results.
 *
 * @param left - Earlier operand (declared first).
 * @param right - Later operand.
 * @param f - Combining function, applied only when both succeed.
 * @param aggregation - Failure policy; fail-fast unless stated otherwise.
 * @returns Success of f(left, right), or a failure chosen by the policy.
 *
 * @pure true
 * @invariant fail-fast: when both fail the error of `left` is returned
 * @complexity O(1)
 */
export const zipWith = <A, B, C>(
  left: DecodeResult<A>,
  right: DecodeResult<B>,
  f: (a: A, b: B) => C,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<C> => {
  if (Either.isLeft(left)) {
    if (aggregation === "accumulate-all" && Either.isLeft(right)) {
      return Either.left(mergeErrors(left.left, right.left))
    }
    return Either.left(left.left)
  }
  if (Either.isLeft(right)) {
    return Either.left(right.left)
  }
  return Either.right(f(left.right, right.right))
}

/**
 * Applicative apply: run a decoded function against a decoded argument.
 *
 * The function operand is the left one, so in a chain built field by field
 * the earliest declared failing field wins under fail-fast.
 *
 * @pure true
 * @complexity O(1)
 */
export const apply = <A, B>(
  fn: DecodeResult<(value: A) => B>,
  arg: DecodeResult<A>,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<B> => zipWith(fn, arg, (f, a) => f(a), aggregation)

export const getOrElse = <A>(result: DecodeResult<A>, fallback: A): A =>
  Either.isRight(result) ? result.right : fallback

export const toOption = <A>(result: DecodeResult<A>): Option.Option<A> => Either.getRight(result)

/**
 * Keep the first success; when both fail, keep the error of `that`.
 *
 * @pure true
 * @complexity O(1)
 */
export const orElse = <A, B>(
  result: DecodeResult<A>,
  that: () => DecodeResult<B>
): DecodeResult<A | B> => (Either.isRight(result) ? result : that())

export const fromOption = <A>(option: Option.Option<A>, onNone: () => DecodeError): DecodeResult<A> =>
  Option.isSome(option) ? Either.right(option.value) : Either.left(onNone())

/**
 * Run `f` over every item, stopping at the first failure unless
 * accumulate-all is requested, in which case every failing item contributes.
 *
 * @param items - Input items in order.
 * @param f - Per-item decode; receives the item and its position.
 * @returns All successes in order, or the failure chosen by the policy.
 *
 * @pure true
 * @invariant on success, output length = input length
 * @complexity O(n)
 */
export const traverse = <I, A>(
  items: ReadonlyArray<I>,
  f: (item: I, index: number) => DecodeResult<A>,
  aggregation: Aggregation = defaultAggregation
): DecodeResult<ReadonlyArray<A>> => {
  const values: Array<A> = []
  let failure: DecodeError | undefined
  for (const [index, item] of items.entries()) {
    const result = f(item, index)
    if (Either.isLeft(result)) {
      if (aggregation === "fail-fast") {
        return Either.left(result.left)
      }
      failure = failure === undefined ? result.left : mergeErrors(failure, result.left)
    } else {
      values.push(result.right)
    }
  }
  return failure === undefined ? Either.right(values) : Either.left(failure)
}
