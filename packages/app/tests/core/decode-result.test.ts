import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import type { DecodeResult } from "../../src/index.js"
import {
  apply,
  fail,
  flatMap,
  getOrElse,
  isFailure,
  isSuccess,
  lift3,
  map,
  mapError,
  mergeErrors,
  missingKey,
  orElse,
  prefixPath,
  succeed,
  toOption,
  traverse,
  typeMismatch,
  zipWith
} from "../../src/index.js"
import { expectFailure, expectSuccess } from "./test-helpers.js"

const nameMissing = missingKey("name")
const ageMissing = missingKey("age")

describe("DecodeResult", () => {
  it.effect("map transforms a success and passes a failure through unmodified", () =>
    Effect.sync(() => {
      expect(expectSuccess(map(succeed(2), (n) => n * 10))).toBe(20)
      const failure: DecodeResult<number> = fail(nameMissing)
      expect(expectFailure(map(failure, (n) => n * 10))).toBe(nameMissing)
    }))

  it.effect("apply runs a decoded function on a decoded argument", () =>
    Effect.sync(() => {
      const fn = succeed((n: number) => `#${n}`)
      expect(expectSuccess(apply(fn, succeed(7)))).toBe("#7")
    }))

  it.effect("apply keeps the function side's error when both fail", () =>
    Effect.sync(() => {
      const fn: DecodeResult<(n: number) => string> = fail(nameMissing)
      const arg: DecodeResult<number> = fail(ageMissing)
      expect(expectFailure(apply(fn, arg))).toBe(nameMissing)
      expect(expectFailure(apply(fn, arg, "accumulate-all"))).toEqual(mergeErrors(nameMissing, ageMissing))
    }))

  it.effect("zipWith returns whichever side failed when only one fails", () =>
    Effect.sync(() => {
      const ok = succeed(1)
      const bad: DecodeResult<number> = fail(ageMissing)
      expect(expectFailure(zipWith(ok, bad, (a, b) => a + b))).toBe(ageMissing)
      expect(expectFailure(zipWith(bad, ok, (a, b) => a + b, "accumulate-all"))).toBe(ageMissing)
    }))

  it.effect("combines a result with itself and with constant successes", () =>
    Effect.sync(() => {
      const one = succeed(1)
      expect(expectSuccess(zipWith(one, one, (a, b) => a + b))).toBe(2)
      const combined = lift3((a: number, b: string, c: boolean) => `${a}${b}${String(c)}`)(
        one,
        succeed("x"),
        succeed(true)
      )
      expect(expectSuccess(combined)).toBe("1xtrue")
    }))

  it.effect("lift3 accumulates all three failures in order", () =>
    Effect.sync(() => {
      const third = typeMismatch("boolean", "null", ["flag"])
      const combined = lift3((a: number, b: number, c: boolean) => [a, b, c], "accumulate-all")(
        fail(nameMissing),
        fail(ageMissing),
        fail(third)
      )
      expect(expectFailure(combined)).toEqual({ _tag: "Composite", errors: [nameMissing, ageMissing, third] })
    }))

  it.effect("flatMap sequences only after a success", () =>
    Effect.sync(() => {
      const next = (n: number): DecodeResult<string> => n > 0 ? succeed("positive") : fail(typeMismatch("positive", `number ${n}`))
      expect(expectSuccess(flatMap(succeed(3), next))).toBe("positive")
      expect(expectFailure(flatMap(succeed(-1), next))).toEqual(typeMismatch("positive", "number -1"))
      expect(expectFailure(flatMap(fail(nameMissing), next))).toBe(nameMissing)
    }))

  it.effect("getOrElse and toOption are the escape hatches", () =>
    Effect.sync(() => {
      const failure: DecodeResult<number> = fail(nameMissing)
      expect(getOrElse(succeed(4), 0)).toBe(4)
      expect(getOrElse(failure, 0)).toBe(0)
      expect(Option.getOrNull(toOption(succeed(4)))).toBe(4)
      expect(Option.isNone(toOption(failure))).toBe(true)
    }))

  it.effect("orElse keeps the first success and otherwise the second result", () =>
    Effect.sync(() => {
      const failure: DecodeResult<number> = fail(nameMissing)
      expect(expectSuccess(orElse(succeed(1), () => succeed(2)))).toBe(1)
      expect(expectSuccess(orElse(failure, () => succeed(2)))).toBe(2)
      expect(expectFailure(orElse(failure, () => fail(ageMissing)))).toBe(ageMissing)
    }))

  it.effect("isSuccess and isFailure are exclusive", () =>
    Effect.sync(() => {
      const success = succeed(1)
      const failure: DecodeResult<number> = fail(nameMissing)
      expect([isSuccess(success), isFailure(success)]).toEqual([true, false])
      expect([isSuccess(failure), isFailure(failure)]).toEqual([false, true])
    }))

  it.effect("mapError wraps a failure", () =>
    Effect.sync(() => {
      const failure: DecodeResult<number> = fail(nameMissing)
      expect(expectFailure(mapError(failure, (error) => prefixPath("user", error)))).toEqual(
        missingKey("name", ["user", "name"])
      )
    }))
})

describe("traverse", () => {
  const positive = (n: number, index: number): DecodeResult<number> =>
    n > 0 ? succeed(n) : fail(typeMismatch("positive number", `number ${n}`, [index]))

  it.effect("returns every success in order", () =>
    Effect.sync(() => {
      expect(expectSuccess(traverse([1, 2, 3], positive))).toEqual([1, 2, 3])
    }))

  it.effect("stops at the first failure by default", () =>
    Effect.sync(() => {
      expect(expectFailure(traverse([1, -2, -3], positive))).toEqual(
        typeMismatch("positive number", "number -2", [1])
      )
    }))

  it.effect("collects every failure under accumulate-all", () =>
    Effect.sync(() => {
      expect(expectFailure(traverse([1, -2, -3], positive, "accumulate-all"))).toEqual({
        _tag: "Composite",
        errors: [
          typeMismatch("positive number", "number -2", [1]),
          typeMismatch("positive number", "number -3", [2])
        ]
      })
    }))
})
