import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { KeyPathError, Path } from "../../src/index.js"
import { formatPath, isPlainKey, parseKeyPath } from "../../src/index.js"

const parsed = (input: string): Path => {
  const result = parseKeyPath(input)
  if (Either.isLeft(result)) {
    throw new Error(`${result.left.message} at ${result.left.position}`)
  }
  return result.right
}

const rejected = (input: string): KeyPathError => {
  const result = parseKeyPath(input)
  if (Either.isRight(result)) {
    throw new Error(`expected ${input} to be rejected, got ${JSON.stringify(result.right)}`)
  }
  return result.left
}

describe("parseKeyPath", () => {
  it.effect("parses the root forms", () =>
    Effect.sync(() => {
      expect(parsed("")).toEqual([])
      expect(parsed("$")).toEqual([])
    }))

  it.effect("parses dotted keys with and without the root marker", () =>
    Effect.sync(() => {
      expect(parsed("a.b.c")).toEqual(["a", "b", "c"])
      expect(parsed("$.a.b")).toEqual(["a", "b"])
    }))

  it.effect("parses indexes and quoted keys in brackets", () =>
    Effect.sync(() => {
      expect(parsed("comments[1].text")).toEqual(["comments", 1, "text"])
      expect(parsed("$[0][2]")).toEqual([0, 2])
      expect(parsed("[\"key.with.dots\"].x")).toEqual(["key.with.dots", "x"])
      expect(parsed("[\"say \\\"hi\\\"\"]")).toEqual(["say \"hi\""])
    }))

  it.effect("reads a leading $ as a key character unless it marks the root", () =>
    Effect.sync(() => {
      expect(parsed("$schema")).toEqual(["$schema"])
      expect(parsed("$ref.id")).toEqual(["$ref", "id"])
      expect(parsed("$.$schema")).toEqual(["$schema"])
      expect(parsed(formatPath(["$schema", 0]))).toEqual(["$schema", 0])
    }))

  it.effect("keeps digits outside brackets as keys", () =>
    Effect.sync(() => {
      expect(parsed("a.0")).toEqual(["a", "0"])
    }))

  it.effect("rejects empty keys", () =>
    Effect.sync(() => {
      expect(rejected("a..b")).toEqual({ _tag: "KeyPathError", input: "a..b", position: 2, message: "Empty key" })
      expect(rejected("a.").message).toBe("Empty key")
      expect(rejected("a.[0]").message).toBe("Empty key")
    }))

  it.effect("rejects malformed brackets", () =>
    Effect.sync(() => {
      expect(rejected("a[1")).toEqual({ _tag: "KeyPathError", input: "a[1", position: 1, message: "Unclosed bracket" })
      expect(rejected("a[x]")).toEqual({
        _tag: "KeyPathError",
        input: "a[x]",
        position: 2,
        message: "Expected an index or a quoted key"
      })
      expect(rejected("a[\"open").message).toBe("Unterminated quoted key")
    }))

  it.effect("rejects a key glued to a bracket", () =>
    Effect.sync(() => {
      expect(rejected("a[0]b")).toEqual({
        _tag: "KeyPathError",
        input: "a[0]b",
        position: 4,
        message: "Expected \".\" or \"[\""
      })
    }))
})

describe("formatPath", () => {
  it.effect("renders the root and mixed paths", () =>
    Effect.sync(() => {
      expect(formatPath([])).toBe("$")
      expect(formatPath(["comments", 1, "text"])).toBe("$.comments[1].text")
      expect(formatPath(["key.with.dots", "plain"])).toBe("$[\"key.with.dots\"].plain")
      expect(formatPath(["0"])).toBe("$[\"0\"]")
    }))

  it.effect("produces text that parses back to the same path", () =>
    Effect.sync(() => {
      const paths: ReadonlyArray<Path> = [["a", 0, "b"], ["with space", 3], ["$"], ["0", 0]]
      for (const path of paths) {
        expect(parsed(formatPath(path))).toEqual(path)
      }
    }))

  it.effect("treats identifiers as plain keys", () =>
    Effect.sync(() => {
      expect(isPlainKey("user_name")).toBe(true)
      expect(isPlainKey("kebab-case")).toBe(true)
      expect(isPlainKey("1st")).toBe(false)
      expect(isPlainKey("$")).toBe(false)
    }))
})
