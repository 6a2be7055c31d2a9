import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import type { Decodable, Json } from "../../src/index.js"
import { map, mergeErrors, missingKey, number, required, requiredArray, string, typeMismatch } from "../../src/index.js"
import type { Comment as CommentValue, Feed as FeedValue } from "./fixtures.js"
import { Category, Comment, decodePerson, encodeFeed, Feed, Nickname, Shape } from "./fixtures.js"
import { expectFailure, expectSuccess } from "./test-helpers.js"

interface Inner {
  readonly b: number
}

const Inner: Decodable<Inner> = {
  decode: (json) => map(required(json, "b", number), (b): Inner => ({ b }))
}

interface Outer {
  readonly a: Inner
}

const Outer: Decodable<Outer> = {
  decode: (json) => map(required(json, "a", Inner), (a): Outer => ({ a }))
}

interface Named {
  readonly name: string
}

const Named: Decodable<Named> = {
  decode: (json) => map(required(json, "name", string), (name): Named => ({ name }))
}

interface Thread {
  readonly comments: ReadonlyArray<CommentValue>
}

const Thread: Decodable<Thread> = {
  decode: (json) => map(requiredArray(json, "comments", Comment), (comments): Thread => ({ comments }))
}

const feedInput: Json = {
  name: "eng",
  posts: [
    { id: 1, title: "Hello", tags: ["a"], comments: [{ author: "A", text: "x" }] },
    { id: 2, title: "Second", nickname: "two", comments: [] }
  ],
  stats: { views: 10, likes: 2.5 }
}

const expectedFeed: FeedValue = {
  name: "eng",
  posts: [
    { id: 1, title: "Hello", nickname: Option.none(), tags: ["a"], comments: [{ author: "A", text: "x" }] },
    { id: 2, title: "Second", nickname: Option.some("two"), tags: [], comments: [] }
  ],
  stats: { views: 10, likes: 2.5 }
}

describe("record decoding", () => {
  it.effect("qualifies a nested type mismatch with the full path", () =>
    Effect.sync(() => {
      const error = expectFailure(Outer.decode({ a: { b: "not-a-number" } }))
      expect(error).toEqual(typeMismatch("number", "string \"not-a-number\"", ["a", "b"]))
    }))

  it.effect("reports a missing required field as MissingKey at its name", () =>
    Effect.sync(() => {
      const error = expectFailure(Named.decode({}))
      expect(error).toEqual({
        _tag: "MissingKey",
        path: ["name"],
        key: "name",
        expected: "key \"name\"",
        actual: "absent"
      })
    }))

  it.effect("decodes an absent optional field as None", () =>
    Effect.sync(() => {
      const value = expectSuccess(Nickname.decode({}))
      expect(Option.isNone(value.nickname)).toBe(true)
    }))

  it.effect("decodes a null optional field as None", () =>
    Effect.sync(() => {
      const value = expectSuccess(Nickname.decode({ nickname: null }))
      expect(Option.isNone(value.nickname)).toBe(true)
    }))

  it.effect("decodes a present optional field as Some", () =>
    Effect.sync(() => {
      const value = expectSuccess(Nickname.decode({ nickname: "Ada" }))
      expect(Option.getOrNull(value.nickname)).toBe("Ada")
    }))

  it.effect("still fails an optional field of the wrong type", () =>
    Effect.sync(() => {
      const error = expectFailure(Nickname.decode({ nickname: 5 }))
      expect(error).toEqual(typeMismatch("string", "number 5", ["nickname"]))
    }))

  it.effect("qualifies an array element failure with its index and key", () =>
    Effect.sync(() => {
      const error = expectFailure(
        Thread.decode({ comments: [{ author: "A", text: "x" }, { author: "B" }] })
      )
      expect(error).toEqual(missingKey("text", ["comments", 1, "text"]))
    }))
})

describe("field combination order", () => {
  it.effect("returns the first declared field's error when both are absent (fail-fast)", () =>
    Effect.sync(() => {
      const error = expectFailure(decodePerson({}))
      expect(error).toEqual(missingKey("name"))
    }))

  it.effect("returns the first failing field even when a later field fails differently", () =>
    Effect.sync(() => {
      const error = expectFailure(decodePerson({ name: 1, age: "old" }))
      expect(error).toEqual(typeMismatch("string", "number 1", ["name"]))
    }))

  it.effect("returns the later field's error when only it fails", () =>
    Effect.sync(() => {
      const error = expectFailure(decodePerson({ name: "Ada" }))
      expect(error).toEqual(missingKey("age"))
    }))

  it.effect("collects every field's error in declaration order under accumulate-all", () =>
    Effect.sync(() => {
      const error = expectFailure(decodePerson({}, "accumulate-all"))
      expect(error).toEqual(mergeErrors(missingKey("name"), missingKey("age")))
      expect(error._tag).toBe("Composite")
    }))

  it.effect("builds the record when every field succeeds", () =>
    Effect.sync(() => {
      expect(expectSuccess(decodePerson({ name: "Ada", age: 36 }))).toEqual({ name: "Ada", age: 36 })
    }))
})

describe("recursive composition", () => {
  it.effect("decodes a feed of posts of comments through three levels", () =>
    Effect.sync(() => {
      expect(expectSuccess(Feed.decode(feedInput))).toEqual(expectedFeed)
    }))

  it.effect("qualifies a failure three levels deep", () =>
    Effect.sync(() => {
      const input: Json = {
        name: "eng",
        posts: [
          { id: 1, title: "Hello", comments: [] },
          { id: 2, title: "Second", comments: [{ author: "B" }] }
        ],
        stats: {}
      }
      const error = expectFailure(Feed.decode(input))
      expect(error).toEqual(missingKey("text", ["posts", 1, "comments", 0, "text"]))
    }))

  it.effect("decodes what the encoder produced back to the same value", () =>
    Effect.sync(() => {
      expect(expectSuccess(Feed.decode(encodeFeed(expectedFeed)))).toEqual(expectedFeed)
    }))

  it.effect("decodes a self-recursive tree", () =>
    Effect.sync(() => {
      const value = expectSuccess(
        Category.decode({
          name: "root",
          children: [{ name: "a", children: [{ name: "a1" }] }, { name: "b" }]
        })
      )
      expect(value).toEqual({
        name: "root",
        children: [
          { name: "a", children: [{ name: "a1", children: [] }] },
          { name: "b", children: [] }
        ]
      })
    }))

  it.effect("qualifies a failure deep inside a self-recursive tree", () =>
    Effect.sync(() => {
      const error = expectFailure(Category.decode({ name: "root", children: [{ name: "a", children: [{}] }] }))
      expect(error).toEqual(missingKey("name", ["children", 0, "children", 0, "name"]))
    }))
})

describe("discriminated decoding", () => {
  it.effect("selects the variant decoder from the kind field", () =>
    Effect.sync(() => {
      expect(expectSuccess(Shape({ kind: "circle", radius: 2 }))).toEqual({ kind: "circle", radius: 2 })
      expect(expectSuccess(Shape({ kind: "rect", width: 1, height: 2 }))).toEqual({
        kind: "rect",
        width: 1,
        height: 2
      })
    }))

  it.effect("fails on an unknown discriminator at its key", () =>
    Effect.sync(() => {
      const error = expectFailure(Shape({ kind: "hexagon" }))
      expect(error).toEqual(typeMismatch("\"circle\" | \"rect\"", "string \"hexagon\"", ["kind"]))
    }))

  it.effect("fails on a variant field after the discriminator matched", () =>
    Effect.sync(() => {
      const error = expectFailure(Shape({ kind: "rect", width: 1 }))
      expect(error).toEqual(missingKey("height"))
    }))
})
