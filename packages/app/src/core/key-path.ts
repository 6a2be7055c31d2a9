import * as Either from "effect/Either"

import type { Path, PathSegment } from "./decode-error.js"

// CHANGE: parse textual key paths such as `comments[1].text` into segments
// WHY: callers outside code (CLI flags, config) address nested values as text
// REF: req-key-path-1
// FORMAT THEOREM: ∀p ∈ Path: parseKeyPath(formatPath(p)) = Right(p)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: bracketed digits are indexes; every other segment is a key
// COMPLEXITY: O(n) where n = text length

export type KeyPathError = {
  readonly _tag: "KeyPathError"
  readonly input: string
  readonly position: number
  readonly message: string
}

const keyPathError = (input: string, position: number, message: string): KeyPathError => ({
  _tag: "KeyPathError",
  input,
  position,
  message
})

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$-]*$/u

export const isPlainKey = (key: string): boolean => IDENTIFIER.test(key) && key !== "$"

interface Cursor {
  readonly input: string
  index: number
}

const readQuotedKey = (cursor: Cursor): Either.Either<string, KeyPathError> => {
  const start = cursor.index
  let end = start + 1
  while (end < cursor.input.length) {
    const char = cursor.input[end]
    if (char === "\\") {
      end += 2
      continue
    }
    if (char === "\"") {
      break
    }
    end += 1
  }
  if (end >= cursor.input.length) {
    return Either.left(keyPathError(cursor.input, start, "Unterminated quoted key"))
  }
  const literal = cursor.input.slice(start, end + 1)
  cursor.index = end + 1
  return Either.try({
    try: (): string => {
      const parsed: unknown = JSON.parse(literal)
      return typeof parsed === "string" ? parsed : ""
    },
    catch: () => keyPathError(cursor.input, start, `Invalid quoted key: ${literal}`)
  })
}

const readBracket = (cursor: Cursor): Either.Either<PathSegment, KeyPathError> => {
  const open = cursor.index
  cursor.index += 1
  const first = cursor.input[cursor.index]
  let segment: Either.Either<PathSegment, KeyPathError>
  if (first === "\"") {
    segment = readQuotedKey(cursor)
  } else {
    const match = /^\d+/u.exec(cursor.input.slice(cursor.index))
    if (match === null) {
      return Either.left(keyPathError(cursor.input, cursor.index, "Expected an index or a quoted key"))
    }
    cursor.index += match[0].length
    segment = Either.right(Number(match[0]))
  }
  if (Either.isLeft(segment)) {
    return segment
  }
  if (cursor.input[cursor.index] !== "]") {
    return Either.left(keyPathError(cursor.input, open, "Unclosed bracket"))
  }
  cursor.index += 1
  return segment
}

const readPlainKey = (cursor: Cursor): Either.Either<string, KeyPathError> => {
  const start = cursor.index
  while (cursor.index < cursor.input.length) {
    const char = cursor.input[cursor.index]
    if (char === "." || char === "[") {
      break
    }
    cursor.index += 1
  }
  if (cursor.index === start) {
    return Either.left(keyPathError(cursor.input, start, "Empty key"))
  }
  return Either.right(cursor.input.slice(start, cursor.index))
}

/**
 * Parse a key path.
 *
 * Accepted forms: `a.b.c`, `items[0].name`, `["key.with.dots"][2]`, with an
 * optional leading `$` for the root when followed by `.` or `[`. The empty
 * string and `$` denote the root; `$schema` is a plain key.
 *
 * @param input - Key path text.
 * @returns Either with the segments or a KeyPathError pointing at the offending position.
 *
 * @pure true
 * @invariant numbers appear only for bracketed digit segments
 * @complexity O(n)
 */
export const parseKeyPath = (input: string): Either.Either<Path, KeyPathError> => {
  const rootMarker = input === "$" || input.startsWith("$.") || input.startsWith("$[")
  const cursor: Cursor = { input, index: rootMarker ? 1 : 0 }
  const segments: Array<PathSegment> = []
  let expectKey = cursor.index === 0
  while (cursor.index < input.length) {
    const char = input[cursor.index]
    if (char === "[") {
      const segment = readBracket(cursor)
      if (Either.isLeft(segment)) {
        return Either.left(segment.left)
      }
      segments.push(segment.right)
      expectKey = false
      continue
    }
    if (char === ".") {
      cursor.index += 1
      expectKey = true
      const next = input[cursor.index]
      if (next === undefined || next === "." || next === "[") {
        return Either.left(keyPathError(input, cursor.index, "Empty key"))
      }
      continue
    }
    if (!expectKey) {
      return Either.left(keyPathError(input, cursor.index, "Expected \".\" or \"[\""))
    }
    const key = readPlainKey(cursor)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    segments.push(key.right)
    expectKey = false
  }
  return Either.right(segments)
}

/**
 * Render a path as text, `$` being the root.
 *
 * @example formatPath(["comments", 1, "text"]) === "$.comments[1].text"
 *
 * @pure true
 * @complexity O(d)
 */
export const formatPath = (path: Path): string => {
  let rendered = "$"
  for (const segment of path) {
    if (typeof segment === "number") {
      rendered += `[${segment}]`
    } else if (isPlainKey(segment)) {
      rendered += `.${segment}`
    } else {
      rendered += `[${JSON.stringify(segment)}]`
    }
  }
  return rendered
}
