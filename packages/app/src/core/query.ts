import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { optional, required } from "./combinators.js"
import type { DecodeError, Path } from "./decode-error.js"
import type { Aggregation } from "./decode-result.js"
import type { Json, JsonKind } from "./json.js"
import { kindOf } from "./json.js"
import type { Target } from "./target.js"
import { targetDecoder } from "./target.js"
import { lookup } from "./traverse.js"

// CHANGE: evaluate one CLI query against a parsed document
// WHY: keep lookup and decoding pure; the shell only reads files and prints
// REF: req-query-1
// FORMAT THEOREM: ∀d, q: runQuery(d, q)._tag = "Failed" ↔ the lookup or the decode fails
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: optional queries never fail on absence or null
// COMPLEXITY: O(d + n)

export interface Query {
  readonly command: "get" | "type"
  readonly path: Path
  readonly target: Target
  readonly optional: boolean
  readonly aggregation: Aggregation
}

export type Outcome =
  | { readonly _tag: "Found"; readonly path: Path; readonly value: Json }
  | { readonly _tag: "Absent"; readonly path: Path }
  | { readonly _tag: "Kind"; readonly path: Path; readonly kind: JsonKind }
  | { readonly _tag: "Failed"; readonly path: Path; readonly error: DecodeError }

const failed = (path: Path, error: DecodeError): Outcome => ({ _tag: "Failed", path, error })

const runType = (document: Json, query: Query): Outcome =>
  Either.match(lookup(document, query.path), {
    onLeft: (error) => failed(query.path, error),
    onRight: (value): Outcome => ({ _tag: "Kind", path: query.path, kind: kindOf(value) })
  })

const runGet = (document: Json, query: Query): Outcome => {
  const decoder = targetDecoder(query.target, query.aggregation)
  if (query.optional) {
    return Either.match(optional(document, query.path, decoder), {
      onLeft: (error) => failed(query.path, error),
      onRight: (found) =>
        Option.match(found, {
          onNone: (): Outcome => ({ _tag: "Absent", path: query.path }),
          onSome: (value): Outcome => ({ _tag: "Found", path: query.path, value })
        })
    })
  }
  return Either.match(required(document, query.path, decoder), {
    onLeft: (error) => failed(query.path, error),
    onRight: (value): Outcome => ({ _tag: "Found", path: query.path, value })
  })
}

/**
 * Evaluate a query.
 *
 * @param document - Parsed JSON document.
 * @param query - Command, path, target decoder and failure policy.
 * @returns The decoded value, its kind, its absence, or the path-qualified failure.
 *
 * @pure true
 * @complexity O(d + n)
 */
export const runQuery = (document: Json, query: Query): Outcome =>
  query.command === "type" ? runType(document, query) : runGet(document, query)
