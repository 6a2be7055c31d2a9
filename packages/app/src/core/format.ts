import type { DecodeError, LeafError } from "./decode-error.js"
import { leaves } from "./decode-error.js"
import { formatPath } from "./key-path.js"

// CHANGE: render decode errors for people and for JSON output
// WHY: callers surface failures; the core only guarantees their content
// REF: req-format-1
// FORMAT THEOREM: ∀e: lines(formatDecodeError(e)) = |leaves(e)|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: leaves are rendered in their stored order
// COMPLEXITY: O(n · d)

export interface ErrorEntry {
  readonly kind: LeafError["_tag"]
  readonly path: string
  readonly expected: string
  readonly actual: string
}

export const toErrorEntry = (error: LeafError): ErrorEntry => ({
  kind: error._tag,
  path: formatPath(error.path),
  expected: error.expected,
  actual: error.actual
})

export const toErrorEntries = (error: DecodeError): ReadonlyArray<ErrorEntry> => leaves(error).map(toErrorEntry)

export const formatLeaf = (error: LeafError): string =>
  `${formatPath(error.path)}: expected ${error.expected}, found ${error.actual}`

/**
 * Render every leaf of an error on its own line.
 *
 * @example
 * formatDecodeError(missingKey("name")) === '$.name: expected key "name", found absent'
 *
 * @pure true
 * @complexity O(n · d)
 */
export const formatDecodeError = (error: DecodeError): string => leaves(error).map(formatLeaf).join("\n")
