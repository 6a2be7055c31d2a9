// CHANGE: define the closed JSON value tree consumed by every decoder
// WHY: decoders inspect variants structurally and never mutate the tree
// REF: req-value-model-1
// FORMAT THEOREM: ∀x ∈ Json: kindOf(x) ∈ JsonKind
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type JsonArray = ReadonlyArray<Json>

export type JsonKind = "null" | "boolean" | "number" | "string" | "array" | "object"

export const isJsonArray = (value: Json): value is JsonArray => Array.isArray(value)

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const kindOf = (value: Json): JsonKind => {
  if (value === null) {
    return "null"
  }
  if (isJsonArray(value)) {
    return "array"
  }
  if (isJsonObject(value)) {
    return "object"
  }
  if (typeof value === "boolean") {
    return "boolean"
  }
  if (typeof value === "number") {
    return "number"
  }
  return "string"
}

const MAX_PREVIEW = 32

const previewString = (value: string): string => {
  const quoted = JSON.stringify(value)
  return quoted.length > MAX_PREVIEW + 2 ? `${quoted.slice(0, MAX_PREVIEW + 1)}…"` : quoted
}

/**
 * Describe a value for the "actual" side of an error.
 *
 * @param value - Any JSON value.
 * @returns Short text such as `string "x"`, `number 5`, `array(2)` or `object`.
 *
 * @pure true
 * @invariant the description starts with kindOf(value)
 * @complexity O(1)
 */
export const describeValue = (value: Json): string => {
  if (value === null) {
    return "null"
  }
  if (isJsonArray(value)) {
    return `array(${value.length})`
  }
  if (isJsonObject(value)) {
    return "object"
  }
  if (typeof value === "string") {
    return `string ${previewString(value)}`
  }
  return `${typeof value} ${String(value)}`
}
