// CHANGE: introduce the path-aware decode error algebra
// WHY: every failure reports what was expected, what was found and where
// REF: req-decode-error-1
// FORMAT THEOREM: ∀e, s: path(prefixPath(s, e)) = [s, ...path(e)] for every leaf of e
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Composite holds ≥ 1 leaf and never nests another Composite
// COMPLEXITY: O(n) where n = number of leaves

export type PathSegment = string | number

export type Path = ReadonlyArray<PathSegment>

export const ABSENT = "absent"

export type TypeMismatch = {
  readonly _tag: "TypeMismatch"
  readonly path: Path
  readonly expected: string
  readonly actual: string
}

export type MissingKey = {
  readonly _tag: "MissingKey"
  readonly path: Path
  readonly key: string
  readonly expected: string
  readonly actual: string
}

export type MissingIndex = {
  readonly _tag: "MissingIndex"
  readonly path: Path
  readonly index: number
  readonly expected: string
  readonly actual: string
}

export type WrongContainer = {
  readonly _tag: "WrongContainer"
  readonly path: Path
  readonly segment: PathSegment
  readonly expected: string
  readonly actual: string
}

export type Custom = {
  readonly _tag: "Custom"
  readonly path: Path
  readonly message: string
  readonly expected: string
  readonly actual: string
}

export type LeafError = TypeMismatch | MissingKey | MissingIndex | WrongContainer | Custom

export type Composite = {
  readonly _tag: "Composite"
  readonly errors: readonly [LeafError, ...Array<LeafError>]
}

export type DecodeError = LeafError | Composite

export const typeMismatch = (expected: string, actual: string, path: Path = []): TypeMismatch => ({
  _tag: "TypeMismatch",
  path,
  expected,
  actual
})

export const missingKey = (key: string, path: Path = [key]): MissingKey => ({
  _tag: "MissingKey",
  path,
  key,
  expected: `key ${JSON.stringify(key)}`,
  actual: ABSENT
})

export const missingIndex = (index: number, length: number, path: Path = [index]): MissingIndex => ({
  _tag: "MissingIndex",
  path,
  index,
  expected: `index ${index} (length ${length})`,
  actual: ABSENT
})

export const wrongContainer = (segment: PathSegment, actual: string, path: Path = []): WrongContainer => ({
  _tag: "WrongContainer",
  path,
  segment,
  expected: typeof segment === "number" ? "array" : "object",
  actual
})

export const custom = (message: string, actual: string, path: Path = []): Custom => ({
  _tag: "Custom",
  path,
  message,
  expected: message,
  actual
})

/**
 * List the leaf errors of an error in left-to-right order.
 *
 * @pure true
 * @invariant result length ≥ 1
 * @complexity O(n)
 */
export const leaves = (error: DecodeError): readonly [LeafError, ...Array<LeafError>] =>
  error._tag === "Composite" ? error.errors : [error]

/**
 * Merge two failures into one composite, flattening nested composites.
 *
 * @param left - Error of the earlier operand.
 * @param right - Error of the later operand.
 * @returns Composite whose leaves are leaves(left) followed by leaves(right).
 *
 * @pure true
 * @invariant order of leaves is preserved
 * @complexity O(n + m)
 */
export const mergeErrors = (left: DecodeError, right: DecodeError): Composite => {
  const [head, ...tail] = leaves(left)
  return {
    _tag: "Composite",
    errors: [head, ...tail, ...leaves(right)]
  }
}

export const composite = (
  first: DecodeError,
  ...rest: ReadonlyArray<DecodeError>
): DecodeError => {
  let merged: DecodeError = first
  for (const error of rest) {
    merged = mergeErrors(merged, error)
  }
  return merged
}

const prefixLeaf = (segment: PathSegment, error: LeafError): LeafError => ({
  ...error,
  path: [segment, ...error.path]
})

/**
 * Prepend the enclosing field's segment to every leaf of an error.
 *
 * @pure true
 * @invariant the original error is not modified
 * @complexity O(n · d) where d = path depth
 */
export const prefixPath = (segment: PathSegment, error: DecodeError): DecodeError => {
  if (error._tag !== "Composite") {
    return prefixLeaf(segment, error)
  }
  const [head, ...tail] = error.errors
  return {
    _tag: "Composite",
    errors: [prefixLeaf(segment, head), ...tail.map((leaf) => prefixLeaf(segment, leaf))]
  }
}

export const prefixPathAll = (prefix: Path, error: DecodeError): DecodeError => {
  let result = error
  for (let index = prefix.length - 1; index >= 0; index--) {
    const segment = prefix[index]
    if (segment !== undefined) {
      result = prefixPath(segment, result)
    }
  }
  return result
}

const pathEquals = (left: Path, right: Path): boolean =>
  left.length === right.length && left.every((segment, index) => segment === right[index])

const leafEquals = (left: LeafError, right: LeafError): boolean =>
  left._tag === right._tag &&
  pathEquals(left.path, right.path) &&
  left.expected === right.expected &&
  left.actual === right.actual

/**
 * Structural equality: same tag, same path and same expected/actual texts
 * for every leaf, in order.
 *
 * @pure true
 * @complexity O(n · d)
 */
export const equals = (left: DecodeError, right: DecodeError): boolean => {
  const leftLeaves = leaves(left)
  const rightLeaves = leaves(right)
  return left._tag === right._tag &&
    leftLeaves.length === rightLeaves.length &&
    leftLeaves.every((leaf, index) => {
      const other = rightLeaves[index]
      return other !== undefined && leafEquals(leaf, other)
    })
}
