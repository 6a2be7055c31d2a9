import { Match } from "effect"

import type { AppError } from "./errors.js"
import type { ErrorEntry } from "./format.js"
import { formatDecodeError, toErrorEntries } from "./format.js"
import type { Json } from "./json.js"
import { formatPath } from "./key-path.js"
import type { Outcome } from "./query.js"

// CHANGE: render query outcomes and map them to exit codes
// WHY: keep reporting pure and deterministic across output modes
// REF: req-report-1
// FORMAT THEOREM: ∀o: exitCodeOf(o) = 1 ↔ o._tag = "Failed"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JSON output is a single object with an ok flag
// COMPLEXITY: O(n)

export type JsonReport =
  | { readonly ok: true; readonly path: string; readonly value: Json }
  | { readonly ok: true; readonly path: string; readonly absent: true }
  | { readonly ok: true; readonly path: string; readonly kind: string }
  | { readonly ok: false; readonly path: string; readonly errors: ReadonlyArray<ErrorEntry> }

export const toJsonReport = (outcome: Outcome): JsonReport =>
  Match.value(outcome).pipe(
    Match.tag("Found", ({ path, value }): JsonReport => ({ ok: true, path: formatPath(path), value })),
    Match.tag("Absent", ({ path }): JsonReport => ({ ok: true, path: formatPath(path), absent: true })),
    Match.tag("Kind", ({ kind, path }): JsonReport => ({ ok: true, path: formatPath(path), kind })),
    Match.tag("Failed", ({ error, path }): JsonReport => ({
      ok: false,
      path: formatPath(path),
      errors: toErrorEntries(error)
    })),
    Match.exhaustive
  )

export const renderJsonReport = (outcome: Outcome): string => JSON.stringify(toJsonReport(outcome), null, 2)

/**
 * Render an outcome for a terminal.
 *
 * @returns The value as indented JSON, the kind name, `<absent>`, or one error per line.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderHumanReport = (outcome: Outcome): string =>
  Match.value(outcome).pipe(
    Match.tag("Found", ({ value }) => JSON.stringify(value, null, 2)),
    Match.tag("Absent", () => "<absent>"),
    Match.tag("Kind", ({ kind }) => kind),
    Match.tag("Failed", ({ error }) => formatDecodeError(error)),
    Match.exhaustive
  )

export const exitCodeOf = (outcome: Outcome): number => (outcome._tag === "Failed" ? 1 : 0)

export const describeAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", ({ message }) => message),
    Match.tag(
      "KeyPathError",
      ({ input, message, position }) => `${message} at position ${position} in key path ${JSON.stringify(input)}`
    ),
    Match.tag("ConfigError", ({ message }) => `invalid config: ${message}`),
    Match.tag("FileError", ({ message }) => message),
    Match.tag("ParseError", ({ error: detail, source }) => `${source} is not valid JSON: ${detail}`),
    Match.tag("DecodeFailure", ({ error: detail, source }) => `${source}: ${formatDecodeError(detail)}`),
    Match.exhaustive
  )
