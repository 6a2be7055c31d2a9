import type { CliError } from "./cli.js"
import type { DecodeError } from "./decode-error.js"
import type { KeyPathError } from "./key-path.js"

// CHANGE: unify the error algebra of the shell and the CLI
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseTextError = { readonly _tag: "ParseError"; readonly source: string; readonly error: string }
export type DecodeFailure = {
  readonly _tag: "DecodeFailure"
  readonly source: string
  readonly error: DecodeError
}

export type AppError =
  | CliError
  | KeyPathError
  | ConfigError
  | FileError
  | ParseTextError
  | DecodeFailure

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseTextError = (source: string, error: string): ParseTextError => ({
  _tag: "ParseError",
  source,
  error
})

export const decodeFailure = (source: string, error: DecodeError): DecodeFailure => ({
  _tag: "DecodeFailure",
  source,
  error
})
