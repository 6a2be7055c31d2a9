export * from "./core/collections.js"
export * from "./core/combinators.js"
export * from "./core/decodable.js"
export * from "./core/decode-error.js"
export * from "./core/decode-result.js"
export * from "./core/format.js"
export * from "./core/from-unknown.js"
export * from "./core/json.js"
export * from "./core/key-path.js"
export * from "./core/lift.js"
export * from "./core/primitives.js"
export * from "./core/traverse.js"
export * from "./core/value.js"
export { decodeEffect, fromDecodeResult } from "./shell/decode-effect.js"
export { decodeJsonFile, readJsonFile } from "./shell/json-file.js"
export { parseJsonText } from "./shell/json-text.js"
export type { AppError, DecodeFailure, FileError, ParseTextError } from "./core/errors.js"
