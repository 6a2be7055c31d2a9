import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .json-decode.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined unless the path was given explicitly
// COMPLEXITY: O(n)

const RawConfigSchema = Schema.partial(
  Schema.Struct({
    aggregation: Schema.Literal("fail-fast", "accumulate-all"),
    logLevel: Schema.Literal("Debug", "Info", "Warning", "Error", "None")
  })
)

const ConfigSchema = Schema.parseJson(RawConfigSchema)

const toFileConfig = (config: Schema.Schema.Type<typeof RawConfigSchema>): FileConfig => ({
  ...(config.aggregation === undefined ? {} : { aggregation: config.aggregation }),
  ...(config.logLevel === undefined ? {} : { logLevel: config.logLevel })
})

/**
 * Decode config file text.
 *
 * @param raw - Contents of the config file.
 * @returns FileConfig with only the keys the file sets, or a ConfigError
 *   holding the schema's rendered issue tree.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    Schema.decodeUnknown(ConfigSchema)(raw),
    Effect.map(toFileConfig),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error)))))
    if (!exists) {
      return explicit ? yield* _(Effect.fail(fileError(`Config file not found: ${path}`))) : undefined
    }
    const contents = yield* _(fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error)))))
    const config = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug(`loaded config ${JSON.stringify(config)}`))
    return config
  }).pipe(Effect.annotateLogs("config", path))
