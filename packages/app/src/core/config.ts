import type { CliArgs } from "./cli.js"
import type { Aggregation } from "./decode-result.js"
import { defaultAggregation } from "./decode-result.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// REF: req-config-merge-1
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every resolved field is defined
// COMPLEXITY: O(1)/O(1)

export type LogLevelName = "Debug" | "Info" | "Warning" | "Error" | "None"

export const logLevelNames: ReadonlyArray<LogLevelName> = ["Debug", "Info", "Warning", "Error", "None"]

export const defaultConfigPath = "./.json-decode.json"

export interface FileConfig {
  readonly aggregation?: Aggregation
  readonly logLevel?: LogLevelName
}

export interface DecodeConfig {
  readonly aggregation: Aggregation
  readonly logLevel: LogLevelName
}

export const defaultConfig: DecodeConfig = {
  aggregation: defaultAggregation,
  logLevel: "Warning"
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-decode.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: Pick<CliArgs, "aggregation" | "logLevel">,
  fileConfig: FileConfig | undefined
): DecodeConfig => ({
  aggregation: cli.aggregation ?? fileConfig?.aggregation ?? defaultConfig.aggregation,
  logLevel: cli.logLevel ?? fileConfig?.logLevel ?? defaultConfig.logLevel
})
