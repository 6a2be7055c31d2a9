import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { DecodeConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { parseKeyPath } from "../core/key-path.js"
import type { Outcome } from "../core/query.js"
import { runQuery } from "../core/query.js"
import { exitCodeOf, renderHumanReport, renderJsonReport } from "../core/report.js"
import { renderTarget } from "../core/target.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile } from "../shell/json-file.js"

// CHANGE: orchestrate the CLI with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0, 1}; AppError is left to the caller
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly outcome: Outcome
  readonly config: DecodeConfig
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (outcome: Outcome, json: boolean, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  const payload = json ? renderJsonReport(outcome) : renderHumanReport(outcome)
  return writeStdout(payload)
}

const executeQuery = (
  cli: CliArgs,
  config: DecodeConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const path = yield* _(fromEither(parseKeyPath(cli.path)))
    const document = yield* _(readJsonFile(cli.file))
    yield* _(Effect.logDebug(`${cli.command} ${cli.path === "" ? "$" : cli.path} as ${renderTarget(cli.target)}`))
    const outcome = runQuery(document, {
      command: cli.command,
      path,
      target: cli.target,
      optional: cli.optional,
      aggregation: config.aggregation
    })
    yield* _(emitReport(outcome, cli.json, cli.silent))
    return { outcome, config, exitCode: exitCodeOf(outcome) }
  }).pipe(
    Effect.annotateLogs("file", cli.file),
    Logger.withMinimumLogLevel(LogLevel.fromLiteral(config.logLevel))
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the query outcome and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    return yield* _(executeQuery(cli, config))
  })
