import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { LogLevelName } from "./config.js"
import { logLevelNames } from "./config.js"
import type { Aggregation } from "./decode-result.js"
import type { Target } from "./target.js"
import { parseTarget } from "./target.js"

// CHANGE: implement deterministic CLI parsing for json-decode
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "get" | "type"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly path: string
  readonly target: Target
  readonly optional: boolean
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly aggregation: Aggregation | undefined
  readonly logLevel: LogLevelName | undefined
  readonly json: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Option.Option<CliCommand> =>
  Match.value(value).pipe(
    Match.when("get", () => Option.some<CliCommand>("get")),
    Match.when("type", () => Option.some<CliCommand>("type")),
    Match.orElse(() => Option.none())
  )

const parseAggregation = (value: string): Either.Either<Aggregation, CliError> => {
  if (value === "fail-fast" || value === "accumulate-all") {
    return Either.right(value)
  }
  return Either.left(cliError(`Invalid aggregation: ${value} (expected fail-fast or accumulate-all)`))
}

const parseLogLevel = (value: string): Either.Either<LogLevelName, CliError> => {
  const level = logLevelNames.find((name) => name.toLowerCase() === value.toLowerCase())
  return level === undefined
    ? Either.left(cliError(`Invalid log level: ${value} (expected ${logLevelNames.join(", ")})`))
    : Either.right(level)
}

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: "",
  path: "",
  target: { kind: "json", many: false },
  optional: false,
  configPath: undefined,
  configPathExplicit: false,
  aggregation: undefined,
  logLevel: undefined,
  json: false,
  silent: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  optional: (current) => setParsedFlag({ ...current, optional: true }, 1),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, file: value })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, path: value })),
  as: (current, inlineValue, nextValue) =>
    parseValueFlag("as", current, inlineValue, nextValue, (args, value) =>
      Either.mapBoth(parseTarget(value), {
        onLeft: cliError,
        onRight: (target) => ({ ...args, target })
      })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  aggregation: (current, inlineValue, nextValue) =>
    parseValueFlag("aggregation", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseAggregation(value), (aggregation) => ({ ...args, aggregation }))),
  "log-level": (current, inlineValue, nextValue) =>
    parseValueFlag("log-level", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseLogLevel(value), (logLevel) => ({ ...args, logLevel })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

// A first positional that names no command is the input file.
const parseCommandFromArgs = (rawArgs: ReadonlyArray<string>): ParsedCommand => {
  const first = rawArgs[0]
  const named = first === undefined || isFlag(first) ? Option.none() : parseCommand(first)
  return Option.match(named, {
    onNone: (): ParsedCommand => ({ command: "get", startIndex: 0 }),
    onSome: (command): ParsedCommand => ({ command, startIndex: 1 })
  })
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      if (args.file !== "") {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, file: current }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * The input file is given either positionally or with --file.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to get when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const parsed = parseCommandFromArgs(rawArgs)
  return Either.flatMap(
    parseArguments(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
    (args) => args.file === "" ? Either.left(cliError("Missing input file")) : Either.right(args)
  )
}
