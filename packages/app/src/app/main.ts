#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { describeAppError } from "../core/report.js"
import { runCli } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// FORMAT THEOREM: runMain(program) terminates with 0 (found), 1 (decode failure) or 2 (usage/IO error)
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const USAGE_EXIT_CODE = 2

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`json-decode: ${describeAppError(error)}\n`)
      process.exitCode = USAGE_EXIT_CODE
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
