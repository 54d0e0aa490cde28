#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, pipe } from "effect"

import { FileSystemLive } from "../shell/services/file-system.js"
import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { program } from "./program.js"

// CHANGE: run the query program through the Node runtime with all live layers
// WHY: provide platform services and shell dependencies in one place
// FORMAT THEOREM: forall env: provide(env) -> runMain(program)
// PURITY: SHELL
// EFFECT: Effect<void, never, RuntimeEnv | FileSystemService | Path>
// INVARIANT: program executed with NodeContext + live services
// COMPLEXITY: O(1)/O(1)
const main = pipe(
  program,
  Effect.provide(
    Layer.provideMerge(
      Layer.mergeAll(RuntimeEnvLive, FileSystemLive),
      NodeContext.layer
    )
  )
)

NodeRuntime.runMain(main)
