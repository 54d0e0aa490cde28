import { Context, Effect, Layer, Option } from "effect"

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly argv: Effect.Effect<ReadonlyArray<string>>
    readonly cwd: Effect.Effect<string>
    readonly envVar: (key: string) => Effect.Effect<Option.Option<string>>
  }
>() {}

const readProcess = (): NodeJS.Process | undefined => typeof process === "undefined" ? undefined : process

const readEnv = (): NodeJS.ProcessEnv => readProcess()?.env ?? {}

// CHANGE: wrap process access behind a typed Effect service
// WHY: argv and env are replaced by stub layers in tests
// FORMAT THEOREM: forall k: env(k) -> Option<string>
// PURITY: SHELL
// EFFECT: Effect<RuntimeEnv, never, never>
// INVARIANT: argv/cwd are read once per effect
// COMPLEXITY: O(1)/O(1)
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  argv: Effect.sync(() => {
    const proc = readProcess()
    return proc === undefined ? [] : [...proc.argv]
  }),
  cwd: Effect.sync(() => readProcess()?.cwd() ?? "."),
  envVar: (key) => Effect.sync(() => Option.fromNullable(readEnv()[key]))
})
