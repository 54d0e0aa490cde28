import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, Option } from "effect"

import { FILE_ENV_VAR, parseArgs, readQueryOptions } from "../../src/shell/cli.js"
import { RuntimeEnv } from "../../src/shell/services/runtime-env.js"

const makeRuntimeEnvLayer = (
  argv: ReadonlyArray<string>,
  env: Readonly<Record<string, string>>
): Layer.Layer<RuntimeEnv> =>
  Layer.succeed(RuntimeEnv, {
    argv: Effect.succeed(["node", "main", ...argv]),
    cwd: Effect.succeed("/work"),
    envVar: (key) => Effect.succeed(Option.fromNullable(env[key]))
  })

describe("parseArgs", () => {
  it("maps long and short flags", () => {
    expect(parseArgs(["--file", "users.json", "-s", "age:dsc", "-k", "id,name", "-q", "al"], "/work")).toEqual({
      cwd: "/work",
      file: "users.json",
      sort: "age:dsc",
      keys: "id,name",
      query: "al"
    })
    expect(parseArgs(["-f", "a.json", "-S", "user", "--columns", "name.first"], "/work")).toEqual({
      cwd: "/work",
      file: "a.json",
      shape: "user",
      columns: "name.first"
    })
  })

  it("ignores unknown flags and a trailing flag without value", () => {
    expect(parseArgs(["--verbose", "-q"], "/work")).toEqual({ cwd: "/work" })
  })

  it("keeps the last value of a repeated flag", () => {
    expect(parseArgs(["-q", "a", "--query", "b"], "/work")).toEqual({ cwd: "/work", query: "b" })
  })
})

describe("readQueryOptions", () => {
  it.effect("falls back to the environment for the input file", () =>
    Effect.gen(function*(_) {
      const options = yield* _(readQueryOptions)
      expect(options).toEqual({ cwd: "/work", file: "env.json", sort: "id" })
    }).pipe(Effect.provide(makeRuntimeEnvLayer(["--sort", "id"], { [FILE_ENV_VAR]: "env.json" }))))

  it.effect("prefers the --file flag over the environment", () =>
    Effect.gen(function*(_) {
      const options = yield* _(readQueryOptions)
      expect(options.file).toBe("flag.json")
    }).pipe(Effect.provide(makeRuntimeEnvLayer(["-f", "flag.json"], { [FILE_ENV_VAR]: "env.json" }))))

  it.effect("leaves the file unset without flag or environment", () =>
    Effect.gen(function*(_) {
      const options = yield* _(readQueryOptions)
      expect(options).toEqual({ cwd: "/work" })
    }).pipe(Effect.provide(makeRuntimeEnvLayer([], {}))))
})
