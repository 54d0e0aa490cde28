import { Effect, Option } from "effect"

import type { QueryOptions } from "./query/types.js"
import { RuntimeEnv } from "./services/runtime-env.js"

type CliKey = Exclude<keyof QueryOptions, "cwd">

export const FILE_ENV_VAR = "TYPED_RECORD_FILE"

const flagMap = new Map<string, CliKey>([
  ["--file", "file"],
  ["-f", "file"],
  ["--shape", "shape"],
  ["-S", "shape"],
  ["--sort", "sort"],
  ["-s", "sort"],
  ["--keys", "keys"],
  ["-k", "keys"],
  ["--query", "query"],
  ["-q", "query"],
  ["--columns", "columns"],
  ["-c", "columns"]
])

/**
 * Maps CLI flags to options; unknown flags and a trailing flag without a
 * value are ignored, and a repeated flag keeps its last value.
 *
 * @pure true
 * @complexity O(n) where n = |args|
 */
export const parseArgs = (args: ReadonlyArray<string>, cwd: string): QueryOptions => {
  let result: QueryOptions = { cwd }

  let index = 0
  while (index < args.length) {
    const arg = args[index]
    if (arg === undefined) {
      index += 1
      continue
    }
    const key = flagMap.get(arg)
    if (key === undefined) {
      index += 1
      continue
    }

    const value = args[index + 1]
    if (value !== undefined) {
      result = { ...result, [key]: value }
      index += 2
      continue
    }
    index += 1
  }

  return result
}

/**
 * Reads CLI arguments and builds QueryOptions.
 *
 * @returns Effect with resolved QueryOptions.
 *
 * @pure false - reads process argv/cwd/env via RuntimeEnv
 * @effect RuntimeEnv
 * @invariant options.cwd is always defined; --file wins over TYPED_RECORD_FILE
 * @complexity O(n) where n = |args|
 */
// CHANGE: parse query flags with an environment fallback for the input file
// WHY: the input file is usually fixed per shell session while queries change
// FORMAT THEOREM: forall a: parse(a) -> QueryOptions
// PURITY: SHELL
// EFFECT: Effect<QueryOptions, never, RuntimeEnv>
// INVARIANT: unknown flags are ignored
// COMPLEXITY: O(n)/O(1)
export const readQueryOptions = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const argv = yield* _(env.argv)
  const cwd = yield* _(env.cwd)
  const parsed = parseArgs(argv.slice(2), cwd)
  if (parsed.file !== undefined) {
    return parsed
  }
  const fromEnv = yield* _(env.envVar(FILE_ENV_VAR))
  return Option.match(fromEnv, {
    onNone: () => parsed,
    onSome: (file): QueryOptions => ({ ...parsed, file })
  })
})
