import { Effect, pipe } from "effect"

import { readQueryOptions } from "../shell/cli.js"
import { runQuery } from "../shell/query/index.js"

/**
 * Compose the typed-record query CLI as a single effect.
 *
 * @returns Effect that reads options and prints the query result.
 *
 * @pure false - reads argv/env and the input file
 * @effect RuntimeEnv, FileSystemService, Path
 * @invariant forall opts: runQuery(opts) prints either results or one error line
 * @precondition true
 * @postcondition results or a typed failure are printed
 * @complexity O(n log n) where n = number of records
 * @throws Never - all errors are typed in the Effect error channel
 */
export const program = pipe(
  readQueryOptions,
  Effect.flatMap((options) => runQuery(options))
)
