import * as FileSystem from "@effect/platform/FileSystem"
import { Context, Effect, Layer, pipe } from "effect"

import { type QueryError, queryError } from "../query/types.js"

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readFileString: (pathValue: string) => Effect.Effect<string, QueryError>
    readonly exists: (pathValue: string) => Effect.Effect<boolean, QueryError>
  }
>() {}

// CHANGE: wrap filesystem access behind a service for typed errors and testing
// WHY: the query shell reads its input only through this boundary
// FORMAT THEOREM: forall p: exists(p) -> readable(p)
// PURITY: SHELL
// EFFECT: Effect<FileSystemService, never, FileSystem>
// INVARIANT: platform errors surface as QueryError carrying the path
// COMPLEXITY: O(n)/O(n)
export const FileSystemLive = Layer.effect(
  FileSystemService,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)

    const readFileString = (pathValue: string): Effect.Effect<string, QueryError> =>
      pipe(
        fs.readFileString(pathValue, "utf8"),
        Effect.mapError(() => queryError(pathValue, "Cannot read file"))
      )

    const exists = (pathValue: string): Effect.Effect<boolean, QueryError> =>
      pipe(
        fs.exists(pathValue),
        Effect.mapError(() => queryError(pathValue, "Cannot check path existence"))
      )

    return {
      readFileString,
      exists
    }
  })
)
