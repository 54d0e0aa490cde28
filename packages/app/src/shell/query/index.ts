import * as Path from "@effect/platform/Path"
import { Array as Arr, Console, Effect, Option, pipe } from "effect"
import { match } from "ts-pattern"

import { recordValue, type TypedRecord } from "../../core/attr-value.js"
import { type Decoder, decodeJson, formatDecodeError } from "../../core/decode.js"
import { filteredBy } from "../../core/filter.js"
import { inferRecords } from "../../core/infer.js"
import { attrValueToString } from "../../core/render.js"
import { ASCENDING_TOKEN, renderedKey, sortedBy } from "../../core/sort.js"
import { usersDecoder } from "../../core/user.js"
import { FILE_ENV_VAR } from "../cli.js"
import { FileSystemService } from "../services/file-system.js"
import { type QueryEffect, type QueryError, queryError, type QueryOptions, type QueryResult } from "./types.js"

const COLUMN_SEPARATOR = "\t"

/**
 * Splits a comma-separated flag value, dropping blank entries.
 *
 * @pure true
 */
export const parseList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)

/**
 * Splits `path:order` at the last colon; a bare path sorts ascending.
 *
 * @pure true
 */
export const parseSortSpec = (value: string): readonly [string, string] => {
  const separator = value.lastIndexOf(":")
  return separator === -1
    ? [value, ASCENDING_TOKEN]
    : [value.slice(0, separator), value.slice(separator + 1)]
}

const resolveDecoder = (
  shape: string | undefined
): Effect.Effect<Decoder<ReadonlyArray<TypedRecord>>, QueryError> =>
  match(shape ?? "infer")
    .with("infer", () => Effect.succeed(inferRecords))
    .with("user", () => Effect.succeed(usersDecoder))
    .otherwise((unknownShape) => Effect.fail(queryError("--shape", `Unknown shape "${unknownShape}"`)))

const topLevelKeys = (records: ReadonlyArray<TypedRecord>): ReadonlyArray<string> =>
  pipe(
    Arr.head(records),
    Option.map((record) => record.map((entry) => entry.key)),
    Option.getOrElse((): ReadonlyArray<string> => [])
  )

const resolveFilterKeys = (
  options: QueryOptions,
  columns: ReadonlyArray<string>,
  records: ReadonlyArray<TypedRecord>
): ReadonlyArray<string> => {
  if (options.keys !== undefined) {
    return parseList(options.keys)
  }
  return columns.length > 0 ? columns : topLevelKeys(records)
}

const renderLine = (columns: ReadonlyArray<string>, record: TypedRecord): string =>
  columns.length === 0
    ? attrValueToString(recordValue(record))
    : columns.map((column) => renderedKey(column, record)).join(COLUMN_SEPARATOR)

const resolveInputPath = (
  options: QueryOptions
): QueryEffect<string, FileSystemService | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const path = yield* _(Path.Path)
    if (options.file === undefined) {
      return yield* _(
        Effect.fail(queryError("--file", `No input file; pass --file or set ${FILE_ENV_VAR}`))
      )
    }
    const filePath = path.resolve(options.cwd, options.file)
    const exists = yield* _(fs.exists(filePath))
    if (!exists) {
      return yield* _(Effect.fail(queryError(filePath, "Input file not found")))
    }
    return filePath
  })

/**
 * Reads, decodes, filters, sorts and renders the records named by options.
 *
 * @returns Effect with one rendered line per shown record.
 *
 * @pure false - reads the input file
 * @effect FileSystemService, Path
 * @invariant filter runs only with --query; sort only with --sort
 * @invariant shown <= total
 * @complexity O(n log n) where n = number of records
 */
// CHANGE: compose the query pipeline over the typed-record core
// WHY: keep IO in the shell and delegate decoding, sorting and filtering to CORE
// FORMAT THEOREM: forall o: run(o) = render(sort(filter(decode(read(o)))))
// PURITY: SHELL
// EFFECT: Effect<QueryResult, QueryError | DecodeError, FileSystemService | Path>
// INVARIANT: input records are never mutated
// COMPLEXITY: O(n log n)/O(n)
export const buildQueryProgram = (
  options: QueryOptions
): QueryEffect<QueryResult, FileSystemService | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const filePath = yield* _(resolveInputPath(options))
    const decoder = yield* _(resolveDecoder(options.shape))
    const text = yield* _(fs.readFileString(filePath))
    const records = yield* _(decodeJson(decoder)(text))

    const columns = parseList(options.columns ?? "")
    const filtered = options.query === undefined
      ? records
      : filteredBy(resolveFilterKeys(options, columns, records), options.query, records)
    const sorted = options.sort === undefined
      ? filtered
      : sortedBy(parseSortSpec(options.sort), filtered)

    return {
      lines: sorted.map((record) => renderLine(columns, record)),
      shown: sorted.length,
      total: records.length
    }
  })

// CHANGE: print query results and report failures once
// WHY: a failed query should print one readable line instead of a defect trace
// FORMAT THEOREM: forall o: runQuery(o) -> logs(o)
// PURITY: SHELL
// EFFECT: Effect<void, never, FileSystemService | Path>
// INVARIANT: every failure is matched exhaustively by tag
// COMPLEXITY: O(n log n)/O(n)
export const runQuery = (
  options: QueryOptions
): Effect.Effect<void, never, FileSystemService | Path.Path> =>
  pipe(
    buildQueryProgram(options),
    Effect.flatMap((result) =>
      Effect.gen(function*(_) {
        yield* _(Effect.forEach(result.lines, (line) => Console.log(line), { discard: true }))
        yield* _(Console.log(`typed-record: ${result.shown} of ${result.total} records`))
      })
    ),
    Effect.catchAll((error) =>
      match(error)
        .with({ _tag: "QueryError" }, (queryFailure) =>
          Console.error(`QueryError: ${queryFailure.reason} (${queryFailure.path})`))
        .with({ _tag: "DecodeError" }, (decodeFailure) => Console.error(`DecodeError: ${formatDecodeError(decodeFailure)}`))
        .exhaustive()
    )
  )
