import { NodeContext } from "@effect/platform-node"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer } from "effect"

import { buildQueryProgram, parseList, parseSortSpec } from "../../src/shell/query/index.js"
import type { QueryOptions } from "../../src/shell/query/types.js"
import { FileSystemLive } from "../../src/shell/services/file-system.js"
import { buildTestPaths, makeTempDir, writeFile } from "../support/fs-helpers.js"

const testPaths = buildTestPaths(new URL(import.meta.url), "typed-record-query-tests")

const TestLayer = Layer.provideMerge(FileSystemLive, NodeContext.layer)

const runOnFixture = (options: Omit<QueryOptions, "cwd" | "file">) =>
  Effect.gen(function*(_) {
    const { fixturesDir } = yield* _(testPaths)
    return yield* _(buildQueryProgram({ cwd: fixturesDir, file: "users.json", ...options }))
  })

describe("parseSortSpec", () => {
  it("splits at the last colon and defaults to ascending", () => {
    expect(parseSortSpec("age:dsc")).toEqual(["age", "dsc"])
    expect(parseSortSpec("name.first")).toEqual(["name.first", "asc"])
    expect(parseSortSpec("a:b:asc")).toEqual(["a:b", "asc"])
  })
})

describe("parseList", () => {
  it("drops blank entries", () => {
    expect(parseList(" id, name.first ,,")).toEqual(["id", "name.first"])
    expect(parseList("")).toEqual([])
  })
})

describe("buildQueryProgram", () => {
  it.effect("sorts the declared user shape and renders columns", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runOnFixture({ shape: "user", sort: "age:dsc", columns: "name.first,age" }))
      expect(result).toEqual({
        lines: ["Bruno\t45", "Alice\t31", "Ahmad\t24"],
        shown: 3,
        total: 3
      })
    }).pipe(Effect.provide(TestLayer)))

  it.effect("filters on the columns when no keys are given", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runOnFixture({ shape: "user", query: "al", columns: "name.first,address.city" }))
      expect(result.lines).toEqual(["Ahmad\tMontreal", "Alice\tToronto"])
      expect(result.shown).toBe(2)
      expect(result.total).toBe(3)
    }).pipe(Effect.provide(TestLayer)))

  it.effect("infers records and filters on every top-level key by default", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runOnFixture({ query: "TORONTO" }))
      expect(result.lines).toEqual(["7 Alice Moreau 31 1.64 false viewer 3 8 King Street Toronto Canada"])
    }).pipe(Effect.provide(TestLayer)))

  it.effect("filters on explicit keys and sorts ascending without an order", () =>
    Effect.gen(function*(_) {
      const filtered = yield* _(runOnFixture({ keys: "id", query: "2", columns: "id,name.last" }))
      expect(filtered.lines).toEqual(["2\tDiaz"])
      const sorted = yield* _(runOnFixture({ sort: "name.last", columns: "name.last" }))
      expect(sorted.lines).toEqual(["Diaz", "Moreau", "Nasser"])
    }).pipe(Effect.provide(TestLayer)))

  it.effect("fails when the input file is missing", () =>
    Effect.gen(function*(_) {
      const { fixturesDir } = yield* _(testPaths)
      const path = yield* _(Path.Path)
      const error = yield* _(Effect.flip(buildQueryProgram({ cwd: fixturesDir, file: "absent.json" })))
      expect(error).toEqual({
        _tag: "QueryError",
        path: path.join(fixturesDir, "absent.json"),
        reason: "Input file not found"
      })
    }).pipe(Effect.provide(TestLayer)))

  it.effect("fails without an input file", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(buildQueryProgram({ cwd: "/work" })))
      expect(error._tag).toBe("QueryError")
      expect(error._tag === "QueryError" ? error.path : undefined).toBe("--file")
    }).pipe(Effect.provide(TestLayer)))

  it.effect("fails on an unknown shape", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runOnFixture({ shape: "csv" })))
      expect(error).toEqual({ _tag: "QueryError", path: "--shape", reason: "Unknown shape \"csv\"" })
    }).pipe(Effect.provide(TestLayer)))

  it.effect("surfaces decode errors with their path", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        const { tempBase } = yield* _(testPaths)
        const path = yield* _(Path.Path)
        const dir = yield* _(makeTempDir(tempBase, "query-"))
        yield* _(writeFile(path.join(dir, "broken.json"), "[{\"id\": 1}, {\"id\": null}]"))
        const error = yield* _(Effect.flip(buildQueryProgram({ cwd: dir, file: "broken.json" })))
        expect(error._tag).toBe("DecodeError")
        expect(error._tag === "DecodeError" ? error.path : undefined).toEqual([1, "id"])
      })
    ).pipe(Effect.provide(TestLayer)))
})
