import type * as Fx from "effect"

import type { DecodeError } from "../../core/decode.js"

export interface QueryError {
  readonly _tag: "QueryError"
  readonly path: string
  readonly reason: string
}

export interface QueryOptions {
  readonly cwd: string
  readonly file?: string
  readonly shape?: string
  readonly sort?: string
  readonly keys?: string
  readonly query?: string
  readonly columns?: string
}

export interface QueryResult {
  readonly lines: ReadonlyArray<string>
  readonly shown: number
  readonly total: number
}

export type QueryFailure = QueryError | DecodeError

export type QueryEffect<A, R = never> = Fx.Effect.Effect<A, QueryFailure, R>

// CHANGE: centralize query-specific types for the shell modules
// WHY: one error model for file access and option errors
// FORMAT THEOREM: forall e: QueryError -> typed(e)
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: QueryError contains path and reason for logging
// COMPLEXITY: O(1)/O(1)
export const queryError = (pathValue: string, reason: string): QueryError => ({
  _tag: "QueryError",
  path: pathValue,
  reason
})
