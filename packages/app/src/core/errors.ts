import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the parser and the command-line program
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; ParseError is never mutated after creation
// COMPLEXITY: O(1)/O(1)

export type ParseError = {
  readonly _tag: "ParseError"
  readonly message: string
  readonly position: number
}
export type SchemaError = { readonly _tag: "SchemaError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type SourceNotFound = { readonly _tag: "SourceNotFound"; readonly path: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | SourceNotFound

export const parseError = (message: string, position: number): ParseError => ({
  _tag: "ParseError",
  message,
  position
})

export const schemaError = (message: string): SchemaError => ({
  _tag: "SchemaError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const sourceNotFound = (path: string): SourceNotFound => ({
  _tag: "SourceNotFound",
  path
})

/**
 * Render an application error as a single diagnostic line.
 *
 * @pure true
 * @invariant every AppError tag has a rendering
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}`),
    Match.tag("ConfigError", (value) => `config error: ${value.message}`),
    Match.tag("FileError", (value) => `file error: ${value.message}`),
    Match.tag("SourceNotFound", (value) => `file error: no such file ${value.path}`),
    Match.exhaustive
  )
