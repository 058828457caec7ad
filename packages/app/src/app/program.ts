import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { parse } from "../core/parser.js"
import { renderParseError, renderParseErrorAt, renderValue } from "../core/render.js"
import { demoSamples } from "../core/samples.js"
import { measure, renderStats } from "../core/stats.js"
import type { JsonValue } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: every line in the result is emitted at most once, and none when silent
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly stdout: ReadonlyArray<string>
  readonly stderr: ReadonlyArray<string>
}

const writeLines = (
  stream: NodeJS.WriteStream,
  lines: ReadonlyArray<string>,
  silent: boolean
): Effect.Effect<void> => {
  if (silent || lines.length === 0) {
    return Effect.void
  }
  return Effect.sync(() => {
    stream.write(`${lines.join("\n")}\n`)
  })
}

const emit = (result: ProgramResult, config: ResolvedConfig): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    yield* _(writeLines(process.stdout, result.stdout, config.silent))
    yield* _(writeLines(process.stderr, result.stderr, config.silent))
    return result
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const renderShown = (value: JsonValue, config: ResolvedConfig): string =>
  Match.value(config.format).pipe(
    Match.when("debug", () => renderValue(value)),
    Match.when("stats", () => renderStats(measure(value))),
    Match.exhaustive
  )

const parseSource = (
  file: string,
  onValue: (value: JsonValue) => string
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const text = yield* _(readSourceFile(file))
    return Either.match(parse(text), {
      onLeft: (error): ProgramResult => ({
        exitCode: 1,
        stdout: [],
        stderr: [`${file}: ${renderParseErrorAt(text, error)}`]
      }),
      onRight: (value): ProgramResult => ({ exitCode: 0, stdout: [onValue(value)], stderr: [] })
    })
  })

const describeSample = (sample: string): ReadonlyArray<string> =>
  Either.match(parse(sample), {
    onLeft: (error) => [`Input:  ${sample}`, `Error:  ${renderParseError(error)}`, ""],
    onRight: (value) => [`Input:  ${sample}`, `Parsed: ${renderValue(value)}`, ""]
  })

const handleDemo = (): Effect.Effect<ProgramResult> =>
  Effect.sync(() => ({
    exitCode: 0,
    stdout: ["=== strict-json demo ===", "", ...demoSamples.flatMap(describeSample)],
    stderr: []
  }))

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> => {
  const file = cli.file ?? ""
  return Match.value(cli.command).pipe(
    Match.when("check", () => parseSource(file, () => "ok")),
    Match.when("show", () => parseSource(file, (value) => renderShown(value, config))),
    Match.when("demo", () => handleDemo()),
    Match.exhaustive
  )
}

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with exit code and the emitted lines.
 *
 * @pure false
 * @effect FileSystem, stdout, stderr
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(
      loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit)
    )
    const config = resolveConfig(cli, fileConfig)
    const result = yield* _(executeCommand(cli, config))
    return yield* _(emit(result, config))
  })
