import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for strict-json
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; check/show carry exactly one file
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "show" | "demo"

export type OutputFormat = "debug" | "stats"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string | undefined
  readonly format: OutputFormat | undefined
  readonly silent: boolean
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("show", () => Either.right<CliCommand>("show")),
    Match.when("demo", () => Either.right<CliCommand>("demo")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

export const parseOutputFormat = (value: string): Either.Either<OutputFormat, CliError> =>
  Match.value(value).pipe(
    Match.when("debug", () => Either.right<OutputFormat>("debug")),
    Match.when("stats", () => Either.right<OutputFormat>("stats")),
    Match.orElse(() => Either.left(cliError(`Invalid format: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: undefined,
  format: undefined,
  silent: false,
  configPath: undefined,
  configPathExplicit: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => Either.right({ next: { ...current, silent: true }, consumed: 1 }),
  format: (current, inlineValue, nextValue) =>
    Either.flatMap(readFlagValue("format", inlineValue, nextValue), (value) =>
      Either.map(parseOutputFormat(value), (format) => ({
        next: { ...current, format },
        consumed: inlineValue === undefined ? 2 : 1
      }))),
  config: (current, inlineValue, nextValue) =>
    Either.map(readFlagValue("config", inlineValue, nextValue), (value) => ({
      next: { ...current, configPath: value, configPathExplicit: true },
      consumed: inlineValue === undefined ? 2 : 1
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "demo", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const acceptsFile = (command: CliCommand): boolean => command === "check" || command === "show"

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      if (!acceptsFile(args.command) || args.file !== undefined) {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, file: current }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireFile = (args: CliArgs): Either.Either<CliArgs, CliError> =>
  acceptsFile(args.command) && args.file === undefined
    ? Either.left(cliError(`Missing file argument for ${args.command}`))
    : Either.right(args)

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to demo when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return Either.flatMap(
    parseArguments(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
    requireFile
  )
}
