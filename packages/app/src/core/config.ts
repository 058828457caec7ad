import type { CliArgs, OutputFormat } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a --silent flag cannot be undone by the config file
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly format?: OutputFormat
  readonly silent?: boolean
}

export interface ResolvedConfig {
  readonly format: OutputFormat
  readonly silent: boolean
}

export const defaultConfigPath = "./.strict-json.json"

const resolveFormat = (cli: CliArgs, fileConfig: FileConfig | undefined): OutputFormat =>
  cli.format ?? fileConfig?.format ?? "debug"

const resolveSilent = (cli: CliArgs, fileConfig: FileConfig | undefined): boolean =>
  cli.silent || (fileConfig?.silent ?? false)

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .strict-json.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  format: resolveFormat(cli, fileConfig),
  silent: resolveSilent(cli, fileConfig)
})
