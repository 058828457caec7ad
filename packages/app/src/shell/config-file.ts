import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { Match } from "effect"

import type { FileConfig } from "../core/config.js"
import { decodeWith } from "../core/decode.js"
import type { DecodeError } from "../core/decode.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { renderParseErrorAt } from "../core/render.js"

// CHANGE: decode .strict-json.json with the strict parser and schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined; missing explicit config fails
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    format: S.Literal("debug", "stats"),
    silent: S.Boolean
  })
)

const decodeRawConfig = decodeWith(RawConfigSchema)

const describeDecodeError = (raw: string, error: DecodeError): string =>
  Match.value(error).pipe(
    Match.tag("ParseError", (value) => renderParseErrorAt(raw, value)),
    Match.tag("SchemaError", (value) => value.message),
    Match.exhaustive
  )

export const decodeConfig = (raw: string): Either.Either<FileConfig, AppError> =>
  Either.mapBoth(decodeRawConfig(raw), {
    onLeft: (error) => configError(describeDecodeError(raw, error)),
    onRight: (config) => ({
      ...(config.format === undefined ? {} : { format: config.format }),
      ...(config.silent === undefined ? {} : { silent: config.silent })
    })
  })

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(configError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = decodeConfig(contents)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(decoded.left))
    }
    return decoded.right
  })
