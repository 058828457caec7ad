import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError, sourceNotFound } from "../core/errors.js"

// CHANGE: read input documents through the platform file system
// WHY: isolate IO so the parser core stays pure
// REF: req-source-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(s) → s is the UTF-8 decoded content of p
// PURITY: SHELL
// EFFECT: Effect<string, AppError, FileSystem>
// INVARIANT: a missing file is reported as SourceNotFound, not as a generic FileError
// COMPLEXITY: O(n)

const mapFsError = (error: PlatformError): AppError => fileError(String(error))

export const readSourceFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(fs.exists(path).pipe(Effect.mapError(mapFsError)))
    if (!exists) {
      return yield* _(Effect.fail(sourceNotFound(path)))
    }
    return yield* _(fs.readFileString(path).pipe(Effect.mapError(mapFsError)))
  })
