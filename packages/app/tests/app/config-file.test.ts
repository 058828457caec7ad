import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withFixtureDir } from "./test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields that are present", () =>
    Effect.sync(() => {
      const decoded = decodeConfig(`{"format": "stats"}`)
      expect(Either.isRight(decoded)).toBe(true)
      if (Either.isRight(decoded)) {
        expect(decoded.right).toEqual({ format: "stats" })
      }
    }))

  it.effect("reports grammar violations with line and column", () =>
    Effect.sync(() => {
      const decoded = decodeConfig(`{"format":"stats",}`)
      expect(Either.isLeft(decoded)).toBe(true)
      if (Either.isLeft(decoded)) {
        expect(decoded.left).toEqual({
          _tag: "ConfigError",
          message: "Parse error at position 18 (line 1, column 19): Expected string key"
        })
      }
    }))

  it.effect("rejects unknown formats", () =>
    Effect.sync(() => {
      const decoded = decodeConfig(`{"format": "xml"}`)
      expect(Either.isLeft(decoded)).toBe(true)
      if (Either.isLeft(decoded)) {
        expect(decoded.left._tag).toBe("ConfigError")
      }
    }))
})

describe("loadConfigFile", () => {
  it.effect("ignores a missing implicit config", () =>
    withFixtureDir(({ pathTo }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(pathTo(".strict-json.json"), false))
        expect(config).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails on a missing explicit config", () =>
    withFixtureDir(({ pathTo }) =>
      Effect.gen(function*(_) {
        const file = pathTo("absent.json")
        const error = yield* _(Effect.flip(loadConfigFile(file, true)))
        expect(error).toEqual({ _tag: "ConfigError", message: `Config file not found: ${file}` })
      })
    ).pipe(provideNodeContext))

  it.effect("reads a present config", () =>
    withFixtureDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const file = yield* _(fixture(".strict-json.json", `{ "silent": true }\n`))
        const config = yield* _(loadConfigFile(file, false))
        expect(config).toEqual({ silent: true })
      })
    ).pipe(provideNodeContext))
})
