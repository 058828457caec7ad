import { describe, expect, it } from "@effect/vitest"
import * as S from "@effect/schema/Schema"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeWith } from "../../src/core/decode.js"

const Package = S.Struct({
  name: S.String,
  size: S.Number,
  tags: S.Array(S.String)
})

const decodePackage = decodeWith(Package)

describe("decodeWith", () => {
  it.effect("returns typed data for conforming documents", () =>
    Effect.sync(() => {
      const decoded = decodePackage(`{"name": "x", "size": 2, "tags": ["a"]}`)
      expect(Either.isRight(decoded)).toBe(true)
      if (Either.isRight(decoded)) {
        expect(decoded.right).toEqual({ name: "x", size: 2, tags: ["a"] })
      }
    }))

  it.effect("reports grammar violations as ParseError", () =>
    Effect.sync(() => {
      const decoded = decodePackage(`{"name":`)
      expect(Either.isLeft(decoded)).toBe(true)
      if (Either.isLeft(decoded)) {
        expect(decoded.left).toEqual({ _tag: "ParseError", message: "Unexpected end of input", position: 8 })
      }
    }))

  it.effect("reports shape mismatches as SchemaError", () =>
    Effect.sync(() => {
      const decoded = decodePackage(`{"name": 1, "size": 2, "tags": []}`)
      expect(Either.isLeft(decoded)).toBe(true)
      if (Either.isLeft(decoded)) {
        expect(decoded.left._tag).toBe("SchemaError")
        expect(decoded.left.message).toContain(`["name"]`)
      }
    }))

  it.effect("still rejects documents a lenient parser would accept", () =>
    Effect.sync(() => {
      const decoded = decodePackage(`{"name": "x", "size": 2, "tags": ["a",]}`)
      expect(Either.isLeft(decoded)).toBe(true)
      if (Either.isLeft(decoded)) {
        expect(decoded.left._tag).toBe("ParseError")
      }
    }))
})
