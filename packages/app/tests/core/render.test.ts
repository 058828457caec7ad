import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseError } from "../../src/core/errors.js"
import { locate } from "../../src/core/location.js"
import { parse } from "../../src/core/parser.js"
import { renderParseError, renderParseErrorAt, renderValue } from "../../src/core/render.js"
import { measure, renderStats } from "../../src/core/stats.js"
import type { JsonValue } from "../../src/core/value.js"

const parsed = (text: string): JsonValue =>
  Either.getOrThrowWith(parse(text), (error) => new Error(renderParseError(error)))

describe("renderValue", () => {
  it.effect("renders scalars", () =>
    Effect.sync(() => {
      expect(renderValue(parsed("null"))).toBe("Null")
      expect(renderValue(parsed("false"))).toBe("Bool(false)")
      expect(renderValue(parsed("2.5e-3"))).toBe("Number(0.0025)")
      expect(renderValue(parsed(`"a\\"b"`))).toBe(`String("a\\"b")`)
    }))

  it.effect("keeps the sign of negative zero", () =>
    Effect.sync(() => {
      expect(renderValue(parsed("-0"))).toBe("Number(-0)")
      expect(renderValue(parsed("[0, -0.0]"))).toBe("Array([Number(0), Number(-0)])")
    }))

  it.effect("renders arbitrarily deep trees", () =>
    Effect.sync(() => {
      const depth = 10_000
      expect(renderValue(parsed("[".repeat(depth) + "]".repeat(depth)))).toBe(
        "Array([".repeat(depth) + "])".repeat(depth)
      )
    }))

  it.effect("renders containers in order", () =>
    Effect.sync(() => {
      expect(renderValue(parsed(`{"name": "Rust"}`))).toBe(`Object({"name": String("Rust")})`)
      expect(renderValue(parsed(`{"b": [], "a": [1, null]}`))).toBe(
        `Object({"b": Array([]), "a": Array([Number(1), Null])})`
      )
    }))
})

describe("locate", () => {
  it.effect("maps positions to 1-based lines and columns", () =>
    Effect.sync(() => {
      expect(locate("abc", 0)).toEqual({ line: 1, column: 1 })
      expect(locate("a\nbc", 3)).toEqual({ line: 2, column: 2 })
      expect(locate("a\nbc", 2)).toEqual({ line: 2, column: 1 })
      expect(locate("ab", 10)).toEqual({ line: 1, column: 3 })
    }))
})

describe("renderParseError", () => {
  it.effect("renders position and message", () =>
    Effect.sync(() => {
      expect(renderParseError(parseError("Expected ':'", 8))).toBe("Parse error at position 8: Expected ':'")
    }))

  it.effect("adds line and column for the source text", () =>
    Effect.sync(() => {
      const text = `{\n  "a" 1\n}`
      const error = Either.getOrThrowWith(Either.flip(parse(text)), () => new Error("expected failure"))
      expect(renderParseErrorAt(text, error)).toBe(
        "Parse error at position 8 (line 2, column 7): Expected ':'"
      )
    }))
})

describe("measure", () => {
  it.effect("counts nodes by kind and nesting depth", () =>
    Effect.sync(() => {
      const stats = measure(parsed(`{"a":[1,true,null],"b":"x"}`))
      expect(stats).toEqual({
        nodes: 6,
        depth: 3,
        counts: { null: 1, bool: 1, number: 1, string: 1, array: 1, object: 1 }
      })
      expect(renderStats(stats)).toBe("nodes=6 depth=3 null=1 bool=1 number=1 string=1 array=1 object=1")
    }))

  it.effect("treats a scalar as a single node of depth one", () =>
    Effect.sync(() => {
      expect(renderStats(measure(parsed("42")))).toBe(
        "nodes=1 depth=1 null=0 bool=0 number=1 string=0 array=0 object=0"
      )
    }))
})
