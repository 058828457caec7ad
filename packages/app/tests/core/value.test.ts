import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { Json } from "../../src/core/json.js"
import { isJsonObject } from "../../src/core/json.js"
import { parse } from "../../src/core/parser.js"
import type { JsonValue } from "../../src/core/value.js"
import {
  isArray,
  isBool,
  isNull,
  isNumber,
  isObject,
  isString,
  jsonArray,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  foldValue,
  toNative
} from "../../src/core/value.js"

const parsed = (text: string): JsonValue =>
  Either.getOrThrowWith(parse(text), (error) => new Error(error.message))

describe("value constructors", () => {
  it.effect("copies object entries on construction", () =>
    Effect.sync(() => {
      const source = new Map<string, JsonValue>([["a", jsonNull]])
      const value = jsonObject(source)
      source.set("b", jsonNull)
      expect([...value.entries.keys()]).toEqual(["a"])
    }))

  it.effect("narrows variants through guards", () =>
    Effect.sync(() => {
      const values: ReadonlyArray<JsonValue> = [
        jsonNull,
        parsed("true"),
        jsonNumber(1),
        jsonString("s"),
        jsonArray([]),
        jsonObject([])
      ]
      expect(values.map(isNull)).toEqual([true, false, false, false, false, false])
      expect(values.map(isBool)).toEqual([false, true, false, false, false, false])
      expect(values.map(isNumber)).toEqual([false, false, true, false, false, false])
      expect(values.map(isString)).toEqual([false, false, false, true, false, false])
      expect(values.map(isArray)).toEqual([false, false, false, false, true, false])
      expect(values.map(isObject)).toEqual([false, false, false, false, false, true])
    }))
})

describe("toNative", () => {
  it.effect("mirrors the tree as plain data", () =>
    Effect.sync(() => {
      expect(toNative(parsed(`{"a":[1,true,null],"b":{"c":"d"}}`))).toEqual({
        a: [1, true, null],
        b: { c: "d" }
      })
    }))

  it.effect("keeps __proto__ as an own property", () =>
    Effect.sync(() => {
      const native = toNative(parsed(`{"__proto__": {"polluted": true}}`))
      expect(isJsonObject(native)).toBe(true)
      if (isJsonObject(native)) {
        expect(Object.keys(native)).toEqual(["__proto__"])
        expect(Object.getPrototypeOf(native)).toBe(Object.prototype)
      }
    }))
})

describe("foldValue", () => {
  it.effect("passes folded children to their container in order", () =>
    Effect.sync(() => {
      const keys = foldValue<string>(parsed(`{"b": {"y": 1, "x": 2}, "a": [{"z": 3}]}`), {
        Null: () => "",
        Bool: () => "",
        Number: () => "",
        String: () => "",
        Array: (items) => items.join(""),
        Object: (entries) => entries.map(([key, child]) => key + child).join("")
      })
      expect(keys).toBe("byxaz")
    }))

  it.effect("sums leaves", () =>
    Effect.sync(() => {
      const sum = foldValue<number>(parsed(`[1, [2, 3], {"a": 4, "b": "x"}, null]`), {
        Null: () => 0,
        Bool: () => 0,
        Number: (value) => value,
        String: () => 0,
        Array: (items) => items.reduce((total, item) => total + item, 0),
        Object: (entries) => entries.reduce((total, [, item]) => total + item, 0)
      })
      expect(sum).toBe(10)
    }))
})

describe("toNative on deep trees", () => {
  it.effect("converts nesting deeper than the call stack", () =>
    Effect.sync(() => {
      const depth = 10_000
      let current: Json = toNative(parsed(`{"a":`.repeat(depth) + "true" + "}".repeat(depth)))
      let levels = 0
      while (isJsonObject(current)) {
        levels += 1
        current = current["a"] ?? null
      }
      expect(levels).toBe(depth)
      expect(current).toBe(true)
    }))
})
