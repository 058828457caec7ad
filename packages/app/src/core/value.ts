import { Match } from "effect"
import * as Arr from "effect/Array"

import type { Json } from "./json.js"

// CHANGE: model parsed JSON as a closed tagged union
// WHY: keep every variant exhaustively matchable and distinguish Number from String payloads
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ {Null, Bool, Number, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Array and Object exclusively own their children; the tree has no sharing or cycles
// COMPLEXITY: O(1)/O(1)

export type JsonNull = { readonly _tag: "Null" }
export type JsonBool = { readonly _tag: "Bool"; readonly value: boolean }
export type JsonNumber = { readonly _tag: "Number"; readonly value: number }
export type JsonString = { readonly _tag: "String"; readonly value: string }
export type JsonArray = { readonly _tag: "Array"; readonly items: ReadonlyArray<JsonValue> }
export type JsonObjectValue = {
  readonly _tag: "Object"
  readonly entries: ReadonlyMap<string, JsonValue>
}

export type JsonValue =
  | JsonNull
  | JsonBool
  | JsonNumber
  | JsonString
  | JsonArray
  | JsonObjectValue

export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonBool = (value: boolean): JsonBool => ({ _tag: "Bool", value })

export const jsonNumber = (value: number): JsonNumber => ({ _tag: "Number", value })

export const jsonString = (value: string): JsonString => ({ _tag: "String", value })

export const jsonArray = (items: ReadonlyArray<JsonValue>): JsonArray => ({ _tag: "Array", items })

export const jsonObject = (
  entries: Iterable<readonly [string, JsonValue]>
): JsonObjectValue => ({ _tag: "Object", entries: new Map<string, JsonValue>(entries) })

export const isNull = (value: JsonValue): value is JsonNull => value._tag === "Null"
export const isBool = (value: JsonValue): value is JsonBool => value._tag === "Bool"
export const isNumber = (value: JsonValue): value is JsonNumber => value._tag === "Number"
export const isString = (value: JsonValue): value is JsonString => value._tag === "String"
export const isArray = (value: JsonValue): value is JsonArray => value._tag === "Array"
export const isObject = (value: JsonValue): value is JsonObjectValue => value._tag === "Object"

/**
 * Folding algebra over a value tree: one case per tag, containers receive
 * the already folded children in order.
 */
export interface ValueAlgebra<R> {
  readonly Null: () => R
  readonly Bool: (value: boolean) => R
  readonly Number: (value: number) => R
  readonly String: (value: string) => R
  readonly Array: (items: ReadonlyArray<R>) => R
  readonly Object: (entries: ReadonlyArray<readonly [string, R]>) => R
}

type FoldStep = { readonly node: JsonValue; readonly exit: boolean }

const pushChildren = (work: Array<FoldStep>, node: JsonArray | JsonObjectValue): void => {
  const children = node._tag === "Array" ? node.items : Array.from(node.entries.values())
  for (let index = children.length - 1; index >= 0; index--) {
    const child = children[index]
    if (child !== undefined) {
      work.push({ node: child, exit: false })
    }
  }
}

const completeStep = <R>(node: JsonValue, results: Array<R>, algebra: ValueAlgebra<R>): R =>
  Match.value(node).pipe(
    Match.tag("Null", () => algebra.Null()),
    Match.tag("Bool", (leaf) => algebra.Bool(leaf.value)),
    Match.tag("Number", (leaf) => algebra.Number(leaf.value)),
    Match.tag("String", (leaf) => algebra.String(leaf.value)),
    Match.tag("Array", (array) => algebra.Array(results.splice(results.length - array.items.length))),
    Match.tag("Object", (object) => {
      const values = results.splice(results.length - object.entries.size)
      return algebra.Object(Arr.zip(object.entries.keys(), values))
    }),
    Match.exhaustive
  )

/**
 * Fold a value tree bottom-up without recursion.
 *
 * Containers are expanded onto an explicit work list and completed from a
 * result stack, so nesting depth is bounded by heap, not by the call stack.
 *
 * @pure true
 * @invariant children are folded before their parent and in document order
 * @complexity O(n) time, O(n) space
 */
export const foldValue = <R>(root: JsonValue, algebra: ValueAlgebra<R>): R => {
  const work: Array<FoldStep> = []
  const results: Array<R> = []
  let step: FoldStep = { node: root, exit: false }
  while (true) {
    if (!step.exit && (step.node._tag === "Array" || step.node._tag === "Object")) {
      const exit: FoldStep = { node: step.node, exit: true }
      work.push(exit)
      pushChildren(work, step.node)
      step = work.pop() ?? exit
    } else {
      const value = completeStep(step.node, results, algebra)
      const next = work.pop()
      if (next === undefined) {
        return value
      }
      results.push(value)
      step = next
    }
  }
}

/**
 * Convert a tagged value tree into plain JS data.
 *
 * Object keys become own properties even when they collide with
 * Object.prototype names such as "__proto__".
 *
 * @pure true
 * @invariant toNative(v) preserves structure and key order of v
 * @complexity O(n) where n = number of nodes
 */
export const toNative = (value: JsonValue): Json =>
  foldValue<Json>(value, {
    Null: () => null,
    Bool: (value) => value,
    Number: (value) => value,
    String: (value) => value,
    Array: (items) => items,
    Object: (entries) => Object.fromEntries(entries)
  })
