// CHANGE: keep a plain JS image of parsed values for interop with schemas and callers
// WHY: tagged trees are precise, but most consumers want ordinary objects and arrays
// REF: req-native-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: x is null, boolean, finite number, string, array or record of Json
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
