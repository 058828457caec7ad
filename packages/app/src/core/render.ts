import type { ParseError } from "./errors.js"
import { locate } from "./location.js"
import type { JsonValue } from "./value.js"
import { foldValue } from "./value.js"

// CHANGE: render value trees and parse errors for humans
// WHY: the demo and show commands print the tagged structure, not re-encoded JSON
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: renderValue(v) starts with v._tag
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entries are rendered in map order
// COMPLEXITY: O(n)

const quote = (value: string): string => JSON.stringify(value)

// String(-0) drops the sign
const renderNumber = (value: number): string => Object.is(value, -0) ? "-0" : String(value)

/**
 * Render a value tree in tagged form, e.g. `Array([Number(1), Null])`.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderValue = (value: JsonValue): string =>
  foldValue<string>(value, {
    Null: () => "Null",
    Bool: (bool) => `Bool(${String(bool)})`,
    Number: (number) => `Number(${renderNumber(number)})`,
    String: (string) => `String(${quote(string)})`,
    Array: (items) => `Array([${items.join(", ")}])`,
    Object: (entries) => `Object({${entries.map(([key, child]) => `${quote(key)}: ${child}`).join(", ")}})`
  })

export const renderParseError = (error: ParseError): string =>
  `Parse error at position ${error.position}: ${error.message}`

/**
 * Render a parse error with the line and column it points at inside `text`.
 *
 * @pure true
 * @complexity O(p) where p = error position
 */
export const renderParseErrorAt = (text: string, error: ParseError): string => {
  const { column, line } = locate(text, error.position)
  return `Parse error at position ${error.position} (line ${line}, column ${column}): ${error.message}`
}
