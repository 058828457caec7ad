import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Cursor } from "./cursor.js"
import { makeCursor } from "./cursor.js"
import type { ParseError } from "./errors.js"
import { parseError } from "./errors.js"
import type { JsonValue } from "./value.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonObject, jsonString } from "./value.js"

// CHANGE: implement a strict recursive-descent JSON parser over a forward-only cursor
// WHY: reject everything outside the JSON value grammar and report where parsing stopped
// REF: req-parser-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀t: parse(t) = Left(e) → e.position ≤ index of first offending character
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: LL(1); a consumed character is never revisited; the first violation aborts the parse
// COMPLEXITY: O(n) time, O(d) heap for open containers where d = nesting depth

type Step<A> = Either.Either<A, ParseError>

const failAt = <A>(cursor: Cursor, message: string): Step<A> =>
  Either.left(parseError(message, cursor.position()))

const isDigit = (char: string | undefined): char is string => char !== undefined && /^[0-9]$/u.test(char)

const isHexDigit = (char: string): boolean => /^[0-9a-fA-F]$/u.test(char)

const simpleEscapes: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["\"", "\""],
  ["\\", "\\"],
  ["/", "/"]
])

const expectKeyword = (cursor: Cursor, keyword: string): Step<void> => {
  for (const expected of keyword) {
    const actual = cursor.peek()
    if (actual === undefined) {
      return failAt(cursor, "Unexpected end of input")
    }
    if (actual !== expected) {
      return failAt(cursor, `Expected '${expected}' but got '${actual}'`)
    }
    cursor.advance()
  }
  return Either.right<void>(undefined)
}

const parseNull = (cursor: Cursor): Step<JsonValue> =>
  Either.map(expectKeyword(cursor, "null"), () => jsonNull)

const parseBool = (cursor: Cursor): Step<JsonValue> =>
  cursor.peek() === "t"
    ? Either.map(expectKeyword(cursor, "true"), () => jsonBool(true))
    : Either.map(expectKeyword(cursor, "false"), () => jsonBool(false))

// \uXXXX stands alone: surrogate halves are not paired up, so they cannot be decoded.
// A surrogate is reported at `start`, the position of the u.
const parseUnicodeEscape = (cursor: Cursor, start: number): Step<string> => {
  let hex = ""
  while (hex.length < 4) {
    const char = cursor.peek()
    if (char === undefined) {
      return failAt(cursor, "Unterminated string")
    }
    if (!isHexDigit(char)) {
      return failAt(cursor, "Invalid unicode escape")
    }
    cursor.advance()
    hex += char
  }
  const code = Number.parseInt(hex, 16)
  if (code >= 0xd800 && code <= 0xdfff) {
    return Either.left(parseError("Invalid unicode code point", start))
  }
  return Either.right(String.fromCodePoint(code))
}

const parseEscape = (cursor: Cursor): Step<string> => {
  const char = cursor.peek()
  if (char === undefined) {
    return failAt(cursor, "Unterminated string")
  }
  if (char === "u") {
    const start = cursor.position()
    cursor.advance()
    return parseUnicodeEscape(cursor, start)
  }
  const decoded = simpleEscapes.get(char)
  if (decoded === undefined) {
    return failAt(cursor, `Invalid escape: \\${char}`)
  }
  cursor.advance()
  return Either.right(decoded)
}

const parseString = (cursor: Cursor): Step<string> => {
  cursor.advance()
  let result = ""
  while (true) {
    const char = cursor.advance()
    if (char === undefined) {
      return failAt(cursor, "Unterminated string")
    }
    if (char === "\"") {
      return Either.right(result)
    }
    if (char === "\\") {
      const decoded = parseEscape(cursor)
      if (Either.isLeft(decoded)) {
        return decoded
      }
      result += decoded.right
    } else {
      result += char
    }
  }
}

const consumeDigits = (cursor: Cursor): string => {
  let digits = ""
  let char = cursor.peek()
  while (isDigit(char)) {
    cursor.advance()
    digits += char
    char = cursor.peek()
  }
  return digits
}

const parseNumber = (cursor: Cursor): Step<number> => {
  const start = cursor.position()
  let lexeme = ""
  if (cursor.peek() === "-") {
    cursor.advance()
    lexeme += "-"
  }
  const first = cursor.peek()
  if (first === "0") {
    cursor.advance()
    lexeme += "0"
  } else if (isDigit(first)) {
    lexeme += consumeDigits(cursor)
  } else {
    return failAt(cursor, "Expected digit")
  }
  if (cursor.peek() === ".") {
    cursor.advance()
    const fraction = consumeDigits(cursor)
    if (fraction.length === 0) {
      return failAt(cursor, "Expected digit after decimal point")
    }
    lexeme += `.${fraction}`
  }
  const marker = cursor.peek()
  if (marker === "e" || marker === "E") {
    cursor.advance()
    lexeme += marker
    const sign = cursor.peek()
    if (sign === "+" || sign === "-") {
      cursor.advance()
      lexeme += sign
    }
    const exponent = consumeDigits(cursor)
    if (exponent.length === 0) {
      return failAt(cursor, "Expected digit in exponent")
    }
    lexeme += exponent
  }
  const value = Number(lexeme)
  if (!Number.isFinite(value)) {
    return Either.left(parseError("Invalid number", start))
  }
  return Either.right(value)
}

// Open containers live on an explicit stack, so nesting depth never reaches the call stack.
type Frame =
  | { readonly _tag: "ArrayFrame"; readonly items: Array<JsonValue> }
  | { readonly _tag: "ObjectFrame"; readonly entries: Map<string, JsonValue>; key: string }

const parseScalar = (cursor: Cursor): Step<JsonValue> => {
  const char = cursor.peek()
  if (char === undefined) {
    return failAt(cursor, "Unexpected end of input")
  }
  if (char === "n") {
    return parseNull(cursor)
  }
  if (char === "t" || char === "f") {
    return parseBool(cursor)
  }
  if (char === "\"") {
    return Either.map(parseString(cursor), jsonString)
  }
  if (char === "-" || isDigit(char)) {
    return Either.map(parseNumber(cursor), jsonNumber)
  }
  return failAt(cursor, `Unexpected character: ${char}`)
}

// key, ':' and the whitespace around them; the cursor is left before the value
const parseKey = (cursor: Cursor): Step<string> => {
  cursor.skipWhitespace()
  if (cursor.peek() !== "\"") {
    return failAt(cursor, "Expected string key")
  }
  const key = parseString(cursor)
  if (Either.isLeft(key)) {
    return key
  }
  cursor.skipWhitespace()
  if (cursor.peek() !== ":") {
    return failAt(cursor, "Expected ':'")
  }
  cursor.advance()
  return key
}

// Some(value) when a whole value was read, None when a container was opened on the stack
const openValue = (cursor: Cursor, stack: Array<Frame>): Step<Option.Option<JsonValue>> => {
  cursor.skipWhitespace()
  const char = cursor.peek()
  if (char === "[") {
    cursor.advance()
    cursor.skipWhitespace()
    if (cursor.peek() === "]") {
      cursor.advance()
      return Either.right(Option.some(jsonArray([])))
    }
    stack.push({ _tag: "ArrayFrame", items: [] })
    return Either.right(Option.none())
  }
  if (char === "{") {
    cursor.advance()
    cursor.skipWhitespace()
    if (cursor.peek() === "}") {
      cursor.advance()
      return Either.right(Option.some(jsonObject([])))
    }
    const key = parseKey(cursor)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    stack.push({ _tag: "ObjectFrame", entries: new Map(), key: key.right })
    return Either.right(Option.none())
  }
  return Either.map(parseScalar(cursor), (value) => Option.some(value))
}

// Hand a finished value to the enclosing containers, closing every one that ends here.
// Some(root) once the stack is empty, None when another element or member follows.
const settleValue = (
  cursor: Cursor,
  stack: Array<Frame>,
  value: JsonValue
): Step<Option.Option<JsonValue>> => {
  let completed = value
  while (true) {
    const frame = stack.at(-1)
    if (frame === undefined) {
      return Either.right(Option.some(completed))
    }
    cursor.skipWhitespace()
    const next = cursor.peek()
    if (frame._tag === "ArrayFrame") {
      frame.items.push(completed)
      if (next === ",") {
        cursor.advance()
        return Either.right(Option.none())
      }
      if (next !== "]") {
        return failAt(cursor, "Expected ',' or ']'")
      }
      cursor.advance()
      stack.pop()
      completed = jsonArray(frame.items)
    } else {
      // last duplicate wins
      frame.entries.set(frame.key, completed)
      if (next === ",") {
        cursor.advance()
        const key = parseKey(cursor)
        if (Either.isLeft(key)) {
          return Either.left(key.left)
        }
        frame.key = key.right
        return Either.right(Option.none())
      }
      if (next !== "}") {
        return failAt(cursor, "Expected ',' or '}'")
      }
      cursor.advance()
      stack.pop()
      completed = jsonObject(frame.entries)
    }
  }
}

const parseValue = (cursor: Cursor): Step<JsonValue> => {
  const stack: Array<Frame> = []
  while (true) {
    const opened = openValue(cursor, stack)
    if (Either.isLeft(opened)) {
      return Either.left(opened.left)
    }
    if (Option.isSome(opened.right)) {
      const settled = settleValue(cursor, stack, opened.right.value)
      if (Either.isLeft(settled)) {
        return Either.left(settled.left)
      }
      if (Option.isSome(settled.right)) {
        return Either.right(settled.right.value)
      }
    }
  }
}

/**
 * Parse a complete JSON document.
 *
 * @param text - Whole document, already resident in memory.
 * @returns Either with the value tree or the first ParseError.
 *
 * @pure true
 * @invariant only whitespace may follow the top-level value
 * @complexity O(n)
 */
export const parse = (text: string): Either.Either<JsonValue, ParseError> => {
  const cursor = makeCursor(text)
  const value = parseValue(cursor)
  if (Either.isLeft(value)) {
    return value
  }
  cursor.skipWhitespace()
  if (cursor.peek() !== undefined) {
    return failAt(cursor, "Unexpected characters after JSON value")
  }
  return value
}

export const parseEffect = (text: string): Effect.Effect<JsonValue, ParseError> =>
  Effect.suspend(() =>
    Either.match(parse(text), {
      onLeft: (error): Effect.Effect<JsonValue, ParseError> => Effect.fail(error),
      onRight: (value): Effect.Effect<JsonValue, ParseError> => Effect.succeed(value)
    })
  )
