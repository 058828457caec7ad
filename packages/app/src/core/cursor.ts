// CHANGE: introduce a forward-only character cursor for the recursive-descent parser
// WHY: give every grammar production single-character lookahead and a diagnostic position
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: advance(c) = Some(ch) → position' = position + 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: peek never moves position; position counts code points, not UTF-16 units
// COMPLEXITY: O(n) to build, O(1) per step

export interface Cursor {
  readonly position: () => number
  readonly peek: () => string | undefined
  readonly advance: () => string | undefined
  readonly skipWhitespace: () => void
}

const whitespace = /^\p{White_Space}$/u

export const isWhitespace = (char: string): boolean => whitespace.test(char)

/**
 * Create a cursor over the code points of `text`.
 *
 * @pure false
 * @invariant no rewind operation exists
 * @complexity O(n)
 */
export const makeCursor = (text: string): Cursor => {
  const chars: ReadonlyArray<string> = Array.from(text)
  let index = 0

  const peek = (): string | undefined => chars[index]

  const advance = (): string | undefined => {
    const char = chars[index]
    if (char !== undefined) {
      index += 1
    }
    return char
  }

  const skipWhitespace = (): void => {
    let char = peek()
    while (char !== undefined && isWhitespace(char)) {
      index += 1
      char = peek()
    }
  }

  return {
    position: () => index,
    peek,
    advance,
    skipWhitespace
  }
}
