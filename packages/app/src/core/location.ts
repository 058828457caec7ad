// CHANGE: translate character positions into line/column pairs
// WHY: a bare offset is hard to find in multi-line documents
// REF: req-location-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,p: locate(t,p).line = 1 + |{i < p : t[i] = "\n"}|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: line ≥ 1 ∧ column ≥ 1; positions past the end are clamped
// COMPLEXITY: O(n)

export interface Location {
  readonly line: number
  readonly column: number
}

/**
 * Locate a code-point position inside `text`.
 *
 * @pure true
 * @complexity O(p)
 */
export const locate = (text: string, position: number): Location => {
  let line = 1
  let column = 1
  let index = 0
  for (const char of text) {
    if (index >= position) {
      break
    }
    if (char === "\n") {
      line += 1
      column = 1
    } else {
      column += 1
    }
    index += 1
  }
  return { line, column }
}
