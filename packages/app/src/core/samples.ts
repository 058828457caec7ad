// CHANGE: fix the inputs shown by the demo command
// WHY: demonstrate every production plus two rejected documents
// REF: req-demo-1
// SOURCE: n/a
// FORMAT THEOREM: n/a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the last two samples are rejected by the parser
// COMPLEXITY: O(1)/O(1)

export const demoSamples: ReadonlyArray<string> = [
  `null`,
  `true`,
  `42`,
  `3.14`,
  `"hello"`,
  `[1, 2, 3]`,
  `{"name": "strict-json", "version": 1.0}`,
  `{"nested": {"array": [1, true, null]}}`,
  `[1,]`,
  `undefined`
]
