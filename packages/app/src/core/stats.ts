import type { JsonValue } from "./value.js"
import { foldValue } from "./value.js"

// CHANGE: measure the shape of a parsed document
// WHY: give the show command a compact view of large documents
// REF: req-stats-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: measure(v).nodes = Σ counts.k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: depth of a scalar is 1
// COMPLEXITY: O(n)

export interface KindCounts {
  readonly null: number
  readonly bool: number
  readonly number: number
  readonly string: number
  readonly array: number
  readonly object: number
}

export interface ValueStats {
  readonly nodes: number
  readonly depth: number
  readonly counts: KindCounts
}

const emptyCounts: KindCounts = { null: 0, bool: 0, number: 0, string: 0, array: 0, object: 0 }

const addCounts = (left: KindCounts, right: KindCounts): KindCounts => ({
  null: left.null + right.null,
  bool: left.bool + right.bool,
  number: left.number + right.number,
  string: left.string + right.string,
  array: left.array + right.array,
  object: left.object + right.object
})

const leaf = (counts: Partial<KindCounts>): ValueStats => ({
  nodes: 1,
  depth: 1,
  counts: { ...emptyCounts, ...counts }
})

const combine = (children: ReadonlyArray<ValueStats>, self: Partial<KindCounts>): ValueStats =>
  children.reduce<ValueStats>(
    (acc, child) => ({
      nodes: acc.nodes + child.nodes,
      depth: Math.max(acc.depth, child.depth + 1),
      counts: addCounts(acc.counts, child.counts)
    }),
    leaf(self)
  )

export const measure = (value: JsonValue): ValueStats =>
  foldValue<ValueStats>(value, {
    Null: () => leaf({ null: 1 }),
    Bool: () => leaf({ bool: 1 }),
    Number: () => leaf({ number: 1 }),
    String: () => leaf({ string: 1 }),
    Array: (items) => combine(items, { array: 1 }),
    Object: (entries) => combine(entries.map(([, child]) => child), { object: 1 })
  })

export const renderStats = (stats: ValueStats): string =>
  [
    `nodes=${stats.nodes}`,
    `depth=${stats.depth}`,
    `null=${stats.counts.null}`,
    `bool=${stats.counts.bool}`,
    `number=${stats.counts.number}`,
    `string=${stats.counts.string}`,
    `array=${stats.counts.array}`,
    `object=${stats.counts.object}`
  ].join(" ")
