/**
 * Result of comparing two values.
 * Comparators may return any finite signed number; only the sign is significant.
 */
export const Ordering = {
  LessThan: -1,
  EqualTo: 0,
  GreaterThan: 1,
} as const

export type Ordering = (typeof Ordering)[keyof typeof Ordering]

/**
 * A pure function imposing a total order on `A`.
 *
 * Negative when `a` sorts before `b`, positive when after, zero when the two
 * are equal under this order. Must be antisymmetric, transitive, total and
 * return the same result for the same arguments.
 *
 * @example
 * ```typescript
 * const byLength: Comparator<string> = (a, b) => a.length - b.length
 * ```
 */
export type Comparator<A> = (a: A, b: A) => number

/**
 * Single-argument ordering view of a value: `view.compareTo(other)` follows
 * the same sign convention as {@link Comparator}.
 */
export interface Ordered<A> {
  compareTo(other: A): number
}

/**
 * Sort direction for a key.
 */
export type SortOrder = 'asc' | 'desc'

/**
 * Where absent (`null`/`undefined`) key values are placed.
 */
export type NullPlacement = 'first' | 'last'

/**
 * Which side of a merge wins when both heads compare equal.
 * - `left`: the left head is taken first, which keeps the sort stable
 * - `right`: the right head is taken first, so equal elements come out in
 *   reverse input order
 */
export type TieBreak = 'left' | 'right'

/**
 * Options for {@link mergeSort}.
 */
export interface MergeSortOptions {
  /** Tie-break policy used by every merge (default: 'left') */
  tieBreak?: TieBreak
  /** Check the comparator contract on every comparison (default: false) */
  verifyComparator?: boolean
}
