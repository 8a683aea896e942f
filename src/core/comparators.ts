import { Ordering } from '../types/ordering'
import type { Comparator, Ordered } from '../types/ordering'

/**
 * Values {@link naturalOrder} knows how to compare.
 */
export type NaturalValue = boolean | number | bigint | string | Date

/**
 * One comparator per tuple position.
 */
export type ComparatorsOf<T extends readonly unknown[]> = {
  [K in keyof T]: Comparator<T[K]>
}

/**
 * Maps any signed number onto an {@link Ordering} by its sign.
 *
 * @example
 * ```typescript
 * toOrdering(-42) // Ordering.LessThan
 * toOrdering(0)   // Ordering.EqualTo
 * toOrdering(0.5) // Ordering.GreaterThan
 * ```
 */
export function toOrdering(result: number): Ordering {
  if (result < 0) return Ordering.LessThan
  if (result > 0) return Ordering.GreaterThan
  return Ordering.EqualTo
}

/**
 * Ascending numeric order.
 * NaN is not part of any total order and must not be passed.
 */
export function compareNumbers(a: number, b: number): Ordering {
  if (a < b) return Ordering.LessThan
  if (a > b) return Ordering.GreaterThan
  return Ordering.EqualTo
}

/**
 * Ascending order by UTF-16 code unit, independent of locale.
 *
 * @example
 * ```typescript
 * compareStrings('apple', 'banana') // -1
 * compareStrings('Zebra', 'apple')  // -1 (uppercase sorts first)
 * ```
 */
export function compareStrings(a: string, b: string): Ordering {
  if (a < b) return Ordering.LessThan
  if (a > b) return Ordering.GreaterThan
  return Ordering.EqualTo
}

/**
 * Binary string order after lower-casing both sides.
 */
export function compareStringsIgnoreCase(a: string, b: string): Ordering {
  return compareStrings(a.toLowerCase(), b.toLowerCase())
}

export function compareBigInts(a: bigint, b: bigint): Ordering {
  if (a < b) return Ordering.LessThan
  if (a > b) return Ordering.GreaterThan
  return Ordering.EqualTo
}

/**
 * `false` sorts before `true`.
 */
export function compareBooleans(a: boolean, b: boolean): Ordering {
  if (a === b) return Ordering.EqualTo
  return a ? Ordering.GreaterThan : Ordering.LessThan
}

/**
 * Chronological order by timestamp. Invalid dates must not be passed.
 */
export function compareDates(a: Date, b: Date): Ordering {
  return compareNumbers(a.getTime(), b.getTime())
}

function kindRank(value: NaturalValue): number {
  if (typeof value === 'boolean') return 0
  if (typeof value === 'number') return 1
  if (typeof value === 'bigint') return 2
  if (typeof value === 'string') return 3
  return 4
}

/**
 * Default order for primitive values and dates.
 *
 * Two values of the same kind are compared with the matching comparator
 * above. Values of different kinds are ordered by kind:
 * boolean < number < bigint < string < Date.
 *
 * @example
 * ```typescript
 * naturalOrder(2, 10)     // -1
 * naturalOrder('2', '10') // 1 (binary string order)
 * naturalOrder(10, '2')   // -1 (numbers before strings)
 * ```
 */
export function naturalOrder(a: NaturalValue, b: NaturalValue): Ordering {
  if (typeof a === 'number' && typeof b === 'number') {
    return compareNumbers(a, b)
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b)
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return compareBigInts(a, b)
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return compareBooleans(a, b)
  }
  if (a instanceof Date && b instanceof Date) {
    return compareDates(a, b)
  }
  return compareNumbers(kindRank(a), kindRank(b))
}

/**
 * Flips a comparator so that it sorts in the opposite direction.
 *
 * @example
 * ```typescript
 * mergeSort([1, 2], reverse(compareNumbers)) // [2, 1]
 * ```
 */
export function reverse<A>(compare: Comparator<A>): Comparator<A> {
  return (a, b) => compare(b, a)
}

/**
 * Alias of {@link reverse} that reads better at call sites.
 */
export const descending: <A>(compare: Comparator<A>) => Comparator<A> = reverse

/**
 * Orders values by a projected key.
 *
 * @param key - Projection applied to both values before comparing
 * @param compare - Order on the key (default: naturalOrder)
 *
 * @example
 * ```typescript
 * const byLength = comparing((s: string) => s.length)
 * const byNameDesc = comparing((p: Person) => p.name, reverse(compareStrings))
 * ```
 */
export function comparing<A, K extends NaturalValue>(
  key: (value: A) => K
): Comparator<A>
export function comparing<A, K>(
  key: (value: A) => K,
  compare: Comparator<K>
): Comparator<A>
export function comparing<A, K>(
  key: (value: A) => K,
  compare?: Comparator<K>
): Comparator<A> {
  const compareKeys: Comparator<K> = compare ?? compareUnknown
  return (a, b) => compareKeys(key(a), key(b))
}

function isNaturalValue(value: unknown): value is NaturalValue {
  return (
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    value instanceof Date
  )
}

const UNSUPPORTED_KIND_RANK = 5

function unknownKindRank(value: unknown): number {
  return isNaturalValue(value) ? kindRank(value) : UNSUPPORTED_KIND_RANK
}

/**
 * {@link naturalOrder} for values of unknown type. Values naturalOrder does
 * not cover (objects, symbols, null, undefined) sort after every supported
 * kind and compare as equal to each other.
 *
 * @example
 * ```typescript
 * compareUnknown(1, 2)      // -1
 * compareUnknown([0], 'z')  // 1
 * compareUnknown({}, null)  // 0
 * ```
 */
export function compareUnknown(a: unknown, b: unknown): Ordering {
  if (isNaturalValue(a) && isNaturalValue(b)) {
    return naturalOrder(a, b)
  }
  return compareNumbers(unknownKindRank(a), unknownKindRank(b))
}

/**
 * Chains comparators over the same type. The first comparator that tells
 * the values apart decides; with none given every pair is equal.
 *
 * @example
 * ```typescript
 * const byLastThenFirst = thenBy(
 *   comparing((p: Person) => p.lastName),
 *   comparing((p: Person) => p.firstName)
 * )
 * ```
 */
export function thenBy<A>(...comparators: Array<Comparator<A>>): Comparator<A> {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b)
      if (result !== 0) return result
    }
    return Ordering.EqualTo
  }
}

/**
 * Combines comparators for the two components of a pair into a lexicographic
 * comparator: first components decide, second components break ties.
 *
 * @example
 * ```typescript
 * const cmp = composeLexicographic(compareNumbers, compareStrings)
 * mergeSort([[3, 'banana'], [1, 'orange'], [1, 'apple']], cmp)
 * // [[1, 'apple'], [1, 'orange'], [3, 'banana']]
 * ```
 */
export function composeLexicographic<A, B>(
  first: Comparator<A>,
  second: Comparator<B>
): Comparator<readonly [A, B]> {
  return (a, b) => {
    const result = first(a[0], b[0])
    if (result !== 0) return result
    return second(a[1], b[1])
  }
}

/**
 * Lexicographic comparator over tuples of any length, one comparator per
 * position, most significant first.
 *
 * @example
 * ```typescript
 * const cmp = lexicographic(compareStrings, compareNumbers, compareBooleans)
 * cmp(['a', 2, true], ['a', 2, false]) // 1
 * ```
 */
export function lexicographic<T extends readonly unknown[]>(
  ...comparators: ComparatorsOf<T>
): Comparator<T> {
  return (a, b) => {
    for (let i = 0; i < comparators.length; i++) {
      const result = comparators[i](a[i], b[i])
      if (result !== 0) return result
    }
    return Ordering.EqualTo
  }
}

/**
 * Lifts a comparator to optional values; `null` and `undefined` sort before
 * every present value and are equal to each other.
 */
export function nullsFirst<A>(
  compare: Comparator<A>
): Comparator<A | null | undefined> {
  return (a, b) => {
    if (a == null) return b == null ? Ordering.EqualTo : Ordering.LessThan
    if (b == null) return Ordering.GreaterThan
    return compare(a, b)
  }
}

/**
 * Lifts a comparator to optional values; `null` and `undefined` sort after
 * every present value and are equal to each other.
 */
export function nullsLast<A>(
  compare: Comparator<A>
): Comparator<A | null | undefined> {
  return (a, b) => {
    if (a == null) return b == null ? Ordering.EqualTo : Ordering.GreaterThan
    if (b == null) return Ordering.LessThan
    return compare(a, b)
  }
}

/**
 * Adapts a single-argument ordering view into a comparator, so types that
 * know how to compare themselves can be sorted like any other.
 *
 * @example
 * ```typescript
 * const asOrdered = (v: number): Ordered<number> => ({
 *   compareTo: (other) => v - other,
 * })
 * mergeSort([1, 5, -2, 12], fromOrdered(asOrdered)) // [-2, 1, 5, 12]
 * ```
 */
export function fromOrdered<A>(view: (value: A) => Ordered<A>): Comparator<A> {
  return (a, b) => view(a).compareTo(b)
}
