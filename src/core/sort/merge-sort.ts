/**
 * Comparator-driven merge sort
 * @module core/sort/merge-sort
 */

import type { Comparator, MergeSortOptions, TieBreak } from '../../types/ordering'
import { requireArray, requireFunction, requireOneOf } from '../../utils/errors'
import { checkedComparator } from './comparator-contract'

/**
 * Defaults applied to {@link MergeSortOptions}.
 */
export const DEFAULT_MERGE_SORT_OPTIONS: Readonly<Required<MergeSortOptions>> = {
  tieBreak: 'left',
  verifyComparator: false,
}

const TIE_BREAKS: readonly TieBreak[] = ['left', 'right']

/**
 * Sorts a sequence with a balanced, top-down merge sort.
 *
 * The left half of every split is the first `ceil(n / 2)` elements in input
 * order. With the default `tieBreak: 'left'` equal elements keep their input
 * order (the sort is stable); with `tieBreak: 'right'` they come out in
 * reverse input order.
 *
 * The input is never modified and a new array is always returned. `compare`
 * must be a total order; if it is not, the result is still a permutation of
 * `xs` but its order is unspecified. Pass `verifyComparator: true` to have
 * broken comparators reported as {@link ComparatorContractError}.
 *
 * Runs in O(n log n) comparisons with recursion depth O(log n).
 *
 * @param xs - Sequence to sort
 * @param compare - Total order over the elements
 * @param options - Tie-break policy and contract checking
 * @returns The elements of `xs` in non-decreasing order under `compare`
 * @throws {InvalidParameterError} If `xs` is not an array, `compare` is not a
 *   function or `tieBreak` is unknown
 *
 * @example
 * ```typescript
 * mergeSort([1, 5, -2, 12], compareNumbers)          // [-2, 1, 5, 12]
 * mergeSort([1, 2], descending(compareNumbers))      // [2, 1]
 * mergeSort(people, comparing((p: Person) => p.age)) // youngest first, stable
 * ```
 */
export function mergeSort<A>(
  xs: ReadonlyArray<A>,
  compare: Comparator<A>,
  options: MergeSortOptions = {}
): A[] {
  requireArray(xs, 'xs')
  requireFunction(compare, 'compare')
  const tieBreak = requireOneOf(
    options.tieBreak ?? DEFAULT_MERGE_SORT_OPTIONS.tieBreak,
    TIE_BREAKS,
    'tieBreak'
  )
  const verify =
    options.verifyComparator ?? DEFAULT_MERGE_SORT_OPTIONS.verifyComparator

  return sortRecursive(xs, verify ? checkedComparator(compare) : compare, tieBreak)
}

function sortRecursive<A>(
  xs: ReadonlyArray<A>,
  compare: Comparator<A>,
  tieBreak: TieBreak
): A[] {
  if (xs.length <= 1) {
    return xs.slice()
  }

  const middle = Math.ceil(xs.length / 2)
  const left = sortRecursive(xs.slice(0, middle), compare, tieBreak)
  const right = sortRecursive(xs.slice(middle), compare, tieBreak)

  return mergeSorted(left, right, compare, tieBreak)
}

function mergeSorted<A>(
  left: ReadonlyArray<A>,
  right: ReadonlyArray<A>,
  compare: Comparator<A>,
  tieBreak: TieBreak
): A[] {
  const merged: A[] = []
  let i = 0
  let j = 0

  while (i < left.length && j < right.length) {
    const result = compare(left[i], right[j])
    const takeLeft = tieBreak === 'left' ? result <= 0 : result < 0

    if (takeLeft) {
      merged.push(left[i++])
    } else {
      merged.push(right[j++])
    }
  }

  // One side is exhausted; the rest of the other is already in order
  while (i < left.length) merged.push(left[i++])
  while (j < right.length) merged.push(right[j++])

  return merged
}

/**
 * Merges two sequences that are each sorted under `compare` into one sorted
 * sequence.
 *
 * @param tieBreak - Side taken first when the heads are equal (default: 'left')
 * @throws {InvalidParameterError} On non-array input, a non-function
 *   comparator or an unknown tie-break
 *
 * @example
 * ```typescript
 * merge([1, 4, 9], [2, 3, 10], compareNumbers) // [1, 2, 3, 4, 9, 10]
 * ```
 */
export function merge<A>(
  left: ReadonlyArray<A>,
  right: ReadonlyArray<A>,
  compare: Comparator<A>,
  tieBreak: TieBreak = 'left'
): A[] {
  requireArray(left, 'left')
  requireArray(right, 'right')
  requireFunction(compare, 'compare')
  requireOneOf(tieBreak, TIE_BREAKS, 'tieBreak')

  return mergeSorted(left, right, compare, tieBreak)
}

/**
 * Checks that no adjacent pair of `xs` is out of order under `compare`.
 *
 * @example
 * ```typescript
 * isSorted([1, 2, 2, 3], compareNumbers) // true
 * isSorted([2, 1], compareNumbers)       // false
 * isSorted([], compareNumbers)           // true
 * ```
 *
 * @throws {InvalidParameterError} If `xs` is not an array or `compare` is not
 *   a function
 */
export function isSorted<A>(xs: ReadonlyArray<A>, compare: Comparator<A>): boolean {
  requireArray(xs, 'xs')
  requireFunction(compare, 'compare')

  for (let i = 1; i < xs.length; i++) {
    if (compare(xs[i - 1], xs[i]) > 0) return false
  }
  return true
}
