/**
 * Named comparator registry
 * @module core/registry
 */

import type { Comparator, MergeSortOptions } from '../types/ordering'
import { UnknownComparatorError, requireFunction, requireNonEmptyString } from '../utils/errors'
import {
  compareBigInts,
  compareBooleans,
  compareDates,
  compareNumbers,
  compareStrings,
  compareStringsIgnoreCase,
  naturalOrder,
  reverse,
} from './comparators'
import { mergeSort } from './sort/merge-sort'

/**
 * Registry mapping comparator names to their implementations.
 * Element types are erased here; callers name the type on lookup.
 */
const comparatorRegistry = new Map<string, Comparator<never>>()

/**
 * Built-in comparators registered when the module loads.
 */
const BUILT_IN_COMPARATORS: ReadonlyArray<[string, Comparator<never>]> = [
  ['number', compareNumbers],
  ['number:desc', reverse(compareNumbers)],
  ['string', compareStrings],
  ['string:desc', reverse(compareStrings)],
  ['string:ci', compareStringsIgnoreCase],
  ['bigint', compareBigInts],
  ['boolean', compareBooleans],
  ['date', compareDates],
  ['date:desc', reverse(compareDates)],
  ['natural', naturalOrder],
]

/**
 * Registers a comparator under a name.
 * If a comparator with the same name already exists, it will be overwritten
 * and a warning will be logged.
 *
 * @param name - Unique identifier for the comparator
 * @param compare - The comparator to register
 * @throws {InvalidParameterError} If the name is empty or `compare` is not a function
 *
 * @example
 * ```typescript
 * registerComparator('length', (a: string, b: string) => a.length - b.length)
 * sortBy(['ccc', 'a', 'bb'], 'length') // ['a', 'bb', 'ccc']
 * ```
 */
export function registerComparator<A>(name: string, compare: Comparator<A>): void {
  requireNonEmptyString(name, 'name')
  requireFunction(compare, 'compare')

  if (comparatorRegistry.has(name)) {
    console.warn(
      `Comparator '${name}' is already registered. Overwriting with new implementation.`
    )
  }
  comparatorRegistry.set(name, compare)
}

/**
 * Retrieves a registered comparator by name.
 *
 * The registry does not know element types: `A` is the caller's claim about
 * what the comparator accepts.
 *
 * @throws {UnknownComparatorError} If no comparator has that name
 */
export function getComparator<A>(name: string): Comparator<A> {
  const compare = comparatorRegistry.get(name)
  if (!compare) {
    throw new UnknownComparatorError(name, listComparators())
  }
  return compare as Comparator<A>
}

export function hasComparator(name: string): boolean {
  return comparatorRegistry.has(name)
}

/**
 * Lists all registered comparator names in registration order.
 */
export function listComparators(): string[] {
  return Array.from(comparatorRegistry.keys())
}

/**
 * Removes a comparator from the registry.
 *
 * @returns True if the comparator was removed, false if it wasn't registered
 */
export function unregisterComparator(name: string): boolean {
  return comparatorRegistry.delete(name)
}

/**
 * Clears all registered comparators, built-ins included.
 * Primarily useful for testing.
 *
 * @internal
 */
export function clearComparators(): void {
  comparatorRegistry.clear()
}

/**
 * (Re-)registers the built-in comparators, replacing any custom comparator
 * registered under a built-in name.
 */
export function registerBuiltInComparators(): void {
  for (const [name, compare] of BUILT_IN_COMPARATORS) {
    comparatorRegistry.set(name, compare)
  }
}

/**
 * Sorts with a registered comparator.
 *
 * @example
 * ```typescript
 * sortBy([3, 1, 2], 'number:desc') // [3, 2, 1]
 * ```
 */
export function sortBy<A>(
  xs: ReadonlyArray<A>,
  name: string,
  options?: MergeSortOptions
): A[] {
  return mergeSort(xs, getComparator<A>(name), options)
}

registerBuiltInComparators()
