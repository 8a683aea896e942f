import type {
  Comparator,
  MergeSortOptions,
  NullPlacement,
  SortOrder,
} from '../types/ordering'
import { Ordering } from '../types/ordering'
import { compareUnknown, reverse, thenBy } from '../core/comparators'
import { mergeSort } from '../core/sort/merge-sort'
import {
  BuilderSequenceError,
  requireFunction,
  requireOneOf,
} from '../utils/errors'

const SORT_ORDERS: readonly SortOrder[] = ['asc', 'desc']
const NULL_PLACEMENTS: readonly NullPlacement[] = ['first', 'last']

/**
 * Options for a single sort key.
 */
export interface SortKeyOptions<K> {
  /** Sort direction (default: 'asc') */
  order?: SortOrder
  /** Placement of null/undefined keys, regardless of order (default: 'last') */
  nulls?: NullPlacement
  /**
   * Order on present key values (default: natural order, with values it does
   * not cover sorted after all others)
   */
  compare?: Comparator<NonNullable<K>>
}

function placeNulls<K>(
  compare: Comparator<NonNullable<K>>,
  nulls: NullPlacement
): Comparator<K> {
  const absentFirst = nulls === 'first'
  return (a, b) => {
    if (a == null) {
      if (b == null) return Ordering.EqualTo
      return absentFirst ? Ordering.LessThan : Ordering.GreaterThan
    }
    if (b == null) {
      return absentFirst ? Ordering.GreaterThan : Ordering.LessThan
    }
    return compare(a, b)
  }
}

/**
 * Builder for multi-key orderings over records.
 * Keys are compared in the order they were added, most significant first.
 *
 * @example
 * ```typescript
 * const byAgeThenName = orderingFor<Person>()
 *   .by('age', { order: 'desc' })
 *   .by('name', { compare: compareStringsIgnoreCase })
 *   .build()
 *
 * mergeSort(people, byAgeThenName)
 * ```
 */
export class OrderingBuilder<T extends object> {
  private keys: Array<Comparator<T>> = []

  /**
   * Adds a sort key read from a record field.
   *
   * @param field - The field to sort by
   * @param options - Direction, null placement and key comparator
   * @returns This builder for chaining
   */
  by<F extends keyof T & string>(
    field: F,
    options: SortKeyOptions<T[F]> = {}
  ): this {
    return this.byKey((record: T) => record[field], options)
  }

  /**
   * Adds a sort key computed from each record.
   *
   * @param select - Computes the key of a record
   * @param options - Direction, null placement and key comparator
   * @returns This builder for chaining
   *
   * @example
   * ```typescript
   * orderingFor<Person>().byKey((p) => p.lastName.length, { order: 'desc' })
   * ```
   */
  byKey<K>(select: (record: T) => K, options: SortKeyOptions<K> = {}): this {
    requireFunction(select, 'select')
    const order = requireOneOf(options.order ?? 'asc', SORT_ORDERS, 'order')
    const nulls = requireOneOf(options.nulls ?? 'last', NULL_PLACEMENTS, 'nulls')

    const base: Comparator<NonNullable<K>> = options.compare ?? compareUnknown
    const directed = order === 'desc' ? reverse(base) : base
    const compareKeys = placeNulls<K>(directed, nulls)

    this.keys.push((a, b) => compareKeys(select(a), select(b)))
    return this
  }

  /**
   * Number of sort keys configured so far.
   */
  get size(): number {
    return this.keys.length
  }

  /**
   * Builds the lexicographic comparator over all configured keys.
   *
   * @throws {BuilderSequenceError} If no sort key was added
   */
  build(): Comparator<T> {
    if (this.keys.length === 0) {
      throw new BuilderSequenceError(
        'build',
        'at least one sort key must be added with by() or byKey()'
      )
    }
    return thenBy(...this.keys)
  }

  /**
   * Builds the comparator and sorts `records` with it.
   */
  sort(records: ReadonlyArray<T>, options?: MergeSortOptions): T[] {
    return mergeSort(records, this.build(), options)
  }
}

/**
 * Starts a new ordering over records of type `T`.
 */
export function orderingFor<T extends object>(): OrderingBuilder<T> {
  return new OrderingBuilder<T>()
}
