/**
 * Property-based tests for the merge sort invariants: permutation, ordering,
 * idempotence and the tie-break policies.
 */
import * as fc from 'fast-check'
import { describe, it, expect } from 'vitest'
import { mergeSort, isSorted } from '../../src/core/sort/merge-sort'
import {
  compareNumbers,
  compareStrings,
  composeLexicographic,
  comparing,
  descending,
} from '../../src/core/comparators'
import type { Comparator } from '../../src/types/ordering'

interface Item {
  key: number
  position: number
}

const byItemKey: Comparator<Item> = comparing((item: Item) => item.key)

/**
 * Small key range so that generated arrays contain many ties.
 */
const itemsArbitrary = fc
  .array(fc.integer({ min: 0, max: 5 }), { maxLength: 60 })
  .map((keys) => keys.map((key, position): Item => ({ key, position })))

function countBy<A>(xs: ReadonlyArray<A>): Map<A, number> {
  const counts = new Map<A, number>()
  for (const x of xs) {
    counts.set(x, (counts.get(x) ?? 0) + 1)
  }
  return counts
}

describe('mergeSort properties', () => {
  it('returns a permutation of the input', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), (xs) => {
        const sorted = mergeSort(xs, compareNumbers)

        expect(sorted).toHaveLength(xs.length)
        expect(countBy(sorted)).toEqual(countBy(xs))
      })
    )
  })

  it('orders every adjacent pair', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), (xs) => {
        const sorted = mergeSort(xs, compareNumbers)

        for (let i = 1; i < sorted.length; i++) {
          expect(compareNumbers(sorted[i - 1], sorted[i])).not.toBe(1)
        }
      })
    )
  })

  it('is idempotent', () => {
    fc.assert(
      fc.property(fc.array(fc.string()), (xs) => {
        const once = mergeSort(xs, compareStrings)

        expect(mergeSort(once, compareStrings)).toEqual(once)
      })
    )
  })

  it('does not mutate the input', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), (xs) => {
        const copy = [...xs]

        mergeSort(xs, descending(compareNumbers))

        expect(xs).toEqual(copy)
      })
    )
  })

  it('agrees with the built-in stable sort', () => {
    fc.assert(
      fc.property(itemsArbitrary, (items) => {
        const expected = [...items].sort(byItemKey)

        expect(mergeSort(items, byItemKey)).toEqual(expected)
      })
    )
  })

  it('is stable with the left tie-break', () => {
    fc.assert(
      fc.property(itemsArbitrary, (items) => {
        const sorted = mergeSort(items, byItemKey, { tieBreak: 'left' })

        for (let i = 1; i < sorted.length; i++) {
          if (sorted[i - 1].key === sorted[i].key) {
            expect(sorted[i - 1].position).toBeLessThan(sorted[i].position)
          }
        }
      })
    )
  })

  it('reverses equal elements with the right tie-break', () => {
    fc.assert(
      fc.property(itemsArbitrary, (items) => {
        const sorted = mergeSort(items, byItemKey, { tieBreak: 'right' })

        expect(isSorted(sorted, byItemKey)).toBe(true)
        for (let i = 1; i < sorted.length; i++) {
          if (sorted[i - 1].key === sorted[i].key) {
            expect(sorted[i - 1].position).toBeGreaterThan(sorted[i].position)
          }
        }
      })
    )
  })

  it('sorts pairs lexicographically', () => {
    const cmp = composeLexicographic(compareNumbers, compareStrings)

    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.integer({ min: -3, max: 3 }), fc.string())),
        (pairs) => {
          const sorted = mergeSort(pairs, cmp)

          for (let i = 1; i < sorted.length; i++) {
            const [prevKey, prevLabel] = sorted[i - 1]
            const [key, label] = sorted[i]
            expect(prevKey).toBeLessThanOrEqual(key)
            if (prevKey === key) {
              expect(compareStrings(prevLabel, label)).not.toBe(1)
            }
          }
        }
      )
    )
  })
})
