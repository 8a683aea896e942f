import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  registerComparator,
  getComparator,
  hasComparator,
  listComparators,
  unregisterComparator,
  clearComparators,
  registerBuiltInComparators,
  sortBy,
} from '../../src/core/registry'
import { compareNumbers } from '../../src/core/comparators'
import {
  InvalidParameterError,
  UnknownComparatorError,
} from '../../src/utils/errors'
import type { Comparator } from '../../src/types/ordering'

const BUILT_IN_NAMES = [
  'number',
  'number:desc',
  'string',
  'string:desc',
  'string:ci',
  'bigint',
  'boolean',
  'date',
  'date:desc',
  'natural',
]

describe('Comparator Registry', () => {
  beforeEach(() => {
    clearComparators()
    registerBuiltInComparators()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('built-in comparators', () => {
    it('registers the built-ins on load', () => {
      expect(listComparators()).toEqual(BUILT_IN_NAMES)
    })

    it('provides ascending and descending numbers', () => {
      expect(sortBy([3, 1, 2], 'number')).toEqual([1, 2, 3])
      expect(sortBy([3, 1, 2], 'number:desc')).toEqual([3, 2, 1])
    })

    it('provides string orders', () => {
      const words = ['pear', 'Apple', 'banana']

      expect(sortBy(words, 'string')).toEqual(['Apple', 'banana', 'pear'])
      expect(sortBy(words, 'string:desc')).toEqual(['pear', 'banana', 'Apple'])
      expect(sortBy(['b', 'A', 'a', 'B'], 'string:ci')).toEqual([
        'A',
        'a',
        'b',
        'B',
      ])
    })

    it('provides date orders', () => {
      const newer = new Date('2024-05-01T00:00:00Z')
      const older = new Date('2019-05-01T00:00:00Z')

      expect(sortBy([newer, older], 'date')).toEqual([older, newer])
      expect(sortBy([older, newer], 'date:desc')).toEqual([newer, older])
    })

    it('provides bigint, boolean and natural orders', () => {
      expect(sortBy([3n, -1n, 2n], 'bigint')).toEqual([-1n, 2n, 3n])
      expect(sortBy([true, false, true], 'boolean')).toEqual([false, true, true])
      expect(sortBy(['b', 2, 'a', 1], 'natural')).toEqual([1, 2, 'a', 'b'])
    })

    it('restores built-ins overwritten by custom comparators', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      registerComparator('number', reverseNumbers)

      registerBuiltInComparators()

      expect(sortBy([2, 1], 'number')).toEqual([1, 2])
    })
  })

  describe('registerComparator', () => {
    it('registers a comparator under a name', () => {
      const byLength: Comparator<string> = (a, b) => a.length - b.length
      registerComparator('length', byLength)

      expect(getComparator<string>('length')).toBe(byLength)
      expect(sortBy(['ccc', 'a', 'bb'], 'length')).toEqual(['a', 'bb', 'ccc'])
    })

    it('warns when overwriting an existing comparator', () => {
      const consoleWarnSpy = vi
        .spyOn(console, 'warn')
        .mockImplementation(() => {})

      registerComparator('custom', compareNumbers)
      registerComparator('custom', reverseNumbers)

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1)
      expect(consoleWarnSpy).toHaveBeenCalledWith(
        "Comparator 'custom' is already registered. Overwriting with new implementation."
      )
      expect(getComparator('custom')).toBe(reverseNumbers)
    })

    it('does not warn for a new name', () => {
      const consoleWarnSpy = vi
        .spyOn(console, 'warn')
        .mockImplementation(() => {})

      registerComparator('fresh', compareNumbers)

      expect(consoleWarnSpy).not.toHaveBeenCalled()
    })

    it('rejects empty names', () => {
      expect(() => registerComparator('', compareNumbers)).toThrow(
        InvalidParameterError
      )
      expect(() => registerComparator('   ', compareNumbers)).toThrow(
        "Invalid parameter 'name': must not be empty"
      )
    })

    it('rejects non-function comparators', () => {
      // @ts-expect-error - testing invalid input
      expect(() => registerComparator('broken', 42)).toThrow(
        "Invalid parameter 'compare': must be a function"
      )
    })
  })

  describe('getComparator', () => {
    it('throws for unknown names and lists what is available', () => {
      clearComparators()
      registerComparator('number', compareNumbers)

      expect(() => getComparator('missing')).toThrow(UnknownComparatorError)
      expect(() => getComparator('missing')).toThrow(
        "Unknown comparator 'missing'. Available comparators: number"
      )
    })
  })

  describe('hasComparator / unregisterComparator', () => {
    it('reports registered names', () => {
      expect(hasComparator('number')).toBe(true)
      expect(hasComparator('nope')).toBe(false)
    })

    it('removes a comparator', () => {
      expect(unregisterComparator('natural')).toBe(true)
      expect(hasComparator('natural')).toBe(false)
      expect(unregisterComparator('natural')).toBe(false)
    })
  })

  describe('clearComparators', () => {
    it('removes every comparator, built-ins included', () => {
      clearComparators()

      expect(listComparators()).toEqual([])
      expect(() => sortBy([1], 'number')).toThrow(UnknownComparatorError)
    })
  })

  describe('sortBy', () => {
    it('passes merge sort options through', () => {
      registerComparator('first-letter', (a: string, b: string) =>
        a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0
      )

      expect(sortBy(['ab', 'aa', 'b'], 'first-letter')).toEqual([
        'ab',
        'aa',
        'b',
      ])
      expect(
        sortBy(['ab', 'aa', 'b'], 'first-letter', { tieBreak: 'right' })
      ).toEqual(['aa', 'ab', 'b'])
    })
  })
})

function reverseNumbers(a: number, b: number): number {
  return compareNumbers(b, a)
}
