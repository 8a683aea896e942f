import { bench, describe } from 'vitest'
import { mergeSort } from '../src/core/sort/merge-sort'
import {
  compareNumbers,
  compareStrings,
  composeLexicographic,
} from '../src/core/comparators'

// Deterministic pseudo-random data (Park-Miller generator)
function generateNumbers(count: number, seed = 42): number[] {
  const values: number[] = []
  let state = seed
  for (let i = 0; i < count; i++) {
    state = (state * 16807) % 2147483647
    values.push(state % 100000)
  }
  return values
}

const small = generateNumbers(100)
const medium = generateNumbers(10_000)
const large = generateNumbers(100_000)
const presorted = [...medium].sort((a, b) => a - b)
const pairs = medium.map((n): [number, string] => [n % 100, `item-${n}`])
const byPair = composeLexicographic(compareNumbers, compareStrings)

describe('mergeSort vs Array.prototype.sort', () => {
  bench('mergeSort 100 numbers', () => {
    mergeSort(small, compareNumbers)
  })

  bench('Array.sort 100 numbers', () => {
    ;[...small].sort(compareNumbers)
  })

  bench('mergeSort 10k numbers', () => {
    mergeSort(medium, compareNumbers)
  })

  bench('Array.sort 10k numbers', () => {
    ;[...medium].sort(compareNumbers)
  })

  bench('mergeSort 100k numbers', () => {
    mergeSort(large, compareNumbers)
  })
})

describe('mergeSort input shapes', () => {
  bench('10k presorted numbers', () => {
    mergeSort(presorted, compareNumbers)
  })

  bench('10k pairs, lexicographic', () => {
    mergeSort(pairs, byPair)
  })

  bench('10k numbers with contract checking', () => {
    mergeSort(medium, compareNumbers, { verifyComparator: true })
  })
})
