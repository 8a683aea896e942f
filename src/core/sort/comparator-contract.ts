import type { Comparator } from '../../types/ordering'
import { ComparatorContractError } from '../../utils/errors'

function sign(result: number): number {
  return result < 0 ? -1 : result > 0 ? 1 : 0
}

function requireFiniteResult(result: unknown, a: unknown, b: unknown): number {
  if (typeof result !== 'number' || !Number.isFinite(result)) {
    throw new ComparatorContractError(
      'non-numeric',
      a,
      b,
      `compare(a, b) returned ${String(result)}, expected a finite number`
    )
  }
  return result
}

/**
 * Wraps a comparator so that every comparison also checks the comparator
 * laws the merge sort relies on.
 *
 * Each call evaluates `compare(a, b)`, `compare(b, a)` and `compare(a, b)`
 * again, and throws {@link ComparatorContractError} when
 * - a result is not a finite number
 * - the two directions do not have opposite signs (antisymmetry)
 * - the repeated call changes sign (consistency)
 *
 * Only pairs the caller actually compares are checked, so a broken
 * comparator can still pass unnoticed. Transitivity is not checked.
 *
 * @example
 * ```typescript
 * const broken: Comparator<number> = () => 1
 * mergeSort([2, 1], checkedComparator(broken))
 * // throws ComparatorContractError (antisymmetry)
 * ```
 */
export function checkedComparator<A>(compare: Comparator<A>): Comparator<A> {
  return (a, b) => {
    const forward = requireFiniteResult(compare(a, b), a, b)
    const backward = requireFiniteResult(compare(b, a), b, a)

    if (sign(forward) !== -sign(backward)) {
      throw new ComparatorContractError(
        'antisymmetry',
        a,
        b,
        `compare(a, b) returned ${forward} but compare(b, a) returned ${backward}`
      )
    }

    const repeated = requireFiniteResult(compare(a, b), a, b)
    if (sign(repeated) !== sign(forward)) {
      throw new ComparatorContractError(
        'consistency',
        a,
        b,
        `compare(a, b) returned ${forward} and then ${repeated}`
      )
    }

    return forward
  }
}
