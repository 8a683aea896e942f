// Sorting
export {
  mergeSort,
  merge,
  isSorted,
  checkedComparator,
  DEFAULT_MERGE_SORT_OPTIONS,
} from './core/sort'

// Comparators
export {
  toOrdering,
  compareNumbers,
  compareStrings,
  compareStringsIgnoreCase,
  compareBigInts,
  compareBooleans,
  compareDates,
  naturalOrder,
  compareUnknown,
  reverse,
  descending,
  comparing,
  thenBy,
  composeLexicographic,
  lexicographic,
  nullsFirst,
  nullsLast,
  fromOrdered,
  type NaturalValue,
  type ComparatorsOf,
} from './core/comparators'

// Registry
export {
  registerComparator,
  getComparator,
  hasComparator,
  listComparators,
  unregisterComparator,
  clearComparators,
  registerBuiltInComparators,
  sortBy,
} from './core/registry'

// Builders
export {
  OrderingBuilder,
  orderingFor,
  type SortKeyOptions,
} from './builder/ordering-builder'

// Types
export { Ordering } from './types'
export type {
  Comparator,
  Ordered,
  SortOrder,
  NullPlacement,
  TieBreak,
  MergeSortOptions,
} from './types'

// Errors
export {
  SortkitError,
  InvalidParameterError,
  BuilderSequenceError,
  ComparatorContractError,
  UnknownComparatorError,
  isSortkitError,
  type ComparatorViolation,
} from './utils/errors'
