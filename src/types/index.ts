export { Ordering } from './ordering'
export type {
  Comparator,
  Ordered,
  SortOrder,
  NullPlacement,
  TieBreak,
  MergeSortOptions,
} from './ordering'
