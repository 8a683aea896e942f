export {
  mergeSort,
  merge,
  isSorted,
  DEFAULT_MERGE_SORT_OPTIONS,
} from './merge-sort'
export { checkedComparator } from './comparator-contract'
