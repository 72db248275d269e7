import type { Comparable } from './filter.js'
import { compareValues } from './filter.js'

export type SortDirection = 'asc' | 'desc'

interface SortEntry<T> {
  row: T
  index: number
  value: Comparable | null | undefined
}

/**
 * Stable sort on a derived key. Ties keep their input order in both
 * directions; `null` and `undefined` keys sort last.
 */
export function orderBy<T>(
  rows: readonly T[],
  key: (row: T) => Comparable | null | undefined,
  direction: SortDirection = 'asc',
): T[] {
  const sign = direction === 'desc' ? -1 : 1
  return rows
    .map((row, index): SortEntry<T> => ({ row, index, value: key(row) }))
    .sort((a, b) => {
      const c = compareKeys(a.value, b.value, sign)
      return c !== 0 ? c : a.index - b.index
    })
    .map((entry) => entry.row)
}

function compareKeys(a: Comparable | null | undefined, b: Comparable | null | undefined, sign: number): number {
  if (a === null || a === undefined) return b === null || b === undefined ? 0 : 1
  if (b === null || b === undefined) return -1
  return compareValues(a, b) * sign
}
