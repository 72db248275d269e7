import type { Key } from './filter.js'

/**
 * Equality inner join. Emits one record per matching (left, right) pair,
 * in left order and then right order. Rows without a partner are dropped,
 * and a `null` or `undefined` key never matches.
 */
export function innerJoin<L, R, K extends Key, O>(
  left: readonly L[],
  right: readonly R[],
  leftKey: (row: L) => K,
  rightKey: (row: R) => K,
  combine: (left: L, right: R) => O,
): O[] {
  const byKey = new Map<K, R[]>()
  for (const r of right) {
    const key = rightKey(r)
    if (key === null || key === undefined) continue
    const bucket = byKey.get(key)
    if (bucket !== undefined) {
      bucket.push(r)
    } else {
      byKey.set(key, [r])
    }
  }

  const out: O[] = []
  for (const l of left) {
    const key = leftKey(l)
    if (key === null || key === undefined) continue
    const matches = byKey.get(key)
    if (matches === undefined) continue
    for (const r of matches) {
      out.push(combine(l, r))
    }
  }
  return out
}

export interface RangeBand<L, R> {
  /** Scalar taken from the left row; `null` matches no band. */
  value: (row: L) => number | null
  /** Inclusive lower bound taken from the right row. */
  low: (row: R) => number
  /** Inclusive upper bound taken from the right row. */
  high: (row: R) => number
}

/**
 * `JOIN ... ON value BETWEEN low AND high`. A left row that falls into
 * several bands yields several records; one that falls into none yields none.
 */
export function rangeJoin<L, R, O>(
  left: readonly L[],
  right: readonly R[],
  band: RangeBand<L, R>,
  combine: (left: L, right: R) => O,
): O[] {
  const out: O[] = []
  for (const l of left) {
    const value = band.value(l)
    if (value === null) continue
    for (const r of right) {
      if (value >= band.low(r) && value <= band.high(r)) {
        out.push(combine(l, r))
      }
    }
  }
  return out
}
