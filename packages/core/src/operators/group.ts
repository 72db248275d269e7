import type { ComparisonOperator, Key } from './filter.js'
import { compare } from './filter.js'

// --- Aggregates ---

export type Aggregate<T, A> = (rows: readonly T[]) => A

export function count<T>(): Aggregate<T, number> {
  return (rows) => rows.length
}

function present<T>(rows: readonly T[], selector: (row: T) => number | null): number[] {
  const values: number[] = []
  for (const row of rows) {
    const v = selector(row)
    if (v !== null) values.push(v)
  }
  return values
}

/** Sum of the non-null values, or `null` when there are none. */
export function sum<T>(selector: (row: T) => number | null): Aggregate<T, number | null> {
  return (rows) => {
    const values = present(rows, selector)
    if (values.length === 0) return null
    return values.reduce((acc, v) => acc + v, 0)
  }
}

/** Mean of the non-null values, or `null` when there are none. */
export function average<T>(selector: (row: T) => number | null): Aggregate<T, number | null> {
  return (rows) => {
    const values = present(rows, selector)
    if (values.length === 0) return null
    return values.reduce((acc, v) => acc + v, 0) / values.length
  }
}

export function min<T>(selector: (row: T) => number | null): Aggregate<T, number | null> {
  return (rows) => {
    const values = present(rows, selector)
    return values.length === 0 ? null : Math.min(...values)
  }
}

export function max<T>(selector: (row: T) => number | null): Aggregate<T, number | null> {
  return (rows) => {
    const values = present(rows, selector)
    return values.length === 0 ? null : Math.max(...values)
  }
}

// --- Group By ---

export interface Group<K, T> {
  readonly key: K
  readonly rows: readonly T[]
}

export interface GroupValue<K, A> {
  readonly key: K
  readonly value: A
}

/**
 * Partitions rows by key; groups come out in order of first key occurrence.
 * Keys compare by value (`SameValueZero`), so `null` forms a group of its own.
 */
export function groupBy<T, K extends Key>(rows: readonly T[], key: (row: T) => K): Group<K, T>[] {
  const groups = new Map<K, T[]>()
  for (const row of rows) {
    const k = key(row)
    const bucket = groups.get(k)
    if (bucket !== undefined) {
      bucket.push(row)
    } else {
      groups.set(k, [row])
    }
  }
  return [...groups].map(([k, members]) => ({ key: k, rows: members }))
}

/** `SELECT key, AGG(...) FROM rows GROUP BY key` */
export function groupAggregate<T, K extends Key, A>(
  rows: readonly T[],
  key: (row: T) => K,
  aggregate: Aggregate<T, A>,
): GroupValue<K, A>[] {
  return groupBy(rows, key).map((group) => ({ key: group.key, value: aggregate(group.rows) }))
}

// --- Correlated Filter ---

export interface CorrelatedCondition<T, K extends Key> {
  /** Correlation key: the subquery sees the rows sharing this key. */
  groupBy: (row: T) => K
  /** Scalar subquery evaluated over the row's group. */
  aggregate: Aggregate<T, number | null>
  /** Value of the outer row compared against the subquery result. */
  value: (row: T) => number | null
  operator: ComparisonOperator
}

/**
 * `WHERE value <op> (SELECT AGG(...) FROM rows r2 WHERE r2.key = row.key)`.
 * The subquery result is computed once per distinct key.
 */
export function whereCorrelated<T, K extends Key>(rows: readonly T[], condition: CorrelatedCondition<T, K>): T[] {
  const scalars = new Map<K, number | null>()
  for (const group of groupBy(rows, condition.groupBy)) {
    scalars.set(group.key, condition.aggregate(group.rows))
  }
  return rows.filter((row) =>
    compare(condition.operator, condition.value(row), scalars.get(condition.groupBy(row))),
  )
}
