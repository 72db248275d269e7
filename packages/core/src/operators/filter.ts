// --- Comparison ---

export type Comparable = number | string

/**
 * Values usable as grouping, join and membership keys. Keys are matched by
 * value, so records and arrays are not accepted; encode a composite key as a
 * string such as `${e.deptNo}:${e.job}`.
 */
export type Key = string | number | boolean | bigint | null | undefined

export type ComparisonOperator = '=' | '!=' | '>' | '>=' | '<' | '<='

/**
 * Total order over two values of the same kind. Mixed number/string pairs
 * fall back to string order.
 */
export function compareValues(a: Comparable, b: Comparable): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  const x = String(a)
  const y = String(b)
  return x < y ? -1 : x > y ? 1 : 0
}

/**
 * Applies a comparison operator with SQL null semantics: a `null` or
 * `undefined` operand never matches, not even under `=` or `!=`.
 */
export function compare(
  operator: ComparisonOperator,
  left: Comparable | null | undefined,
  right: Comparable | null | undefined,
): boolean {
  if (left === null || left === undefined || right === null || right === undefined) return false
  const c = compareValues(left, right)
  switch (operator) {
    case '=':
      return c === 0
    case '!=':
      return c !== 0
    case '>':
      return c > 0
    case '>=':
      return c >= 0
    case '<':
      return c < 0
    case '<=':
      return c <= 0
  }
}

// --- Filters ---

export function where<T>(rows: readonly T[], predicate: (row: T) => boolean): T[] {
  return rows.filter((row) => predicate(row))
}

export type WithRequired<T, K extends keyof T> = T & { [P in K]-?: NonNullable<T[P]> }

/** Rows whose `field` holds a value. `0` and `''` count as values. */
export function whereNotNull<T, K extends keyof T>(rows: readonly T[], field: K): WithRequired<T, K>[] {
  return rows.filter((row): row is WithRequired<T, K> => row[field] !== null && row[field] !== undefined)
}

/** Rows whose `field` is `null` or `undefined`. */
export function whereNull<T, K extends keyof T>(rows: readonly T[], field: K): T[] {
  return rows.filter((row) => row[field] === null || row[field] === undefined)
}

/**
 * `WHERE key IN (...)`. The key list is materialized once, so it may be the
 * result of an earlier query. A `null` or `undefined` key never matches, even
 * when the list holds one.
 */
export function whereIn<T, K extends Key>(rows: readonly T[], key: (row: T) => K, keys: Iterable<K>): T[] {
  const members = new Set<K>()
  for (const k of keys) {
    if (k !== null && k !== undefined) members.add(k)
  }
  if (members.size === 0) return []
  return rows.filter((row) => {
    const k = key(row)
    return k !== null && k !== undefined && members.has(k)
  })
}
