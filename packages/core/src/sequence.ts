import type { Comparable, Key, WithRequired } from './operators/filter.js'
import { where, whereIn, whereNotNull, whereNull } from './operators/filter.js'
import type { Aggregate, CorrelatedCondition, Group, GroupValue } from './operators/group.js'
import { groupAggregate, groupBy, whereCorrelated } from './operators/group.js'
import type { RangeBand } from './operators/join.js'
import { innerJoin, rangeJoin } from './operators/join.js'
import type { SortDirection } from './operators/order.js'
import { orderBy } from './operators/order.js'
import { project } from './operators/projection.js'

/**
 * Chainable view over an ordered, read-only row list. Every step returns a
 * new sequence; the source rows are never touched.
 */
export class Sequence<T> {
  private readonly rows: readonly T[]

  constructor(rows: readonly T[]) {
    this.rows = rows
  }

  where(predicate: (row: T) => boolean): Sequence<T> {
    return new Sequence(where(this.rows, predicate))
  }

  whereNull<K extends keyof T>(field: K): Sequence<T> {
    return new Sequence(whereNull(this.rows, field))
  }

  whereNotNull<K extends keyof T>(field: K): Sequence<WithRequired<T, K>> {
    return new Sequence(whereNotNull(this.rows, field))
  }

  whereIn<K extends Key>(key: (row: T) => K, keys: Iterable<K>): Sequence<T> {
    return new Sequence(whereIn(this.rows, key, keys))
  }

  whereCorrelated<K extends Key>(condition: CorrelatedCondition<T, K>): Sequence<T> {
    return new Sequence(whereCorrelated(this.rows, condition))
  }

  orderBy(key: (row: T) => Comparable | null | undefined, direction: SortDirection = 'asc'): Sequence<T> {
    return new Sequence(orderBy(this.rows, key, direction))
  }

  project<R>(projection: (row: T, index: number) => R): Sequence<R> {
    return new Sequence(project(this.rows, projection))
  }

  innerJoin<R, K extends Key, O>(
    right: readonly R[],
    leftKey: (row: T) => K,
    rightKey: (row: R) => K,
    combine: (left: T, right: R) => O,
  ): Sequence<O> {
    return new Sequence(innerJoin(this.rows, right, leftKey, rightKey, combine))
  }

  rangeJoin<R, O>(right: readonly R[], band: RangeBand<T, R>, combine: (left: T, right: R) => O): Sequence<O> {
    return new Sequence(rangeJoin(this.rows, right, band, combine))
  }

  groupBy<K extends Key>(key: (row: T) => K): Sequence<Group<K, T>> {
    return new Sequence(groupBy(this.rows, key))
  }

  groupAggregate<K extends Key, A>(key: (row: T) => K, aggregate: Aggregate<T, A>): Sequence<GroupValue<K, A>> {
    return new Sequence(groupAggregate(this.rows, key, aggregate))
  }

  first(): T | undefined {
    return this.rows[0]
  }

  count(): number {
    return this.rows.length
  }

  toArray(): T[] {
    return [...this.rows]
  }
}

export function from<T>(rows: readonly T[]): Sequence<T> {
  return new Sequence(rows)
}
