import { describe, expect, it } from 'vitest'
import { compare, compareValues, where, whereIn, whereNotNull, whereNull } from '../src/operators/filter.js'
import {
  average,
  count,
  groupAggregate,
  groupBy,
  max,
  min,
  sum,
  whereCorrelated,
} from '../src/operators/group.js'
import { innerJoin, rangeJoin } from '../src/operators/join.js'
import { orderBy } from '../src/operators/order.js'
import { project } from '../src/operators/projection.js'

// --- Fixtures ---

interface Row {
  name: string
  dept: number
  pay: number
  bonus: number | null
}

const rows: readonly Row[] = [
  { name: 'a', dept: 1, pay: 100, bonus: null },
  { name: 'b', dept: 2, pay: 300, bonus: 0 },
  { name: 'c', dept: 1, pay: 200, bonus: 50 },
  { name: 'd', dept: 3, pay: 300, bonus: null },
  { name: 'e', dept: 2, pay: 100, bonus: 10 },
]

const names = (list: readonly { name: string }[]): string[] => list.map((r) => r.name)

// --- compare ---

describe('compare', () => {
  it('orders numbers numerically', () => {
    expect(compareValues(9, 10)).toBe(-1)
    expect(compareValues(10, 9)).toBe(1)
    expect(compareValues(1.5, 1.5)).toBe(0)
  })

  it('orders strings lexically', () => {
    expect(compareValues('ALLEN', 'WARD')).toBe(-1)
  })

  it('applies each operator', () => {
    expect(compare('=', 1, 1)).toBe(true)
    expect(compare('!=', 1, 2)).toBe(true)
    expect(compare('>', 2, 1)).toBe(true)
    expect(compare('>=', 1, 1)).toBe(true)
    expect(compare('<', 1, 2)).toBe(true)
    expect(compare('<=', 2, 1)).toBe(false)
  })

  it('never matches a null operand', () => {
    expect(compare('=', null, null)).toBe(false)
    expect(compare('!=', null, 0)).toBe(false)
    expect(compare('<', 0, undefined)).toBe(false)
  })
})

// --- Filters ---

describe('where', () => {
  it('keeps matching rows in input order', () => {
    expect(names(where(rows, (r) => r.pay >= 200))).toEqual(['b', 'c', 'd'])
  })

  it('is sound and complete', () => {
    const predicate = (r: Row): boolean => r.dept === 1
    const result = where(rows, predicate)
    expect(result.every(predicate)).toBe(true)
    expect(result).toHaveLength(rows.filter(predicate).length)
  })

  it('returns [] for empty input', () => {
    expect(where([], () => true)).toEqual([])
  })

  it('does not mutate the input', () => {
    const copy = [...rows]
    where(rows, () => false)
    expect(rows).toEqual(copy)
  })
})

describe('whereNull / whereNotNull', () => {
  it('treats 0 as a value, not as absent', () => {
    expect(names(whereNotNull(rows, 'bonus'))).toEqual(['b', 'c', 'e'])
    expect(names(whereNull(rows, 'bonus'))).toEqual(['a', 'd'])
  })

  it('narrows the field type', () => {
    const total = whereNotNull(rows, 'bonus').reduce((acc, r) => acc + r.bonus, 0)
    expect(total).toBe(60)
  })
})

describe('whereIn', () => {
  it('keeps rows whose key is in the set', () => {
    expect(names(whereIn(rows, (r) => r.dept, [2, 3]))).toEqual(['b', 'd', 'e'])
  })

  it('accepts any iterable of keys', () => {
    expect(names(whereIn(rows, (r) => r.dept, new Set([1])))).toEqual(['a', 'c'])
  })

  it('returns [] for an empty key list', () => {
    expect(whereIn(rows, (r) => r.dept, [])).toEqual([])
  })

  it('returns [] for keys that match nothing', () => {
    expect(whereIn(rows, (r) => r.dept, [99])).toEqual([])
  })

  it('never matches a null key, even when the list holds null', () => {
    expect(names(whereIn(rows, (r) => r.bonus, [null, 0]))).toEqual(['b'])
  })

  it('returns [] when the list holds only null', () => {
    expect(whereIn(rows, (r) => r.bonus, [null])).toEqual([])
  })
})

// --- orderBy ---

describe('orderBy', () => {
  it('sorts ascending by default', () => {
    expect(orderBy(rows, (r) => r.pay).map((r) => r.pay)).toEqual([100, 100, 200, 300, 300])
  })

  it('descending result is non-increasing', () => {
    const result = orderBy(rows, (r) => r.pay, 'desc')
    for (let i = 1; i < result.length; i++) {
      const prev = result[i - 1]
      const cur = result[i]
      if (prev === undefined || cur === undefined) continue
      expect(prev.pay).toBeGreaterThanOrEqual(cur.pay)
    }
  })

  it('keeps ties in input order in both directions', () => {
    expect(names(orderBy(rows, (r) => r.pay))).toEqual(['a', 'e', 'c', 'b', 'd'])
    expect(names(orderBy(rows, (r) => r.pay, 'desc'))).toEqual(['b', 'd', 'c', 'a', 'e'])
  })

  it('sorts null keys last', () => {
    expect(names(orderBy(rows, (r) => r.bonus, 'desc'))).toEqual(['c', 'e', 'b', 'a', 'd'])
    expect(names(orderBy(rows, (r) => r.bonus))).toEqual(['b', 'e', 'c', 'a', 'd'])
  })

  it('returns a new array', () => {
    const result = orderBy(rows, (r) => r.name)
    expect(result).not.toBe(rows)
    expect(names(rows)).toEqual(['a', 'b', 'c', 'd', 'e'])
  })
})

// --- project ---

describe('project', () => {
  it('builds records holding only the selected fields', () => {
    expect(project(rows.slice(0, 2), (r) => ({ name: r.name, pay: r.pay }))).toEqual([
      { name: 'a', pay: 100 },
      { name: 'b', pay: 300 },
    ])
  })

  it('passes the row index', () => {
    expect(project(rows.slice(0, 3), (_r, i) => i)).toEqual([0, 1, 2])
  })
})

// --- Joins ---

interface Unit {
  id: number
  label: string
}

const units: readonly Unit[] = [
  { id: 1, label: 'one' },
  { id: 2, label: 'two' },
  { id: 2, label: 'deux' },
  { id: 4, label: 'four' },
]

describe('innerJoin', () => {
  const joined = innerJoin(
    rows,
    units,
    (r) => r.dept,
    (u) => u.id,
    (r, u) => ({ name: r.name, dept: r.dept, id: u.id, label: u.label }),
  )

  it('emits one record per matching pair in left-then-right order', () => {
    expect(joined.map((j) => `${j.name}:${j.label}`)).toEqual(['a:one', 'b:two', 'b:deux', 'c:one', 'e:two', 'e:deux'])
  })

  it('drops unmatched rows on both sides', () => {
    expect(joined.some((j) => j.name === 'd')).toBe(false)
    expect(joined.some((j) => j.id === 4)).toBe(false)
  })

  it('every output satisfies the key equality and size bound', () => {
    expect(joined.length).toBeLessThanOrEqual(rows.length * units.length)
    for (const j of joined) {
      expect(j.dept).toBe(j.id)
    }
  })

  it('never matches null keys', () => {
    const result = innerJoin(
      rows,
      [{ bonus: null }, { bonus: 0 }],
      (r) => r.bonus,
      (x) => x.bonus,
      (r) => r.name,
    )
    expect(result).toEqual(['b'])
  })

  it('matches string-encoded composite keys by value', () => {
    const result = innerJoin(
      rows,
      [{ dept: 2, pay: 300, tag: 'x' }],
      (r) => `${r.dept}:${r.pay}`,
      (x) => `${x.dept}:${x.pay}`,
      (r, x) => `${r.name}:${x.tag}`,
    )
    expect(result).toEqual(['b:x'])
  })

  it('returns [] when either side is empty', () => {
    expect(innerJoin([], units, () => 1, (u) => u.id, () => 0)).toEqual([])
    expect(innerJoin(rows, [], (r) => r.dept, () => 1, () => 0)).toEqual([])
  })
})

describe('rangeJoin', () => {
  const bands = [
    { tier: 'low', from: 0, to: 150 },
    { tier: 'mid', from: 150, to: 250 },
    { tier: 'top', from: 250, to: 300 },
  ]
  const band = {
    value: (r: Row) => r.pay,
    low: (b: (typeof bands)[number]) => b.from,
    high: (b: (typeof bands)[number]) => b.to,
  }

  it('matches inclusive bounds', () => {
    const result = rangeJoin(rows, bands, band, (r, b) => `${r.name}:${b.tier}`)
    expect(result).toEqual(['a:low', 'b:top', 'c:mid', 'd:top', 'e:low'])
  })

  it('emits a row once per band it falls into', () => {
    const edge: Row[] = [{ name: 'x', dept: 0, pay: 150, bonus: null }]
    expect(rangeJoin(edge, bands, band, (_r, b) => b.tier)).toEqual(['low', 'mid'])
  })

  it('drops a row that falls into no band', () => {
    const high: Row[] = [{ name: 'y', dept: 0, pay: 301, bonus: null }]
    expect(rangeJoin(high, bands, band, (r) => r.name)).toEqual([])
  })

  it('skips null values', () => {
    const result = rangeJoin(rows, bands, { ...band, value: (r: Row) => r.bonus }, (r) => r.name)
    expect(result).toEqual(['b', 'c', 'e'])
  })
})

// --- Aggregates ---

describe('aggregates', () => {
  it('count is the row count', () => {
    expect(count<Row>()(rows)).toBe(5)
    expect(count<Row>()([])).toBe(0)
  })

  it('ignore null values', () => {
    const bonus = (r: Row): number | null => r.bonus
    expect(sum(bonus)(rows)).toBe(60)
    expect(average(bonus)(rows)).toBe(20)
    expect(min(bonus)(rows)).toBe(0)
    expect(max(bonus)(rows)).toBe(50)
  })

  it('return null with no values', () => {
    const pay = (r: Row): number => r.pay
    expect(sum(pay)([])).toBeNull()
    expect(average(pay)([])).toBeNull()
    expect(min(pay)([])).toBeNull()
    expect(max(pay)([])).toBeNull()
  })

  it('average is not truncated', () => {
    expect(average((n: number) => n)([1, 2])).toBe(1.5)
  })
})

// --- groupBy ---

describe('groupBy', () => {
  it('groups in order of first key occurrence', () => {
    const groups = groupBy(rows, (r) => r.dept)
    expect(groups.map((g) => g.key)).toEqual([1, 2, 3])
    expect(groups.map((g) => names(g.rows))).toEqual([['a', 'c'], ['b', 'e'], ['d']])
  })

  it('group counts sum to the input length', () => {
    const counts = groupAggregate(rows, (r) => r.dept, count())
    expect(counts.reduce((acc, g) => acc + g.value, 0)).toBe(rows.length)
  })

  it('computes one aggregate per group', () => {
    expect(groupAggregate(rows, (r) => r.dept, average((r) => r.pay))).toEqual([
      { key: 1, value: 150 },
      { key: 2, value: 200 },
      { key: 3, value: 300 },
    ])
  })

  it('groups on a string-encoded composite key by value', () => {
    const groups = groupBy(rows, (r) => `${r.dept}:${r.bonus === null ? 'none' : 'paid'}`)
    expect(groups.map((g) => g.key)).toEqual(['1:none', '2:paid', '1:paid', '3:none'])
    expect(groups.map((g) => names(g.rows))).toEqual([['a'], ['b', 'e'], ['c'], ['d']])
  })

  it('collects null keys into one group', () => {
    const groups = groupBy(rows, (r) => r.bonus)
    expect(groups.map((g) => g.key)).toEqual([null, 0, 50, 10])
    expect(names(groups[0]?.rows ?? [])).toEqual(['a', 'd'])
  })

  it('returns [] for empty input', () => {
    expect(groupBy([], (r: Row) => r.dept)).toEqual([])
  })
})

// --- whereCorrelated ---

describe('whereCorrelated', () => {
  it('compares each row with its own group aggregate', () => {
    const result = whereCorrelated(rows, {
      groupBy: (r) => r.dept,
      aggregate: average((r) => r.pay),
      value: (r) => r.pay,
      operator: '>',
    })
    expect(names(result)).toEqual(['b', 'c'])
  })

  it('keeps a single-row group under >=', () => {
    const result = whereCorrelated(rows, {
      groupBy: (r) => r.dept,
      aggregate: max((r) => r.pay),
      value: (r) => r.pay,
      operator: '>=',
    })
    expect(names(result)).toEqual(['b', 'c', 'd'])
  })

  it('drops rows whose group aggregate is null', () => {
    const result = whereCorrelated(rows, {
      groupBy: (r) => r.dept,
      aggregate: average((r) => r.bonus),
      value: (r) => r.pay,
      operator: '>',
    })
    expect(names(result)).toEqual(['a', 'b', 'c', 'e'])
  })
})
