/**
 * `SELECT` with a per-row projection. The projection builds a new record,
 * e.g. `(e) => ({ ename: e.ename, sal: e.sal })`.
 */
export function project<T, R>(rows: readonly T[], projection: (row: T, index: number) => R): R[] {
  return rows.map((row, index) => projection(row, index))
}
