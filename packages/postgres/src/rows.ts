import type { Employee } from '@emp-dept/query'
import { ExecutionError } from '@emp-dept/query'

// --- Column Readers ---

function describeValue(value: unknown): string {
  return value === null ? 'null' : typeof value
}

function invalid(table: string, column: string, expected: string, value: unknown): ExecutionError {
  return new ExecutionError({ code: 'INVALID_ROW', table, column, expected, actual: describeValue(value) })
}

export function readString(row: Record<string, unknown>, table: string, column: string): string {
  const value = row[column]
  if (typeof value !== 'string') throw invalid(table, column, 'string', value)
  return value
}

export function readNumber(row: Record<string, unknown>, table: string, column: string): number {
  const value = row[column]
  if (typeof value !== 'number' || Number.isNaN(value)) throw invalid(table, column, 'number', value)
  return value
}

/** SQL NULL stays `null`; it is never coerced to `0`. */
export function readNullableNumber(row: Record<string, unknown>, table: string, column: string): number | null {
  const value = row[column]
  if (value === null || value === undefined) return null
  return readNumber(row, table, column)
}

// --- Row Decoders ---

export function toEmployee(row: Record<string, unknown>): Employee {
  return {
    ename: readString(row, 'emp', 'ename'),
    job: readString(row, 'emp', 'job'),
    deptNo: readNumber(row, 'emp', 'deptNo'),
    sal: readNumber(row, 'emp', 'sal'),
    comm: readNullableNumber(row, 'emp', 'comm'),
  }
}
