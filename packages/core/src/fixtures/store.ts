import type { Department, Employee, FixtureData, SalaryGrade } from '@emp-dept/validation'
import { sampleData } from './sampleData.js'

/**
 * Read-only access to the three tables. Every call returns the same
 * ordered rows.
 */
export interface FixtureStore {
  employees(): readonly Employee[]
  departments(): readonly Department[]
  salaryGrades(): readonly SalaryGrade[]
}

/**
 * Creates a FixtureStore over fixed data. Rows are copied and frozen,
 * so later changes to `data` do not leak in.
 */
export function staticFixtures(data: FixtureData = sampleData): FixtureStore {
  const employees = freezeRows(data.employees)
  const departments = freezeRows(data.departments)
  const salaryGrades = freezeRows(data.salaryGrades)
  return {
    employees: () => employees,
    departments: () => departments,
    salaryGrades: () => salaryGrades,
  }
}

/** Snapshot of a store's tables, e.g. for `validateFixtures`. */
export function readFixtures(store: FixtureStore): FixtureData {
  return {
    employees: store.employees(),
    departments: store.departments(),
    salaryGrades: store.salaryGrades(),
  }
}

function freezeRows<T extends object>(rows: readonly T[]): readonly Readonly<T>[] {
  return Object.freeze(rows.map((row) => Object.freeze({ ...row })))
}
