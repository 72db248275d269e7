// Errors
export type { ConnectionErrorDetails, ExecutionErrorDetails, FixtureErrorEntry } from './errors.js'
export { ConnectionError, EmpDeptError, ExecutionError, FixtureError } from './errors.js'

// Fixture validation
export { validateFixtures } from './fixtureValidation.js'

// Types — records
export type { Department, Employee, FixtureData, SalaryGrade } from './types/records.js'
// Types — result
export type {
  DebugLogEntry,
  DepartmentAverage,
  DepartmentCount,
  EmployeeCommission,
  EmployeeDepartment,
  EmployeeGrade,
  EmployeeName,
  NameSalary,
  QueryResult,
  QueryResultMeta,
  QuerySource,
} from './types/result.js'
// Types — queries
export type { EmpDeptQueries } from './types/queries.js'
