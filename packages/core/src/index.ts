// Re-export all types from validation package
export type {
  DebugLogEntry,
  Department,
  DepartmentAverage,
  DepartmentCount,
  EmpDeptQueries,
  Employee,
  EmployeeCommission,
  EmployeeDepartment,
  EmployeeGrade,
  EmployeeName,
  ExecutionErrorDetails,
  FixtureData,
  FixtureErrorEntry,
  NameSalary,
  QueryResult,
  QueryResultMeta,
  QuerySource,
  SalaryGrade,
} from '@emp-dept/validation'
// Re-export validation functions and classes
export {
  ConnectionError,
  EmpDeptError,
  ExecutionError,
  FixtureError,
  validateFixtures,
} from '@emp-dept/validation'
// Debug
export { debugEntry, withDebugLog } from './debug/logger.js'
// Fixture Store
export { sampleData } from './fixtures/sampleData.js'
export type { FixtureStore } from './fixtures/store.js'
export { readFixtures, staticFixtures } from './fixtures/store.js'
// Operators
export type { Comparable, ComparisonOperator, Key, WithRequired } from './operators/filter.js'
export { compare, compareValues, where, whereIn, whereNotNull, whereNull } from './operators/filter.js'
export type { Aggregate, CorrelatedCondition, Group, GroupValue } from './operators/group.js'
export { average, count, groupAggregate, groupBy, max, min, sum, whereCorrelated } from './operators/group.js'
export type { RangeBand } from './operators/join.js'
export { innerJoin, rangeJoin } from './operators/join.js'
export type { SortDirection } from './operators/order.js'
export { orderBy } from './operators/order.js'
export { project } from './operators/projection.js'
// In-memory queries
export type { CreateEmpDeptQueriesOptions } from './queries.js'
export { createEmpDeptQueries } from './queries.js'
// Sequence
export { from, Sequence } from './sequence.js'
