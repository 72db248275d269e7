export type { EmpDeptClient, EmpDeptParam, PostgresConfig } from './client.js'
export { createEmpDeptClient } from './client.js'
export type { PostgresQueriesOptions } from './queries.js'
export { createPostgresQueries, openPostgresQueries } from './queries.js'
export type { EmpDeptQueryName } from './sql.js'
export { EMP_DEPT_SCHEMA, EMP_DEPT_SQL } from './sql.js'
