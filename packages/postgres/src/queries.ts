import type { DebugLogEntry, EmpDeptQueries, QueryResult } from '@emp-dept/query'
import { debugEntry, withDebugLog } from '@emp-dept/query'
import type { EmpDeptClient, EmpDeptParam, PostgresConfig } from './client.js'
import { createEmpDeptClient } from './client.js'
import { readNumber, readString, toEmployee } from './rows.js'
import type { EmpDeptQueryName } from './sql.js'
import { EMP_DEPT_SQL } from './sql.js'

export interface PostgresQueriesOptions {
  /** Attach a `debugLog` with the SQL and timings to every result. */
  readonly debug?: boolean | undefined
}

// ── createPostgresQueries ──────────────────────────────────────

/** EmpDeptQueries over an EmpDeptClient. `close()` closes the client. */
export function createPostgresQueries(client: EmpDeptClient, options: PostgresQueriesOptions = {}): EmpDeptQueries {
  const debug = options.debug === true

  async function run<T>(
    name: EmpDeptQueryName,
    params: readonly EmpDeptParam[],
    decode: (row: Record<string, unknown>) => T,
  ): Promise<QueryResult<T>> {
    const log: DebugLogEntry[] = []
    const sql = EMP_DEPT_SQL[name]

    const t0 = Date.now()
    const raw = await client.query(name, params)
    const executionMs = Date.now() - t0
    if (debug) log.push(debugEntry('execution', name, executionMs, { sql, params }))

    const t1 = Date.now()
    const rows = raw.map((row) => decode(row))
    if (debug) log.push(debugEntry('decode', `Decoded ${rows.length} rows`, Date.now() - t1))

    return withDebugLog({ rows, meta: { source: 'postgres', rowCount: rows.length, executionMs } }, debug, log)
  }

  return {
    employeesByJob: (job) => run('employeesByJob', [job], toEmployee),
    departmentEmployeesBySalary: (deptNo) => run('departmentEmployeesBySalary', [deptNo], toEmployee),
    employeesInLocation: (loc) => run('employeesInLocation', [loc], toEmployee),
    namesAndSalaries: () =>
      run('namesAndSalaries', [], (row) => ({
        ename: readString(row, 'emp', 'ename'),
        sal: readNumber(row, 'emp', 'sal'),
      })),
    employeeDepartments: () =>
      run('employeeDepartments', [], (row) => ({
        ename: readString(row, 'emp', 'ename'),
        sal: readNumber(row, 'emp', 'sal'),
        dname: readString(row, 'dept', 'dname'),
      })),
    headcountByDepartment: () =>
      run('headcountByDepartment', [], (row) => ({
        deptNo: readNumber(row, 'emp', 'deptNo'),
        count: readNumber(row, 'emp', 'count'),
      })),
    commissionedEmployees: () =>
      run('commissionedEmployees', [], (row) => ({
        ename: readString(row, 'emp', 'ename'),
        comm: readNumber(row, 'emp', 'comm'),
      })),
    employeeGrades: () =>
      run('employeeGrades', [], (row) => ({
        ename: readString(row, 'emp', 'ename'),
        grade: readNumber(row, 'salgrade', 'grade'),
      })),
    averageSalaryByDepartment: () =>
      run('averageSalaryByDepartment', [], (row) => ({
        deptNo: readNumber(row, 'emp', 'deptNo'),
        avgSal: readNumber(row, 'emp', 'avgSal'),
      })),
    aboveDepartmentAverage: () =>
      run('aboveDepartmentAverage', [], (row) => ({
        ename: readString(row, 'emp', 'ename'),
      })),
    close: () => client.close(),
  }
}

/**
 * Connects, checks the schema and returns the queries. The pool is closed
 * again when the check fails.
 */
export async function openPostgresQueries(
  config: PostgresConfig,
  options: PostgresQueriesOptions = {},
): Promise<EmpDeptQueries> {
  const client = createEmpDeptClient(config)
  try {
    await client.verifySchema()
  } catch (err) {
    await client.close()
    throw err
  }
  return createPostgresQueries(client, options)
}
