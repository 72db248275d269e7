import type { DebugLogEntry, EmpDeptQueries, QueryResult } from '@emp-dept/validation'
import { validateFixtures } from '@emp-dept/validation'
import { debugEntry, withDebugLog } from './debug/logger.js'
import type { FixtureStore } from './fixtures/store.js'
import { readFixtures, staticFixtures } from './fixtures/store.js'
import { average, count } from './operators/group.js'
import { from } from './sequence.js'

export interface CreateEmpDeptQueriesOptions {
  /** Defaults to `staticFixtures()` over the built-in sample data. */
  readonly store?: FixtureStore | undefined
  /** Attach a `debugLog` to every result. */
  readonly debug?: boolean | undefined
}

/**
 * In-memory EmpDeptQueries over a FixtureStore.
 *
 * The store is validated once up front; inconsistent fixtures throw
 * `FixtureError` instead of producing silently wrong grade matches.
 */
export function createEmpDeptQueries(options: CreateEmpDeptQueriesOptions = {}): EmpDeptQueries {
  const store = options.store ?? staticFixtures()
  const debug = options.debug === true

  const t0 = Date.now()
  const fixtures = readFixtures(store)
  const fErr = validateFixtures(fixtures)
  if (fErr !== null) throw fErr
  const fixturesMs = Date.now() - t0

  // Each result gets its own entry so one caller's log never aliases another's.
  const fixturesEntry = (): DebugLogEntry =>
    debugEntry('fixtures', 'Fixtures validated', fixturesMs, {
      employees: fixtures.employees.length,
      departments: fixtures.departments.length,
      salaryGrades: fixtures.salaryGrades.length,
    })

  function run<T>(name: string, query: () => readonly T[]): QueryResult<T> {
    const log: DebugLogEntry[] = debug ? [fixturesEntry()] : []
    const t1 = Date.now()
    const rows = query()
    const executionMs = Date.now() - t1
    if (debug) log.push(debugEntry('query', name, executionMs, { rowCount: rows.length }))
    return withDebugLog({ rows, meta: { source: 'memory', rowCount: rows.length, executionMs } }, debug, log)
  }

  return {
    async employeesByJob(job) {
      return run('employeesByJob', () =>
        from(store.employees())
          .where((e) => e.job === job)
          .toArray(),
      )
    },

    async departmentEmployeesBySalary(deptNo) {
      return run('departmentEmployeesBySalary', () =>
        from(store.employees())
          .where((e) => e.deptNo === deptNo)
          .orderBy((e) => e.sal, 'desc')
          .toArray(),
      )
    },

    async employeesInLocation(loc) {
      return run('employeesInLocation', () => {
        const deptNos = from(store.departments())
          .where((d) => d.loc === loc)
          .project((d) => d.deptNo)
          .toArray()
        return from(store.employees())
          .whereIn((e) => e.deptNo, deptNos)
          .toArray()
      })
    },

    async namesAndSalaries() {
      return run('namesAndSalaries', () =>
        from(store.employees())
          .project((e) => ({ ename: e.ename, sal: e.sal }))
          .toArray(),
      )
    },

    async employeeDepartments() {
      return run('employeeDepartments', () =>
        from(store.employees())
          .innerJoin(
            store.departments(),
            (e) => e.deptNo,
            (d) => d.deptNo,
            (e, d) => ({ ename: e.ename, sal: e.sal, dname: d.dname }),
          )
          .toArray(),
      )
    },

    async headcountByDepartment() {
      return run('headcountByDepartment', () =>
        from(store.employees())
          .groupAggregate((e) => e.deptNo, count())
          .project((g) => ({ deptNo: g.key, count: g.value }))
          .toArray(),
      )
    },

    async commissionedEmployees() {
      return run('commissionedEmployees', () =>
        from(store.employees())
          .whereNotNull('comm')
          .project((e) => ({ ename: e.ename, comm: e.comm }))
          .toArray(),
      )
    },

    async employeeGrades() {
      return run('employeeGrades', () =>
        from(store.employees())
          .rangeJoin(
            store.salaryGrades(),
            { value: (e) => e.sal, low: (s) => s.losal, high: (s) => s.hisal },
            (e, s) => ({ ename: e.ename, grade: s.grade }),
          )
          .toArray(),
      )
    },

    async averageSalaryByDepartment() {
      return run('averageSalaryByDepartment', () =>
        from(store.employees())
          .groupAggregate(
            (e) => e.deptNo,
            average((e) => e.sal),
          )
          .whereNotNull('value')
          .project((g) => ({ deptNo: g.key, avgSal: g.value }))
          .toArray(),
      )
    },

    async aboveDepartmentAverage() {
      return run('aboveDepartmentAverage', () =>
        from(store.employees())
          .whereCorrelated({
            groupBy: (e) => e.deptNo,
            aggregate: average((e) => e.sal),
            value: (e) => e.sal,
            operator: '>',
          })
          .project((e) => ({ ename: e.ename }))
          .toArray(),
      )
    },

    async close() {},
  }
}
