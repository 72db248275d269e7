// ── Statements ─────────────────────────────────────────────────

const EMP_COLUMNS = 'ename, job, deptno AS "deptNo", sal, comm'

/** Ordering by `empno` and `MIN(empno)` reproduces the in-memory row order. */
export const EMP_DEPT_SQL = {
  employeesByJob: `SELECT ${EMP_COLUMNS} FROM emp WHERE job = $1 ORDER BY empno`,
  departmentEmployeesBySalary: `SELECT ${EMP_COLUMNS} FROM emp WHERE deptno = $1 ORDER BY sal DESC, empno`,
  employeesInLocation: `SELECT ${EMP_COLUMNS} FROM emp WHERE deptno IN (SELECT deptno FROM dept WHERE loc = $1) ORDER BY empno`,
  namesAndSalaries: 'SELECT ename, sal FROM emp ORDER BY empno',
  employeeDepartments:
    'SELECT e.ename, e.sal, d.dname FROM emp e JOIN dept d ON e.deptno = d.deptno ORDER BY e.empno, d.deptno',
  headcountByDepartment: 'SELECT deptno AS "deptNo", COUNT(*) AS count FROM emp GROUP BY deptno ORDER BY MIN(empno)',
  commissionedEmployees: 'SELECT ename, comm FROM emp WHERE comm IS NOT NULL ORDER BY empno',
  employeeGrades:
    'SELECT e.ename, s.grade FROM emp e JOIN salgrade s ON e.sal BETWEEN s.losal AND s.hisal ORDER BY e.empno, s.grade',
  averageSalaryByDepartment:
    'SELECT deptno AS "deptNo", AVG(sal) AS "avgSal" FROM emp GROUP BY deptno ORDER BY MIN(empno)',
  aboveDepartmentAverage:
    'SELECT e.ename FROM emp e WHERE e.sal > (SELECT AVG(i.sal) FROM emp i WHERE i.deptno = e.deptno) ORDER BY e.empno',
} as const

export type EmpDeptQueryName = keyof typeof EMP_DEPT_SQL

// ── Schema ─────────────────────────────────────────────────────

/** Every table and column the statements above read. */
export const EMP_DEPT_SCHEMA = {
  emp: ['empno', 'ename', 'job', 'deptno', 'sal', 'comm'],
  dept: ['deptno', 'dname', 'loc'],
  salgrade: ['grade', 'losal', 'hisal'],
} as const satisfies Record<string, readonly string[]>

export const SCHEMA_SQL =
  'SELECT table_name, column_name FROM information_schema.columns WHERE table_schema = current_schema() AND table_name = ANY($1)'

/**
 * Compares `information_schema.columns` rows against `EMP_DEPT_SCHEMA`.
 * A table with no columns at all is reported by name alone; otherwise each
 * absent column is reported as `table.column`.
 */
export function findMissingSchema(rows: readonly Record<string, unknown>[]): string[] {
  const found = new Map<string, Set<string>>()
  for (const row of rows) {
    const table = row.table_name
    const column = row.column_name
    if (typeof table !== 'string' || typeof column !== 'string') continue
    const columns = found.get(table)
    if (columns !== undefined) {
      columns.add(column)
    } else {
      found.set(table, new Set([column]))
    }
  }

  const missing: string[] = []
  for (const [table, columns] of Object.entries(EMP_DEPT_SCHEMA)) {
    const present = found.get(table)
    if (present === undefined) {
      missing.push(table)
      continue
    }
    for (const column of columns) {
      if (!present.has(column)) missing.push(`${table}.${column}`)
    }
  }
  return missing
}
