import type { Employee } from './records.js'
import type {
  DepartmentAverage,
  DepartmentCount,
  EmployeeCommission,
  EmployeeDepartment,
  EmployeeGrade,
  EmployeeName,
  NameSalary,
  QueryResult,
} from './result.js'

/**
 * The EMP/DEPT/SALGRADE query surface. Implemented in memory by
 * `createEmpDeptQueries` and over SQL by `createPostgresQueries`.
 */
export interface EmpDeptQueries {
  /** `SELECT * FROM emp WHERE job = :job` */
  employeesByJob(job: string): Promise<QueryResult<Employee>>
  /** `SELECT * FROM emp WHERE deptno = :deptNo ORDER BY sal DESC` */
  departmentEmployeesBySalary(deptNo: number): Promise<QueryResult<Employee>>
  /** `SELECT * FROM emp WHERE deptno IN (SELECT deptno FROM dept WHERE loc = :loc)` */
  employeesInLocation(loc: string): Promise<QueryResult<Employee>>
  /** `SELECT ename, sal FROM emp` */
  namesAndSalaries(): Promise<QueryResult<NameSalary>>
  /** `SELECT e.ename, e.sal, d.dname FROM emp e JOIN dept d ON e.deptno = d.deptno` */
  employeeDepartments(): Promise<QueryResult<EmployeeDepartment>>
  /** `SELECT deptno, COUNT(*) FROM emp GROUP BY deptno` */
  headcountByDepartment(): Promise<QueryResult<DepartmentCount>>
  /** `SELECT ename, comm FROM emp WHERE comm IS NOT NULL` */
  commissionedEmployees(): Promise<QueryResult<EmployeeCommission>>
  /** `SELECT e.ename, s.grade FROM emp e JOIN salgrade s ON e.sal BETWEEN s.losal AND s.hisal` */
  employeeGrades(): Promise<QueryResult<EmployeeGrade>>
  /** `SELECT deptno, AVG(sal) FROM emp GROUP BY deptno` */
  averageSalaryByDepartment(): Promise<QueryResult<DepartmentAverage>>
  /** `SELECT ename FROM emp e WHERE sal > (SELECT AVG(sal) FROM emp WHERE deptno = e.deptno)` */
  aboveDepartmentAverage(): Promise<QueryResult<EmployeeName>>
  close(): Promise<void>
}
