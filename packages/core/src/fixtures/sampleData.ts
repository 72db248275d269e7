import type { FixtureData } from '@emp-dept/validation'

/**
 * EMP/DEPT/SALGRADE sample rows, cut down from the classic tutorial schema.
 * Department 40 has no employees; SALGRADE bands cover every salary once.
 */
export const sampleData: FixtureData = {
  employees: [
    { ename: 'SMITH', job: 'CLERK', deptNo: 20, sal: 800, comm: null },
    { ename: 'ALLEN', job: 'SALESMAN', deptNo: 30, sal: 1600, comm: 300 },
    { ename: 'WARD', job: 'SALESMAN', deptNo: 30, sal: 1250, comm: 500 },
    { ename: 'JONES', job: 'MANAGER', deptNo: 20, sal: 2975, comm: null },
    { ename: 'CLARK', job: 'MANAGER', deptNo: 10, sal: 2450, comm: null },
    { ename: 'KING', job: 'PRESIDENT', deptNo: 10, sal: 5000, comm: null },
    { ename: 'MILLER', job: 'CLERK', deptNo: 10, sal: 1300, comm: 0 },
  ],
  departments: [
    { deptNo: 10, dname: 'ACCOUNTING', loc: 'NEW YORK' },
    { deptNo: 20, dname: 'RESEARCH', loc: 'DALLAS' },
    { deptNo: 30, dname: 'SALES', loc: 'CHICAGO' },
    { deptNo: 40, dname: 'OPERATIONS', loc: 'BOSTON' },
  ],
  salaryGrades: [
    { grade: 1, losal: 700, hisal: 1200 },
    { grade: 2, losal: 1201, hisal: 1400 },
    { grade: 3, losal: 1401, hisal: 2000 },
    { grade: 4, losal: 2001, hisal: 3000 },
    { grade: 5, losal: 3001, hisal: 9999 },
  ],
}
