import type { EmpDeptQueries } from '@emp-dept/validation'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── ScenarioContract ───────────────────────────────────────────

/** Any EMP/DEPT/SALGRADE back end loaded with the sample rows. */
export type ScenarioContract = EmpDeptQueries

// ── describeScenarioContract ───────────────────────────────────

export function describeScenarioContract(name: string, factory: () => Promise<ScenarioContract>): void {
  describe(`ScenarioContract: ${name}`, () => {
    let engine: ScenarioContract

    beforeAll(async () => {
      engine = await factory()
    })

    afterAll(async () => {
      await engine?.close()
    })

    // ── Tutorial Scenarios ──────────────────────────────────

    describe('Tutorial scenarios', () => {
      it('S01: WHERE job = SALESMAN returns exactly two salesmen', async () => {
        const r = await engine.employeesByJob('SALESMAN')
        expect(r.rows).toHaveLength(2)
        for (const e of r.rows) {
          expect(e.job).toBe('SALESMAN')
        }
      })

      it('S02: department 30 ordered by salary descending', async () => {
        const r = await engine.departmentEmployeesBySalary(30)
        expect(r.rows).toHaveLength(2)
        const [first, second] = r.rows
        expect(first?.sal).toBeGreaterThanOrEqual(second?.sal ?? Number.POSITIVE_INFINITY)
      })

      it('S03: employees of CHICAGO departments all work in department 30', async () => {
        const r = await engine.employeesInLocation('CHICAGO')
        expect(r.rows.length).toBeGreaterThanOrEqual(1)
        for (const e of r.rows) {
          expect(e.deptNo).toBe(30)
        }
      })

      it('S04: projection of names and salaries', async () => {
        const r = await engine.namesAndSalaries()
        expect(r.rows.length).toBeGreaterThanOrEqual(1)
        for (const row of r.rows) {
          expect(Object.keys(row).sort()).toEqual(['ename', 'sal'])
          expect(row.ename.trim()).not.toBe('')
          expect(row.sal).toBeGreaterThan(0)
        }
      })

      it('S05: join finds ALLEN in SALES', async () => {
        const r = await engine.employeeDepartments()
        expect(r.rows).toContainEqual(expect.objectContaining({ ename: 'ALLEN', dname: 'SALES' }))
      })

      it('S06: department 30 has two employees', async () => {
        const r = await engine.headcountByDepartment()
        expect(r.rows).toContainEqual({ deptNo: 30, count: 2 })
      })

      it('S07: every commissioned employee has a commission', async () => {
        const r = await engine.commissionedEmployees()
        expect(r.rows.length).toBeGreaterThanOrEqual(1)
        for (const row of r.rows) {
          expect(row.comm).not.toBeNull()
          expect(typeof row.comm).toBe('number')
        }
      })

      it('S08: ALLEN earns a grade 3 salary', async () => {
        const r = await engine.employeeGrades()
        expect(r.rows).toContainEqual({ ename: 'ALLEN', grade: 3 })
      })

      it('S09: department 30 averages more than 1000', async () => {
        const r = await engine.averageSalaryByDepartment()
        const dept30 = r.rows.find((row) => row.deptNo === 30)
        expect(dept30).toBeDefined()
        expect(dept30?.avgSal).toBeGreaterThan(1000)
      })

      it('S10: ALLEN earns more than the department average', async () => {
        const r = await engine.aboveDepartmentAverage()
        expect(r.rows.map((row) => row.ename)).toContain('ALLEN')
      })
    })

    // ── Result Properties ───────────────────────────────────

    describe('Result properties', () => {
      it('P01: filter keeps only matching rows', async () => {
        const all = await engine.namesAndSalaries()
        const clerks = await engine.employeesByJob('CLERK')
        const managers = await engine.employeesByJob('MANAGER')
        for (const e of clerks.rows) expect(e.job).toBe('CLERK')
        expect(clerks.rows.length + managers.rows.length).toBeLessThanOrEqual(all.rows.length)
      })

      it('P02: descending order is non-increasing', async () => {
        const r = await engine.departmentEmployeesBySalary(10)
        for (let i = 1; i < r.rows.length; i++) {
          const prev = r.rows[i - 1]
          const cur = r.rows[i]
          if (prev === undefined || cur === undefined) continue
          expect(prev.sal).toBeGreaterThanOrEqual(cur.sal)
        }
      })

      it('P03: each employee joins at most one department', async () => {
        const all = await engine.namesAndSalaries()
        const joined = await engine.employeeDepartments()
        expect(joined.rows.length).toBeLessThanOrEqual(all.rows.length)
        const names = joined.rows.map((row) => row.ename)
        expect(new Set(names).size).toBe(names.length)
      })

      it('P04: group counts sum to the number of employees', async () => {
        const all = await engine.namesAndSalaries()
        const counts = await engine.headcountByDepartment()
        const total = counts.rows.reduce((acc, row) => acc + row.count, 0)
        expect(total).toBe(all.rows.length)
      })

      it('P05: no result for an unknown job or location', async () => {
        expect((await engine.employeesByJob('__none__')).rows).toEqual([])
        expect((await engine.employeesInLocation('__none__')).rows).toEqual([])
      })

      it('P06: meta.rowCount matches rows', async () => {
        const r = await engine.employeeGrades()
        expect(r.meta.rowCount).toBe(r.rows.length)
        expect(r.meta.executionMs).toBeGreaterThanOrEqual(0)
      })
    })
  })
}
