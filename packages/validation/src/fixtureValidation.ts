import type { FixtureErrorEntry } from './errors.js'
import { FixtureError } from './errors.js'
import type { FixtureData, SalaryGrade } from './types/records.js'

// --- Fixture Validation ---

/**
 * Checks the invariants the grade and department queries rely on.
 *
 * An employee whose department number has no DEPT row is legal: joins simply
 * drop it. Returns `null` when the data is consistent.
 */
export function validateFixtures(data: FixtureData): FixtureError | null {
  const errors: FixtureErrorEntry[] = []

  // --- DEPT ---
  const seenDepartments = new Set<number>()
  for (const dept of data.departments) {
    if (seenDepartments.has(dept.deptNo)) {
      errors.push({
        code: 'DUPLICATE_DEPARTMENT',
        message: `Department ${dept.deptNo} is defined more than once`,
        details: { table: 'dept', deptNo: dept.deptNo },
      })
    }
    seenDepartments.add(dept.deptNo)
  }

  // --- SALGRADE ---
  const validBands: SalaryGrade[] = []
  for (const band of data.salaryGrades) {
    if (band.losal > band.hisal) {
      errors.push({
        code: 'INVALID_GRADE_BAND',
        message: `Grade ${band.grade}: losal ${band.losal} is greater than hisal ${band.hisal}`,
        details: { table: 'salgrade', grade: band.grade },
      })
      continue
    }
    validBands.push(band)
  }

  for (let i = 0; i < validBands.length; i++) {
    for (let j = i + 1; j < validBands.length; j++) {
      const a = validBands[i]
      const b = validBands[j]
      if (a === undefined || b === undefined) continue
      if (a.losal <= b.hisal && b.losal <= a.hisal) {
        errors.push({
          code: 'OVERLAPPING_GRADES',
          message: `Grades ${a.grade} and ${b.grade} overlap`,
          details: { table: 'salgrade', grades: [a.grade, b.grade] },
        })
      }
    }
  }

  // --- EMP ---
  for (const emp of data.employees) {
    const grades = validBands.filter((band) => emp.sal >= band.losal && emp.sal <= band.hisal).map((band) => band.grade)
    if (grades.length !== 1) {
      errors.push({
        code: 'UNGRADED_SALARY',
        message: `Employee '${emp.ename}': salary ${emp.sal} falls into ${grades.length} grades`,
        details: { table: 'emp', ename: emp.ename, sal: emp.sal, grades },
      })
    }
  }

  return errors.length > 0 ? new FixtureError(errors) : null
}
