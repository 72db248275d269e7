// --- EMP ---

export interface Employee {
  readonly ename: string
  readonly job: string
  readonly deptNo: number
  readonly sal: number
  /** `null` when the employee earns no commission. `0` is a commission of zero. */
  readonly comm: number | null
}

// --- DEPT ---

export interface Department {
  readonly deptNo: number
  readonly dname: string
  readonly loc: string
}

// --- SALGRADE ---

/** Salary band; `losal` and `hisal` are both inclusive. */
export interface SalaryGrade {
  readonly grade: number
  readonly losal: number
  readonly hisal: number
}

// --- Fixture Data ---

export interface FixtureData {
  readonly employees: readonly Employee[]
  readonly departments: readonly Department[]
  readonly salaryGrades: readonly SalaryGrade[]
}
