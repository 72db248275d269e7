// --- Projections ---

export interface NameSalary {
  readonly ename: string
  readonly sal: number
}

export interface EmployeeDepartment {
  readonly ename: string
  readonly sal: number
  readonly dname: string
}

export interface DepartmentCount {
  readonly deptNo: number
  readonly count: number
}

export interface EmployeeCommission {
  readonly ename: string
  readonly comm: number
}

export interface EmployeeGrade {
  readonly ename: string
  readonly grade: number
}

export interface DepartmentAverage {
  readonly deptNo: number
  readonly avgSal: number
}

export interface EmployeeName {
  readonly ename: string
}

// --- Query Result ---

export type QuerySource = 'memory' | 'postgres'

export interface DebugLogEntry {
  readonly timestamp: number
  readonly phase: 'fixtures' | 'query' | 'execution' | 'decode'
  readonly message: string
  readonly details?: unknown
}

export interface QueryResultMeta {
  readonly source: QuerySource
  readonly rowCount: number
  readonly executionMs: number
}

export interface QueryResult<T> {
  readonly rows: readonly T[]
  readonly meta: QueryResultMeta
  readonly debugLog?: readonly DebugLogEntry[] | undefined
}
