// --- Base Error ---

export class EmpDeptError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'EmpDeptError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Fixture Error ---

export interface FixtureErrorEntry {
  code: 'DUPLICATE_DEPARTMENT' | 'INVALID_GRADE_BAND' | 'OVERLAPPING_GRADES' | 'UNGRADED_SALARY'
  message: string
  details: {
    table: 'emp' | 'dept' | 'salgrade'
    deptNo?: number | undefined
    grade?: number | undefined
    grades?: readonly number[] | undefined
    ename?: string | undefined
    sal?: number | undefined
  }
}

export class FixtureError extends EmpDeptError {
  declare readonly code: 'FIXTURES_INVALID'
  readonly errors: readonly FixtureErrorEntry[]

  constructor(errors: readonly FixtureErrorEntry[]) {
    super('FIXTURES_INVALID', `Fixtures invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'FixtureError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Connection Error ---

export interface ConnectionErrorDetails {
  url?: string | undefined
  host?: string | undefined
}

export class ConnectionError extends EmpDeptError {
  declare readonly code: 'CONNECTION_FAILED'
  readonly details: ConnectionErrorDetails

  constructor(message: string, details: ConnectionErrorDetails, cause?: Error | undefined) {
    super('CONNECTION_FAILED', message, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Execution Error ---

export type ExecutionErrorDetails =
  | {
      code: 'QUERY_FAILED'
      sql: string
      params: unknown[]
      cause?: Error | undefined
    }
  | {
      code: 'INVALID_ROW'
      table: string
      column: string
      expected: string
      actual: string
    }
  | {
      code: 'MISSING_SCHEMA'
      /** `table` or `table.column` for each expected object not found. */
      missing: string[]
    }

export class ExecutionError extends EmpDeptError {
  declare readonly code: ExecutionErrorDetails['code']
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super(details.code, defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeExecutionDetails(this.details),
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof EmpDeptError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeExecutionDetails(details: ExecutionErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'QUERY_FAILED':
      return `Query failed: ${details.sql}`
    case 'INVALID_ROW':
      return `Invalid ${details.table}.${details.column}: expected ${details.expected}, got ${details.actual}`
    case 'MISSING_SCHEMA':
      return `Missing schema objects: ${details.missing.join(', ')}`
  }
}
