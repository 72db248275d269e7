import { ConnectionError, ExecutionError } from '@emp-dept/query'
import type { PoolConfig } from 'pg'
import { Pool, types } from 'pg'
import type { EmpDeptQueryName } from './sql.js'
import { EMP_DEPT_SCHEMA, EMP_DEPT_SQL, findMissingSchema, SCHEMA_SQL } from './sql.js'

// sal, comm and AVG come back as NUMERIC, COUNT as INT8
types.setTypeParser(1700, parseFloat)
types.setTypeParser(20, Number)

export interface PostgresConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: PoolConfig['ssl'] | undefined
  readonly max?: number | undefined
  readonly timeoutMs?: number | undefined
}

export type EmpDeptParam = string | number

/** Pooled access to the `emp`, `dept` and `salgrade` tables. */
export interface EmpDeptClient {
  /** Runs one named statement from `EMP_DEPT_SQL`; failures throw `ExecutionError` (`QUERY_FAILED`). */
  query(name: EmpDeptQueryName, params: readonly EmpDeptParam[]): Promise<Record<string, unknown>[]>
  /**
   * Checks that every table and column the statements read exists.
   * Throws `ConnectionError` when the database cannot be reached and
   * `ExecutionError` (`MISSING_SCHEMA`) when something is absent.
   */
  verifySchema(): Promise<void>
  close(): Promise<void>
}

export function createEmpDeptClient(config: PostgresConfig): EmpDeptClient {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
  })

  return {
    async query(name, params) {
      const sql = EMP_DEPT_SQL[name]
      const values = [...params]
      try {
        const result = await pool.query<Record<string, unknown>>(sql, values)
        return result.rows
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new ExecutionError({ code: 'QUERY_FAILED', sql, params: values, cause }, cause)
      }
    },

    async verifySchema() {
      let rows: Record<string, unknown>[]
      try {
        const result = await pool.query<Record<string, unknown>>(SCHEMA_SQL, [Object.keys(EMP_DEPT_SCHEMA)])
        rows = result.rows
      } catch (err) {
        throw new ConnectionError(
          'PostgreSQL schema check failed',
          { url: config.connectionString, host: config.host },
          err instanceof Error ? err : undefined,
        )
      }
      const missing = findMissingSchema(rows)
      if (missing.length > 0) throw new ExecutionError({ code: 'MISSING_SCHEMA', missing })
    },

    async close() {
      await pool.end()
    },
  }
}
