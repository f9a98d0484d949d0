/**
 * Postgres query runner
 *
 * Catalog queries and generated SQL both go through one pg Pool. Rows come
 * back in array mode so duplicate output column names (two "name" columns
 * from a join) keep their positions.
 */

import { Pool, type PoolClient, type PoolConfig } from "pg"
import type { AnalystConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"
import type { QueryResultSet, QueryRunner, ResultRow, ResultValue } from "./schema_types.js"

export interface PgQueryRunnerOptions {
	pool: Pool
	statementTimeoutMs: number
	logger: Logger
}

function toResultValue(value: unknown): ResultValue {
	if (value === null || value === undefined) return null
	switch (typeof value) {
		case "string":
		case "number":
		case "boolean":
		case "bigint":
		case "object":
			return value
		default:
			return String(value)
	}
}

function toRows(rows: unknown[][]): ResultRow[] {
	return rows.map(row => row.map(toResultValue))
}

export class PgQueryRunner implements QueryRunner {
	private pool: Pool
	private statementTimeoutMs: number
	private logger: Logger

	constructor(options: PgQueryRunnerOptions) {
		this.pool = options.pool
		this.statementTimeoutMs = options.statementTimeoutMs
		this.logger = options.logger
	}

	/**
	 * Parameterised catalog query
	 */
	async runQuery(sql: string, params: unknown[] = []): Promise<ResultRow[]> {
		const result = await this.pool.query<unknown[]>({ text: sql, values: params, rowMode: "array" })
		return toRows(result.rows)
	}

	/**
	 * Run generated SQL inside a read-only transaction with a statement
	 * timeout, returning rows and output column names
	 */
	runQueryWithColumns = async (sql: string): Promise<QueryResultSet> => {
		const started = Date.now()
		let client: PoolClient | null = null
		try {
			client = await this.pool.connect()
			await client.query("BEGIN READ ONLY")
			await client.query(`SET LOCAL statement_timeout = ${Math.floor(this.statementTimeoutMs)}`)
			const result = await client.query<unknown[]>({ text: sql, rowMode: "array" })
			await client.query("COMMIT")

			this.logger.debug("Query executed", {
				rows: result.rows.length,
				execution_time_ms: Date.now() - started,
			})
			return {
				rows: toRows(result.rows),
				columnNames: result.fields.map(f => f.name),
			}
		} catch (error) {
			if (client) {
				await client.query("ROLLBACK").catch((rollbackError: unknown) => {
					this.logger.warn("Rollback failed", { error: String(rollbackError) })
				})
			}
			throw error
		} finally {
			if (client) {
				client.release()
			}
		}
	}

	async close(): Promise<void> {
		await this.pool.end()
	}
}

/**
 * Build a pool from the database section of the config
 */
export function createQueryRunner(
	database: AnalystConfig["database"],
	logger: Logger,
	overrides: PoolConfig = {},
): PgQueryRunner {
	const pool = new Pool({
		host: database.host,
		port: database.port,
		database: database.name,
		user: database.user,
		password: database.password,
		max: 5,
		...overrides,
	})
	pool.on("error", err => {
		logger.error("Idle database client error", { error: err.message })
	})
	return new PgQueryRunner({ pool, statementTimeoutMs: database.statement_timeout_ms, logger })
}
