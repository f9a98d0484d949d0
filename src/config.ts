/**
 * Shared constants, error types and database error helpers
 *
 * Includes:
 * - The mutating-keyword blocklist enforced before any SQL runs
 * - Fixed user-facing messages
 * - AnalystError, the single error type raised by pipeline stages
 * - PostgreSQL error parsing and SQLSTATE classification
 */

/**
 * Statements that must never reach the database. Matched as whole words,
 * case-insensitive, anywhere in the generated SQL.
 */
export const BLOCKED_SQL_KEYWORDS = [
	"DROP",
	"DELETE",
	"TRUNCATE",
	"ALTER",
	"CREATE",
	"INSERT",
	"UPDATE",
	"GRANT",
	"REVOKE",
	"MERGE",
] as const

export const BLOCKED_SQL_PATTERN = new RegExp(`\\b(${BLOCKED_SQL_KEYWORDS.join("|")})\\b`, "i")

/** Shown to end users for every fatal pipeline failure. */
export const FRIENDLY_ERROR = "Sorry, I couldn't answer that question. Please try rephrasing it."

/** Returned as the analysis when a query produced no rows. */
export const NO_RESULTS_MESSAGE = "No results found for this query."

/**
 * Error kinds raised by pipeline stages
 *
 * - retrieval: embedding or index failure
 * - generation: the language model call failed or returned nothing usable
 * - generation_blocked: the SQL contained a mutating statement (never retried)
 * - validation: unknown column/table after the retry budget ran out
 * - execution: the database rejected or timed out on the accepted SQL
 * - narration: summarising the rows failed (rows are still returned)
 * - config: invalid or missing configuration
 */
export type AnalystErrorKind =
	| "retrieval"
	| "generation"
	| "generation_blocked"
	| "validation"
	| "execution"
	| "narration"
	| "config"

export class AnalystError extends Error {
	constructor(
		public kind: AnalystErrorKind,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "AnalystError"
	}
}

/**
 * PostgreSQL error context kept for diagnostics
 */
export interface PostgresErrorContext {
	sqlstate: string
	message: string
	hint?: string
	detail?: string
	position?: number
}

/**
 * Execution error classification
 *
 * - infra_failure: connection, pool, resource errors
 * - query_timeout: canceled by statement_timeout or server shutdown
 * - sql_error: syntax/semantic error in the statement
 * - permission_denied: insufficient privilege or unsupported feature
 * - unknown: anything else
 */
export type ExecutionErrorClass =
	| "infra_failure"
	| "query_timeout"
	| "sql_error"
	| "permission_denied"
	| "unknown"

const SQLSTATE_PREFIXES: Record<Exclude<ExecutionErrorClass, "unknown">, string[]> = {
	infra_failure: ["08", "53", "54", "58", "F0", "XX"],
	query_timeout: ["57014", "57P01", "57P02", "57P03"],
	sql_error: ["42601", "42P01", "42703", "42P09", "42P10", "42804", "42883", "42803", "22"],
	permission_denied: ["42501", "0A"],
}

function matchesSqlstate(sqlstate: string, codes: string[]): boolean {
	return codes.some(code => code.length === 2 ? sqlstate.startsWith(code) : sqlstate === code)
}

export function classifyExecutionError(sqlstate: string): ExecutionErrorClass {
	if (matchesSqlstate(sqlstate, SQLSTATE_PREFIXES.query_timeout)) return "query_timeout"
	if (matchesSqlstate(sqlstate, SQLSTATE_PREFIXES.infra_failure)) return "infra_failure"
	if (matchesSqlstate(sqlstate, SQLSTATE_PREFIXES.permission_denied)) return "permission_denied"
	if (matchesSqlstate(sqlstate, SQLSTATE_PREFIXES.sql_error)) return "sql_error"
	return "unknown"
}

/**
 * Parse a pg driver error into structured format
 */
export function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error && typeof error === "object") {
		const code = "code" in error && typeof error.code === "string" ? error.code : "UNKNOWN"
		const message = error instanceof Error ? error.message : String(error)
		const hint = "hint" in error && typeof error.hint === "string" ? error.hint : undefined
		const detail = "detail" in error && typeof error.detail === "string" ? error.detail : undefined
		const rawPosition = "position" in error ? error.position : undefined
		const position = typeof rawPosition === "string" || typeof rawPosition === "number"
			? Number(rawPosition)
			: undefined

		return {
			sqlstate: code,
			message,
			hint,
			detail,
			position: position !== undefined && !isNaN(position) ? position : undefined,
		}
	}

	return {
		sqlstate: "UNKNOWN",
		message: String(error),
	}
}

/** Human-readable message of any thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
