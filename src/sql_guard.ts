/**
 * SQL Guard
 *
 * Static checks applied to every generated query before it runs:
 * - Response cleaning (markdown fences, USE DATABASE lines)
 * - Mutating-keyword blocklist
 * - Column whitelist check for dotted column references
 *
 * Extraction is regex based. String literals and comments are blanked first
 * so their contents never look like identifiers or keywords. References the
 * guard cannot resolve (CTEs, subqueries, other schemas) are reported as
 * warnings, never as errors.
 */

import { BLOCKED_SQL_PATTERN } from "./config.js"
import type { ColumnWhitelist } from "./schema_types.js"

// ============================================================================
// Response Cleaning
// ============================================================================

/**
 * Strip markdown code fences and USE DATABASE lines from a model response
 */
export function cleanSqlResponse(raw: string): string {
	const unfenced = raw.replace(/```sql/gi, "").replace(/```/g, "")
	return unfenced
		.split("\n")
		.filter(line => !/^\s*USE\s+DATABASE\b/i.test(line))
		.join("\n")
		.trim()
}

// ============================================================================
// Blocklist
// ============================================================================

/**
 * The first mutating keyword found as a whole word, uppercased, or null
 */
export function findBlockedKeyword(sql: string): string | null {
	const match = BLOCKED_SQL_PATTERN.exec(sql)
	return match ? match[1].toUpperCase() : null
}

// ============================================================================
// Normalisation
// ============================================================================

/**
 * Replace string literals with '' and drop comments
 */
export function blankLiterals(sql: string): string {
	return sql
		.replace(/'(?:[^']|'')*'/g, "''")
		.replace(/--[^\n]*/g, " ")
		.replace(/\/\*[\s\S]*?\*\//g, " ")
}

function normalizeForExtraction(sql: string): string {
	return blankLiterals(sql)
		.replace(/"([^"]+)"/g, "$1")
		.replace(/\s+/g, " ")
		.toLowerCase()
}

// ============================================================================
// Alias Resolution (FROM/JOIN parsing)
// ============================================================================

export interface TableReference {
	schema: string | null
	table: string
	alias: string | null
}

const IDENT = "[a-z_][a-z0-9_$]*"

const NON_ALIAS_WORDS = new Set([
	"on", "using", "where", "group", "order", "limit", "offset", "having", "window",
	"join", "left", "right", "inner", "outer", "full", "cross", "natural", "lateral",
	"union", "except", "intersect", "fetch", "for", "and", "or", "as", "select",
])

// Optional alias; a following keyword is never taken as one
const ALIAS = `(?:\\s+(?:as\\s+)?(?!(?:${[...NON_ALIAS_WORDS].join("|")})\\b)(${IDENT}))?`

const TABLE_REF_PATTERN = new RegExp(`\\b(?:from|join)\\s+(${IDENT})(?:\\.(${IDENT}))?${ALIAS}`, "g")

// Continuation of a comma-separated FROM list, matched right after a FROM entry
const COMMA_REF_PATTERN = new RegExp(`\\s*,\\s*(${IDENT})(?:\\.(${IDENT}))?${ALIAS}`, "y")

function toReference(first: string, second: string | undefined, alias: string | undefined): TableReference {
	const schema = second === undefined ? null : first
	const table = second === undefined ? first : second
	return { schema, table, alias: alias ?? null }
}

/**
 * Every table named after FROM or JOIN, including comma-separated FROM
 * lists. Supports: table, table alias, table AS alias, schema.table AS alias.
 */
export function parseTableReferences(sql: string): TableReference[] {
	const normalized = normalizeForExtraction(sql)
	const refs: TableReference[] = []

	TABLE_REF_PATTERN.lastIndex = 0
	let match: RegExpExecArray | null
	while ((match = TABLE_REF_PATTERN.exec(normalized)) !== null) {
		const ref = toReference(match[1], match[2], match[3])
		if (NON_ALIAS_WORDS.has(ref.table)) continue
		refs.push(ref)

		if (!match[0].startsWith("from")) continue
		COMMA_REF_PATTERN.lastIndex = TABLE_REF_PATTERN.lastIndex
		let more: RegExpExecArray | null
		while ((more = COMMA_REF_PATTERN.exec(normalized)) !== null) {
			refs.push(toReference(more[1], more[2], more[3]))
			TABLE_REF_PATTERN.lastIndex = COMMA_REF_PATTERN.lastIndex
		}
	}
	return refs
}

export interface AliasResolution {
	/** alias or bare table name -> table in the target schema (or a CTE name) */
	local: Map<string, { table: string; qualified: boolean }>
	/** other schemas, their tables and aliases */
	foreign: Set<string>
}

/**
 * Map aliases (and table names used directly) to tables. References
 * qualified with another schema are kept apart and never validated.
 */
export function resolveAliases(sql: string, schema: string): AliasResolution {
	const target = schema.toLowerCase()
	const local = new Map<string, { table: string; qualified: boolean }>()
	const foreign = new Set<string>()

	for (const ref of parseTableReferences(sql)) {
		if (ref.schema !== null && ref.schema !== target) {
			foreign.add(ref.schema)
			foreign.add(ref.table)
			if (ref.alias) foreign.add(ref.alias)
			continue
		}
		const entry = { table: ref.table, qualified: ref.schema !== null }
		if (!local.has(ref.table)) local.set(ref.table, entry)
		if (ref.alias && ref.alias !== ref.table) local.set(ref.alias, entry)
	}
	return { local, foreign }
}

// ============================================================================
// Column References
// ============================================================================

export interface ColumnReference {
	/** Present only for three-part schema.table.column references */
	schema: string | null
	/** Alias or table name before the column */
	qualifier: string
	column: string
}

// Dotted chains of two or three identifiers, not followed by a call
const DOTTED_PATTERN = new RegExp(`(?<![a-z0-9_$.])(${IDENT})\\.(${IDENT})(?:\\.(${IDENT}))?\\b(?!\\s*\\()(?!\\.)`, "g")

/**
 * Dotted column references in the query. Two-part chains whose first part is
 * the target schema name are table references and are skipped.
 */
export function extractColumnReferences(sql: string, schema: string): ColumnReference[] {
	const normalized = normalizeForExtraction(sql)
	const target = schema.toLowerCase()
	const refs: ColumnReference[] = []

	DOTTED_PATTERN.lastIndex = 0
	let match: RegExpExecArray | null
	while ((match = DOTTED_PATTERN.exec(normalized)) !== null) {
		const [, first, second, third] = match
		if (third !== undefined) {
			refs.push({ schema: first, qualifier: second, column: third })
		} else if (first !== target) {
			refs.push({ schema: null, qualifier: first, column: second })
		}
	}
	return refs
}

// ============================================================================
// Whitelist Validation
// ============================================================================

export interface ValidationReport {
	errors: string[]
	warnings: string[]
}

function lowerWhitelist(whitelist: ColumnWhitelist): Map<string, { name: string; columns: Map<string, string> }> {
	const lowered = new Map<string, { name: string; columns: Map<string, string> }>()
	for (const [table, columns] of whitelist) {
		const cols = new Map<string, string>()
		for (const c of columns) cols.set(c.toLowerCase(), c)
		lowered.set(table.toLowerCase(), { name: table, columns: cols })
	}
	return lowered
}

/**
 * Check every table and column reference against the whitelist.
 *
 * Errors: schema-qualified tables that are not indexed, and columns that do
 * not exist in the table their qualifier resolves to. Warnings: qualifiers
 * that resolve to nothing indexed (CTEs, subquery aliases).
 */
export function validateAgainstWhitelist(sql: string, whitelist: ColumnWhitelist, schema: string): ValidationReport {
	const errors = new Set<string>()
	const warnings = new Set<string>()
	const tables = lowerWhitelist(whitelist)
	const target = schema.toLowerCase()
	const { local, foreign } = resolveAliases(sql, schema)

	const checkColumn = (table: string, column: string) => {
		const entry = tables.get(table)
		if (!entry) {
			errors.add(`Table '${schema}.${table}' does not exist`)
			return
		}
		if (!entry.columns.has(column)) {
			errors.add(
				`Column '${column}' does not exist in table '${entry.name}'. ` +
					`Valid columns: ${[...entry.columns.values()].join(", ")}`,
			)
		}
	}

	for (const [, ref] of local) {
		if (ref.qualified && !tables.has(ref.table)) {
			errors.add(`Table '${schema}.${ref.table}' does not exist`)
		}
	}

	for (const ref of extractColumnReferences(sql, schema)) {
		if (ref.schema !== null) {
			if (ref.schema === target) checkColumn(ref.qualifier, ref.column)
			continue
		}
		const resolved = local.get(ref.qualifier)
		if (!resolved) {
			if (foreign.has(ref.qualifier)) continue
			warnings.add(`Could not resolve '${ref.qualifier}' for column '${ref.qualifier}.${ref.column}'; not checked`)
			continue
		}
		if (!tables.has(resolved.table)) {
			if (!resolved.qualified) {
				warnings.add(`'${ref.qualifier}' refers to '${resolved.table}', which is not an indexed table; column '${ref.column}' not checked`)
			}
			continue
		}
		checkColumn(resolved.table, ref.column)
	}

	return { errors: [...errors], warnings: [...warnings] }
}
