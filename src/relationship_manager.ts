/**
 * Relationship Reconciler
 *
 * Merges join metadata from four sources into one consistent map:
 * 1. Declared foreign-key constraints (information_schema)
 * 2. Column comments carrying a [FK: table.column] tag (pg_description)
 * 3. The relationships.yaml overlay file
 * 4. Edits made through the add/delete relationship tools (same file)
 *
 * Priority: yaml/tool edits > comment tags > FK constraints
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { AnalystError, errorMessage } from "./config.js"
import type { Logger } from "./logger.js"
import type { QueryRunner, Relationship, ResultValue } from "./schema_types.js"

export const FK_COMMENT_PATTERN = /\[FK:\s*(\w+)\.(\w+)\]/i

// ============================================================================
// Catalog Sources
// ============================================================================

export const FK_CONSTRAINT_QUERY = `
	SELECT tc.table_name, kcu.column_name, ccu.table_name, ccu.column_name
	FROM information_schema.table_constraints tc
	JOIN information_schema.key_column_usage kcu
		ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
	JOIN information_schema.constraint_column_usage ccu
		ON tc.constraint_name = ccu.constraint_name AND tc.table_schema = ccu.table_schema
	WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = $1
	ORDER BY tc.table_name, kcu.column_name
`

export const COLUMN_COMMENT_QUERY = `
	SELECT c.table_name, c.column_name, d.description
	FROM information_schema.columns c
	JOIN pg_catalog.pg_namespace ns ON ns.nspname = c.table_schema
	JOIN pg_catalog.pg_class cl ON cl.relnamespace = ns.oid AND cl.relname = c.table_name AND cl.relkind = 'r'
	JOIN pg_catalog.pg_description d ON d.objoid = cl.oid AND d.objsubid = c.ordinal_position
	WHERE c.table_schema = $1 AND d.description IS NOT NULL
	ORDER BY c.table_name, c.ordinal_position
`

function cell(value: ResultValue | undefined): string {
	return value === null || value === undefined ? "" : String(value)
}

/**
 * Source 1: declared foreign-key constraints
 */
export async function getFkRelationships(runner: QueryRunner, schema: string): Promise<Relationship[]> {
	const rows = await runner.runQuery(FK_CONSTRAINT_QUERY, [schema])
	return rows.map(r => ({
		source_table: cell(r[0]),
		source_column: cell(r[1]),
		target_table: cell(r[2]),
		target_column: cell(r[3]),
		origin: "fk_constraint" as const,
	}))
}

/**
 * Parse a [FK: table.column] tag out of a column comment
 */
export function parseFkComment(comment: string): { table: string; column: string } | null {
	const match = FK_COMMENT_PATTERN.exec(comment)
	return match ? { table: match[1], column: match[2] } : null
}

/**
 * Source 2: [FK: table.column] tags inside column comments. Comments
 * without a tag are ignored.
 */
export async function getCommentRelationships(runner: QueryRunner, schema: string): Promise<Relationship[]> {
	const rows = await runner.runQuery(COLUMN_COMMENT_QUERY, [schema])
	const rels: Relationship[] = []
	for (const r of rows) {
		const target = parseFkComment(cell(r[2]))
		if (target) {
			rels.push({
				source_table: cell(r[0]),
				source_column: cell(r[1]),
				target_table: target.table,
				target_column: target.column,
				origin: "comment_fk",
			})
		}
	}
	return rels
}

// ============================================================================
// YAML Overlay Store (sources 3 & 4)
// ============================================================================

const overlayEntrySchema = z.object({
	source: z.string(),
	target: z.string(),
	description: z.string().nullish(),
})

const overlayFileSchema = z.record(z.array(overlayEntrySchema).nullable())

export type OverlayEntry = z.infer<typeof overlayEntrySchema>

type OverlayFile = z.infer<typeof overlayFileSchema>

function splitQualified(ref: string): [string, string] | null {
	const parts = ref.split(".")
	if (parts.length !== 2 || !parts[0] || !parts[1]) return null
	return [parts[0], parts[1]]
}

/**
 * Persisted overlay of manually declared relationships, keyed by schema.
 *
 * File shape:
 *   northwind:
 *     - source: orders.shipvia
 *       target: shippers.shipperid
 *       description: carrier that shipped the order
 */
export class RelationshipOverlayStore {
	constructor(private filePath: string) {}

	get path(): string {
		return this.filePath
	}

	private load(): OverlayFile {
		if (!fs.existsSync(this.filePath)) return {}
		const parsed = yaml.load(fs.readFileSync(this.filePath, "utf-8"))
		if (parsed === undefined || parsed === null) return {}
		const result = overlayFileSchema.safeParse(parsed)
		if (!result.success) {
			throw new AnalystError("config", `Invalid relationships file ${this.filePath}: ${result.error.message}`)
		}
		return result.data
	}

	private save(data: OverlayFile): void {
		fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
		fs.writeFileSync(this.filePath, yaml.dump(data, { lineWidth: -1, noRefs: true }))
	}

	/** Raw entries for a schema */
	entries(schema: string): OverlayEntry[] {
		return this.load()[schema] ?? []
	}

	/**
	 * Overlay relationships for a schema. Entries whose source or target is
	 * not exactly "table.column" are skipped.
	 */
	list(schema: string): Relationship[] {
		const rels: Relationship[] = []
		for (const entry of this.entries(schema)) {
			const src = splitQualified(entry.source)
			const tgt = splitQualified(entry.target)
			if (!src || !tgt) continue
			rels.push({
				source_table: src[0],
				source_column: src[1],
				target_table: tgt[0],
				target_column: tgt[1],
				description: entry.description ?? "",
				origin: "yaml",
			})
		}
		return rels
	}

	/**
	 * Add a relationship. Upserts on (source, target): an existing entry only
	 * gets its description replaced.
	 */
	add(
		schema: string,
		sourceTable: string,
		sourceColumn: string,
		targetTable: string,
		targetColumn: string,
		description: string = "",
	): "added" | "updated" {
		const data = this.load()
		const list = data[schema] ?? []
		const entry: OverlayEntry = {
			source: `${sourceTable}.${sourceColumn}`,
			target: `${targetTable}.${targetColumn}`,
			description,
		}

		const existing = list.find(e => e.source === entry.source && e.target === entry.target)
		if (existing) {
			existing.description = description
		} else {
			list.push(entry)
		}
		data[schema] = list
		this.save(data)
		return existing ? "updated" : "added"
	}

	/**
	 * Delete a relationship by its "table.column" source and target.
	 * Returns false when nothing matched.
	 */
	delete(schema: string, source: string, target: string): boolean {
		const data = this.load()
		const list = data[schema]
		if (!list) return false
		const kept = list.filter(e => !(e.source === source && e.target === target))
		if (kept.length === list.length) return false
		data[schema] = kept
		this.save(data)
		return true
	}
}

// ============================================================================
// Merge
// ============================================================================

export function relationshipKey(rel: Relationship): string {
	return [rel.source_table, rel.source_column, rel.target_table, rel.target_column].join("\u0000")
}

/**
 * Merge relationship lists given lowest priority first. Later entries with
 * the same (source_table, source_column, target_table, target_column)
 * replace earlier ones; output keeps first-seen key order.
 */
export function mergeRelationships(...sources: Relationship[][]): Relationship[] {
	const seen = new Map<string, Relationship>()
	for (const rels of sources) {
		for (const rel of rels) {
			seen.set(relationshipKey(rel), rel)
		}
	}
	return [...seen.values()]
}

/**
 * All relationships for a schema from every source. A failing catalog
 * source contributes nothing; the overlay file is authoritative and its
 * errors propagate.
 */
export async function getAllRelationships(
	runner: QueryRunner,
	schema: string,
	overlay: RelationshipOverlayStore,
	logger: Logger,
): Promise<Relationship[]> {
	const fromCatalog = async (
		label: string,
		load: () => Promise<Relationship[]>,
	): Promise<Relationship[]> => {
		try {
			return await load()
		} catch (error) {
			logger.warn(`Relationship source ${label} failed, skipping it`, {
				schema,
				error: errorMessage(error),
			})
			return []
		}
	}

	const fkRels = await fromCatalog("fk_constraint", () => getFkRelationships(runner, schema))
	const commentRels = await fromCatalog("comment_fk", () => getCommentRelationships(runner, schema))
	const yamlRels = overlay.list(schema)

	const merged = mergeRelationships(fkRels, commentRels, yamlRels)
	logger.debug("Relationships merged", {
		schema,
		fk_constraint: fkRels.length,
		comment_fk: commentRels.length,
		yaml: yamlRels.length,
		merged: merged.length,
	})
	return merged
}

/**
 * Per-table join hints used to enrich table documents.
 *
 *   customers: ["Referenced by northwind.orders.customerid"]
 *   orders:    ["customerid -> northwind.customers.customerid (who placed it)"]
 */
export function buildRelationshipMap(relationships: Relationship[], schema: string): Map<string, string[]> {
	const fkMap = new Map<string, string[]>()
	const push = (table: string, hint: string) => {
		const list = fkMap.get(table) ?? []
		list.push(hint)
		fkMap.set(table, list)
	}

	for (const rel of relationships) {
		const descSuffix = rel.description ? ` (${rel.description})` : ""
		push(rel.source_table, `${rel.source_column} -> ${schema}.${rel.target_table}.${rel.target_column}${descSuffix}`)
		push(rel.target_table, `Referenced by ${schema}.${rel.source_table}.${rel.source_column}${descSuffix}`)
	}
	return fkMap
}
