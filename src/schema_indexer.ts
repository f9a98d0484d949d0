/**
 * Schema Indexer
 *
 * Introspects the live catalog and (re)builds the schema index:
 * 1. List base tables, their columns and comments
 * 2. Merge relationships from every source into per-table join hints
 * 3. Render one document per table plus a schema overview document
 * 4. Embed every document (in order) and swap the set into the SchemaIndex
 *
 * Re-indexing identical catalog data yields identical documents in the
 * same order.
 */

import { AnalystError } from "./config.js"
import type { Logger } from "./logger.js"
import {
	buildRelationshipMap,
	getAllRelationships,
	type RelationshipOverlayStore,
} from "./relationship_manager.js"
import {
	renderOverviewDocument,
	renderTableDocument,
	type ColumnDescriptor,
	type DocumentMetadata,
	type EmbeddingProvider,
	type QueryRunner,
	type ResultValue,
	type SchemaDocument,
} from "./schema_types.js"
import type { SchemaIndex } from "./vector_index.js"

export const TABLES_QUERY = `
	SELECT table_name
	FROM information_schema.tables
	WHERE table_schema = $1 AND table_type = 'BASE TABLE'
	ORDER BY table_name
`

export const COLUMNS_QUERY = `
	SELECT c.table_name, c.column_name, c.data_type, d.description
	FROM information_schema.columns c
	LEFT JOIN (
		SELECT cl.oid, cl.relname, ns.nspname
		FROM pg_catalog.pg_class cl
		JOIN pg_catalog.pg_namespace ns ON cl.relnamespace = ns.oid
		WHERE cl.relkind = 'r'
	) t ON t.relname = c.table_name AND t.nspname = c.table_schema
	LEFT JOIN pg_catalog.pg_description d ON t.oid = d.objoid AND d.objsubid = c.ordinal_position
	WHERE c.table_schema = $1
	ORDER BY c.table_name, c.ordinal_position
`

export const TABLE_COMMENTS_QUERY = `
	SELECT c.relname, d.description
	FROM pg_catalog.pg_class c
	JOIN pg_catalog.pg_namespace n ON c.relnamespace = n.oid
	JOIN pg_catalog.pg_description d ON c.oid = d.objoid AND d.objsubid = 0
	WHERE n.nspname = $1 AND c.relkind = 'r'
`

export type GlossaryStatus = "glossary" | "cryptic_no_glossary" | "descriptive"

export interface GlossaryReport {
	status: GlossaryStatus
	message: string
	commentPct: number
	crypticPct: number
}

export interface CatalogSnapshot {
	tables: string[]
	columns: Map<string, ColumnDescriptor[]>
	tableComments: Map<string, string>
}

export interface IndexResult {
	schema: string
	documents: number
	tables: string[]
	relationships: number
	glossary: GlossaryReport
}

function text(value: ResultValue | undefined): string {
	return value === null || value === undefined ? "" : String(value)
}

function nullableText(value: ResultValue | undefined): string | null {
	const s = text(value)
	return s ? s : null
}

/**
 * A table name is treated as abbreviated when it has at least two
 * underscore-separated parts averaging four characters or fewer
 * (t_cust_mst, ord_dtl).
 */
export function isCrypticName(name: string): boolean {
	const parts = name.split("_").filter(p => p.length > 0)
	if (parts.length < 2) return false
	const avg = parts.reduce((sum, p) => sum + p.length, 0) / parts.length
	return avg <= 4
}

/**
 * Classify how well the schema explains itself
 */
export function detectGlossaryStatus(snapshot: CatalogSnapshot): GlossaryReport {
	let total = 0
	let commented = 0
	for (const cols of snapshot.columns.values()) {
		total += cols.length
		commented += cols.filter(c => c.description).length
	}
	const commentPct = total > 0 ? (commented / total) * 100 : 0
	const crypticCount = snapshot.tables.filter(isCrypticName).length
	const crypticPct = snapshot.tables.length > 0 ? (crypticCount / snapshot.tables.length) * 100 : 0

	if (commentPct >= 50) {
		return {
			status: "glossary",
			message: `Business glossary detected: ${Math.floor(commentPct)}% of columns have descriptions.`,
			commentPct,
			crypticPct,
		}
	}
	if (crypticPct >= 50 && commentPct < 10) {
		return {
			status: "cryptic_no_glossary",
			message:
				`Cryptic object names detected (${Math.floor(crypticPct)}% abbreviated) with minimal glossary ` +
				`(${Math.floor(commentPct)}% commented). Add COMMENT ON to tables and columns for better results.`,
			commentPct,
			crypticPct,
		}
	}
	return {
		status: "descriptive",
		message: "Descriptive object names detected: using table and column names directly.",
		commentPct,
		crypticPct,
	}
}

export class SchemaIndexer {
	constructor(
		private runner: QueryRunner,
		private embedder: EmbeddingProvider,
		private overlay: RelationshipOverlayStore,
		private logger: Logger,
	) {}

	/**
	 * Read tables, columns and comments for a schema
	 */
	async readCatalog(schema: string): Promise<CatalogSnapshot> {
		const tableRows = await this.runner.runQuery(TABLES_QUERY, [schema])
		const tables = tableRows.map(r => text(r[0])).filter(t => t.length > 0)

		const columns = new Map<string, ColumnDescriptor[]>()
		for (const r of await this.runner.runQuery(COLUMNS_QUERY, [schema])) {
			const table = text(r[0])
			const list = columns.get(table) ?? []
			list.push({
				column_name: text(r[1]),
				data_type: text(r[2]),
				description: nullableText(r[3]),
			})
			columns.set(table, list)
		}

		const tableComments = new Map<string, string>()
		for (const r of await this.runner.runQuery(TABLE_COMMENTS_QUERY, [schema])) {
			const comment = text(r[1])
			if (comment) tableComments.set(text(r[0]), comment)
		}

		return { tables, columns, tableComments }
	}

	/**
	 * Build the embedded document set for a schema without touching the index
	 */
	async buildDocuments(
		database: string,
		schema: string,
	): Promise<{ documents: SchemaDocument[]; snapshot: CatalogSnapshot; relationships: number }> {
		const snapshot = await this.readCatalog(schema)
		if (snapshot.tables.length === 0) {
			throw new AnalystError("retrieval", `No tables found in schema '${schema}'`, false, { schema })
		}

		const relationships = await getAllRelationships(this.runner, schema, this.overlay, this.logger)
		const fkMap = buildRelationshipMap(relationships, schema)

		const pending: Array<{ text: string; metadata: DocumentMetadata }> = []
		for (const table of snapshot.tables) {
			const cols = snapshot.columns.get(table) ?? []
			if (cols.length === 0) continue
			const tableComment = snapshot.tableComments.get(table) ?? null
			const rels = fkMap.get(table) ?? []
			pending.push({
				text: renderTableDocument(schema, table, tableComment, cols, rels),
				metadata: {
					database,
					schema,
					table,
					kind: "table",
					table_comment: tableComment,
					columns: cols,
					relationships: rels,
				},
			})
		}

		pending.push({
			text: renderOverviewDocument(database, schema, snapshot.tables),
			metadata: { database, schema, kind: "overview" },
		})

		const documents: SchemaDocument[] = []
		for (const doc of pending) {
			documents.push({ ...doc, embedding: await this.embedder.embed(doc.text) })
		}

		return { documents, snapshot, relationships: relationships.length }
	}

	/**
	 * Rebuild the index for a schema. The previous document set stays live
	 * until the new one is fully embedded.
	 */
	async reindex(index: SchemaIndex, database: string, schema: string): Promise<IndexResult> {
		const started = Date.now()
		const built: { value?: Awaited<ReturnType<SchemaIndexer["buildDocuments"]>> } = {}

		await index.rebuild(schema, async () => {
			built.value = await this.buildDocuments(database, schema)
			return built.value.documents
		})

		if (!built.value) {
			throw new AnalystError("retrieval", `Index rebuild for '${schema}' produced no documents`)
		}
		const { documents, snapshot, relationships } = built.value
		const glossary = detectGlossaryStatus(snapshot)

		this.logger.info("Schema indexed", {
			schema,
			documents: documents.length,
			tables: snapshot.tables.length,
			relationships,
			glossary: glossary.status,
			latency_ms: Date.now() - started,
		})

		return {
			schema,
			documents: documents.length,
			tables: snapshot.tables,
			relationships,
			glossary,
		}
	}
}
