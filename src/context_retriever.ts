/**
 * Context Retriever
 *
 * Turns a question into the schema context the synthesizer sees.
 *
 * Flow:
 * 1. Embed the question and search the schema index (top_k hits)
 * 2. Narrow the table hits:
 *    - small schemas: ask the model which tables the question needs
 *    - otherwise: keep hits within distance_ratio of the best hit
 * 3. Always keep the schema overview document
 * 4. Prune wide tables down to the columns closest to the question
 * 5. Build the validation whitelist from every indexed table (unpruned)
 */

import { AnalystError, errorMessage } from "./config.js"
import type { GoldenExampleStore } from "./example_selector.js"
import type { Logger } from "./logger.js"
import {
	renderColumnText,
	renderTableDocument,
	type ColumnDescriptor,
	type ColumnWhitelist,
	type CompletionProvider,
	type ContextDocument,
	type DocumentMetadata,
	type EmbeddingProvider,
	type GoldenExample,
	type SearchHit,
} from "./schema_types.js"
import { squaredDistance, type SchemaIndex, type VectorIndex } from "./vector_index.js"

// ============================================================================
// Configuration
// ============================================================================

export interface RetrieverSettings {
	topK: number
	distanceRatio: number
	smallSchemaTableLimit: number
	llmTableSelection: boolean
	columnPruneThreshold: number
	columnKeepMin: number
	columnKeepMax: number
	keyFragments: string[]
}

export const DEFAULT_RETRIEVER_SETTINGS: RetrieverSettings = {
	topK: 8,
	distanceRatio: 1.15,
	smallSchemaTableLimit: 5,
	llmTableSelection: true,
	columnPruneThreshold: 8,
	columnKeepMin: 5,
	columnKeepMax: 10,
	keyFragments: ["id", "key", "number", "code"],
}

export interface RetrievedContext {
	questionEmbedding: number[]
	/** Kept table documents (ascending distance) followed by the overview */
	documents: ContextDocument[]
	/** Names of the kept tables */
	tables: string[]
	whitelist: ColumnWhitelist
	/** True when the index was empty and only the fallback hint was returned */
	fallback: boolean
}

export function fallbackContextText(schema: string): string {
	return `Use ${schema} schema. Query information_schema to discover available tables and columns.`
}

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Keep hits whose distance is within `ratio` times the best distance.
 * Input order is preserved.
 */
export function filterByRelativeDistance<T extends { distance: number }>(hits: T[], ratio: number): T[] {
	if (hits.length === 0) return []
	const best = Math.min(...hits.map(h => h.distance))
	const cutoff = best * ratio
	return hits.filter(h => h.distance <= cutoff)
}

/** Number of best-scoring columns kept for a table with n columns */
export function columnKeepCount(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, Math.ceil(n / 4)))
}

/**
 * Lowercased identifier words used in example SQL. A column named by one
 * of these survives pruning.
 */
export function exampleIdentifiers(examples: GoldenExample[]): Set<string> {
	const words = new Set<string>()
	for (const ex of examples) {
		for (const word of ex.sql.toLowerCase().match(/[a-z_][a-z0-9_]*/g) ?? []) {
			words.add(word)
		}
	}
	return words
}

/**
 * Parse a comma or newline separated table list from a model answer,
 * keeping only names among the candidates
 */
export function parseTableSelection(answer: string, candidates: string[]): string[] {
	const byLower = new Map(candidates.map(c => [c.toLowerCase(), c]))
	const selected: string[] = []
	for (const raw of answer.split(/[,\n]/)) {
		const name = raw
			.trim()
			.replace(/^[-*\d.\s]+/, "")
			.replace(/[`"'\s]/g, "")
			.split(".")
			.pop()
			?.toLowerCase()
		const match = name ? byLower.get(name) : undefined
		if (match && !selected.includes(match)) selected.push(match)
	}
	return selected
}

/**
 * Every indexed table with all of its column names
 */
export function buildWhitelist(index: VectorIndex): ColumnWhitelist {
	const whitelist: ColumnWhitelist = new Map()
	for (const { metadata } of index.find(m => m.kind === "table")) {
		if (!metadata.table) continue
		whitelist.set(metadata.table, new Set((metadata.columns ?? []).map(c => c.column_name)))
	}
	return whitelist
}

// ============================================================================
// Retriever
// ============================================================================

export class ContextRetriever {
	private settings: RetrieverSettings

	constructor(
		private index: SchemaIndex,
		private embedder: EmbeddingProvider,
		private completer: CompletionProvider | null,
		private examples: GoldenExampleStore | null,
		private logger: Logger,
		settings: Partial<RetrieverSettings> = {},
	) {
		this.settings = { ...DEFAULT_RETRIEVER_SETTINGS, ...settings }
	}

	async retrieve(question: string, schema: string): Promise<RetrievedContext> {
		const questionEmbedding = await this.embed(question)
		// Pin the index for the whole request; a concurrent rebuild swaps a new one in
		const index = this.index.current()

		if (index.size === 0) {
			this.logger.warn("Schema index is empty, using fallback context", { schema })
			return {
				questionEmbedding,
				documents: [{ text: fallbackContextText(schema), metadata: { database: "", schema, kind: "overview" } }],
				tables: [],
				whitelist: new Map(),
				fallback: true,
			}
		}

		const hits = index.search(questionEmbedding, this.settings.topK)
		const tableHits = hits.filter(h => h.metadata.kind === "table" && h.metadata.table)
		const tableCount = index.find(m => m.kind === "table").length

		const kept = await this.narrowTables(question, tableHits, tableCount)

		const documents: ContextDocument[] = []
		for (const hit of kept) {
			documents.push(await this.pruneDocument(hit, questionEmbedding, schema))
		}

		const overviewHit = hits.find(h => h.metadata.kind === "overview")
		const overview = overviewHit ?? index.find(m => m.kind === "overview")[0]
		if (overview) documents.push(overview)

		const tables = kept.flatMap(h => (h.metadata.table ? [h.metadata.table] : []))
		this.logger.debug("Context retrieved", {
			schema,
			hits: hits.length,
			tables,
			distances: kept.map(h => Number(h.distance.toFixed(4))),
		})

		return {
			questionEmbedding,
			documents,
			tables,
			whitelist: buildWhitelist(index),
			fallback: false,
		}
	}

	private async embed(text: string): Promise<number[]> {
		try {
			return await this.embedder.embed(text)
		} catch (error) {
			if (error instanceof AnalystError && error.kind === "retrieval") throw error
			throw new AnalystError("retrieval", `Embedding failed: ${errorMessage(error)}`, false, {
				originalError: errorMessage(error),
			})
		}
	}

	private async narrowTables(question: string, tableHits: SearchHit[], tableCount: number): Promise<SearchHit[]> {
		const { smallSchemaTableLimit, llmTableSelection, distanceRatio } = this.settings
		if (tableCount > smallSchemaTableLimit || !llmTableSelection || !this.completer) {
			return filterByRelativeDistance(tableHits, distanceRatio)
		}

		const candidates = tableHits.flatMap(h => (h.metadata.table ? [h.metadata.table] : []))
		if (candidates.length <= 1) return tableHits

		const prompt =
			`Question: ${question}\n\n` +
			`Tables:\n${tableHits.map(h => `- ${h.text}`).join("\n")}\n\n` +
			"Which of these tables are needed to answer the question? " +
			"Reply with the table names only, comma-separated, without schema prefixes."

		try {
			const answer = await this.completer.complete(prompt, { temperature: 0, maxTokens: 100 })
			const selected = new Set(parseTableSelection(answer, candidates))
			if (selected.size === 0) {
				this.logger.debug("Table selection answer was empty or unparseable, keeping all hits", { answer })
				return tableHits
			}
			return tableHits.filter(h => h.metadata.table !== undefined && selected.has(h.metadata.table))
		} catch (error) {
			this.logger.warn("Table selection failed, keeping all hits", { error: errorMessage(error) })
			return tableHits
		}
	}

	private async pruneDocument(hit: SearchHit, questionEmbedding: number[], schema: string): Promise<ContextDocument> {
		const { metadata } = hit
		const columns = metadata.columns ?? []
		if (!metadata.table || columns.length <= this.settings.columnPruneThreshold) {
			return hit
		}
		const table = metadata.table

		// Concurrent; each score stays paired with its column index
		const scores = await Promise.all(
			columns.map(async (col, i) => ({
				index: i,
				distance: squaredDistance(questionEmbedding, await this.embed(renderColumnText(table, col))),
			})),
		)
		scores.sort((a, b) => a.distance - b.distance || a.index - b.index)

		const keep = new Set(
			scores
				.slice(0, columnKeepCount(columns.length, this.settings.columnKeepMin, this.settings.columnKeepMax))
				.map(s => s.index),
		)

		const exampleWords = this.examples ? exampleIdentifiers(this.examples.list(schema)) : new Set<string>()
		columns.forEach((col, i) => {
			const name = col.column_name.toLowerCase()
			if (this.settings.keyFragments.some(f => name.includes(f)) || exampleWords.has(name)) {
				keep.add(i)
			}
		})

		const kept: ColumnDescriptor[] = columns.filter((_, i) => keep.has(i))
		const prunedMetadata: DocumentMetadata = { ...metadata, columns: kept }
		return {
			text: renderTableDocument(metadata.schema, table, metadata.table_comment, kept, metadata.relationships),
			metadata: prunedMetadata,
			distance: hit.distance,
		}
	}
}
