/**
 * In-process stand-ins for the model server and the database, shared by
 * the test files.
 */

import type {
	CompletionOptions,
	CompletionProvider,
	EmbeddingProvider,
	QueryResultSet,
	QueryRunner,
	ResultRow,
} from "./schema_types.js"

/**
 * Bag-of-words embedder: one dimension per vocabulary word, counting its
 * occurrences in the lowercased text, plus a constant last dimension.
 */
export class KeywordEmbedder implements EmbeddingProvider {
	calls: string[] = []

	constructor(private vocabulary: string[]) {}

	async embed(text: string): Promise<number[]> {
		this.calls.push(text)
		const words = text.toLowerCase().match(/[a-z0-9_]+/g) ?? []
		return [...this.vocabulary.map(v => words.filter(w => w === v).length), 1]
	}
}

/**
 * Embedder answering from a fixed table of texts
 */
export class TableEmbedder implements EmbeddingProvider {
	constructor(
		private vectors: Map<string, number[]>,
		private fallback: number[] | null = null,
	) {}

	async embed(text: string): Promise<number[]> {
		const vector = this.vectors.get(text) ?? this.fallback
		if (!vector) throw new Error(`no embedding for: ${text}`)
		return vector
	}
}

export type ScriptedResponse = string | Error | ((prompt: string) => string)

/**
 * Completion provider that replays responses in order and records prompts
 */
export class ScriptedCompleter implements CompletionProvider {
	prompts: string[] = []
	options: CompletionOptions[] = []

	constructor(private responses: ScriptedResponse[]) {}

	async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
		this.prompts.push(prompt)
		this.options.push(options)
		const next = this.responses.shift()
		if (next === undefined) throw new Error("no scripted response left")
		if (next instanceof Error) throw next
		return typeof next === "function" ? next(prompt) : next
	}
}

/**
 * Query runner answering catalog queries by exact SQL text and generated
 * SQL through a handler
 */
export class FakeQueryRunner implements QueryRunner {
	queries: Array<{ sql: string; params: unknown[] }> = []
	executed: string[] = []

	constructor(
		private catalog: Map<string, ResultRow[] | Error>,
		private execute: (sql: string) => QueryResultSet = () => ({ rows: [], columnNames: [] }),
	) {}

	async runQuery(sql: string, params: unknown[] = []): Promise<ResultRow[]> {
		this.queries.push({ sql, params })
		const answer = this.catalog.get(sql)
		if (answer instanceof Error) throw answer
		return answer ?? []
	}

	runQueryWithColumns = async (sql: string): Promise<QueryResultSet> => {
		this.executed.push(sql)
		return this.execute(sql)
	}
}
