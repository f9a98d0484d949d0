/**
 * Golden Example Selection
 *
 * Few-shot (question, SQL) pairs per schema, read from examples.yaml:
 *
 *   northwind:
 *     - question: How many customers are there?
 *       sql: SELECT COUNT(*) AS customer_count FROM northwind.customers
 *
 * The selector embeds each example question once and returns the examples
 * closest to the incoming question.
 */

import * as fs from "fs"
import * as yaml from "js-yaml"
import { z } from "zod"
import { AnalystError } from "./config.js"
import type { EmbeddingProvider, GoldenExample, RankedExample } from "./schema_types.js"
import { squaredDistance } from "./vector_index.js"

const exampleSchema = z.object({
	question: z.string().min(1),
	sql: z.string().min(1),
})

const examplesFileSchema = z.record(z.array(exampleSchema).nullable())

/**
 * Read-only store over the examples file. The file is read once and cached;
 * a missing file means no examples.
 */
export class GoldenExampleStore {
	private cache: Record<string, GoldenExample[] | null> | null = null

	constructor(private filePath: string) {}

	private load(): Record<string, GoldenExample[] | null> {
		if (this.cache) return this.cache
		if (!fs.existsSync(this.filePath)) {
			this.cache = {}
			return this.cache
		}
		const parsed = yaml.load(fs.readFileSync(this.filePath, "utf-8"))
		const result = examplesFileSchema.safeParse(parsed ?? {})
		if (!result.success) {
			throw new AnalystError("config", `Invalid examples file ${this.filePath}: ${result.error.message}`)
		}
		this.cache = result.data
		return this.cache
	}

	list(schema: string): GoldenExample[] {
		return this.load()[schema] ?? []
	}
}

export class ExampleSelector {
	// key: schema + "\u0000" + question
	private embeddings = new Map<string, number[]>()

	constructor(
		private store: GoldenExampleStore,
		private embedder: EmbeddingProvider,
	) {}

	/**
	 * The k examples of a schema whose question embedding is closest to the
	 * given one, ascending by distance
	 */
	async select(schema: string, questionEmbedding: number[], k: number = 3): Promise<RankedExample[]> {
		const examples = this.store.list(schema)
		if (examples.length === 0 || k <= 0) return []

		const ranked: RankedExample[] = []
		for (const example of examples) {
			const embedding = await this.embeddingFor(schema, example.question)
			if (embedding.length !== questionEmbedding.length) continue
			ranked.push({ ...example, distance: squaredDistance(questionEmbedding, embedding) })
		}

		// Stable sort keeps file order on ties
		ranked.sort((a, b) => a.distance - b.distance)
		return ranked.slice(0, k)
	}

	private async embeddingFor(schema: string, question: string): Promise<number[]> {
		const key = `${schema}\u0000${question}`
		const cached = this.embeddings.get(key)
		if (cached) return cached
		const embedding = await this.embedder.embed(question)
		this.embeddings.set(key, embedding)
		return embedding
	}
}

/**
 * Render examples for a prompt
 */
export function formatExamples(examples: GoldenExample[]): string {
	return examples.map((ex, i) => `Example ${i + 1}:\nQuestion: ${ex.question}\nSQL: ${ex.sql}`).join("\n\n")
}
