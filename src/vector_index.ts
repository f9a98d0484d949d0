/**
 * Vector Index
 *
 * Exact nearest-neighbour search over schema document embeddings under
 * squared Euclidean distance. Schemas index tens to low hundreds of
 * documents, so a brute-force scan is all that is needed.
 *
 * SchemaIndex owns the live VectorIndex. A rebuild fills a fresh index and
 * swaps it in with one assignment, so searches only ever see a complete
 * document set.
 */

import { AnalystError } from "./config.js"
import type { DocumentMetadata, SchemaDocument, SearchHit } from "./schema_types.js"

export function squaredDistance(a: number[], b: number[]): number {
	let sum = 0
	for (let i = 0; i < a.length; i++) {
		const d = a[i] - b[i]
		sum += d * d
	}
	return sum
}

export class VectorIndex {
	// texts[i], metadata[i] and embeddings[i] describe the same document
	private _texts: string[] = []
	private _metadata: DocumentMetadata[] = []
	private embeddings: number[][] = []
	private dimension: number | null = null

	get size(): number {
		return this._texts.length
	}

	get texts(): readonly string[] {
		return this._texts
	}

	get metadata(): readonly DocumentMetadata[] {
		return this._metadata
	}

	/**
	 * Append documents. Every embedding must share the dimension of the
	 * first document ever added (until reset).
	 */
	add(documents: SchemaDocument[]): void {
		for (const doc of documents) {
			if (doc.embedding.length === 0) {
				throw new AnalystError("retrieval", "Cannot index a document with an empty embedding", false, {
					table: doc.metadata.table,
				})
			}
			const expected = this.dimension ?? doc.embedding.length
			if (doc.embedding.length !== expected) {
				throw new AnalystError(
					"retrieval",
					`Embedding dimension mismatch: expected ${expected}, got ${doc.embedding.length}`,
					false,
					{ table: doc.metadata.table },
				)
			}
		}

		for (const doc of documents) {
			this.dimension ??= doc.embedding.length
			this._texts.push(doc.text)
			this._metadata.push(doc.metadata)
			this.embeddings.push([...doc.embedding])
		}
	}

	/**
	 * The k documents closest to the query, ascending by distance.
	 * An empty index returns no hits.
	 */
	search(queryEmbedding: number[], k: number): SearchHit[] {
		const limit = Math.min(k, this.size)
		if (limit <= 0) return []

		if (this.dimension !== null && queryEmbedding.length !== this.dimension) {
			throw new AnalystError(
				"retrieval",
				`Query embedding dimension ${queryEmbedding.length} does not match index dimension ${this.dimension}`,
			)
		}

		const scored = this.embeddings.map((embedding, i) => ({
			index: i,
			distance: squaredDistance(queryEmbedding, embedding),
		}))
		// Ties keep insertion order
		scored.sort((a, b) => a.distance - b.distance || a.index - b.index)

		return scored.slice(0, limit).map(({ index, distance }) => ({
			text: this._texts[index],
			metadata: this._metadata[index],
			distance,
		}))
	}

	/** Documents matching a predicate, in insertion order. */
	find(predicate: (metadata: DocumentMetadata) => boolean): Array<{ text: string; metadata: DocumentMetadata }> {
		const found: Array<{ text: string; metadata: DocumentMetadata }> = []
		for (let i = 0; i < this.size; i++) {
			if (predicate(this._metadata[i])) {
				found.push({ text: this._texts[i], metadata: this._metadata[i] })
			}
		}
		return found
	}

	reset(): void {
		this._texts = []
		this._metadata = []
		this.embeddings = []
		this.dimension = null
	}
}

/**
 * Owner of the live index. Readers call current() per request; rebuilds
 * are serialised and replace the whole index at once.
 */
export class SchemaIndex {
	private index: VectorIndex = new VectorIndex()
	private rebuildChain: Promise<void> = Promise.resolve()
	private _schema: string | null = null

	current(): VectorIndex {
		return this.index
	}

	/** Schema of the documents currently indexed, null before the first build. */
	get schema(): string | null {
		return this._schema
	}

	search(queryEmbedding: number[], k: number): SearchHit[] {
		return this.index.search(queryEmbedding, k)
	}

	/**
	 * Replace the indexed document set. The producer runs inside the
	 * critical section, so two rebuilds never interleave; the swap happens
	 * only if the producer succeeds.
	 */
	rebuild(schema: string, produce: () => Promise<SchemaDocument[]>): Promise<VectorIndex> {
		const run = this.rebuildChain.then(async () => {
			const documents = await produce()
			const next = new VectorIndex()
			next.add(documents)
			this.index = next
			this._schema = schema
			return next
		})
		// Keep the chain alive after a failed rebuild; the caller still sees the rejection
		this.rebuildChain = run.then(
			() => undefined,
			() => undefined,
		)
		return run
	}

	clear(): void {
		this.index = new VectorIndex()
		this._schema = null
	}
}
