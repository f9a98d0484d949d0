/**
 * Tests for the vector index and its rebuild owner
 */

import { describe, it, expect } from "vitest"
import { AnalystError } from "./config.js"
import type { SchemaDocument } from "./schema_types.js"
import { SchemaIndex, VectorIndex, squaredDistance } from "./vector_index.js"

function doc(table: string, embedding: number[]): SchemaDocument {
	return {
		text: `Schema: s, Table: s.${table}`,
		embedding,
		metadata: { database: "db", schema: "s", table, kind: "table" },
	}
}

describe("squaredDistance", () => {
	it("sums squared component differences", () => {
		expect(squaredDistance([0, 0], [3, 4])).toBe(25)
		expect(squaredDistance([1, 2, 3], [1, 2, 3])).toBe(0)
	})
})

describe("VectorIndex", () => {
	it("returns hits in ascending distance with the distance attached", () => {
		const index = new VectorIndex()
		index.add([doc("far", [3, 0]), doc("near", [1, 0]), doc("mid", [0, 2])])

		const hits = index.search([0, 0], 3)
		expect(hits.map(h => h.metadata.table)).toEqual(["near", "mid", "far"])
		expect(hits.map(h => h.distance)).toEqual([1, 4, 9])
		expect(hits[0].text).toBe("Schema: s, Table: s.near")
	})

	it("clamps k to the index size", () => {
		const index = new VectorIndex()
		index.add([doc("a", [1]), doc("b", [2])])
		expect(index.search([0], 10)).toHaveLength(2)
	})

	it("returns no hits from an empty index", () => {
		expect(new VectorIndex().search([1, 2], 5)).toEqual([])
	})

	it("keeps insertion order for equal distances", () => {
		const index = new VectorIndex()
		index.add([doc("first", [1, 0]), doc("second", [0, 1]), doc("third", [-1, 0])])
		expect(index.search([0, 0], 3).map(h => h.metadata.table)).toEqual(["first", "second", "third"])
	})

	it("rejects embeddings of a different dimension", () => {
		const index = new VectorIndex()
		index.add([doc("a", [1, 2])])
		expect(() => index.add([doc("b", [1, 2, 3])])).toThrow(AnalystError)
		expect(index.size).toBe(1)
	})

	it("rejects a query of the wrong dimension", () => {
		const index = new VectorIndex()
		index.add([doc("a", [1, 2])])
		expect(() => index.search([1], 1)).toThrow(/does not match index dimension 2/)
	})

	it("rejects empty embeddings", () => {
		expect(() => new VectorIndex().add([doc("a", [])])).toThrow(/empty embedding/)
	})

	it("reset clears documents and the stored dimension", () => {
		const index = new VectorIndex()
		index.add([doc("a", [1, 2])])
		index.reset()
		expect(index.size).toBe(0)
		index.add([doc("b", [1, 2, 3])])
		expect(index.texts).toEqual(["Schema: s, Table: s.b"])
	})

	it("find filters metadata in insertion order", () => {
		const index = new VectorIndex()
		index.add([
			doc("a", [1]),
			{ text: "overview", embedding: [2], metadata: { database: "db", schema: "s", kind: "overview" } },
			doc("b", [3]),
		])
		expect(index.find(m => m.kind === "table").map(d => d.metadata.table)).toEqual(["a", "b"])
	})
})

describe("SchemaIndex", () => {
	it("swaps in a complete index after a rebuild", async () => {
		const owner = new SchemaIndex()
		const before = owner.current()

		const built = await owner.rebuild("s", async () => [doc("a", [1]), doc("b", [2])])

		expect(owner.current()).toBe(built)
		expect(owner.current()).not.toBe(before)
		expect(before.size).toBe(0)
		expect(owner.schema).toBe("s")
		expect(owner.search([0], 1)[0].metadata.table).toBe("a")
	})

	it("keeps the previous index when a rebuild fails", async () => {
		const owner = new SchemaIndex()
		await owner.rebuild("s", async () => [doc("a", [1])])
		const live = owner.current()

		await expect(
			owner.rebuild("s", async () => {
				throw new Error("catalog unavailable")
			}),
		).rejects.toThrow("catalog unavailable")

		expect(owner.current()).toBe(live)
		// The chain still accepts rebuilds after a failure
		await owner.rebuild("s", async () => [doc("c", [5])])
		expect(owner.current().texts).toEqual(["Schema: s, Table: s.c"])
	})

	it("serialises concurrent rebuilds", async () => {
		const owner = new SchemaIndex()
		const events: string[] = []
		let release: () => void = () => {}
		const gate = new Promise<void>(resolve => {
			release = resolve
		})

		const first = owner.rebuild("s", async () => {
			events.push("first:start")
			await gate
			events.push("first:end")
			return [doc("first", [1])]
		})
		const second = owner.rebuild("s", async () => {
			events.push("second:start")
			return [doc("second", [1])]
		})

		// Let pending microtasks run; the second producer must not have started
		await Promise.resolve()
		await Promise.resolve()
		expect(events).toEqual(["first:start"])

		release()
		await Promise.all([first, second])
		expect(events).toEqual(["first:start", "first:end", "second:start"])
		expect(owner.current().metadata[0].table).toBe("second")
	})

	it("clear empties the index", async () => {
		const owner = new SchemaIndex()
		await owner.rebuild("s", async () => [doc("a", [1])])
		owner.clear()
		expect(owner.current().size).toBe(0)
		expect(owner.schema).toBeNull()
	})
})
