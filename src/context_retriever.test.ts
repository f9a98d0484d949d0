/**
 * Tests for context retrieval, table narrowing and column pruning
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { AnalystError } from "./config.js"
import {
	ContextRetriever,
	columnKeepCount,
	exampleIdentifiers,
	fallbackContextText,
	filterByRelativeDistance,
	parseTableSelection,
} from "./context_retriever.js"
import { GoldenExampleStore } from "./example_selector.js"
import { silentLogger } from "./logger.js"
import { renderOverviewDocument, renderTableDocument, type EmbeddingProvider, type SchemaDocument } from "./schema_types.js"
import { ScriptedCompleter, TableEmbedder } from "./test_helpers.js"
import { SchemaIndex } from "./vector_index.js"

// ============================================================================
// Test Fixtures
// ============================================================================

const QUESTION = "Which customers ordered the most?"

function tableDoc(table: string, embedding: number[], columns: string[] = ["id", "name"]): SchemaDocument {
	const cols = columns.map(c => ({ column_name: c, data_type: "text", description: null }))
	return {
		text: renderTableDocument("northwind", table, null, cols),
		embedding,
		metadata: { database: "sales", schema: "northwind", table, kind: "table", table_comment: null, columns: cols, relationships: [] },
	}
}

function overviewDoc(tables: string[], embedding: number[]): SchemaDocument {
	return {
		text: renderOverviewDocument("sales", "northwind", tables),
		embedding,
		metadata: { database: "sales", schema: "northwind", kind: "overview" },
	}
}

async function buildIndex(docs: SchemaDocument[]): Promise<SchemaIndex> {
	const index = new SchemaIndex()
	await index.rebuild("northwind", async () => docs)
	return index
}

function questionEmbedder(vector: number[]): EmbeddingProvider {
	return new TableEmbedder(new Map([[QUESTION, vector]]))
}

let tmpDir: string

beforeEach(() => {
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "analyst-retriever-test-"))
})

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true })
})

// ============================================================================
// Pure helpers
// ============================================================================

describe("filterByRelativeDistance", () => {
	it("keeps hits within the ratio of the best distance", () => {
		const hits = [1.0, 1.1, 1.3, 5.0].map(distance => ({ distance }))
		expect(filterByRelativeDistance(hits, 1.15).map(h => h.distance)).toEqual([1.0, 1.1])
	})

	it("keeps every hit at distance zero when the best is zero", () => {
		expect(filterByRelativeDistance([{ distance: 0 }, { distance: 0 }, { distance: 0.1 }], 1.15)).toHaveLength(2)
	})

	it("returns nothing for no hits", () => {
		expect(filterByRelativeDistance([], 1.15)).toEqual([])
	})
})

describe("columnKeepCount", () => {
	it("keeps a quarter of the columns clamped to [5, 10]", () => {
		expect(columnKeepCount(12, 5, 10)).toBe(5)
		expect(columnKeepCount(30, 5, 10)).toBe(8)
		expect(columnKeepCount(80, 5, 10)).toBe(10)
	})
})

describe("parseTableSelection", () => {
	it("matches names case-insensitively and strips schema prefixes", () => {
		expect(parseTableSelection("northwind.Orders, customers\n- products", ["customers", "orders", "employees"])).toEqual([
			"orders",
			"customers",
		])
	})

	it("returns nothing for an unrelated answer", () => {
		expect(parseTableSelection("I am not sure.", ["customers"])).toEqual([])
	})
})

describe("exampleIdentifiers", () => {
	it("collects lowercased identifier words from example SQL", () => {
		const words = exampleIdentifiers([{ question: "q", sql: "SELECT o.RequiredDate FROM northwind.orders o" }])
		expect(words.has("requireddate")).toBe(true)
		expect(words.has("orders")).toBe(true)
	})
})

// ============================================================================
// Retrieval
// ============================================================================

describe("ContextRetriever.retrieve", () => {
	it("keeps tables within the distance ratio plus the overview on larger schemas", async () => {
		const tables = ["customers", "orders", "products", "employees", "suppliers", "shippers"]
		const index = await buildIndex([
			tableDoc("customers", [1, 0]), // 1
			tableDoc("orders", [1, 0.3]), // 1.09
			tableDoc("products", [1, 0.6]), // 1.36
			tableDoc("employees", [2, 1]), // 5
			tableDoc("suppliers", [3, 0]), // 9
			tableDoc("shippers", [0, 4]), // 16
			overviewDoc(tables, [5, 5]), // 50
		])
		const completer = new ScriptedCompleter([])
		const retriever = new ContextRetriever(index, questionEmbedder([0, 0]), completer, null, silentLogger)

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.tables).toEqual(["customers", "orders"])
		expect(context.documents.map(d => d.metadata.kind)).toEqual(["table", "table", "overview"])
		expect(context.documents[2].text).toBe(renderOverviewDocument("sales", "northwind", tables))
		expect(context.fallback).toBe(false)
		expect(completer.prompts).toHaveLength(0)
	})

	it("fetches the overview even when it is outside the top hits", async () => {
		const docs = ["a", "b", "c", "d", "e", "f"].map((t, i) => tableDoc(t, [i + 1]))
		const index = await buildIndex([...docs, overviewDoc(["a"], [100])])
		const retriever = new ContextRetriever(index, questionEmbedder([0]), null, null, silentLogger, { topK: 2 })

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.tables).toEqual(["a"])
		expect(context.documents.map(d => d.metadata.kind)).toEqual(["table", "overview"])
	})

	it("builds the whitelist from every indexed table", async () => {
		const index = await buildIndex([
			tableDoc("customers", [1], ["customerid", "companyname"]),
			tableDoc("orders", [9], ["orderid", "customerid"]),
			overviewDoc(["customers", "orders"], [50]),
		])
		const retriever = new ContextRetriever(index, questionEmbedder([0]), null, null, silentLogger, { topK: 1 })

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.tables).toEqual(["customers"])
		expect(context.whitelist).toEqual(
			new Map([
				["customers", new Set(["customerid", "companyname"])],
				["orders", new Set(["orderid", "customerid"])],
			]),
		)
	})

	it("asks the model to pick tables on small schemas", async () => {
		const index = await buildIndex([
			tableDoc("customers", [1]),
			tableDoc("orders", [2]),
			tableDoc("products", [3]),
			overviewDoc(["customers", "orders", "products"], [4]),
		])
		const completer = new ScriptedCompleter(["northwind.orders, customers"])
		const retriever = new ContextRetriever(index, questionEmbedder([0]), completer, null, silentLogger)

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.tables).toEqual(["customers", "orders"])
		expect(completer.prompts[0]).toContain(`Question: ${QUESTION}`)
		expect(completer.options[0]).toEqual({ temperature: 0, maxTokens: 100 })
	})

	it("keeps every hit when the table pick is unusable or fails", async () => {
		const index = await buildIndex([tableDoc("customers", [1]), tableDoc("orders", [2]), overviewDoc(["customers", "orders"], [4])])
		const completer = new ScriptedCompleter(["I cannot tell", new Error("model offline")])
		const retriever = new ContextRetriever(index, questionEmbedder([0]), completer, null, silentLogger)

		expect((await retriever.retrieve(QUESTION, "northwind")).tables).toEqual(["customers", "orders"])
		expect((await retriever.retrieve(QUESTION, "northwind")).tables).toEqual(["customers", "orders"])
	})

	it("uses the distance filter on small schemas when table selection is off", async () => {
		const index = await buildIndex([tableDoc("customers", [1]), tableDoc("orders", [2]), overviewDoc(["customers", "orders"], [4])])
		const completer = new ScriptedCompleter([])
		const retriever = new ContextRetriever(index, questionEmbedder([0]), completer, null, silentLogger, {
			llmTableSelection: false,
		})

		expect((await retriever.retrieve(QUESTION, "northwind")).tables).toEqual(["customers"])
		expect(completer.prompts).toHaveLength(0)
	})

	it("returns the fallback context for an empty index", async () => {
		const retriever = new ContextRetriever(new SchemaIndex(), questionEmbedder([0]), null, null, silentLogger)

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.fallback).toBe(true)
		expect(context.tables).toEqual([])
		expect(context.whitelist.size).toBe(0)
		expect(context.documents.map(d => d.text)).toEqual([fallbackContextText("northwind")])
		expect(fallbackContextText("northwind")).toBe(
			"Use northwind schema. Query information_schema to discover available tables and columns.",
		)
	})

	it("raises a retrieval error when the question cannot be embedded", async () => {
		const index = await buildIndex([tableDoc("customers", [1])])
		const retriever = new ContextRetriever(index, new TableEmbedder(new Map()), null, null, silentLogger)

		const attempt = retriever.retrieve(QUESTION, "northwind")
		await expect(attempt).rejects.toBeInstanceOf(AnalystError)
		await expect(attempt).rejects.toMatchObject({ kind: "retrieval" })
	})
})

// ============================================================================
// Column pruning
// ============================================================================

describe("ContextRetriever column pruning", () => {
	const ORDER_COLUMNS = [
		"orderid", "customerid", "freight", "shipname", "shipaddress", "shipcity",
		"shipregion", "shippostalcode", "shipcountry", "orderdate", "requireddate", "shippeddate",
	]
	const RANKS: Record<string, number> = { freight: 1, shipcountry: 2, orderdate: 3, shipcity: 4, shipname: 5 }

	// Question sits at 0; each column sits at its rank (10 when unranked)
	const columnEmbedder: EmbeddingProvider = {
		async embed(text: string): Promise<number[]> {
			if (!text.startsWith("orders.")) return [0]
			const name = text.slice("orders.".length).split(" ")[0]
			return [RANKS[name] ?? 10]
		},
	}

	it("keeps the best columns, key columns and example columns in ordinal order", async () => {
		const examplesPath = path.join(tmpDir, "examples.yaml")
		fs.writeFileSync(
			examplesPath,
			"northwind:\n  - question: When is it due?\n    sql: SELECT o.requireddate FROM northwind.orders o\n",
		)
		const index = await buildIndex([tableDoc("orders", [1], ORDER_COLUMNS), overviewDoc(["orders"], [2])])
		const retriever = new ContextRetriever(
			index,
			columnEmbedder,
			null,
			new GoldenExampleStore(examplesPath),
			silentLogger,
		)

		const context = await retriever.retrieve(QUESTION, "northwind")
		const orders = context.documents[0]

		expect(orders.metadata.columns?.map(c => c.column_name)).toEqual([
			"orderid", "customerid", "freight", "shipname", "shipcity",
			"shippostalcode", "shipcountry", "orderdate", "requireddate",
		])
		expect(orders.text).toBe(
			"Schema: northwind, Table: northwind.orders\n" +
				"Columns: orderid (text) | customerid (text) | freight (text) | shipname (text) | shipcity (text) | " +
				"shippostalcode (text) | shipcountry (text) | orderdate (text) | requireddate (text)",
		)
		expect(orders.distance).toBe(1)
		expect(context.whitelist.get("orders")?.size).toBe(12)
	})

	it("does not keep columns that merely contain the letters of a short word", async () => {
		const cols = [
			"productid", "productname", "unitprice", "unitsinstock", "discontinued",
			"unitsonorder", "notes", "reorderlevel", "categoryid",
		]
		const index = await buildIndex([tableDoc("orders", [1], cols), overviewDoc(["orders"], [2])])
		const retriever = new ContextRetriever(index, columnEmbedder, null, null, silentLogger)

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.documents[0].metadata.columns?.map(c => c.column_name)).toEqual([
			"productid", "productname", "unitprice", "unitsinstock", "discontinued", "categoryid",
		])
	})

	it("leaves tables at or below the threshold unpruned", async () => {
		const cols = ORDER_COLUMNS.slice(0, 8)
		const index = await buildIndex([tableDoc("orders", [1], cols), overviewDoc(["orders"], [2])])
		const retriever = new ContextRetriever(index, columnEmbedder, null, null, silentLogger)

		const context = await retriever.retrieve(QUESTION, "northwind")

		expect(context.documents[0].metadata.columns?.map(c => c.column_name)).toEqual(cols)
	})
})
