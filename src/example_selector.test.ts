/**
 * Tests for golden example storage and selection
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { AnalystError } from "./config.js"
import { ExampleSelector, GoldenExampleStore, formatExamples } from "./example_selector.js"
import { KeywordEmbedder } from "./test_helpers.js"

let tmpDir: string
let examplesPath: string

const EXAMPLES_YAML = `
northwind:
  - question: How many customers are there?
    sql: SELECT COUNT(*) FROM northwind.customers
  - question: Which products are most expensive?
    sql: SELECT productname FROM northwind.products ORDER BY unitprice DESC LIMIT 5
  - question: How many orders shipped to Germany?
    sql: SELECT COUNT(*) FROM northwind.orders WHERE shipcountry = 'Germany'
other:
`

beforeEach(() => {
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "analyst-examples-test-"))
	examplesPath = path.join(tmpDir, "examples.yaml")
	fs.writeFileSync(examplesPath, EXAMPLES_YAML)
})

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true })
})

describe("GoldenExampleStore", () => {
	it("lists examples per schema", () => {
		const store = new GoldenExampleStore(examplesPath)
		expect(store.list("northwind").map(e => e.question)).toEqual([
			"How many customers are there?",
			"Which products are most expensive?",
			"How many orders shipped to Germany?",
		])
	})

	it("returns nothing for unknown or empty schemas and missing files", () => {
		expect(new GoldenExampleStore(examplesPath).list("sales")).toEqual([])
		expect(new GoldenExampleStore(examplesPath).list("other")).toEqual([])
		expect(new GoldenExampleStore(path.join(tmpDir, "missing.yaml")).list("northwind")).toEqual([])
	})

	it("rejects entries without SQL", () => {
		fs.writeFileSync(examplesPath, "northwind:\n  - question: Only a question\n")
		expect(() => new GoldenExampleStore(examplesPath).list("northwind")).toThrow(AnalystError)
	})
})

describe("ExampleSelector", () => {
	it("returns the closest examples first", async () => {
		const embedder = new KeywordEmbedder(["customers", "products", "orders", "germany"])
		const selector = new ExampleSelector(new GoldenExampleStore(examplesPath), embedder)
		const question = await embedder.embed("How many orders went to Germany?")

		const ranked = await selector.select("northwind", question, 2)

		expect(ranked.map(e => e.question)).toEqual([
			"How many orders shipped to Germany?",
			"How many customers are there?",
		])
		expect(ranked[0].distance).toBe(0)
		expect(ranked[1].distance).toBe(3)
	})

	it("embeds each example question once", async () => {
		const embedder = new KeywordEmbedder(["orders"])
		const selector = new ExampleSelector(new GoldenExampleStore(examplesPath), embedder)

		await selector.select("northwind", [1, 1], 3)
		await selector.select("northwind", [0, 1], 3)

		expect(embedder.calls).toHaveLength(3)
	})

	it("returns nothing when the schema has no examples", async () => {
		const selector = new ExampleSelector(new GoldenExampleStore(examplesPath), new KeywordEmbedder([]))
		expect(await selector.select("sales", [1], 3)).toEqual([])
	})
})

describe("formatExamples", () => {
	it("numbers each question and its SQL", () => {
		expect(formatExamples([{ question: "How many customers?", sql: "SELECT COUNT(*) FROM northwind.customers" }])).toBe(
			"Example 1:\nQuestion: How many customers?\nSQL: SELECT COUNT(*) FROM northwind.customers",
		)
	})
})
