/**
 * Data Analyst MCP Server
 *
 * Wires the pipeline components together and exposes them as MCP tools:
 * - nl_query:            answer a business question with SQL + analysis
 * - explain_sql:         plain-English explanation of a SQL statement
 * - list_relationships:  merged join metadata for the schema
 * - add_relationship:    declare a join in the overlay file (re-indexes)
 * - delete_relationship: remove a declared join (re-indexes)
 * - reindex_schema:      rebuild the schema index from the live catalog
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { errorMessage } from "./config.js"
import { resolveConfigPath, type AnalystConfig } from "./config/loadConfig.js"
import { ContextRetriever } from "./context_retriever.js"
import { createQueryRunner } from "./database.js"
import { ExampleSelector, GoldenExampleStore } from "./example_selector.js"
import type { Logger } from "./logger.js"
import { createModelClient } from "./model_client.js"
import { getAllRelationships, RelationshipOverlayStore } from "./relationship_manager.js"
import { ResultNarrator } from "./result_narrator.js"
import { SchemaIndexer, type IndexResult } from "./schema_indexer.js"
import type { CompletionProvider, EmbeddingProvider, QueryRunner, WorkflowState } from "./schema_types.js"
import { SqlSynthesizer } from "./sql_synthesizer.js"
import { SchemaIndex } from "./vector_index.js"
import { AnalysisWorkflow } from "./workflow.js"

export const SERVER_NAME = "data-analyst"
export const SERVER_VERSION = "1.0.0"

export type ModelProvider = EmbeddingProvider & CompletionProvider

export interface AnalystServices {
	config: AnalystConfig
	logger: Logger
	runner: QueryRunner
	index: SchemaIndex
	overlay: RelationshipOverlayStore
	indexer: SchemaIndexer
	narrator: ResultNarrator
	workflow: AnalysisWorkflow
}

export interface ServiceOverrides {
	runner?: QueryRunner
	model?: ModelProvider
}

/**
 * Build every component from config. Tests inject an in-process runner
 * and model.
 */
export function createServices(config: AnalystConfig, logger: Logger, overrides: ServiceOverrides = {}): AnalystServices {
	const runner = overrides.runner ?? createQueryRunner(config.database, logger)
	const model = overrides.model ?? createModelClient(config.model)

	const index = new SchemaIndex()
	const overlay = new RelationshipOverlayStore(resolveConfigPath(config.overlays.relationships_path))
	const exampleStore = new GoldenExampleStore(resolveConfigPath(config.overlays.examples_path))
	const { retrieval, generation, narration, database } = config

	const retriever = new ContextRetriever(index, model, model, exampleStore, logger, {
		topK: retrieval.top_k,
		distanceRatio: retrieval.distance_ratio,
		smallSchemaTableLimit: retrieval.small_schema_table_limit,
		llmTableSelection: retrieval.llm_table_selection,
		columnPruneThreshold: retrieval.column_prune_threshold,
		columnKeepMin: retrieval.column_keep_min,
		columnKeepMax: retrieval.column_keep_max,
		keyFragments: retrieval.key_fragments,
	})
	const synthesizer = new SqlSynthesizer(model, logger, {
		maxAttempts: generation.max_attempts,
		temperature: generation.temperature,
		maxTokens: generation.max_tokens,
	})
	const narrator = new ResultNarrator(model, {
		maxRows: narration.max_rows,
		temperature: narration.temperature,
		maxTokens: narration.max_tokens,
	})
	const workflow = new AnalysisWorkflow({
		retriever,
		examples: new ExampleSelector(exampleStore, model),
		synthesizer,
		narrator,
		logger,
		schema: database.schema,
		examplesK: generation.examples_k,
	})

	return {
		config,
		logger,
		runner,
		index,
		overlay,
		indexer: new SchemaIndexer(runner, model, overlay, logger),
		narrator,
		workflow,
	}
}

// ============================================================================
// Tool Handlers
// ============================================================================

export type ToolResult = {
	content: Array<{ type: "text"; text: string }>
	isError?: boolean
}

function json(value: unknown, isError: boolean = false): ToolResult {
	return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }], ...(isError ? { isError } : {}) }
}

function text(value: string): ToolResult {
	return { content: [{ type: "text", text: value }] }
}

function toolError(message: string): ToolResult {
	return { content: [{ type: "text", text: message }], isError: true }
}

/**
 * Shape of an nl_query answer. Internal error detail stays in the logs.
 */
export function summarizeState(state: WorkflowState): Record<string, unknown> {
	if (state.status === "completed") {
		return {
			status: "completed",
			query_id: state.query_id,
			sql: state.generated_sql,
			columns: state.column_names,
			rows: state.query_results,
			row_count: state.query_results.length,
			execution_time: state.execution_time,
			tables: state.retrieved_tables,
			analysis: state.analysis,
			steps: state.steps_completed,
		}
	}
	return {
		status: "failed",
		query_id: state.query_id,
		error: state.friendly_error,
		failed_stage: state.failed_stage,
		steps: state.steps_completed,
		...(state.query_results ? { columns: state.column_names, rows: state.query_results } : {}),
		...(state.generated_sql && state.failed_stage !== "generate_sql" ? { sql: state.generated_sql } : {}),
	}
}

export function createToolHandlers(services: AnalystServices) {
	const { config, logger, runner, index, overlay, indexer, narrator, workflow } = services
	const schema = config.database.schema

	const reindex = (): Promise<IndexResult> => indexer.reindex(index, config.database.name, schema)

	return {
		async nlQuery(question: string): Promise<ToolResult> {
			const state = await workflow.execute(question, runner.runQueryWithColumns)
			return json(summarizeState(state), state.status === "failed")
		},

		async explainSql(sql: string): Promise<ToolResult> {
			try {
				return text(await narrator.explainSql(sql))
			} catch (error) {
				logger.error("SQL explanation failed", { error: errorMessage(error) })
				return toolError("Could not explain this SQL right now.")
			}
		},

		async listRelationships(): Promise<ToolResult> {
			const relationships = await getAllRelationships(runner, schema, overlay, logger)
			return json({ schema, relationships })
		},

		async addRelationship(args: {
			source_table: string
			source_column: string
			target_table: string
			target_column: string
			description?: string
		}): Promise<ToolResult> {
			const result = overlay.add(
				schema,
				args.source_table,
				args.source_column,
				args.target_table,
				args.target_column,
				args.description ?? "",
			)
			const indexed = await reindex()
			return json({ result, relationships: indexed.relationships })
		},

		async deleteRelationship(source: string, target: string): Promise<ToolResult> {
			if (!overlay.delete(schema, source, target)) {
				return toolError(`No declared relationship ${source} -> ${target} in schema ${schema}`)
			}
			const indexed = await reindex()
			return json({ result: "deleted", relationships: indexed.relationships })
		},

		async reindexSchema(): Promise<ToolResult> {
			return json(await reindex())
		},

		reindex,
	}
}

// ============================================================================
// Server
// ============================================================================

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier")
const qualifiedColumn = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*\.[A-Za-z_][A-Za-z0-9_]*$/, "must be table.column")

export interface CreateServerOptions {
	config: AnalystConfig
	logger: Logger
	services?: AnalystServices
}

export default function createServer({ config, logger, services }: CreateServerOptions): {
	server: McpServer
	services: AnalystServices
} {
	const resolved = services ?? createServices(config, logger)
	const handlers = createToolHandlers(resolved)
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"nl_query",
		"Answer a business question about the database: generates read-only SQL, runs it and summarises the results",
		{ question: z.string().min(1).describe("The question in plain language") },
		async ({ question }) => handlers.nlQuery(question),
	)

	server.tool(
		"explain_sql",
		"Explain a SQL query in plain English",
		{ sql: z.string().min(1) },
		async ({ sql }) => handlers.explainSql(sql),
	)

	server.tool(
		"list_relationships",
		"List the join relationships known for the schema (foreign keys, comment tags and declared joins)",
		{},
		async () => handlers.listRelationships(),
	)

	server.tool(
		"add_relationship",
		"Declare a join between two columns and re-index the schema",
		{
			source_table: identifier,
			source_column: identifier,
			target_table: identifier,
			target_column: identifier,
			description: z.string().optional(),
		},
		async args => handlers.addRelationship(args),
	)

	server.tool(
		"delete_relationship",
		"Remove a declared join and re-index the schema",
		{ source: qualifiedColumn, target: qualifiedColumn },
		async ({ source, target }) => handlers.deleteRelationship(source, target),
	)

	server.tool(
		"reindex_schema",
		"Rebuild the schema index from the live database catalog",
		{},
		async () => handlers.reindexSchema(),
	)

	return { server, services: resolved }
}
