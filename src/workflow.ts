/**
 * Analysis Workflow
 *
 * Orchestrates one question end to end:
 * 1. retrieve_context   - schema documents, kept tables, whitelist
 * 2. select_examples    - few-shot examples (failure degrades to none)
 * 3. generate_sql       - draft, check, retry once with the errors
 * 4. execute_sql        - run the accepted SQL through the caller's runner
 * 5. analyze_results    - narrate the rows
 *
 * Any fatal failure ends in handle_error with a generic friendly_error; the
 * internal detail goes to `error`. The returned state always says which
 * stages ran.
 */

import { v4 as uuidv4 } from "uuid"
import { FRIENDLY_ERROR, errorMessage, parsePostgresError } from "./config.js"
import type { ContextRetriever, RetrievedContext } from "./context_retriever.js"
import type { ExampleSelector } from "./example_selector.js"
import type { Logger } from "./logger.js"
import type { ResultNarrator } from "./result_narrator.js"
import type {
	FailedWorkflowState,
	GoldenExample,
	QueryResultSet,
	RunQueryWithColumns,
	WorkflowStage,
	WorkflowState,
} from "./schema_types.js"
import type { SqlSynthesizer } from "./sql_synthesizer.js"

export interface WorkflowDeps {
	retriever: ContextRetriever
	examples: ExampleSelector | null
	synthesizer: SqlSynthesizer
	narrator: ResultNarrator
	logger: Logger
	schema: string
	examplesK?: number
}

type Progress = Omit<FailedWorkflowState, "status" | "failed_stage" | "error" | "friendly_error">

export class AnalysisWorkflow {
	constructor(private deps: WorkflowDeps) {}

	async execute(question: string, runQueryWithColumns: RunQueryWithColumns): Promise<WorkflowState> {
		const { retriever, synthesizer, narrator, logger, schema } = this.deps
		const state: Progress = {
			query_id: uuidv4(),
			query: question,
			timestamp: new Date().toISOString(),
			steps_completed: [],
			relevant_context: [],
			retrieved_tables: [],
			sql_validation_errors: [],
		}
		const queryId = state.query_id
		logger.info("Question received", { query_id: queryId, schema, question })

		// ── 1. Retrieve context ──────────────────────────────────────────
		let context: RetrievedContext
		try {
			context = await retriever.retrieve(question, schema)
		} catch (error) {
			return this.fail(state, "retrieve_context", "retrieve_context_error", `Context retrieval failed: ${errorMessage(error)}`)
		}
		state.relevant_context = context.documents
		state.retrieved_tables = context.tables
		state.steps_completed.push("retrieve_context")
		logger.info("Context retrieved", {
			query_id: queryId,
			tables: context.tables,
			documents: context.documents.length,
			fallback: context.fallback,
		})

		// ── 2. Select examples ───────────────────────────────────────────
		const examples = await this.selectExamples(state, context)

		// ── 3. Generate SQL ──────────────────────────────────────────────
		let sql: string
		try {
			const outcome = await synthesizer.synthesize({
				question,
				schema,
				context: context.documents,
				examples,
				whitelist: context.whitelist,
			})

			if (outcome.status === "blocked") {
				state.generated_sql = outcome.sql
				return this.fail(
					state,
					"generate_sql",
					"generate_sql_blocked",
					`Generated SQL contains a blocked statement (${outcome.pattern})`,
				)
			}
			if (outcome.status === "rejected") {
				state.generated_sql = outcome.sql
				state.sql_validation_errors = outcome.errors
				return this.fail(
					state,
					"generate_sql",
					"generate_sql_error",
					`SQL failed validation after ${outcome.attempts} attempts: ${outcome.errors.join("; ")}`,
				)
			}

			sql = outcome.sql
			// Unchecked references of the accepted attempt, kept for diagnostics
			state.sql_validation_errors = outcome.warnings
			logger.info("SQL generated", {
				query_id: queryId,
				attempts: outcome.attempts,
				warnings: outcome.warnings,
			})
		} catch (error) {
			return this.fail(state, "generate_sql", "generate_sql_error", `SQL generation failed: ${errorMessage(error)}`)
		}
		state.generated_sql = sql
		state.steps_completed.push("generate_sql")

		// ── 4. Execute ───────────────────────────────────────────────────
		let result: QueryResultSet
		const started = performance.now()
		try {
			result = await runQueryWithColumns(sql)
		} catch (error) {
			const pgError = parsePostgresError(error)
			logger.warn("Query execution failed", { query_id: queryId, sqlstate: pgError.sqlstate, hint: pgError.hint })
			return this.fail(state, "execute_sql", "execute_sql_error", `Query execution failed: ${pgError.message}`)
		}
		const executionTime = (performance.now() - started) / 1000
		state.query_results = result.rows
		state.column_names = result.columnNames
		state.execution_time = executionTime
		state.steps_completed.push("execute_sql")
		logger.info("Query executed", { query_id: queryId, rows: result.rows.length, execution_time: executionTime })

		// ── 5. Analyze ───────────────────────────────────────────────────
		let analysis: string
		try {
			analysis = await narrator.narrate(question, sql, result.rows, result.columnNames)
		} catch (error) {
			return this.fail(state, "analyze_results", "analyze_results_error", `Result analysis failed: ${errorMessage(error)}`)
		}
		state.steps_completed.push("analyze_results")

		logger.info("Question answered", { query_id: queryId, steps: state.steps_completed })
		return {
			...state,
			status: "completed",
			generated_sql: sql,
			query_results: result.rows,
			column_names: result.columnNames,
			execution_time: executionTime,
			analysis,
		}
	}

	private async selectExamples(state: Progress, context: RetrievedContext): Promise<GoldenExample[]> {
		const { examples, logger, schema, examplesK } = this.deps
		if (!examples) {
			state.steps_completed.push("select_examples")
			return []
		}
		try {
			const selected = await examples.select(schema, context.questionEmbedding, examplesK ?? 3)
			state.steps_completed.push("select_examples")
			return selected
		} catch (error) {
			logger.warn("Example selection failed, continuing without examples", {
				query_id: state.query_id,
				error: errorMessage(error),
			})
			state.steps_completed.push("select_examples_error")
			return []
		}
	}

	/**
	 * handle_error: record the failed stage and finish the state
	 */
	private fail(state: Progress, stage: WorkflowStage, step: string, error: string): FailedWorkflowState {
		state.steps_completed.push(step, "handle_error")
		this.deps.logger.error("Question failed", { query_id: state.query_id, stage, error })
		return {
			...state,
			status: "failed",
			failed_stage: stage,
			error,
			friendly_error: FRIENDLY_ERROR,
		}
	}
}
