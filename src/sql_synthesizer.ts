/**
 * SQL Synthesizer
 *
 * Drafts SQL from the retrieved context and few-shot examples, then checks
 * it before anything runs.
 *
 * States:
 *   drafting -> validating -> accepted
 *                          -> retrying -> drafting (corrective prompt)
 *                          -> rejected (attempt budget spent)
 *                          -> blocked  (mutating statement, never retried)
 */

import { AnalystError, errorMessage } from "./config.js"
import { formatExamples } from "./example_selector.js"
import type { Logger } from "./logger.js"
import type { ColumnWhitelist, CompletionProvider, ContextDocument, GoldenExample } from "./schema_types.js"
import { blankLiterals, cleanSqlResponse, findBlockedKeyword, validateAgainstWhitelist } from "./sql_guard.js"

export type SynthesisState = "drafting" | "validating" | "retrying" | "accepted" | "rejected" | "blocked"

export type SynthesisOutcome =
	| { status: "accepted"; sql: string; attempts: number; warnings: string[]; trace: SynthesisState[] }
	| { status: "blocked"; sql: string; pattern: string; attempts: number; trace: SynthesisState[] }
	| { status: "rejected"; sql: string; attempts: number; errors: string[]; trace: SynthesisState[] }

export interface SynthesisRequest {
	question: string
	schema: string
	context: ContextDocument[]
	examples: GoldenExample[]
	whitelist: ColumnWhitelist
}

export interface SynthesizerSettings {
	maxAttempts: number
	temperature: number
	maxTokens: number
}

export const DEFAULT_SYNTHESIZER_SETTINGS: SynthesizerSettings = {
	maxAttempts: 2,
	temperature: 0.1,
	maxTokens: 2048,
}

// ============================================================================
// Prompts
// ============================================================================

function rules(schema: string): string {
	return [
		"Rules:",
		"- Do NOT include USE DATABASE statements",
		`- Always use schema.table format (e.g. ${schema}.tablename)`,
		"- Use lowercase for all table and column names",
		"- Never nest aggregate functions (e.g. AVG(SUM(x))); use a CTE instead",
		"- Use CTEs (WITH ...) for multi-step calculations",
		"- Only write a single SELECT statement; never modify data",
		"- Only use tables and columns listed in the schema context",
		"- Return only the SQL query, no explanation",
	].join("\n")
}

function contextBlock(context: ContextDocument[]): string {
	return context.map(doc => `- ${doc.text}`).join("\n")
}

export function buildDraftPrompt(req: SynthesisRequest): string {
	const examples = req.examples.length > 0 ? `\n\nSimilar questions and their SQL:\n${formatExamples(req.examples)}` : ""
	return (
		`You are a PostgreSQL expert. Write a query that answers the question.\n\n` +
		`Schema context:\n${contextBlock(req.context)}` +
		examples +
		`\n\n${rules(req.schema)}\n\n` +
		`Question: ${req.question}\n\nSQL:`
	)
}

export function buildCorrectionPrompt(req: SynthesisRequest, previousSql: string, errors: string[]): string {
	return (
		`The previous SQL for this question was invalid.\n\n` +
		`Question: ${req.question}\n\n` +
		`Previous SQL:\n${previousSql}\n\n` +
		`Errors:\n${errors.map(e => `- ${e}`).join("\n")}\n\n` +
		`Schema context:\n${contextBlock(req.context)}\n\n` +
		`${rules(req.schema)}\n` +
		`- Only use columns listed above; do not invent column names\n\n` +
		`Corrected SQL:`
	)
}

// ============================================================================
// Synthesizer
// ============================================================================

/**
 * Errors that make a cleaned draft unusable before the whitelist check
 */
export function structuralErrors(sql: string): string[] {
	if (!sql) return ["The response contained no SQL statement"]
	if (!/^\s*(select|with)\b/i.test(sql)) return ["The query must be a single SELECT statement"]
	// pg runs every statement of an unparameterised query, so only a trailing semicolon is allowed
	const body = blankLiterals(sql).replace(/"(?:[^"]|"")*"/g, '""').replace(/[\s;]+$/, "")
	if (body.includes(";")) return ["The query must be a single statement; remove everything after the first semicolon"]
	return []
}

export class SqlSynthesizer {
	private settings: SynthesizerSettings

	constructor(
		private completer: CompletionProvider,
		private logger: Logger,
		settings: Partial<SynthesizerSettings> = {},
	) {
		this.settings = { ...DEFAULT_SYNTHESIZER_SETTINGS, ...settings }
	}

	async synthesize(req: SynthesisRequest): Promise<SynthesisOutcome> {
		const trace: SynthesisState[] = []
		let prompt = buildDraftPrompt(req)
		let sql = ""
		let errors: string[] = []

		for (let attempt = 1; attempt <= this.settings.maxAttempts; attempt++) {
			trace.push("drafting")
			sql = cleanSqlResponse(await this.draft(prompt, attempt))

			trace.push("validating")
			const keyword = findBlockedKeyword(sql)
			if (keyword) {
				trace.push("blocked")
				this.logger.warn("Generated SQL contains a blocked statement", { keyword, attempt })
				return { status: "blocked", sql, pattern: keyword, attempts: attempt, trace }
			}

			errors = structuralErrors(sql)
			let warnings: string[] = []
			// The fallback context has no whitelist; the database is the only check left
			if (errors.length === 0 && req.whitelist.size > 0) {
				const report = validateAgainstWhitelist(sql, req.whitelist, req.schema)
				errors = report.errors
				warnings = report.warnings
			}

			if (errors.length === 0) {
				trace.push("accepted")
				this.logger.debug("SQL accepted", { attempt, warnings })
				return { status: "accepted", sql, attempts: attempt, warnings, trace }
			}

			this.logger.info("SQL failed validation", { attempt, errors })
			if (attempt < this.settings.maxAttempts) {
				trace.push("retrying")
				prompt = buildCorrectionPrompt(req, sql, errors)
			}
		}

		trace.push("rejected")
		return { status: "rejected", sql, attempts: this.settings.maxAttempts, errors, trace }
	}

	private async draft(prompt: string, attempt: number): Promise<string> {
		try {
			return await this.completer.complete(prompt, {
				temperature: this.settings.temperature,
				maxTokens: this.settings.maxTokens,
			})
		} catch (error) {
			if (error instanceof AnalystError && error.kind === "generation") throw error
			throw new AnalystError("generation", `SQL generation failed: ${errorMessage(error)}`, false, { attempt })
		}
	}
}
