/**
 * Result Narrator
 *
 * Summarises query results in plain language, and explains SQL to
 * non-technical readers.
 */

import { AnalystError, NO_RESULTS_MESSAGE, errorMessage } from "./config.js"
import type { CompletionProvider, ResultRow, ResultValue } from "./schema_types.js"

export interface NarratorSettings {
	maxRows: number
	temperature: number
	maxTokens: number
}

export const DEFAULT_NARRATOR_SETTINGS: NarratorSettings = {
	maxRows: 20,
	temperature: 0.3,
	maxTokens: 1024,
}

export function formatValue(value: ResultValue): string {
	if (value === null) return "NULL"
	if (value instanceof Date) return value.toISOString()
	if (typeof value === "object") return JSON.stringify(value)
	return String(value)
}

/**
 * Render at most maxRows rows, one per line. With column names each value
 * is shown as col=value.
 */
export function formatRows(rows: ResultRow[], columnNames: string[], maxRows: number): string {
	const lines = rows.slice(0, maxRows).map(row => {
		if (columnNames.length === 0) return row.map(formatValue).join(", ")
		return row.map((value, i) => `${columnNames[i] ?? `col${i + 1}`}=${formatValue(value)}`).join(", ")
	})
	if (rows.length > maxRows) {
		lines.push(`... and ${rows.length - maxRows} more rows`)
	}
	return lines.join("\n")
}

export function buildNarrationPrompt(question: string, sql: string, rows: ResultRow[], columnNames: string[], maxRows: number): string {
	return (
		`Question: ${question}\n\n` +
		`SQL used:\n${sql}\n\n` +
		`Results (${rows.length} rows):\n${formatRows(rows, columnNames, maxRows)}\n\n` +
		"Write a short analysis for a business reader:\n" +
		"1. A one-sentence direct answer to the question\n" +
		"2. 3-5 bullet points with key findings, citing concrete numbers\n" +
		"3. Any notable trends or outliers"
	)
}

export function buildExplanationPrompt(sql: string): string {
	return (
		"Explain what this SQL query does in plain English for a non-technical business user.\n" +
		"Use 3-5 short bullet points. Do not repeat the SQL.\n\n" +
		`SQL:\n${sql}`
	)
}

export class ResultNarrator {
	private settings: NarratorSettings

	constructor(
		private completer: CompletionProvider,
		settings: Partial<NarratorSettings> = {},
	) {
		this.settings = { ...DEFAULT_NARRATOR_SETTINGS, ...settings }
	}

	/**
	 * Summary of a result set. Zero rows short-circuit to the fixed
	 * no-results message without calling the model.
	 */
	async narrate(question: string, sql: string, rows: ResultRow[], columnNames: string[]): Promise<string> {
		if (rows.length === 0) return NO_RESULTS_MESSAGE
		const prompt = buildNarrationPrompt(question, sql, rows, columnNames, this.settings.maxRows)
		return this.ask(prompt, "Narration")
	}

	/**
	 * Plain-English explanation of a SQL statement
	 */
	async explainSql(sql: string): Promise<string> {
		return this.ask(buildExplanationPrompt(sql), "SQL explanation")
	}

	private async ask(prompt: string, label: string): Promise<string> {
		let text: string
		try {
			text = await this.completer.complete(prompt, {
				temperature: this.settings.temperature,
				maxTokens: this.settings.maxTokens,
			})
		} catch (error) {
			throw new AnalystError("narration", `${label} failed: ${errorMessage(error)}`, false, {
				originalError: errorMessage(error),
			})
		}
		const trimmed = text.trim()
		if (!trimmed) {
			throw new AnalystError("narration", `${label} returned no text`)
		}
		return trimmed
	}
}
