/**
 * Ollama HTTP Client
 *
 * Handles communication with the model server.
 *
 * Responsibilities:
 * - Embed text via /api/embeddings
 * - Single-turn completions via /api/generate (non-streaming)
 * - Per-request timeouts
 * - Health checks
 */

import { AnalystError } from "./config.js"
import type { AnalystConfig } from "./config/loadConfig.js"
import type { CompletionOptions, CompletionProvider, EmbeddingProvider } from "./schema_types.js"

export interface ModelClientOptions {
	baseUrl: string
	llmModel: string
	embeddingModel: string
	timeoutMs: number
	numCtx?: number
	/** Injected for tests; defaults to the global fetch */
	fetchImpl?: typeof fetch
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function isNumberArray(value: unknown): value is number[] {
	return Array.isArray(value) && value.every(v => typeof v === "number")
}

export class OllamaClient implements EmbeddingProvider, CompletionProvider {
	private baseUrl: string
	private llmModel: string
	private embeddingModel: string
	private timeout: number
	private numCtx?: number
	private fetchImpl: typeof fetch

	constructor(options: ModelClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.llmModel = options.llmModel
		this.embeddingModel = options.embeddingModel
		this.timeout = options.timeoutMs
		this.numCtx = options.numCtx
		this.fetchImpl = options.fetchImpl ?? fetch
	}

	/**
	 * Get embedding for text
	 */
	async embed(text: string): Promise<number[]> {
		const data = await this.post(
			"/api/embeddings",
			{ model: this.embeddingModel, prompt: text },
			"retrieval",
			"Embedding",
		)

		const embedding = isRecord(data) ? data.embedding : undefined
		if (!isNumberArray(embedding) || embedding.length === 0) {
			throw new AnalystError("retrieval", "Embedding response did not contain a vector", false, {
				model: this.embeddingModel,
			})
		}
		return embedding
	}

	/**
	 * Single-turn completion
	 */
	async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
		const data = await this.post(
			"/api/generate",
			{
				model: this.llmModel,
				prompt,
				stream: false,
				options: {
					temperature: options.temperature ?? 0.7,
					num_predict: options.maxTokens ?? 4096,
					...(this.numCtx ? { num_ctx: this.numCtx } : {}),
				},
			},
			"generation",
			"Completion",
		)

		const text = isRecord(data) ? data.response : undefined
		if (typeof text !== "string") {
			throw new AnalystError("generation", "Completion response did not contain text", false, {
				model: this.llmModel,
			})
		}
		return text
	}

	/**
	 * Health check endpoint
	 *
	 * Returns true if the model server is reachable.
	 */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), 5000)
		try {
			const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
				method: "GET",
				signal: controller.signal,
			})
			return response.ok
		} catch {
			return false
		} finally {
			clearTimeout(timeoutId)
		}
	}

	private async post(
		endpoint: string,
		body: Record<string, unknown>,
		kind: "retrieval" | "generation",
		label: string,
	): Promise<unknown> {
		const url = `${this.baseUrl}${endpoint}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)

		try {
			const response = await this.fetchImpl(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new AnalystError(
					kind,
					`${label} request failed: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			// Shape is checked by the callers
			const data: unknown = await response.json()
			return data
		} catch (error) {
			if (error instanceof Error && error.name === "AbortError") {
				throw new AnalystError(
					kind,
					`${label} request timed out after ${this.timeout}ms`,
					true,
					{ timeout: this.timeout, url },
				)
			}

			if (error instanceof AnalystError) {
				throw error
			}

			// fetch raises TypeError when the server is unreachable
			if (error instanceof TypeError) {
				throw new AnalystError(
					kind,
					`Cannot connect to model server at ${this.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			throw new AnalystError(
				kind,
				`${label} error: ${String(error)}`,
				false,
				{ originalError: String(error) },
			)
		} finally {
			clearTimeout(timeoutId)
		}
	}
}

/**
 * Build a client from the model section of the config
 */
export function createModelClient(model: AnalystConfig["model"], fetchImpl?: typeof fetch): OllamaClient {
	return new OllamaClient({
		baseUrl: model.ollama_url,
		llmModel: model.llm,
		embeddingModel: model.embedding,
		timeoutMs: model.timeout_ms,
		numCtx: model.num_ctx,
		fetchImpl,
	})
}
