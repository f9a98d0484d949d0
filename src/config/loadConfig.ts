/**
 * Unified config loader for the data analyst server.
 *
 * Precedence: overrides > ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated with a zod schema that also supplies
 * defaults, so a missing config directory still yields a usable config.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

export const configSchema = z.object({
	database: z.object({
		host: z.string().default("localhost"),
		port: z.number().int().positive().default(5432),
		name: z.string().default("sales_analyst"),
		user: z.string().default("analyst"),
		password: z.string().default(""),
		schema: z.string().min(1).default("public"),
		statement_timeout_ms: z.number().int().positive().default(30000),
	}).default({}),
	model: z.object({
		ollama_url: z.string().default("http://localhost:11434"),
		llm: z.string().default("llama3.1:8b"),
		embedding: z.string().default("nomic-embed-text:latest"),
		timeout_ms: z.number().int().positive().default(120000),
		num_ctx: z.number().int().positive().default(8192),
	}).default({}),
	retrieval: z.object({
		top_k: z.number().int().positive().default(8),
		distance_ratio: z.number().min(1).default(1.15),
		small_schema_table_limit: z.number().int().nonnegative().default(5),
		llm_table_selection: z.boolean().default(true),
		column_prune_threshold: z.number().int().nonnegative().default(8),
		column_keep_min: z.number().int().positive().default(5),
		column_keep_max: z.number().int().positive().default(10),
		key_fragments: z.array(z.string()).default(["id", "key", "number", "code"]),
	}).default({}),
	generation: z.object({
		temperature: z.number().min(0).max(2).default(0.1),
		max_tokens: z.number().int().positive().default(2048),
		max_attempts: z.number().int().min(1).default(2),
		examples_k: z.number().int().nonnegative().default(3),
	}).default({}),
	narration: z.object({
		max_rows: z.number().int().positive().default(20),
		temperature: z.number().min(0).max(2).default(0.3),
		max_tokens: z.number().int().positive().default(1024),
	}).default({}),
	overlays: z.object({
		relationships_path: z.string().default("config/relationships.yaml"),
		examples_path: z.string().default("config/examples.yaml"),
	}).default({}),
	logging: z.object({
		level: z.enum(["debug", "info", "warn", "error"]).default("info"),
	}).default({}),
})

export type AnalystConfig = z.infer<typeof configSchema>

type ConfigDocument = Record<string, unknown>

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function isPlainObject(value: unknown): value is ConfigDocument {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function loadYaml(filePath: string): ConfigDocument {
	if (!fs.existsSync(filePath)) return {}
	const parsed = yaml.load(fs.readFileSync(filePath, "utf-8"))
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigDocument, b: ConfigDocument): ConfigDocument {
	const result: ConfigDocument = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(left) && isPlainObject(right)) {
			result[key] = deepMerge(left, right)
		} else if (right !== undefined) {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

/** Section of the merged document, created when absent. */
function section(cfg: ConfigDocument, name: string): ConfigDocument {
	const existing = cfg[name]
	if (isPlainObject(existing)) return existing
	const created: ConfigDocument = {}
	cfg[name] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: ConfigDocument): void {
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.schema = env("DB_SCHEMA") ?? db.schema
	db.statement_timeout_ms = envInt("STATEMENT_TIMEOUT_MS") ?? db.statement_timeout_ms

	const m = section(cfg, "model")
	m.ollama_url = env("OLLAMA_BASE_URL") ?? m.ollama_url
	m.llm = env("OLLAMA_MODEL") ?? m.llm
	m.embedding = env("EMBEDDING_MODEL") ?? m.embedding
	m.timeout_ms = envInt("OLLAMA_TIMEOUT_MS") ?? m.timeout_ms
	m.num_ctx = envInt("OLLAMA_NUM_CTX") ?? m.num_ctx

	const r = section(cfg, "retrieval")
	r.top_k = envInt("RETRIEVAL_TOP_K") ?? r.top_k
	r.distance_ratio = envFloat("RETRIEVAL_DISTANCE_RATIO") ?? r.distance_ratio
	r.llm_table_selection = envBool("LLM_TABLE_SELECTION") ?? r.llm_table_selection

	const g = section(cfg, "generation")
	g.temperature = envFloat("TEMPERATURE") ?? g.temperature
	g.max_attempts = envInt("MAX_SQL_ATTEMPTS") ?? g.max_attempts

	const o = section(cfg, "overlays")
	o.relationships_path = env("RELATIONSHIPS_PATH") ?? o.relationships_path
	o.examples_path = env("EXAMPLES_PATH") ?? o.examples_path

	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL")?.toLowerCase() ?? l.level
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AnalystConfig | null = null
let _configRoot: string = process.cwd()

export interface LoadConfigOptions {
	/** Applied last, e.g. a JSON document passed on the command line. */
	overrides?: ConfigDocument
}

export function loadConfig(options: LoadConfigOptions = {}): AnalystConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigDocument = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
		_configRoot = path.dirname(configDir)
	} else {
		_configRoot = process.cwd()
	}

	applyEnvOverrides(merged)
	if (options.overrides) {
		merged = deepMerge(merged, options.overrides)
	}

	_config = configSchema.parse(merged)
	return _config
}

export function getConfig(): AnalystConfig {
	return _config ?? loadConfig()
}

/**
 * Resolve a path from the config against the directory that holds config/.
 * Absolute paths are returned unchanged.
 */
export function resolveConfigPath(filePath: string): string {
	return path.isAbsolute(filePath) ? filePath : path.join(_configRoot, filePath)
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
	_configRoot = process.cwd()
}
