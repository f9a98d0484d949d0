#!/usr/bin/env node
/**
 * Stdio entry point for the Data Analyst MCP Server
 *
 * Config priority:
 *   1. CLI argument (JSON, merged over everything else)
 *   2. Environment variables
 *   3. config/config.local.yaml, then config/config.yaml
 *
 * Usage:
 *   node dist/src/stdio.js
 *   node dist/src/stdio.js '{"database":{"schema":"northwind"}}'
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { errorMessage } from "./config.js"
import { loadConfig } from "./config/loadConfig.js"
import createServer from "./index.js"
import { createLogger } from "./logger.js"

function parseOverrides(arg: string | undefined): Record<string, unknown> | undefined {
	if (!arg) return undefined
	const parsed: unknown = JSON.parse(arg)
	if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
		throw new Error("CLI config must be a JSON object")
	}
	return Object.fromEntries(Object.entries(parsed))
}

async function main() {
	const config = loadConfig({ overrides: parseOverrides(process.argv[2]) })
	const logger = createLogger(config.logging.level)

	logger.info("Starting Data Analyst MCP Server with stdio transport", {
		database: `${config.database.user}@${config.database.host}:${config.database.port}/${config.database.name}`,
		schema: config.database.schema,
		llm: config.model.llm,
		embedding: config.model.embedding,
	})

	const { server, services } = createServer({ config, logger })

	// A failed initial index leaves the server up; questions use the fallback context
	try {
		const result = await services.indexer.reindex(services.index, config.database.name, config.database.schema)
		logger.info(result.glossary.message, { schema: result.schema })
	} catch (error) {
		logger.error("Initial schema indexing failed", { error: errorMessage(error) })
	}

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Data Analyst MCP Server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		await services.runner.close?.()
		process.exit(0)
	}
	process.on("SIGINT", () => void shutdown())
	process.on("SIGTERM", () => void shutdown())
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", errorMessage(error))
	process.exit(1)
})
