#!/usr/bin/env npx tsx
/**
 * Index Schema Script
 *
 * Introspects the configured PostgreSQL schema, embeds one document per
 * table plus the overview, and reports the glossary status. With --dry-run
 * the documents are printed instead of summarised.
 *
 * Usage:
 *   npx tsx scripts/index_schema.ts --schema=northwind
 *   npx tsx scripts/index_schema.ts --dry-run
 *
 * Options:
 *   --schema     Schema to index (default: database.schema from config)
 *   --dry-run    Print document texts and relationships
 */

import { errorMessage } from "../src/config.js"
import { loadConfig, resolveConfigPath } from "../src/config/loadConfig.js"
import { createQueryRunner } from "../src/database.js"
import { createLogger } from "../src/logger.js"
import { createModelClient } from "../src/model_client.js"
import { RelationshipOverlayStore } from "../src/relationship_manager.js"
import { SchemaIndexer, detectGlossaryStatus } from "../src/schema_indexer.js"
import { SchemaIndex } from "../src/vector_index.js"

interface Options {
	schema: string | null
	dryRun: boolean
}

function parseArgs(): Options {
	const options: Options = { schema: null, dryRun: false }
	for (const arg of process.argv.slice(2)) {
		if (arg.startsWith("--schema=")) {
			options.schema = arg.split("=")[1]
		} else if (arg === "--dry-run") {
			options.dryRun = true
		}
	}
	return options
}

async function main() {
	const options = parseArgs()
	const config = loadConfig(options.schema ? { overrides: { database: { schema: options.schema } } } : {})
	const logger = createLogger(config.logging.level)
	const schema = config.database.schema

	const runner = createQueryRunner(config.database, logger)
	const model = createModelClient(config.model)

	if (!(await model.healthCheck())) {
		console.error(`Model server at ${config.model.ollama_url} is not reachable`)
		await runner.close()
		process.exit(1)
	}

	const overlay = new RelationshipOverlayStore(resolveConfigPath(config.overlays.relationships_path))
	const indexer = new SchemaIndexer(runner, model, overlay, logger)

	try {
		if (options.dryRun) {
			const { documents, snapshot, relationships } = await indexer.buildDocuments(config.database.name, schema)
			for (const doc of documents) {
				console.log(`--- ${doc.metadata.kind}${doc.metadata.table ? `: ${doc.metadata.table}` : ""}`)
				console.log(doc.text)
			}
			console.log(`\n${documents.length} documents, ${relationships} relationships`)
			console.log(detectGlossaryStatus(snapshot).message)
		} else {
			const result = await indexer.reindex(new SchemaIndex(), config.database.name, schema)
			console.log(`Indexed ${result.documents} documents for ${result.tables.length} tables in ${schema}`)
			console.log(`Relationships: ${result.relationships}`)
			console.log(result.glossary.message)
		}
	} finally {
		await runner.close()
	}
}

main().catch((error: unknown) => {
	console.error("Fatal error:", errorMessage(error))
	process.exit(1)
})
