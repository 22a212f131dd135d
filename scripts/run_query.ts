/**
 * Adaptive order query
 *
 * Inspects the configured database, picks the richest join the schema supports,
 * runs it and prints the result table.
 *
 * Usage:
 *   npx tsx scripts/run_query.ts
 */

import pg from "pg"
import { connectionConfig, loadConfig } from "../src/config/loadConfig.js"
import { createLogger } from "../src/logger.js"
import { runQueryCommand } from "../src/query_runner.js"
import { pgStore } from "../src/store.js"

const { Pool } = pg

async function main(): Promise<number> {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)
	const pool = new Pool({ ...connectionConfig(config), max: 1 })

	try {
		return await runQueryCommand({
			pool: pgStore(pool),
			logger,
			print: (line) => console.log(line),
			schema: config.database.schema,
		})
	} finally {
		await pool.end()
	}
}

main()
	.then((code) => {
		process.exitCode = code
	})
	.catch((error) => {
		console.error("Fatal error:", error)
		process.exitCode = 1
	})
