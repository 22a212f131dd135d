/**
 * Load generated CSV files into the configured database.
 *
 * Drops and recreates customers, products, orders, payments and reviews.
 *
 * Usage:
 *   npx tsx scripts/load_data.ts [dataDir]
 */

import pg from "pg"
import path from "path"
import { connectionConfig, loadConfig } from "../src/config/loadConfig.js"
import { ConnectivityError } from "../src/config.js"
import { loadDataset } from "../src/csv_loader.js"
import { createLogger } from "../src/logger.js"
import { pgStore } from "../src/store.js"

const { Pool } = pg

async function main(): Promise<number> {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)
	const dataDir = path.resolve(process.cwd(), process.argv[2] ?? config.data.dir)
	const pool = new Pool({ ...connectionConfig(config), max: 1 })

	try {
		const summary = await loadDataset(pgStore(pool), dataDir, config.database.schema, logger)

		console.log("\nCreated tables:")
		for (const { table, rows } of summary.tables) {
			console.log(` - ${table}: ${rows} rows`)
		}
		return 0
	} catch (error) {
		if (error instanceof ConnectivityError) {
			console.log(error.message)
			return 1
		}
		throw error
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
