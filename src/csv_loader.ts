/**
 * CSV Loader
 *
 * Recreates the e-commerce tables (drop-if-exists) and bulk-inserts the rows of
 * each CSV file, coercing values to the declared column type. Each file is
 * loaded in its own transaction.
 */

import * as fs from "fs"
import * as path from "path"
import type { Logger } from "./config.js"
import { connectStore, quoteIdent, type StoreClient, type StorePool } from "./store.js"

// ============================================================================
// Types
// ============================================================================

export type SqlColumnType = "TEXT" | "DOUBLE PRECISION" | "INTEGER"

export interface TableSchema {
	table: string
	columns: Array<[name: string, type: SqlColumnType]>
}

export type CellValue = string | number | null

export interface TableCount {
	table: string
	rows: number
}

export interface LoadSummary {
	inserted: Record<string, number>
	tables: TableCount[]
}

// ============================================================================
// Table Definitions
// ============================================================================

export const TABLE_SCHEMAS: Record<string, TableSchema> = {
	"customers.csv": {
		table: "customers",
		columns: [
			["customer_id", "TEXT"],
			["name", "TEXT"],
			["email", "TEXT"],
			["phone", "TEXT"],
			["address", "TEXT"],
			["created_at", "TEXT"],
		],
	},
	"products.csv": {
		table: "products",
		columns: [
			["product_id", "TEXT"],
			["name", "TEXT"],
			["category", "TEXT"],
			["price", "DOUBLE PRECISION"],
			["stock", "INTEGER"],
			["created_at", "TEXT"],
		],
	},
	"orders.csv": {
		table: "orders",
		columns: [
			["order_id", "TEXT"],
			["customer_id", "TEXT"],
			["product_id", "TEXT"],
			["quantity", "INTEGER"],
			["order_date", "TEXT"],
			["status", "TEXT"],
			["subtotal", "DOUBLE PRECISION"],
			["shipping", "DOUBLE PRECISION"],
			["total", "DOUBLE PRECISION"],
		],
	},
	"payments.csv": {
		table: "payments",
		columns: [
			["payment_id", "TEXT"],
			["order_id", "TEXT"],
			["amount", "DOUBLE PRECISION"],
			["method", "TEXT"],
			["status", "TEXT"],
			["payment_date", "TEXT"],
		],
	},
	"reviews.csv": {
		table: "reviews",
		columns: [
			["review_id", "TEXT"],
			["product_id", "TEXT"],
			["customer_id", "TEXT"],
			["rating", "INTEGER"],
			["review_text", "TEXT"],
			["review_date", "TEXT"],
		],
	},
}

/** Rows per INSERT statement; keeps bind parameters well under the protocol limit. */
const INSERT_BATCH_SIZE = 500

// ============================================================================
// CSV Parser (no external deps)
// ============================================================================

export function parseCsv(content: string): Record<string, string>[] {
	const lines = content.split(/\r?\n/)
	if (lines.length < 2) return []

	const headers = parseCsvLine(lines[0])
	const rows: Record<string, string>[] = []

	let currentLine = ""
	for (let i = 1; i < lines.length; i++) {
		currentLine += (currentLine ? "\n" : "") + lines[i]
		// A quoted field may span lines; wait for balanced quotes
		const quoteCount = (currentLine.match(/"/g) || []).length
		if (quoteCount % 2 === 0) {
			if (currentLine.trim()) {
				const values = parseCsvLine(currentLine)
				const row: Record<string, string> = {}
				headers.forEach((h, idx) => {
					row[h] = values[idx] ?? ""
				})
				rows.push(row)
			}
			currentLine = ""
		}
	}
	return rows
}

function parseCsvLine(line: string): string[] {
	const result: string[] = []
	let current = ""
	let inQuotes = false

	for (let i = 0; i < line.length; i++) {
		const ch = line[i]
		if (ch === '"') {
			if (inQuotes && i + 1 < line.length && line[i + 1] === '"') {
				current += '"'
				i++
			} else {
				inQuotes = !inQuotes
			}
		} else if (ch === "," && !inQuotes) {
			result.push(current)
			current = ""
		} else {
			current += ch
		}
	}
	result.push(current)
	return result
}

// ============================================================================
// Coercion
// ============================================================================

/**
 * Convert a CSV cell to the value inserted for a column type.
 * Empty cells and unparseable numbers become null.
 */
export function convertValue(type: SqlColumnType, raw: string | undefined): CellValue {
	if (raw === undefined || raw === "") return null
	switch (type) {
		case "INTEGER": {
			const n = Number(raw)
			return Number.isFinite(n) ? Math.trunc(n) : null
		}
		case "DOUBLE PRECISION": {
			const n = Number(raw)
			return Number.isNaN(n) ? null : n
		}
		case "TEXT":
			return raw
	}
}

// ============================================================================
// Loading
// ============================================================================

function qualified(schema: string, table: string): string {
	return `${quoteIdent(schema)}.${quoteIdent(table)}`
}

export async function createTable(client: StoreClient, schema: string, def: TableSchema): Promise<void> {
	const columnsSql = def.columns.map(([name, type]) => `${quoteIdent(name)} ${type}`).join(", ")
	await client.query(`DROP TABLE IF EXISTS ${qualified(schema, def.table)}`)
	await client.query(`CREATE TABLE ${qualified(schema, def.table)} (${columnsSql})`)
}

export function buildInsert(
	schema: string,
	def: TableSchema,
	rowCount: number,
): string {
	const width = def.columns.length
	const columnList = def.columns.map(([name]) => quoteIdent(name)).join(",")
	const tuples: string[] = []
	for (let r = 0; r < rowCount; r++) {
		const placeholders = def.columns.map((_, c) => `$${r * width + c + 1}`)
		tuples.push(`(${placeholders.join(",")})`)
	}
	return `INSERT INTO ${qualified(schema, def.table)} (${columnList}) VALUES ${tuples.join(",")}`
}

/**
 * Load one CSV file into its (already created) table.
 *
 * @returns number of rows inserted; 0 when the file is missing or empty
 */
export async function ingestCsv(
	client: StoreClient,
	dataDir: string,
	csvFile: string,
	def: TableSchema,
	schema: string,
	logger: Logger,
): Promise<number> {
	const fullPath = path.join(dataDir, csvFile)
	if (!fs.existsSync(fullPath)) {
		logger.warn("CSV file not found, skipping", { path: fullPath })
		return 0
	}

	const records = parseCsv(fs.readFileSync(fullPath, "utf-8"))
	const rows: CellValue[][] = records.map((record) =>
		def.columns.map(([name, type]) => convertValue(type, (record[name] ?? "").trim())),
	)
	if (rows.length === 0) return 0

	await client.query("BEGIN")
	try {
		for (let start = 0; start < rows.length; start += INSERT_BATCH_SIZE) {
			const batch = rows.slice(start, start + INSERT_BATCH_SIZE)
			await client.query(buildInsert(schema, def, batch.length), batch.flat())
		}
		await client.query("COMMIT")
	} catch (error) {
		try {
			await client.query("ROLLBACK")
		} catch (rollbackError) {
			logger.warn("Rollback failed", {
				table: def.table,
				error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
			})
		}
		throw error
	}
	return rows.length
}

async function countTables(client: StoreClient, schema: string): Promise<TableCount[]> {
	const tables = await client.query(
		`SELECT table_name FROM information_schema.tables
			WHERE table_schema = $1 AND table_type = 'BASE TABLE'
			ORDER BY table_name`,
		[schema],
	)

	const counts: TableCount[] = []
	for (const row of tables.rows) {
		const table = String(row.table_name)
		const result = await client.query(`SELECT COUNT(*) AS count FROM ${qualified(schema, table)}`)
		counts.push({ table, rows: Number(result.rows[0]?.count ?? 0) })
	}
	return counts
}

/**
 * Recreate and load every table in TABLE_SCHEMAS, then count rows per table.
 */
export async function loadDataset(
	pool: StorePool,
	dataDir: string,
	schema: string,
	logger: Logger,
): Promise<LoadSummary> {
	const client = await connectStore(pool, logger)
	try {
		const inserted: Record<string, number> = {}
		for (const [csvFile, def] of Object.entries(TABLE_SCHEMAS)) {
			logger.info(`Creating table '${def.table}' and loading from ${csvFile}`)
			await createTable(client, schema, def)
			const count = await ingestCsv(client, dataDir, csvFile, def, schema, logger)
			logger.info(`Inserted ${count} rows into ${def.table}`)
			inserted[def.table] = count
		}

		return { inserted, tables: await countTables(client, schema) }
	} finally {
		client.release()
	}
}
