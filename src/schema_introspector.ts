/**
 * Schema Introspector
 *
 * Captures table names and ordered column names of one schema through
 * information_schema. Works against whatever database the borrowed client is
 * connected to; nothing about table or column naming is assumed.
 *
 * Read-only: issues SELECTs against the catalog and nothing else.
 */

import { ConnectivityError, DEFAULTS, type Logger } from "./config.js"
import type { SchemaSnapshot, SnapshotTable } from "./schema_types.js"
import { parsePostgresError, type StoreClient } from "./store.js"

// ============================================================================
// Introspector Class
// ============================================================================

export class SchemaIntrospector {
	private client: StoreClient
	private logger: Logger

	constructor(client: StoreClient, logger: Logger) {
		this.client = client
		this.logger = logger
	}

	/**
	 * Introspect all base tables in a schema
	 *
	 * @param schema Schema to introspect (default: 'public')
	 */
	async introspect(schema: string = DEFAULTS.schema): Promise<SchemaSnapshot> {
		const startTime = Date.now()
		this.logger.debug("Starting schema introspection", { schema })

		try {
			// Step 1: Get all tables
			const tableNames = await this.getTables(schema)
			this.logger.debug("Tables found", { count: tableNames.length })

			// Step 2: Get columns for those tables, grouped per table
			const columnsByTable = tableNames.length > 0 ? await this.getColumns(schema, tableNames) : new Map<string, string[]>()

			const tables: SnapshotTable[] = tableNames.map((name) => ({
				table_schema: schema,
				table_name: name,
				columns: columnsByTable.get(name) ?? [],
			}))

			this.logger.info("Schema introspection complete", {
				schema,
				tables: tables.length,
				latency_ms: Date.now() - startTime,
			})

			return {
				schema,
				tables,
				introspected_at: new Date().toISOString(),
			}
		} catch (error) {
			const pgError = parsePostgresError(error)
			this.logger.error("Schema introspection failed", {
				schema,
				sqlstate: pgError.sqlstate,
				message: pgError.message,
			})
			throw new ConnectivityError(`Could not read schema catalog: ${pgError.message}`, {
				sqlstate: pgError.sqlstate,
				schema,
			})
		}
	}

	/**
	 * Get base table names from information_schema
	 */
	private async getTables(schema: string): Promise<string[]> {
		const query = `
			SELECT t.table_name
			FROM information_schema.tables t
			WHERE t.table_schema = $1
				AND t.table_type = 'BASE TABLE'
			ORDER BY t.table_name
		`

		const result = await this.client.query(query, [schema])
		return result.rows.map((row) => String(row.table_name))
	}

	/**
	 * Get column names in ordinal order, keyed by table name
	 */
	private async getColumns(schema: string, tableNames: string[]): Promise<Map<string, string[]>> {
		const query = `
			SELECT c.table_name, c.column_name
			FROM information_schema.columns c
			WHERE c.table_schema = $1
				AND c.table_name = ANY($2)
			ORDER BY c.table_name, c.ordinal_position
		`

		const result = await this.client.query(query, [schema, tableNames])

		const columnsByTable = new Map<string, string[]>()
		for (const row of result.rows) {
			const table = String(row.table_name)
			const existing = columnsByTable.get(table) || []
			existing.push(String(row.column_name))
			columnsByTable.set(table, existing)
		}
		return columnsByTable
	}
}
