/**
 * Query Runner
 *
 * The adaptive query pipeline over one borrowed connection:
 *   connect → introspect → bind roles → select/render plan → execute → release
 *
 * runQueryCommand() wraps the pipeline with the console output and exit codes of
 * the `query` script.
 */

import { bindRoles } from "./column_candidates.js"
import {
	ConnectivityError,
	DEFAULTS,
	SchemaInsufficientError,
	StoreExecutionError,
	type Logger,
} from "./config.js"
import { renderQuery } from "./join_planner.js"
import { formatResultTable } from "./result_table.js"
import { SchemaIntrospector } from "./schema_introspector.js"
import type { RenderedQuery, SchemaSnapshot } from "./schema_types.js"
import { connectStore, parsePostgresError, type StoreClient, type StorePool } from "./store.js"

// ============================================================================
// Types
// ============================================================================

export interface QueryRunOptions {
	logger: Logger
	/** Schema to introspect (default: 'public') */
	schema?: string
	/** Called once the snapshot is captured, before a plan is selected */
	onSnapshot?: (snapshot: SchemaSnapshot) => void
	/** Called with the rendered query, before it is executed */
	onQuery?: (query: RenderedQuery) => void
}

export interface BuiltQuery {
	snapshot: SchemaSnapshot
	query: RenderedQuery
}

export interface QueryRows {
	headers: string[]
	rows: unknown[][]
}

export interface QueryRunResult extends QueryRows {
	tables: string[]
	query: RenderedQuery
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Introspect the connected store and render the best available query.
 *
 * @throws ConnectivityError when the catalog cannot be read
 * @throws SchemaInsufficientError when customers or orders is missing
 */
export async function buildQuery(client: StoreClient, options: QueryRunOptions): Promise<BuiltQuery> {
	const { logger } = options
	const snapshot = await new SchemaIntrospector(client, logger).introspect(options.schema ?? DEFAULTS.schema)
	options.onSnapshot?.(snapshot)

	const binding = bindRoles(snapshot)
	logger.debug("Roles bound", { roles: binding.roles })

	const query = renderQuery(binding)
	logger.info("Join plan selected", { tier: query.tier, columns: query.columns })
	return { snapshot, query }
}

/**
 * Execute a rendered query, returning headers and rows in column order.
 *
 * @throws StoreExecutionError when the store rejects the query
 */
export async function executeQuery(client: StoreClient, query: RenderedQuery, logger: Logger): Promise<QueryRows> {
	const startTime = Date.now()
	try {
		const result = await client.query(query.sql)
		const headers = result.fields.map((f) => f.name)
		const rows = result.rows.map((row) => headers.map((h) => row[h]))

		logger.debug("Query executed", {
			tier: query.tier,
			rows: rows.length,
			latency_ms: Date.now() - startTime,
		})
		return { headers, rows }
	} catch (error) {
		const pgError = parsePostgresError(error)
		logger.error("Query execution failed", {
			tier: query.tier,
			sqlstate: pgError.sqlstate,
			message: pgError.message,
		})
		throw new StoreExecutionError(pgError.message, pgError.sqlstate, query.sql)
	}
}

/**
 * Full pipeline on a single connection, released on every exit path.
 */
export async function runQuery(pool: StorePool, options: QueryRunOptions): Promise<QueryRunResult> {
	const client = await connectStore(pool, options.logger)
	try {
		const { snapshot, query } = await buildQuery(client, options)
		options.onQuery?.(query)
		const { headers, rows } = await executeQuery(client, query, options.logger)
		return {
			tables: snapshot.tables.map((t) => t.table_name),
			query,
			headers,
			rows,
		}
	} finally {
		client.release()
	}
}

// ============================================================================
// Command
// ============================================================================

export interface QueryCommandDeps {
	pool: StorePool
	logger: Logger
	print: (line: string) => void
	schema?: string
}

/**
 * Run the pipeline and print tables, query and results.
 *
 * @returns process exit code: 1 when the store cannot be reached, else 0
 */
export async function runQueryCommand(deps: QueryCommandDeps): Promise<number> {
	const { print } = deps
	const rule = "-".repeat(DEFAULTS.separatorWidth)

	try {
		const result = await runQuery(deps.pool, {
			logger: deps.logger,
			schema: deps.schema,
			onSnapshot: (snapshot) => {
				print(`Tables in database: ${snapshot.tables.map((t) => t.table_name).join(", ")}`)
			},
			onQuery: (query) => {
				print("")
				print("Executing query:")
				print(rule)
				print(query.sql)
				print(rule)
			},
		})

		if (result.rows.length === 0) {
			print("Query returned 0 rows.")
			return 0
		}
		for (const line of formatResultTable(result.headers, result.rows)) {
			print(line)
		}
		return 0
	} catch (error) {
		if (error instanceof ConnectivityError) {
			print(error.message)
			return 1
		}
		if (error instanceof SchemaInsufficientError) {
			print(`Runtime error: ${error.message}`)
			return 0
		}
		if (error instanceof StoreExecutionError) {
			print(`Database error while running query: ${error.message}`)
			return 0
		}
		throw error
	}
}
