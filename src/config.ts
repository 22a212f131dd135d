/**
 * Shared types and constants for the order query runner
 *
 * Includes:
 * - Logger shape injected into every component
 * - Structured error classes
 * - Output defaults
 */

/**
 * Logger injected into components. Matches the shape produced by createLogger().
 */
export interface Logger {
	info(message: string, data?: Record<string, unknown>): void
	warn(message: string, data?: Record<string, unknown>): void
	error(message: string, data?: Record<string, unknown>): void
	debug(message: string, data?: Record<string, unknown>): void
}

export type QueryRunnerErrorType = "connectivity" | "schema" | "execution"

/**
 * Error types for structured error handling
 */
export class QueryRunnerError extends Error {
	constructor(
		public type: QueryRunnerErrorType,
		message: string,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "QueryRunnerError"
	}
}

/**
 * Store unreachable, database missing, or catalog unreadable. Fatal.
 */
export class ConnectivityError extends QueryRunnerError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("connectivity", message, context)
		this.name = "ConnectivityError"
	}
}

/**
 * Mandatory tables (customers, orders) missing. No query is produced.
 */
export class SchemaInsufficientError extends QueryRunnerError {
	constructor(
		message: string,
		public missingTables: string[],
	) {
		super("schema", message, { missing_tables: missingTables })
		this.name = "SchemaInsufficientError"
	}
}

/**
 * Rendered query failed in the store, e.g. a literal fallback column that does not exist.
 */
export class StoreExecutionError extends QueryRunnerError {
	constructor(
		message: string,
		public sqlstate: string,
		public sql: string,
	) {
		super("execution", message, { sqlstate, sql })
		this.name = "StoreExecutionError"
	}
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
	schema: "public",
	separatorWidth: 60,
}
