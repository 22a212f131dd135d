/**
 * Store access
 *
 * Narrow client/pool interfaces over node-postgres so the pipeline can borrow a
 * single connection and tests can substitute an in-process fake.
 */

import type { Pool } from "pg"
import { ConnectivityError, type Logger } from "./config.js"

// ============================================================================
// Types
// ============================================================================

export interface StoreField {
	name: string
}

export interface StoreResult {
	rows: Array<Record<string, unknown>>
	fields: StoreField[]
	rowCount: number | null
}

export interface StoreClient {
	query(text: string, values?: unknown[]): Promise<StoreResult>
	release(): void
}

export interface StorePool {
	connect(): Promise<StoreClient>
	end(): Promise<void>
}

export interface PostgresErrorContext {
	sqlstate: string
	message: string
	hint?: string
	detail?: string
}

// ============================================================================
// pg adapter
// ============================================================================

export function pgStore(pool: Pool): StorePool {
	return {
		async connect(): Promise<StoreClient> {
			const client = await pool.connect()
			return {
				async query(text: string, values?: unknown[]): Promise<StoreResult> {
					const result = await client.query(text, values)
					return {
						rows: result.rows,
						fields: result.fields.map((f) => ({ name: f.name })),
						rowCount: result.rowCount,
					}
				},
				release: () => client.release(),
			}
		},
		end: () => pool.end(),
	}
}

/**
 * Acquire the one connection used for an invocation.
 * Any failure here means the store cannot be reached.
 */
export async function connectStore(pool: StorePool, logger: Logger): Promise<StoreClient> {
	try {
		return await pool.connect()
	} catch (error) {
		const pgError = parsePostgresError(error)
		logger.error("Store connection failed", {
			sqlstate: pgError.sqlstate,
			message: pgError.message,
		})
		throw new ConnectivityError(`Database not reachable: ${pgError.message}`, {
			sqlstate: pgError.sqlstate,
		})
	}
}

/**
 * Double-quote an identifier so catalog spelling (including case) is kept.
 */
export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

// ============================================================================
// Error parsing
// ============================================================================

function readString(source: object, key: string): string | undefined {
	const value: unknown = Reflect.get(source, key)
	return typeof value === "string" ? value : undefined
}

/**
 * Extract sqlstate and message from a pg (or socket) error.
 */
export function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error && typeof error === "object") {
		return {
			sqlstate: readString(error, "code") || "UNKNOWN",
			message: readString(error, "message") || String(error),
			hint: readString(error, "hint"),
			detail: readString(error, "detail"),
		}
	}

	return {
		sqlstate: "UNKNOWN",
		message: String(error),
	}
}
