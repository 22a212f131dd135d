/**
 * Schema Types for adaptive order queries
 *
 * Defines types for:
 * - Schema snapshot (tables + ordered column names)
 * - Logical tables and column roles
 * - Role binding and table presence
 * - Rendered query output
 */

// ============================================================================
// Schema Snapshot
// ============================================================================

/**
 * One table as reported by the store catalog. Column order is ordinal order.
 */
export interface SnapshotTable {
	readonly table_schema: string
	readonly table_name: string
	readonly columns: readonly string[]
}

export interface SchemaSnapshot {
	readonly schema: string
	readonly tables: readonly SnapshotTable[]
	readonly introspected_at: string
}

// ============================================================================
// Logical Tables & Roles
// ============================================================================

export type LogicalTable = "customers" | "orders" | "products" | "order_items" | "reviews"

/**
 * Exact-case table reference per logical table, null when the store lacks it.
 */
export type TablePresence = Record<LogicalTable, SnapshotTable | null>

export type ColumnRole =
	| "customerId"
	| "orderId"
	| "productId"
	| "productName"
	| "orderTotal"
	| "quantity"
	| "subtotal"
	| "rating"

/** Resolved column name per role; null means absent. */
export type RoleBinding = Record<ColumnRole, string | null>

export interface SchemaBinding {
	presence: TablePresence
	roles: RoleBinding
}

// ============================================================================
// Join Plans
// ============================================================================

/** Ordered by descending completeness. */
export type JoinTier = "full" | "degraded" | "minimal"

export interface RenderedQuery {
	tier: JoinTier
	sql: string
	/** Projected column aliases, in SELECT order */
	columns: string[]
}
