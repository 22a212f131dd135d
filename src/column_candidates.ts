/**
 * Column Candidates
 *
 * Binds logical column roles to concrete column names. Each role has an ordered
 * list of candidate names; the first one present in the relevant table wins.
 * An unmatched role is bound to null and left for the join planner to degrade on.
 */

import type {
	ColumnRole,
	RoleBinding,
	SchemaBinding,
	SchemaSnapshot,
	SnapshotTable,
	TablePresence,
} from "./schema_types.js"

// ============================================================================
// Candidate Lists (earlier entries preferred)
// ============================================================================

export const ROLE_CANDIDATES: Readonly<Record<ColumnRole, readonly string[]>> = Object.freeze({
	productName: ["product_name", "name", "title", "product_title", "product"],
	orderTotal: ["total_amount", "total", "amount", "order_total"],
	rating: ["rating", "stars", "score"],
	orderId: ["order_id", "id"],
	productId: ["product_id", "id"],
	customerId: ["customer_id", "id"],
	quantity: ["quantity", "qty"],
	subtotal: ["subtotal", "line_total", "amount"],
})

// ============================================================================
// Resolution
// ============================================================================

/**
 * First candidate present in `columns` (exact, case-sensitive), or null.
 */
export function resolveCandidate(columns: readonly string[], candidates: readonly string[]): string | null {
	const available = new Set(columns)
	for (const candidate of candidates) {
		if (available.has(candidate)) {
			return candidate
		}
	}
	return null
}

/**
 * Case-insensitive table lookup; the returned table keeps its catalog spelling.
 */
export function findTable(snapshot: SchemaSnapshot, name: string): SnapshotTable | null {
	const wanted = name.toLowerCase()
	return snapshot.tables.find((t) => t.table_name.toLowerCase() === wanted) ?? null
}

function resolveIn(table: SnapshotTable | null, role: ColumnRole): string | null {
	return table ? resolveCandidate(table.columns, ROLE_CANDIDATES[role]) : null
}

/**
 * Build table presence and the role binding for a snapshot.
 *
 * product-id is looked up on the line-item table first and falls back to orders,
 * so the same key joins products whichever table carries it.
 */
export function bindRoles(snapshot: SchemaSnapshot): SchemaBinding {
	const presence: TablePresence = {
		customers: findTable(snapshot, "customers"),
		orders: findTable(snapshot, "orders"),
		products: findTable(snapshot, "products"),
		order_items: findTable(snapshot, "order_items"),
		reviews: findTable(snapshot, "reviews"),
	}

	const { customers, orders, products, order_items: orderItems, reviews } = presence

	const roles: RoleBinding = {
		customerId: resolveIn(customers, "customerId"),
		orderId: resolveIn(orders, "orderId"),
		productId: resolveIn(orderItems, "productId") ?? resolveIn(orders, "productId"),
		productName: resolveIn(products, "productName"),
		orderTotal: resolveIn(orders, "orderTotal"),
		quantity: resolveIn(orderItems, "quantity"),
		subtotal: resolveIn(orderItems, "subtotal"),
		rating: resolveIn(reviews, "rating"),
	}

	return { presence, roles }
}
