/**
 * Join Planner
 *
 * Chooses one of three fixed join topologies from the tables and column roles a
 * schema actually offers, and renders it as a single SELECT.
 *
 * Tiers, in order of preference:
 * - full:     customers → orders → order_items → products, reviews
 * - degraded: customers → orders → products, reviews (one order row = one unit)
 * - minimal:  customers ⟕ orders
 *
 * Unresolved roles fall back to literal column names. Those literals are not
 * checked against the schema; a wrong guess surfaces as an execution error.
 */

import { SchemaInsufficientError } from "./config.js"
import type {
	JoinTier,
	RenderedQuery,
	RoleBinding,
	SchemaBinding,
	SnapshotTable,
	TablePresence,
} from "./schema_types.js"
import { quoteIdent } from "./store.js"

// ============================================================================
// Constants
// ============================================================================

/** Display sample size. Every tier ends with this LIMIT. */
export const ROW_LIMIT = 50

const MANDATORY_TABLES = ["customers", "orders"] as const

// ============================================================================
// Types
// ============================================================================

/**
 * Inputs every plan builder sees once the mandatory tables are known present.
 */
export interface PlanContext {
	presence: TablePresence
	roles: RoleBinding
	customers: SnapshotTable
	orders: SnapshotTable
}

export interface PlanBuilder {
	tier: JoinTier
	applies(ctx: PlanContext): boolean
	render(ctx: PlanContext): RenderedQuery
}

interface Projection {
	expr: string
	alias: string
}

// ============================================================================
// SQL helpers
// ============================================================================

function tableRef(table: SnapshotTable, alias: string): string {
	return `${quoteIdent(table.table_schema)}.${quoteIdent(table.table_name)} ${alias}`
}

function col(alias: string, column: string): string {
	return `${alias}.${quoteIdent(column)}`
}

function buildSelect(projections: Projection[], from: string[]): string {
	const selectList = projections.map((p) => `  ${p.expr} AS ${p.alias}`).join(",\n")
	return ["SELECT", selectList, ...from, `LIMIT ${ROW_LIMIT}`].join("\n")
}

function customerKey(ctx: PlanContext): string {
	return ctx.roles.customerId ?? ctx.customers.columns[0] ?? "customer_id"
}

function orderKey(ctx: PlanContext): string {
	return ctx.roles.orderId ?? ctx.orders.columns[0] ?? "order_id"
}

function ratingProjection(ctx: PlanContext): Projection {
	const { reviews } = ctx.presence
	const rating = ctx.roles.rating
	return {
		expr: reviews && rating ? col("r", rating) : "NULL",
		alias: "rating",
	}
}

function reviewsJoin(ctx: PlanContext, productKey: string): string[] {
	const { reviews } = ctx.presence
	if (!reviews) return []
	return [
		`LEFT JOIN ${tableRef(reviews, "r")} ON ${col("r", "customer_id")} = ${col("c", customerKey(ctx))} AND ${col("r", "product_id")} = ${col("p", productKey)}`,
	]
}

/**
 * Projections shared by the product-level tiers; only quantity and subtotal differ.
 */
function productLevelQuery(
	tier: JoinTier,
	ctx: PlanContext,
	productName: string,
	lineColumns: { quantity: string; subtotal: string },
	from: string[],
): RenderedQuery {
	const projections: Projection[] = [
		{ expr: col("c", customerKey(ctx)), alias: "customer_id" },
		{ expr: col("c", "name"), alias: "customer_name" },
		{ expr: col("p", productName), alias: "product_name" },
		{ expr: col("o", orderKey(ctx)), alias: "order_id" },
		{ expr: col("o", "order_date"), alias: "order_date" },
		{ expr: lineColumns.quantity, alias: "quantity" },
		{ expr: lineColumns.subtotal, alias: "subtotal" },
		ratingProjection(ctx),
	]
	return {
		tier,
		sql: buildSelect(projections, from),
		columns: projections.map((p) => p.alias),
	}
}

// ============================================================================
// Plan Builders
// ============================================================================

const fullPlan: PlanBuilder = {
	tier: "full",
	applies: (ctx) => ctx.presence.order_items !== null && ctx.presence.products !== null && ctx.roles.productName !== null,
	render(ctx) {
		const { order_items: orderItems, products } = ctx.presence
		const productName = ctx.roles.productName
		if (!orderItems || !products || !productName) {
			throw new Error("full plan rendered without its required tables")
		}
		const productKey = ctx.roles.productId ?? "product_id"

		return productLevelQuery(
			"full",
			ctx,
			productName,
			{
				quantity: col("oi", ctx.roles.quantity ?? "quantity"),
				subtotal: col("oi", ctx.roles.subtotal ?? "subtotal"),
			},
			[
				`FROM ${tableRef(ctx.customers, "c")}`,
				`JOIN ${tableRef(ctx.orders, "o")} ON ${col("c", customerKey(ctx))} = ${col("o", "customer_id")}`,
				`JOIN ${tableRef(orderItems, "oi")} ON ${col("o", orderKey(ctx))} = ${col("oi", "order_id")}`,
				`LEFT JOIN ${tableRef(products, "p")} ON ${col("oi", "product_id")} = ${col("p", productKey)}`,
				...reviewsJoin(ctx, productKey),
			],
		)
	},
}

const degradedPlan: PlanBuilder = {
	tier: "degraded",
	applies: (ctx) =>
		ctx.presence.order_items === null &&
		ctx.presence.products !== null &&
		ctx.roles.productId !== null &&
		ctx.roles.productName !== null,
	render(ctx) {
		const { products } = ctx.presence
		const { productId, productName } = ctx.roles
		if (!products || !productId || !productName) {
			throw new Error("degraded plan rendered without its required tables")
		}

		return productLevelQuery(
			"degraded",
			ctx,
			productName,
			{
				quantity: "1",
				subtotal: col("o", ctx.roles.orderTotal ?? "total_amount"),
			},
			[
				`FROM ${tableRef(ctx.customers, "c")}`,
				`JOIN ${tableRef(ctx.orders, "o")} ON ${col("c", customerKey(ctx))} = ${col("o", "customer_id")}`,
				`LEFT JOIN ${tableRef(products, "p")} ON ${col("o", productId)} = ${col("p", productId)}`,
				...reviewsJoin(ctx, productId),
			],
		)
	},
}

const minimalPlan: PlanBuilder = {
	tier: "minimal",
	applies: () => true,
	render(ctx) {
		const projections: Projection[] = [
			{ expr: col("c", customerKey(ctx)), alias: "customer_id" },
			{ expr: col("c", "name"), alias: "customer_name" },
			{ expr: col("o", orderKey(ctx)), alias: "order_id" },
			{ expr: col("o", "order_date"), alias: "order_date" },
			{ expr: col("o", ctx.roles.orderTotal ?? "total_amount"), alias: "total_amount" },
		]
		return {
			tier: "minimal",
			sql: buildSelect(projections, [
				`FROM ${tableRef(ctx.customers, "c")}`,
				`LEFT JOIN ${tableRef(ctx.orders, "o")} ON ${col("c", customerKey(ctx))} = ${col("o", "customer_id")}`,
			]),
			columns: projections.map((p) => p.alias),
		}
	},
}

/** Evaluated in order; the first applicable builder wins. */
export const PLAN_BUILDERS: readonly PlanBuilder[] = [fullPlan, degradedPlan, minimalPlan]

// ============================================================================
// Selection
// ============================================================================

function planContext(binding: SchemaBinding): PlanContext {
	const { customers, orders } = binding.presence
	if (!customers || !orders) {
		const missing = MANDATORY_TABLES.filter((name) => binding.presence[name] === null)
		throw new SchemaInsufficientError(
			"Database must have at least 'customers' and 'orders' tables.",
			missing,
		)
	}
	return { presence: binding.presence, roles: binding.roles, customers, orders }
}

/**
 * Pick the plan builder for a binding.
 *
 * @throws SchemaInsufficientError when customers or orders is missing
 */
export function selectJoinPlan(binding: SchemaBinding): PlanBuilder {
	const ctx = planContext(binding)
	const builder = PLAN_BUILDERS.find((b) => b.applies(ctx))
	// minimal always applies
	return builder ?? minimalPlan
}

/**
 * Select and render the query for a binding.
 */
export function renderQuery(binding: SchemaBinding): RenderedQuery {
	const ctx = planContext(binding)
	return selectJoinPlan(binding).render(ctx)
}
