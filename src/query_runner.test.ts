import { describe, it, expect } from "vitest"
import { ConnectivityError, SchemaInsufficientError, StoreExecutionError } from "./config.js"
import { FakeStore, pgError } from "./testing/fake_store.js"
import { silentLogger } from "./logger.js"
import { buildQuery, runQuery, runQueryCommand } from "./query_runner.js"

const MINIMAL_TABLES = {
	customers: ["customer_id", "name"],
	orders: ["order_id", "customer_id", "total_amount", "order_date"],
}

const MINIMAL_SQL = [
	"SELECT",
	'  c."customer_id" AS customer_id,',
	'  c."name" AS customer_name,',
	'  o."order_id" AS order_id,',
	'  o."order_date" AS order_date,',
	'  o."total_amount" AS total_amount',
	'FROM "public"."customers" c',
	'LEFT JOIN "public"."orders" o ON c."customer_id" = o."customer_id"',
	"LIMIT 50",
].join("\n")

const MINIMAL_RESULT = {
	fields: ["customer_id", "customer_name", "order_id", "order_date", "total_amount"],
	rows: [
		{ customer_id: "CUST0001", customer_name: "Ana Diaz", order_id: "ORD00001", order_date: "2024-03-01", total_amount: 19.5 },
		{ customer_id: "CUST0002", customer_name: "Bo Li", order_id: null, order_date: null, total_amount: null },
	],
}

const RULE = "-".repeat(60)

async function runCommand(store: FakeStore): Promise<{ code: number; lines: string[] }> {
	const lines: string[] = []
	const code = await runQueryCommand({ pool: store, logger: silentLogger, print: (line) => lines.push(line) })
	return { code, lines }
}

// ============================================================================
// Pipeline
// ============================================================================

describe("buildQuery", () => {
	it("introspects and renders without executing anything", async () => {
		const store = new FakeStore(MINIMAL_TABLES)
		const client = await store.connect()

		const { snapshot, query } = await buildQuery(client, { logger: silentLogger })

		expect(snapshot.tables.map((t) => t.table_name)).toEqual(["customers", "orders"])
		expect(query.tier).toBe("minimal")
		expect(query.sql).toBe(MINIMAL_SQL)
		expect(store.executed).toEqual([])
	})
})

describe("runQuery", () => {
	it("executes the rendered query and returns rows in column order", async () => {
		const store = new FakeStore(MINIMAL_TABLES, { result: MINIMAL_RESULT })

		const result = await runQuery(store, { logger: silentLogger })

		expect(result.tables).toEqual(["customers", "orders"])
		expect(result.headers).toEqual(MINIMAL_RESULT.fields)
		expect(result.rows[0]).toEqual(["CUST0001", "Ana Diaz", "ORD00001", "2024-03-01", 19.5])
		expect(store.executed.map((q) => q.text)).toEqual([MINIMAL_SQL])
		expect(store.connections).toBe(1)
		expect(store.releases).toBe(1)
	})

	it("wraps execution failures in StoreExecutionError and still releases", async () => {
		const store = new FakeStore(
			{ ...MINIMAL_TABLES, products: ["product_id", "name"], order_items: ["order_id", "product_id"] },
			{ executeError: pgError('column oi.quantity does not exist', "42703") },
		)

		const run = runQuery(store, { logger: silentLogger })

		await expect(run).rejects.toBeInstanceOf(StoreExecutionError)
		await expect(run).rejects.toMatchObject({ sqlstate: "42703", type: "execution" })
		expect(store.releases).toBe(1)
	})

	it("releases the connection when mandatory tables are missing", async () => {
		const store = new FakeStore({ customers: ["customer_id"] })

		await expect(runQuery(store, { logger: silentLogger })).rejects.toBeInstanceOf(SchemaInsufficientError)
		expect(store.releases).toBe(1)
		expect(store.executed).toEqual([])
	})

	it("releases the connection when the catalog cannot be read", async () => {
		const store = new FakeStore(MINIMAL_TABLES, {
			catalogError: pgError("permission denied for schema public", "42501"),
		})

		await expect(runQuery(store, { logger: silentLogger })).rejects.toBeInstanceOf(ConnectivityError)
		expect(store.connections).toBe(1)
		expect(store.releases).toBe(1)
		expect(store.executed).toEqual([])
	})

	it("raises ConnectivityError when the store cannot be reached", async () => {
		const store = new FakeStore(MINIMAL_TABLES, {
			connectError: pgError('database "ecommerce" does not exist', "3D000"),
		})

		await expect(runQuery(store, { logger: silentLogger })).rejects.toBeInstanceOf(ConnectivityError)
		expect(store.connections).toBe(0)
	})
})

// ============================================================================
// Command output
// ============================================================================

describe("runQueryCommand", () => {
	it("prints tables, the framed query and the result table", async () => {
		const { code, lines } = await runCommand(new FakeStore(MINIMAL_TABLES, { result: MINIMAL_RESULT }))

		expect(code).toBe(0)
		expect(lines).toEqual([
			"Tables in database: customers, orders",
			"",
			"Executing query:",
			RULE,
			MINIMAL_SQL,
			RULE,
			"customer_id | customer_name | order_id | order_date | total_amount",
			"------------+---------------+----------+------------+-------------",
			"CUST0001    | Ana Diaz      | ORD00001 | 2024-03-01 | 19.5        ",
			"CUST0002    | Bo Li         |          |            |             ",
			"",
			"2 rows returned.",
		])
	})

	it("reports an empty result", async () => {
		const { code, lines } = await runCommand(new FakeStore(MINIMAL_TABLES))

		expect(code).toBe(0)
		expect(lines[lines.length - 1]).toBe("Query returned 0 rows.")
	})

	it("exits 1 when the store cannot be reached", async () => {
		const { code, lines } = await runCommand(
			new FakeStore(MINIMAL_TABLES, { connectError: pgError("connect ECONNREFUSED 127.0.0.1:5432", "ECONNREFUSED") }),
		)

		expect(code).toBe(1)
		expect(lines).toEqual(["Database not reachable: connect ECONNREFUSED 127.0.0.1:5432"])
	})

	it("reports missing mandatory tables without printing a query", async () => {
		const { code, lines } = await runCommand(new FakeStore({ orders: ["order_id"], reviews: ["rating"] }))

		expect(code).toBe(0)
		expect(lines).toEqual([
			"Tables in database: orders, reviews",
			"Runtime error: Database must have at least 'customers' and 'orders' tables.",
		])
	})

	it("reports execution errors and ends normally", async () => {
		const store = new FakeStore(MINIMAL_TABLES, { executeError: pgError('column o.order_date does not exist', "42703") })

		const { code, lines } = await runCommand(store)

		expect(code).toBe(0)
		expect(lines[lines.length - 1]).toBe("Database error while running query: column o.order_date does not exist")
		expect(store.releases).toBe(1)
	})
})
