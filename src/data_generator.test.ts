import { describe, it, expect, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { parseCsv } from "./csv_loader.js"
import {
	CSV_FIELDS,
	generateCustomers,
	generateDataset,
	generateOrders,
	generatePayments,
	generateProducts,
	generateReviews,
	toCsv,
	type GeneratorOptions,
	type ProductRecord,
} from "./data_generator.js"

const NOW = new Date("2024-06-01T00:00:00.000Z")

/** Always picks the first option / lowest value. */
const LOW: GeneratorOptions = { random: () => 0, now: () => NOW }

/** Always picks the last option / highest value. */
const HIGH: GeneratorOptions = { random: () => 0.99, now: () => NOW }

function product(price: number): ProductRecord {
	return {
		product_id: "PROD0042",
		name: "Smart Lamp",
		category: "Home",
		price,
		stock: 10,
		created_at: NOW.toISOString(),
	}
}

let tmpDir: string | null = null

afterEach(() => {
	if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true })
	tmpDir = null
})

describe("generateCustomers", () => {
	it("builds sequential ids and derived contact fields", () => {
		const [first, second] = generateCustomers(2, LOW)

		expect(first).toEqual({
			customer_id: "CUST0001",
			name: "James Smith",
			email: "james.smith1@example.com",
			phone: "+1-200-200-1000",
			address: "100 Oak St, Springfield, CA",
			created_at: "2024-05-31T00:00:00.000Z",
		})
		expect(second.customer_id).toBe("CUST0002")
		expect(second.email).toBe("james.smith2@example.com")
	})
})

describe("generateProducts", () => {
	it("rounds prices to cents within range", () => {
		const [low] = generateProducts(1, LOW)
		expect(low).toMatchObject({ product_id: "PROD0001", name: "Portable Headphones", category: "Electronics", price: 5, stock: 0 })

		for (const p of generateProducts(50)) {
			expect(p.price).toBeGreaterThanOrEqual(5)
			expect(p.price).toBeLessThanOrEqual(499.99)
			expect(Math.round(p.price * 100) / 100).toBe(p.price)
		}
	})
})

describe("generateOrders", () => {
	const customers = generateCustomers(3, LOW)

	it("charges shipping on small orders", () => {
		const [order] = generateOrders(1, customers, [product(30)], LOW)

		expect(order).toMatchObject({
			order_id: "ORD00001",
			customer_id: "CUST0001",
			product_id: "PROD0042",
			quantity: 1,
			status: "pending",
			subtotal: 30,
			shipping: 3.99,
			total: 33.99,
		})
	})

	it("ships free above the threshold", () => {
		const [order] = generateOrders(1, customers, [product(30)], HIGH)

		expect(order.quantity).toBe(5)
		expect(order.subtotal).toBe(150)
		expect(order.shipping).toBe(0)
		expect(order.total).toBe(150)
		expect(order.status).toBe("cancelled")
		expect(order.customer_id).toBe("CUST0003")
	})
})

describe("generatePayments", () => {
	const orders = generateOrders(1, generateCustomers(1, LOW), [product(30)], LOW)

	it("pays the full total most of the time", () => {
		const [payment] = generatePayments(orders, { random: () => 0.5 })

		expect(payment.order_id).toBe("ORD00001")
		expect(payment.amount).toBe(33.99)
		expect(payment.payment_id).toBe("PAY-80808080")
	})

	it("records partial payments", () => {
		const [payment] = generatePayments(orders, LOW)

		expect(payment.payment_id).toBe("PAY-00000000")
		expect(payment.amount).toBe(10.2)
		expect(payment.method).toBe("credit_card")
		expect(payment.status).toBe("paid")
		expect(payment.payment_date).toBe(orders[0].order_date)
	})

	it("derives payment ids from the injected random source", () => {
		let seed = 7
		const seeded = () => {
			seed = (seed * 16807) % 2147483647
			return seed / 2147483647
		}
		const first = generatePayments(orders, { random: seeded })
		seed = 7
		const second = generatePayments(orders, { random: seeded })

		expect(second[0].payment_id).toBe(first[0].payment_id)
	})
})

describe("generateReviews", () => {
	it("links reviews to customers and products", () => {
		const [review] = generateReviews(1, generateCustomers(1, LOW), [product(30)], LOW)

		expect(review).toEqual({
			review_id: "REV00001",
			product_id: "PROD0042",
			customer_id: "CUST0001",
			rating: 1,
			review_text: "Excellent product, highly recommend!",
			review_date: "2024-05-31T00:00:00.000Z",
		})
	})
})

describe("CSV output", () => {
	it("quotes cells containing commas or quotes", () => {
		expect(toCsv(["a", "b"], [{ a: "x,y", b: 'say "hi"' }])).toBe('a,b\n"x,y","say ""hi"""\n')
	})

	it("writes every file with the requested row counts", () => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "data-generator-test-"))
		const outDir = path.join(tmpDir, "nested")

		const files = generateDataset(outDir, { customers: 4, products: 3, orders: 5, reviews: 2 })

		expect(files.map((f) => path.basename(f))).toEqual([
			"customers.csv",
			"products.csv",
			"orders.csv",
			"payments.csv",
			"reviews.csv",
		])

		const orders = parseCsv(fs.readFileSync(path.join(outDir, "orders.csv"), "utf-8"))
		expect(orders).toHaveLength(5)
		expect(Object.keys(orders[0])).toEqual([...CSV_FIELDS.orders])

		const payments = parseCsv(fs.readFileSync(path.join(outDir, "payments.csv"), "utf-8"))
		expect(payments.map((p) => p.order_id)).toEqual(orders.map((o) => o.order_id))

		expect(parseCsv(fs.readFileSync(path.join(outDir, "reviews.csv"), "utf-8"))).toHaveLength(2)
	})
})
