/**
 * Synthetic e-commerce data generator
 *
 * Produces linked customer, product, order, payment and review records and
 * writes them as CSV files for the loader. Randomness and the clock are
 * injectable so output can be made deterministic.
 */

import * as fs from "fs"
import * as path from "path"
import { v4 as uuidv4 } from "uuid"

// ============================================================================
// Types
// ============================================================================

export type CsvValue = string | number

export interface CustomerRecord {
	customer_id: string
	name: string
	email: string
	phone: string
	address: string
	created_at: string
}

export interface ProductRecord {
	product_id: string
	name: string
	category: string
	price: number
	stock: number
	created_at: string
}

export interface OrderRecord {
	order_id: string
	customer_id: string
	product_id: string
	quantity: number
	order_date: string
	status: string
	subtotal: number
	shipping: number
	total: number
}

export interface PaymentRecord {
	payment_id: string
	order_id: string
	amount: number
	method: string
	status: string
	payment_date: string
}

export interface ReviewRecord {
	review_id: string
	product_id: string
	customer_id: string
	rating: number
	review_text: string
	review_date: string
}

export interface GeneratorOptions {
	/** Uniform source in [0, 1) */
	random?: () => number
	now?: () => Date
}

export interface DatasetCounts {
	customers: number
	products: number
	orders: number
	reviews: number
}

// ============================================================================
// Vocabulary
// ============================================================================

const FIRST_NAMES = ["James", "Mary", "John", "Patricia", "Robert", "Jennifer", "Michael", "Linda", "William", "Elizabeth"]
const LAST_NAMES = ["Smith", "Johnson", "Williams", "Brown", "Jones", "Garcia", "Miller", "Davis", "Rodriguez", "Martinez"]
const EMAIL_DOMAINS = ["example.com", "email.com", "shopnow.com", "mail.com"]
const STREETS = ["Oak", "Maple", "Pine", "Cedar", "Elm"]
const CITIES = ["Springfield", "Rivertown", "Greenville", "Fairview"]
const STATES = ["CA", "NY", "TX", "WA", "FL"]

const CATEGORIES = ["Electronics", "Books", "Home", "Toys", "Clothing", "Sports", "Beauty"]
const ADJECTIVES = ["Portable", "Advanced", "Smart", "Eco", "Premium", "Compact", "Durable", "Classic"]
const ITEMS = ["Headphones", "Lamp", "Backpack", "Blender", "Watch", "Camera", "Mug", "Sneakers", "Jacket", "Game"]

const ORDER_STATUSES = ["pending", "processing", "shipped", "delivered", "cancelled"]
const ORDER_STATUS_WEIGHTS = [10, 20, 30, 30, 10]
const PAYMENT_METHODS = ["credit_card", "paypal", "bank_transfer", "apple_pay"]
const PAYMENT_STATUSES = ["paid", "pending", "failed"]
const PAYMENT_STATUS_WEIGHTS = [85, 10, 5]

const REVIEW_TEXTS = [
	"Excellent product, highly recommend!",
	"Good value for money.",
	"Arrived late but works as expected.",
	"Not satisfied with the quality.",
	"Exceeded my expectations.",
	"Will buy again.",
	"Too expensive for what it offers.",
	"Five stars!",
]

const DAY_MS = 24 * 60 * 60 * 1000

/** Orders above this subtotal ship free */
const FREE_SHIPPING_THRESHOLD = 50

// ============================================================================
// Random helpers
// ============================================================================

class Rng {
	constructor(private next: () => number) {}

	/** Inclusive on both ends */
	int(min: number, max: number): number {
		return min + Math.floor(this.next() * (max - min + 1))
	}

	uniform(min: number, max: number): number {
		return min + this.next() * (max - min)
	}

	chance(): number {
		return this.next()
	}

	bytes(n: number): number[] {
		return Array.from({ length: n }, () => this.int(0, 255))
	}

	choice<T>(items: readonly T[]): T {
		if (items.length === 0) throw new Error("choice() from an empty list")
		return items[Math.min(items.length - 1, Math.floor(this.next() * items.length))]
	}

	weighted<T>(items: readonly T[], weights: readonly number[]): T {
		const total = weights.reduce((sum, w) => sum + w, 0)
		let pick = this.next() * total
		for (let i = 0; i < items.length; i++) {
			pick -= weights[i]
			if (pick < 0) return items[i]
		}
		return items[items.length - 1]
	}
}

function round2(value: number): number {
	return Math.round(value * 100) / 100
}

function pad(n: number, width: number): string {
	return String(n).padStart(width, "0")
}

function daysAgo(now: Date, days: number): Date {
	return new Date(now.getTime() - days * DAY_MS)
}

function resolveOptions(options: GeneratorOptions): { rng: Rng; now: Date } {
	return {
		rng: new Rng(options.random ?? Math.random),
		now: (options.now ?? (() => new Date()))(),
	}
}

// ============================================================================
// Generators
// ============================================================================

export function generateCustomers(n: number, options: GeneratorOptions = {}): CustomerRecord[] {
	const { rng, now } = resolveOptions(options)
	const rows: CustomerRecord[] = []
	for (let i = 1; i <= n; i++) {
		const first = rng.choice(FIRST_NAMES)
		const last = rng.choice(LAST_NAMES)
		rows.push({
			customer_id: `CUST${pad(i, 4)}`,
			name: `${first} ${last}`,
			email: `${first.toLowerCase()}.${last.toLowerCase()}${i}@${rng.choice(EMAIL_DOMAINS)}`,
			phone: `+1-${rng.int(200, 999)}-${rng.int(200, 999)}-${rng.int(1000, 9999)}`,
			address: `${rng.int(100, 9999)} ${rng.choice(STREETS)} St, ${rng.choice(CITIES)}, ${rng.choice(STATES)}`,
			created_at: daysAgo(now, rng.int(1, 2000)).toISOString(),
		})
	}
	return rows
}

export function generateProducts(n: number, options: GeneratorOptions = {}): ProductRecord[] {
	const { rng, now } = resolveOptions(options)
	const rows: ProductRecord[] = []
	for (let i = 1; i <= n; i++) {
		rows.push({
			product_id: `PROD${pad(i, 4)}`,
			name: `${rng.choice(ADJECTIVES)} ${rng.choice(ITEMS)}`,
			category: rng.choice(CATEGORIES),
			price: round2(rng.uniform(5.0, 499.99)),
			stock: rng.int(0, 500),
			created_at: daysAgo(now, rng.int(1, 1500)).toISOString(),
		})
	}
	return rows
}

/**
 * One product per order. Shipping is free above the threshold, otherwise 3.99–9.99.
 */
export function generateOrders(
	n: number,
	customers: readonly CustomerRecord[],
	products: readonly ProductRecord[],
	options: GeneratorOptions = {},
): OrderRecord[] {
	const { rng, now } = resolveOptions(options)
	const rows: OrderRecord[] = []
	for (let i = 1; i <= n; i++) {
		const customer = rng.choice(customers)
		const product = rng.choice(products)
		const quantity = rng.int(1, 5)
		const orderDate = daysAgo(now, rng.int(1, 365))
		const subtotal = round2(product.price * quantity)
		const shipping = subtotal > FREE_SHIPPING_THRESHOLD ? 0 : round2(rng.uniform(3.99, 9.99))
		rows.push({
			order_id: `ORD${pad(i, 5)}`,
			customer_id: customer.customer_id,
			product_id: product.product_id,
			quantity,
			order_date: orderDate.toISOString(),
			status: rng.weighted(ORDER_STATUSES, ORDER_STATUS_WEIGHTS),
			subtotal,
			shipping,
			total: round2(subtotal + shipping),
		})
	}
	return rows
}

/**
 * One payment per order; about 5% are partial (30–90% of the total).
 */
export function generatePayments(orders: readonly OrderRecord[], options: GeneratorOptions = {}): PaymentRecord[] {
	const { rng } = resolveOptions(options)
	return orders.map((order) => {
		const amount = rng.chance() > 0.05 ? order.total : round2(order.total * rng.uniform(0.3, 0.9))
		const method = rng.choice(PAYMENT_METHODS)
		const status = rng.weighted(PAYMENT_STATUSES, PAYMENT_STATUS_WEIGHTS)
		const paidAt = new Date(new Date(order.order_date).getTime() + rng.int(0, 7) * DAY_MS)
		const id = uuidv4({ random: rng.bytes(16) })
		return {
			payment_id: `PAY-${id.replace(/-/g, "").slice(0, 8)}`,
			order_id: order.order_id,
			amount,
			method,
			status,
			payment_date: paidAt.toISOString(),
		}
	})
}

export function generateReviews(
	n: number,
	customers: readonly CustomerRecord[],
	products: readonly ProductRecord[],
	options: GeneratorOptions = {},
): ReviewRecord[] {
	const { rng, now } = resolveOptions(options)
	const rows: ReviewRecord[] = []
	for (let i = 1; i <= n; i++) {
		const customer = rng.choice(customers)
		const product = rng.choice(products)
		rows.push({
			review_id: `REV${pad(i, 5)}`,
			product_id: product.product_id,
			customer_id: customer.customer_id,
			rating: rng.int(1, 5),
			review_text: rng.choice(REVIEW_TEXTS),
			review_date: daysAgo(now, rng.int(1, 800)).toISOString(),
		})
	}
	return rows
}

// ============================================================================
// CSV output
// ============================================================================

function csvCell(value: CsvValue | undefined): string {
	if (value === undefined) return ""
	const text = String(value)
	return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function toCsv<K extends string>(fieldnames: readonly K[], rows: ReadonlyArray<Record<K, CsvValue>>): string {
	const lines = [fieldnames.map((f) => csvCell(f)).join(",")]
	for (const row of rows) {
		lines.push(fieldnames.map((f) => csvCell(row[f])).join(","))
	}
	return lines.join("\n") + "\n"
}

export function writeCsv<K extends string>(
	filePath: string,
	fieldnames: readonly K[],
	rows: ReadonlyArray<Record<K, CsvValue>>,
): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true })
	fs.writeFileSync(filePath, toCsv(fieldnames, rows), "utf-8")
}

export const CSV_FIELDS = {
	customers: ["customer_id", "name", "email", "phone", "address", "created_at"],
	products: ["product_id", "name", "category", "price", "stock", "created_at"],
	orders: ["order_id", "customer_id", "product_id", "quantity", "order_date", "status", "subtotal", "shipping", "total"],
	payments: ["payment_id", "order_id", "amount", "method", "status", "payment_date"],
	reviews: ["review_id", "product_id", "customer_id", "rating", "review_text", "review_date"],
} as const

/**
 * Generate every record set and write <name>.csv files into outputDir.
 *
 * @returns written file paths
 */
export function generateDataset(outputDir: string, counts: DatasetCounts, options: GeneratorOptions = {}): string[] {
	const customers = generateCustomers(counts.customers, options)
	const products = generateProducts(counts.products, options)
	const orders = generateOrders(counts.orders, customers, products, options)
	const payments = generatePayments(orders, options)
	const reviews = generateReviews(counts.reviews, customers, products, options)

	const files = {
		customers: path.join(outputDir, "customers.csv"),
		products: path.join(outputDir, "products.csv"),
		orders: path.join(outputDir, "orders.csv"),
		payments: path.join(outputDir, "payments.csv"),
		reviews: path.join(outputDir, "reviews.csv"),
	}

	writeCsv(files.customers, CSV_FIELDS.customers, customers)
	writeCsv(files.products, CSV_FIELDS.products, products)
	writeCsv(files.orders, CSV_FIELDS.orders, orders)
	writeCsv(files.payments, CSV_FIELDS.payments, payments)
	writeCsv(files.reviews, CSV_FIELDS.reviews, reviews)

	return Object.values(files)
}
