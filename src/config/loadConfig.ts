/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > schema defaults
 *
 * The merged result is validated with zod, which also fills in defaults.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import type { PoolConfig } from "pg"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

export const configSchema = z.object({
	database: z
		.object({
			connection_string: z.string().optional(),
			host: z.string().default("localhost"),
			port: z.number().int().positive().default(5432),
			name: z.string().default("ecommerce"),
			user: z.string().default("postgres"),
			password: z.string().default(""),
			schema: z.string().min(1).default("public"),
		})
		.default({}),
	data: z
		.object({
			dir: z.string().default("data"),
			customers: z.number().int().nonnegative().default(100),
			products: z.number().int().nonnegative().default(100),
			orders: z.number().int().nonnegative().default(100),
			reviews: z.number().int().nonnegative().default(100),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
})

export type OrderQueryConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}

function section(cfg: Record<string, unknown>, key: string): Record<string, unknown> {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: Record<string, unknown> = {}
	cfg[key] = created
	return created
}

function override(target: Record<string, unknown>, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: Record<string, unknown>): void {
	// database
	const db = section(cfg, "database")
	override(db, "connection_string", env("DATABASE_URL"))
	override(db, "host", env("DB_HOST"))
	override(db, "port", envInt("DB_PORT"))
	override(db, "name", env("DB_NAME"))
	override(db, "user", env("DB_USER"))
	override(db, "password", env("DB_PASSWORD"))
	override(db, "schema", env("DB_SCHEMA"))

	// data
	const data = section(cfg, "data")
	override(data, "dir", env("DATA_DIR"))

	// logging
	const l = section(cfg, "logging")
	override(l, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: OrderQueryConfig | null = null

export function loadConfig(): OrderQueryConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: Record<string, unknown> = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = configSchema.parse(merged)
	return _config
}

export function getConfig(): OrderQueryConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}

/**
 * node-postgres pool options. A connection string takes precedence over the
 * discrete host/port/name fields.
 */
export function connectionConfig(cfg: OrderQueryConfig): PoolConfig {
	const db = cfg.database
	if (db.connection_string) {
		return { connectionString: db.connection_string }
	}
	return {
		host: db.host,
		port: db.port,
		database: db.name,
		user: db.user,
		password: db.password,
	}
}
