/**
 * Plain-text result table: left-aligned columns padded to the widest value,
 * a dash rule joined by "-+-", and a trailing row count.
 */

export function formatCell(value: unknown): string {
	if (value === null || value === undefined) return ""
	if (value instanceof Date) return value.toISOString()
	return String(value)
}

export function formatResultTable(headers: string[], rows: unknown[][]): string[] {
	const cells = rows.map((row) => headers.map((_, i) => formatCell(row[i])))

	const widths = headers.map((h) => h.length)
	for (const row of cells) {
		row.forEach((cell, i) => {
			widths[i] = Math.max(widths[i], cell.length)
		})
	}

	const lines: string[] = []
	lines.push(headers.map((h, i) => h.padEnd(widths[i])).join(" | "))
	lines.push(widths.map((w) => "-".repeat(w)).join("-+-"))
	for (const row of cells) {
		lines.push(row.map((cell, i) => cell.padEnd(widths[i])).join(" | "))
	}
	lines.push("")
	lines.push(`${rows.length} rows returned.`)
	return lines
}
