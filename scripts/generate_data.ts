/**
 * Generate synthetic e-commerce CSV files.
 *
 * Usage:
 *   npx tsx scripts/generate_data.ts [outputDir]
 */

import path from "path"
import { loadConfig } from "../src/config/loadConfig.js"
import { generateDataset } from "../src/data_generator.js"

const config = loadConfig()
const outputDir = path.resolve(process.cwd(), process.argv[2] ?? config.data.dir)

const files = generateDataset(outputDir, config.data)
console.log(`Generated: ${files.map((f) => path.basename(f)).join(", ")}`)
