#!/usr/bin/env node
/**
 * Convert `.mesh` files to OBJ.
 *
 * Usage: tsx scripts/mesh2obj.ts [files...] [-o dir] [--defs file] [--zip] [--verbose]
 *
 * Without files, lists the `.mesh` files in the working directory and asks
 * which ones to convert.
 */

import * as fs from 'fs'
import * as path from 'path'
import { createInterface } from 'readline/promises'
import { parseArgs } from 'util'
import { ConsoleLogger, MeshDefs, convertFiles, parseSelection } from '../src/index'

const DEFAULT_DEFS = 'MeshDefs.lua'
const DEFAULT_OUT_DIR = 'obj'

/**
 * Ask for the files to convert and the output directory
 *
 * @returns undefined when the user quits or nothing is selected
 */
async function promptForFiles(defaultOutDir: string): Promise<{ files: string[], outDir: string } | undefined> {
  const candidates = fs.readdirSync(process.cwd())
    .filter(file => file.toLowerCase().endsWith('.mesh'))
    .sort()

  if (candidates.length === 0) {
    console.log('No .mesh files in the current directory')
    return undefined
  }

  candidates.forEach((file, i) => console.log(`${String(i + 1).padStart(3)}. ${file}`))

  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    while (true) {
      const answer = await rl.question('Select files (e.g. 1,3,5-7, all, q to quit): ')
      const selection = parseSelection(answer, candidates.length)
      if (selection.kind === 'quit') return undefined

      selection.warnings.forEach(warning => console.warn(`  ${warning}`))
      if (selection.indices.length === 0) {
        console.log('Nothing selected')
        continue
      }

      const outDir = (await rl.question(`Output directory [${defaultOutDir}]: `)).trim() || defaultOutDir
      return { files: selection.indices.map(i => candidates[i]), outDir }
    }
  } finally {
    rl.close()
  }
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      defs: { type: 'string' },
      zip: { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false }
    }
  })

  const logger = new ConsoleLogger(values.verbose ? 'debug' : 'info')

  let files = positionals
  let outDir = values.out ?? DEFAULT_OUT_DIR
  if (files.length === 0) {
    const picked = await promptForFiles(outDir)
    if (!picked) return 0
    files = picked.files
    outDir = picked.outDir
  }

  const defsPath = values.defs ?? DEFAULT_DEFS
  const flagTable = await MeshDefs.load(defsPath)
  logger.debug(`Loaded ${Object.keys(flagTable).length} definitions from ${defsPath}`)

  const report = await convertFiles(files, {
    outDir: path.resolve(outDir),
    archive: values.zip ? 'meshes.zip' : undefined,
    flagTable,
    logger
  })

  console.log('\nSummary:')
  console.log(`Total files: ${report.entries.length}`)
  console.log(`Converted: ${report.converted}`)
  console.log(`Failed: ${report.failed}`)
  for (const entry of report.entries.filter(entry => entry.status === 'failed')) {
    console.log(`  ${entry.file}: ${entry.error ?? 'unknown error'}`)
  }
  if (report.archivePath) {
    console.log(`Archive: ${report.archivePath}`)
  }

  return report.converted > 0 ? 0 : 1
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error('Error running script:', error)
    process.exit(1)
  })
