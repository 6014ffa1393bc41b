import { readFile } from 'node:fs/promises'
import type { FlagTable, MeshFlags } from './types'

const RESOURCE_PATTERN = /resource\s+"Mesh"\s+"([^"]+)"\s*\{([^}]+)\}/g
const INTEGER_PATTERN = /^-?\d+$/

/**
 * Reader for the `MeshDefs.lua` definitions file that carries per-model flags
 */
export class MeshDefs {

  /**
   * Parse every `resource "Mesh" "<name>" { key = value, ... }` block.
   * A later block for the same name replaces an earlier one.
   */
  static parse(text: string): FlagTable {
    const table: FlagTable = {}
    for (const match of text.matchAll(RESOURCE_PATTERN)) {
      const [, name, body] = match
      const flags: MeshFlags = {}
      for (const entry of body.split(',')) {
        const separator = entry.indexOf('=')
        if (separator < 0) continue
        const key = entry.slice(0, separator).trim()
        if (!key) continue
        flags[key] = MeshDefs.parseValue(entry.slice(separator + 1).trim())
      }
      table[name] = flags
    }
    return table
  }

  /**
   * `true`/`false` in any case, quoted strings, integers; anything else stays raw
   */
  static parseValue(raw: string): boolean | number | string {
    const lower = raw.toLowerCase()
    if (lower === 'true') return true
    if (lower === 'false') return false
    if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) return raw.slice(1, -1)
    if (INTEGER_PATTERN.test(raw)) return Number.parseInt(raw, 10)
    return raw
  }

  /**
   * Read and parse a definitions file; a missing file yields an empty table
   */
  static async load(path: string): Promise<FlagTable> {
    try {
      return MeshDefs.parse(await readFile(path, 'utf8'))
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {}
      }
      throw error
    }
  }
}
