/**
 * Parsing of the interactive file selection prompt
 */

export type Selection =
  | { kind: 'quit' }
  | {
    kind: 'files'
    /**
     * Zero-based, sorted, without duplicates
     */
    indices: number[]
    /**
     * One message per ignored part
     */
    warnings: string[]
  }

const NUMBER_PATTERN = /^\d+$/

/**
 * Parse `all`, `q`, 1-based numbers and inclusive `a-b` ranges separated
 * by commas or whitespace, against a list of `count` entries
 */
export function parseSelection(input: string, count: number): Selection {
  const trimmed = input.trim().toLowerCase()
  if (trimmed === 'q') {
    return { kind: 'quit' }
  }
  if (trimmed === 'all') {
    return { kind: 'files', indices: Array.from({ length: count }, (_, i) => i), warnings: [] }
  }

  const selected = new Set<number>()
  const warnings: string[] = []

  for (const part of trimmed.split(/[\s,]+/).filter(Boolean)) {
    if (NUMBER_PATTERN.test(part)) {
      const n = Number.parseInt(part, 10)
      if (n >= 1 && n <= count) {
        selected.add(n - 1)
      } else {
        warnings.push(`${part} is out of range 1-${count}`)
      }
      continue
    }

    const bounds = part.split('-')
    if (bounds.length === 2 && bounds.every(bound => NUMBER_PATTERN.test(bound))) {
      const start = Number.parseInt(bounds[0], 10)
      const end = Number.parseInt(bounds[1], 10)
      if (start >= 1 && start <= end && end <= count) {
        for (let n = start; n <= end; n++) selected.add(n - 1)
      } else {
        warnings.push(`range ${part} is invalid for 1-${count}`)
      }
      continue
    }

    warnings.push(`cannot parse "${part}"`)
  }

  return { kind: 'files', indices: [...selected].sort((a, b) => a - b), warnings }
}
