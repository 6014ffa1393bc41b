import type { ByteHeap } from './byte-heap'
import { FormatConstants } from './constants'
import { Outcome, type ParseOutcome } from './errors'

export type IndexWidth = 2 | 4

export interface IndexSearchOptions {
  /**
   * First probed offset
   */
  start: number

  /**
   * Exclusive end of the searchable region, defaults to the heap end
   */
  end?: number

  /**
   * Every accepted index is below this
   */
  vertexCount: number

  /**
   * Expected number of indices
   */
  indexCount: number

  /**
   * @default 4
   */
  step?: number

  /**
   * @default 10000
   */
  maxSteps?: number

  /**
   * Widths tried at each offset, in order
   * @default [4, 2]
   */
  widths?: IndexWidth[]
}

/**
 * An accepted index array
 */
export interface IndexRegion {
  offset: number
  width: IndexWidth
  indices: Uint32Array
}

/**
 * Scans a byte region for a plausible contiguous triangle index array
 */
export class IndexLocator {

  static locate(heap: ByteHeap, options: IndexSearchOptions): ParseOutcome<IndexRegion> {
    const end = Math.min(options.end ?? heap.length, heap.length)
    const step = options.step ?? 4
    const maxSteps = options.maxSteps ?? 10_000
    const widths = options.widths ?? [4, 2]
    const { start, vertexCount, indexCount } = options

    if (vertexCount <= 0) {
      return Outcome.failure('IndexRegionNotFound', 'no vertices to index')
    }
    if (indexCount <= 0 || indexCount % 3 !== 0) {
      return Outcome.failure('IndexRegionNotFound', `index count ${indexCount} is not a positive multiple of three`)
    }

    for (let k = 0, offset = start; k < maxSteps && offset < end; k++, offset += step) {
      let accepted: IndexWidth | undefined
      for (const width of widths) {
        if (!IndexLocator.fits(offset, end, width, indexCount)) continue
        if (!IndexLocator.scan(heap, offset, width, indexCount, vertexCount)) continue
        // 16-bit is the common storage width in this format family
        if (accepted === undefined || width < accepted) accepted = width
      }
      if (accepted !== undefined) {
        const indices = IndexLocator.readWindow(heap, offset, accepted, indexCount)
        return Outcome.success({ offset, width: accepted, indices }, `indices@${FormatConstants.hex(offset)}:u${accepted * 8}`)
      }
    }

    return Outcome.failure(
      'IndexRegionNotFound',
      `no index array of ${indexCount} entries below ${vertexCount} ` +
      `between ${FormatConstants.hex(start)} and ${FormatConstants.hex(end)}`
    )
  }

  private static fits(offset: number, end: number, width: IndexWidth, count: number): boolean {
    return offset >= 0 && offset + count * width <= end
  }

  /**
   * Validate a window in place, stopping at the first out-of-range value
   */
  private static scan(heap: ByteHeap, offset: number, width: IndexWidth, count: number, vertexCount: number): boolean {
    let nonZero = false
    for (let i = 0; i < count; i++) {
      const index = width === 2 ? heap.u16(offset + i * 2) : heap.u32(offset + i * 4)
      if (index >= vertexCount) return false
      if (index !== 0) nonZero = true
    }
    return nonZero
  }

  private static readWindow(heap: ByteHeap, offset: number, width: IndexWidth, count: number): Uint32Array {
    const indices = new Uint32Array(count)
    for (let i = 0; i < count; i++) {
      indices[i] = width === 2 ? heap.u16(offset + i * 2) : heap.u32(offset + i * 4)
    }
    return indices
  }
}
