import { type FailureKind, MeshFormatError } from './errors'
import { FormatConstants } from './constants'

/**
 * Bounds-checked little-endian reads over a flat buffer.
 *
 * The container stores its internal "pointers" as offsets into the buffer
 * itself, so the buffer doubles as a small heap addressed by those offsets.
 * Every read outside the buffer raises a MeshFormatError instead of
 * returning garbage.
 */
export class ByteHeap {
  private readonly view: DataView

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get length(): number {
    return this.bytes.byteLength
  }

  /**
   * Whether `size` bytes starting at `offset` lie inside the buffer
   */
  contains(offset: number, size: number): boolean {
    return Number.isSafeInteger(offset) && Number.isSafeInteger(size) &&
      offset >= 0 && size >= 0 && offset + size <= this.length
  }

  /**
   * Throw unless `size` bytes starting at `offset` lie inside the buffer
   *
   * @param what Name of the field or block, for the error message
   */
  require(offset: number, size: number, what: string, kind: FailureKind = 'UnsupportedHeader'): void {
    if (!this.contains(offset, size)) {
      throw new MeshFormatError(
        kind,
        `${what} at ${FormatConstants.hex(offset)} (+${size}) lies outside the ${this.length}-byte buffer`
      )
    }
  }

  u8(offset: number): number {
    this.require(offset, 1, 'u8')
    return this.view.getUint8(offset)
  }

  u16(offset: number): number {
    this.require(offset, 2, 'u16')
    return this.view.getUint16(offset, true)
  }

  u32(offset: number): number {
    this.require(offset, 4, 'u32')
    return this.view.getUint32(offset, true)
  }

  i32(offset: number): number {
    this.require(offset, 4, 'i32')
    return this.view.getInt32(offset, true)
  }

  f32(offset: number): number {
    this.require(offset, 4, 'f32')
    return this.view.getFloat32(offset, true)
  }

  /**
   * Read a u32 element count and reject it above `max`
   */
  count(offset: number, what: string, max: number): number {
    const value = this.u32(offset)
    if (value > max) {
      throw new MeshFormatError('UnsupportedHeader', `${what} ${value} exceeds the limit of ${max}`)
    }
    return value
  }

  /**
   * View of `size` bytes starting at `offset`, sharing memory with the heap
   */
  slice(offset: number, size: number): Uint8Array {
    this.require(offset, size, 'slice')
    return this.bytes.subarray(offset, offset + size)
  }
}
