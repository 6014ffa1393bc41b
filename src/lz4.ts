import { MeshFormatError, Outcome, type ParseOutcome } from './errors'

/**
 * Block decompression capability.
 *
 * Stateless: invoked once per payload, holding nothing between calls.
 * Tests substitute a fake.
 */
export interface Decompressor {
  /**
   * @param input Buffer holding the compressed payload at its start
   * @param compressedLength Declared compressed size
   * @param expectedLength Declared uncompressed size; any other output length is a failure
   */
  decompress(input: Uint8Array, compressedLength: number, expectedLength: number): ParseOutcome<Uint8Array>
}

function fail(message: string): never {
  throw new MeshFormatError('DecompressionFailure', `LZ4 ${message}`)
}

/**
 * Decode one LZ4 block (not the frame format) into exactly `outputSize` bytes
 */
export function decompressLz4Block(input: Uint8Array, outputSize: number): Uint8Array {
  const out = new Uint8Array(outputSize)
  let ip = 0
  let op = 0

  const readLength = (initial: number): number => {
    let length = initial
    if (length === 15) {
      let b: number
      do {
        if (ip >= input.length) fail('length runs past the end of input')
        b = input[ip++]
        length += b
      } while (b === 255)
    }
    return length
  }

  while (ip < input.length) {
    const token = input[ip++]

    const literalLength = readLength(token >>> 4)
    if (ip + literalLength > input.length) fail('literal length out of range')
    if (op + literalLength > out.length) fail(`output overflow: more than ${outputSize} bytes`)
    out.set(input.subarray(ip, ip + literalLength), op)
    ip += literalLength
    op += literalLength

    // the last sequence carries literals only
    if (ip >= input.length) break

    if (ip + 2 > input.length) fail('missing match offset')
    const offset = input[ip] | (input[ip + 1] << 8)
    ip += 2
    if (offset === 0) fail('invalid match offset 0')

    let matchLength = readLength(token & 0x0f) + 4
    if (op + matchLength > out.length) fail(`output overflow: more than ${outputSize} bytes`)

    // overlapping copy
    let ref = op - offset
    if (ref < 0) fail('match reference before output start')
    while (matchLength-- > 0) {
      out[op++] = out[ref++]
    }
  }

  if (op !== out.length) {
    fail(`decompressed size mismatch: got ${op}, expected ${out.length}`)
  }

  return out
}

/**
 * Production decompressor bound to the LZ4 block format
 */
export class Lz4BlockDecompressor implements Decompressor {
  decompress(input: Uint8Array, compressedLength: number, expectedLength: number): ParseOutcome<Uint8Array> {
    if (compressedLength <= 0 || compressedLength > input.length) {
      return Outcome.failure(
        'DecompressionFailure',
        `compressed length ${compressedLength} does not fit the ${input.length}-byte input`
      )
    }
    if (expectedLength <= 0) {
      return Outcome.failure('DecompressionFailure', `invalid uncompressed length ${expectedLength}`)
    }
    return Outcome.guard(() => Outcome.success(
      decompressLz4Block(input.subarray(0, compressedLength), expectedLength),
      'lz4'
    ))
  }
}
