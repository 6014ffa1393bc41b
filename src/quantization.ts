import type { QuantizationParams, QuantizationParams2D, Vec2, Vec3 } from './types'

/**
 * Fixed-point to floating-point mappings used by the compressed layouts
 */
export class Quantization {
  static readonly U16_MAX = 65535
  static readonly U8_MAX = 255

  /**
   * 16-bit affine dequantization: 0 maps to `min`, 65535 to `min + range`
   */
  static dequantize16(raw: number, min: number, range: number): number {
    return min + (raw / Quantization.U16_MAX) * range
  }

  static dequantize16Vec3(raw: Vec3, params: QuantizationParams): Vec3 {
    return [
      Quantization.dequantize16(raw[0], params.min[0], params.range[0]),
      Quantization.dequantize16(raw[1], params.min[1], params.range[1]),
      Quantization.dequantize16(raw[2], params.min[2], params.range[2])
    ]
  }

  static dequantize16Vec2(raw: Vec2, params: QuantizationParams2D): Vec2 {
    return [
      Quantization.dequantize16(raw[0], params.min[0], params.range[0]),
      Quantization.dequantize16(raw[1], params.min[1], params.range[1])
    ]
  }

  /**
   * 16-bit UV normalization to [0, 1]
   */
  static unorm16(raw: number): number {
    return raw / Quantization.U16_MAX
  }

  /**
   * Symmetric 8-bit normalization to [-1, 1], used for ZipPos positions
   * regardless of any min/range fields
   */
  static snorm8(raw: number): number {
    return (raw / Quantization.U8_MAX) * 2 - 1
  }

  /**
   * IEEE 754 binary16 to number
   */
  static halfToFloat(half: number): number {
    const sign = (half >> 15) & 0x1 ? -1 : 1
    const exponent = (half >> 10) & 0x1f
    const fraction = half & 0x3ff
    if (exponent === 0) {
      // zero or subnormal
      return sign * Math.pow(2, -14) * (fraction / 1024)
    }
    if (exponent === 31) {
      return fraction === 0 ? sign * Infinity : NaN
    }
    return sign * Math.pow(2, exponent - 15) * (1 + fraction / 1024)
  }
}
