/**
 * Byte layout constants for the `.mesh` container family.
 * All offsets are in bytes and all fields are little-endian.
 */

export const FormatConstants = {
    /** Leading bytes of the fmt_mesh variant */
    SIGNATURE: [0x1f, 0x00, 0x00, 0x00] as const,

    /** fmt_mesh file header and the body it compresses */
    FMT_MESH: {
        SUB_MESH_COUNT: 0x48,
        /** u16, `1` when a bone block follows the payload */
        BONE_FLAG: 0x4c,
        COMPRESSED_SIZE: 0x52,
        UNCOMPRESSED_SIZE: 0x56,
        PAYLOAD: 0x5a,

        /** Twenty u32, one u8, one u32 */
        BONE_BLOCK_SIZE: 85,
        BONE_COUNT: 68,
        /** Two 64-byte matrices and a parent index */
        BONE_RECORD_SIZE: 132,

        VERTEX_COUNT: 116,
        INDEX_COUNT: 120,
        UV_COUNT: 128,
        DATA: 179,

        /** f32 x, y, z, w */
        VERTEX_STRIDE: 16,
        /** Per-vertex block between positions and UVs */
        VERTEX_GAP_STRIDE: 4,
        /** Up to four half-float UV channels */
        UV_STRIDE: 16,
        /** Bone weights, skipped */
        WEIGHT_STRIDE: 8,
        /** pad, x, y, z as bytes */
        ZIP_VERTEX_STRIDE: 4
    },

    /** Body of the compressed-model variant, after decompression */
    COMPRESSED_BODY: {
        NEW_SHARED_COUNT: 0x34,
        NEW_TOTAL_COUNT: 0x38,
        NEW_MIN: 0x40,
        NEW_RANGE: 0x4c,
        NEW_VERTICES: 0x60,
        /** Smallest body that can carry the new-layout marker */
        NEW_MARKER_END: 0x40,

        OLD_MIN: 0x60,
        OLD_RANGE_X: 0x6c,
        OLD_RANGE_Y: 0x70,
        SHARED_COUNT: 0x74,
        TOTAL_COUNT: 0x78,
        OLD_VERTICES: 0x7c,

        /** Three u16 quantized axes */
        VERTEX_STRIDE: 6,
        /** u16 pair normalized by 65535 */
        UV_STRIDE: 4,
        ZIP_VERTEX_STRIDE: 4
    },

    /** Uncompressed layouts probed by the heuristic strategy */
    HEURISTIC: {
        VERTEX_START: 0xb3,
        PADDED_VERTEX_STRIDE: 16,
        /** 4 pad bytes, half u, half v, 8 pad bytes */
        PADDED_UV_STRIDE: 16,
        PADDED_UV_OFFSET: 4,
        PACKED_VERTEX_STRIDE: 12,
        PACKED_UV_STRIDE: 8
    },

    /**
     * Format a byte offset the way layout tables write it.
     * @returns e.g. "0x5a"
     */
    hex(offset: number): string {
        return `0x${offset.toString(16)}`
    }
}
