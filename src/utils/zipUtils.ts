/**
 * Utility class for packing batch output into a zip archive.
 */

import JSZip from "jszip"

/**
 * Fixed entry timestamp so identical inputs give identical archives
 */
const ENTRY_DATE = new Date(Date.UTC(2020, 0, 1))

/**
 * Static utility methods for zip file operations.
 */
export class ZipUtils {
  /**
   * Pack named files into a DEFLATE-compressed zip archive.
   *
   * Entries are added in sorted name order.
   *
   * @param files - Archive path to file contents
   * @returns The archive bytes
   */
  static async bundle(files: Record<string, string | Uint8Array>): Promise<Uint8Array> {
    const zip = new JSZip()
    for (const name of Object.keys(files).sort()) {
      zip.file(name, files[name], { date: ENTRY_DATE })
    }
    return zip.generateAsync({
      type: "uint8array",
      compression: "DEFLATE",
      compressionOptions: { level: 6 }
    })
  }
}
