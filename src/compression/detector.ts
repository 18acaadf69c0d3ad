/**
 * Compression format detection for sequencing files
 *
 * Read files are usually shipped gzipped (`.fastq.gz`); everything else this
 * package reads is plain text.
 */

export type CompressionFormat = "gzip" | "none";

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Detect compression from the file extension
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("/data/sample.R1.fastq.gz"); // "gzip"
 * ```
 */
export class CompressionDetector {
  static fromExtension(filePath: string): CompressionFormat {
    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }
}
