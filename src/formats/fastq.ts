/**
 * FASTQ read counting
 */

import { countLines } from "../io/file-reader";

/** Lines per FASTQ record: header, sequence, separator, quality */
export const FASTQ_LINES_PER_RECORD = 4;

/**
 * Number of sequenced fragments in a (possibly gzipped) FASTQ file
 *
 * For paired-end data, count the first mate file only: each fragment has one
 * record per mate.
 */
export async function countFastqFragments(path: string): Promise<number> {
  const lines = await countLines(path);
  return Math.floor(lines / FASTQ_LINES_PER_RECORD);
}
