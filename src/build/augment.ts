/**
 * Augmented reference construction
 *
 * The reference an aligner sees is the host genome plus the transposon as an
 * extra sequence, annotated by the host GTF minus any blacklisted genes.
 */

import { getGtfAttribute, parseGtfAttributes } from "../formats/gtf";
import { readFileLines } from "../io/file-reader";
import { writeLines } from "../io/file-writer";

const GENE_KEYS = ["gene_id", "gene_name"] as const;

/**
 * Drop GTF lines belonging to blacklisted genes
 *
 * Genes are matched on `gene_id` or `gene_name`. Comment lines are kept.
 */
export async function* filterGtfGenes(
  lines: AsyncIterable<string>,
  blacklist: ReadonlySet<string>
): AsyncIterable<string> {
  for await (const line of lines) {
    if (blacklist.size === 0 || line.startsWith("#")) {
      yield line;
      continue;
    }

    const attributes = parseGtfAttributes(line.split("\t")[8] ?? "");
    const blacklisted = GENE_KEYS.some((key) => {
      const value = getGtfAttribute(attributes, key);
      return value !== undefined && blacklist.has(value);
    });

    if (!blacklisted) {
      yield line;
    }
  }
}

/**
 * Write the reference GTF with blacklisted genes removed
 */
export async function writeFilteredGtf(
  inputPath: string,
  outputPath: string,
  blacklist: readonly string[] = []
): Promise<void> {
  await writeLines(outputPath, filterGtfGenes(readFileLines(inputPath), new Set(blacklist)));
}
