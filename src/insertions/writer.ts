/**
 * Insertion table output
 */

import { writeLines } from "../io/file-writer";
import { collect } from "../io/stream-utils";
import type { Insertion } from "./model";

export const INSERTION_COLUMNS = [
  "id",
  "seqname",
  "position",
  "strand",
  "support_junction",
  "support_spanning",
  "support",
] as const;

/** Metadata keys in output order; other keys follow sorted */
const KNOWN_METADATA_KEYS = [
  "geneId",
  "geneName",
  "geneStrand",
  "featureName",
  "featureType",
  "featureStrand",
  "orientation",
  "transposonAnchor",
  "ffpmJunction",
  "ffpmSpanning",
  "ffpm",
];

/**
 * `geneId` -> `gene_id`
 */
export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Metadata keys used by any insertion, in output order
 */
export function metadataColumns(insertions: readonly Insertion[]): string[] {
  const used = new Set<string>();
  for (const insertion of insertions) {
    for (const [key, value] of Object.entries(insertion.metadata)) {
      if (value !== undefined) {
        used.add(key);
      }
    }
  }

  const known = KNOWN_METADATA_KEYS.filter((key) => used.has(key));
  const other = [...used].filter((key) => !KNOWN_METADATA_KEYS.includes(key)).sort();
  return [...known, ...other];
}

/**
 * Format insertions as tab-separated lines, header first
 */
export function formatInsertions(insertions: readonly Insertion[]): string[] {
  const keys = metadataColumns(insertions);
  const header = [...INSERTION_COLUMNS, ...keys.map(toSnakeCase)].join("\t");

  const rows = insertions.map((insertion) =>
    [
      insertion.id,
      insertion.seqname,
      insertion.position,
      insertion.strand,
      insertion.supportJunction,
      insertion.supportSpanning,
      insertion.support,
      ...keys.map((key) => insertion.metadata[key] ?? ""),
    ].join("\t")
  );

  return [header, ...rows];
}

/**
 * Write insertions as a TSV file
 *
 * Metadata columns are the union over all insertions; missing values are
 * left empty.
 */
export async function writeInsertions(
  path: string,
  insertions: Iterable<Insertion> | AsyncIterable<Insertion>
): Promise<void> {
  await writeLines(path, formatInsertions(await collect(insertions)));
}
