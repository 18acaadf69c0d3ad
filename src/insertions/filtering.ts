/**
 * Insertion filters
 *
 * Applied after ids are assigned, so filtered output keeps the ids of the
 * unfiltered run.
 */

import type { Insertion } from "./model";

/** Splice acceptor and splice donor feature types */
export const SPLICE_FEATURE_TYPES: readonly string[] = ["SA", "SD"];

export interface FilterOptions {
  /** Keep only insertions in a splice acceptor or donor (default: true) */
  filterFeatures?: boolean;
  /** Keep only insertions whose feature reads in the gene's direction (default: true) */
  filterOrientation?: boolean;
  /** Drop insertions in these genes, by id or name */
  filterBlacklist?: readonly string[] | undefined;
}

/**
 * Insertion lies in a splice acceptor or donor
 */
export function hasSpliceFeature(insertion: Insertion): boolean {
  const type = insertion.metadata.featureType;
  return type !== undefined && SPLICE_FEATURE_TYPES.includes(type);
}

/**
 * The transposon feature, as inserted, reads in the same direction as the gene
 *
 * False when the feature or gene strand is unknown.
 */
export function isFeatureInGeneOrientation(insertion: Insertion): boolean {
  const { featureStrand, geneStrand } = insertion.metadata;
  if (featureStrand === undefined || geneStrand === undefined) {
    return false;
  }
  return insertion.strand * featureStrand === geneStrand;
}

/**
 * Insertion hits one of the listed genes
 */
export function isBlacklisted(insertion: Insertion, blacklist: ReadonlySet<string>): boolean {
  const { geneId, geneName } = insertion.metadata;
  return (
    (geneId !== undefined && blacklist.has(geneId)) ||
    (geneName !== undefined && blacklist.has(geneName))
  );
}

/**
 * Build a predicate combining the enabled filters
 */
export function createInsertionFilter(options: FilterOptions = {}): (insertion: Insertion) => boolean {
  const filterFeatures = options.filterFeatures ?? true;
  const filterOrientation = options.filterOrientation ?? true;
  const blacklist = new Set(options.filterBlacklist ?? []);

  return (insertion) =>
    (!filterFeatures || hasSpliceFeature(insertion)) &&
    (!filterOrientation || isFeatureInGeneOrientation(insertion)) &&
    !isBlacklisted(insertion, blacklist);
}

export function filterInsertions(
  insertions: readonly Insertion[],
  options: FilterOptions = {}
): Insertion[] {
  return insertions.filter(createInsertionFilter(options));
}
