/**
 * GTF format type definitions
 *
 * @module gtf/types
 */

import type { Strand } from "../../types";

/**
 * GTF feature annotation
 * Represents a single feature line with parsed attributes
 *
 * @public
 */
export interface GtfFeature {
  /** Chromosome or sequence name (e.g., "1", "chrX") */
  readonly seqname: string;
  /** Annotation source (e.g., "ensembl", "havana") */
  readonly source: string;
  /** Feature type (e.g., "gene", "transcript", "exon") */
  readonly feature: string;
  /** Start coordinate (1-based inclusive) */
  readonly start: number;
  /** End coordinate (1-based inclusive) */
  readonly end: number;
  /** Score value or null if not specified */
  readonly score: number | null;
  /** Strand orientation: + (forward), - (reverse), . (unknown) */
  readonly strand: Strand;
  /** Reading frame for CDS features (0, 1, 2) or null */
  readonly frame: number | null;
  /** Parsed attribute key-value pairs (repeated keys become arrays) */
  readonly attributes: Readonly<Record<string, string | string[]>>;
  /** Feature length (end - start + 1) */
  readonly length: number;
  /** Source line number */
  readonly lineNumber: number;
}

/**
 * GTF parser configuration options
 *
 * @public
 */
export interface GtfParserOptions {
  /** Feature types to include (default: all) */
  includeFeatures?: string[];
  /** Feature types to exclude */
  excludeFeatures?: string[];
}

/**
 * GTF coordinate limits
 */
export const GTF_LIMITS = {
  /** Larger than any known chromosome */
  MAX_CHROMOSOME_SIZE: 2_500_000_000,
  /** GTF is 1-based */
  MIN_COORDINATE: 1,
} as const;
