/**
 * Insertion data model
 */

import type { GenomicStrand } from "../types";

export type Orientation = "sense" | "antisense";

/**
 * Annotation attached to an insertion
 *
 * Known keys are typed; other keys may be added by callers.
 */
export interface InsertionMetadata {
  readonly geneId?: string;
  readonly geneName?: string;
  readonly geneStrand?: GenomicStrand;
  readonly featureName?: string;
  readonly featureType?: string;
  readonly featureStrand?: GenomicStrand;
  readonly orientation?: Orientation;
  /** Breakpoint position within the transposon sequence */
  readonly transposonAnchor?: number;
  readonly ffpmJunction?: number;
  readonly ffpmSpanning?: number;
  readonly ffpm?: number;
  readonly [key: string]: string | number | undefined;
}

/**
 * A transposon insertion in the genome, supported by fusion reads
 */
export interface Insertion {
  readonly id: string;
  readonly seqname: string;
  readonly position: number;
  /** Orientation of the transposon on the genome */
  readonly strand: GenomicStrand;
  readonly supportJunction: number;
  readonly supportSpanning: number;
  /** supportJunction + supportSpanning */
  readonly support: number;
  readonly metadata: InsertionMetadata;
}

/**
 * Create a frozen insertion; total support is derived
 */
export function createInsertion(fields: Omit<Insertion, "support">): Insertion {
  return Object.freeze({
    ...fields,
    support: fields.supportJunction + fields.supportSpanning,
    metadata: Object.freeze({ ...fields.metadata }),
  });
}

/**
 * A fusion between the genome and the transposon sequence, normalized so the
 * genomic partner is always described first
 */
export interface TransposonFusion {
  readonly seqname: string;
  /** Breakpoint on the genome */
  readonly anchorGenome: number;
  /** Breakpoint on the transposon */
  readonly anchorTransposon: number;
  readonly strandGenome: GenomicStrand;
  readonly strandTransposon: GenomicStrand;
  /** Aligned bases flanking the junction on the genome, when reported */
  readonly flankGenome?: number;
  /** Aligned bases flanking the junction on the transposon, when reported */
  readonly flankTransposon?: number;
  readonly supportJunction: number;
  readonly supportSpanning: number;
}

/**
 * Strand of the insertion implied by a fusion
 */
export function fusionStrand(fusion: TransposonFusion): GenomicStrand {
  return fusion.strandGenome === fusion.strandTransposon ? 1 : -1;
}
