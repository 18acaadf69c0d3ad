/**
 * Gene annotation lookup
 */

import { getGtfAttribute, type GtfFeature, GtfParser } from "../formats/gtf";
import type { TransposonFeature } from "../formats/features";
import { type GenomicStrand, toGenomicStrand } from "../types";

export interface Gene {
  readonly id: string;
  readonly name?: string;
  readonly seqname: string;
  readonly start: number;
  readonly end: number;
  readonly strand?: GenomicStrand;
}

function geneFromFeature(feature: GtfFeature, id: string): Gene {
  const name = getGtfAttribute(feature.attributes, "gene_name");
  const strand = toGenomicStrand(feature.strand);
  return {
    id,
    seqname: feature.seqname,
    start: feature.start,
    end: feature.end,
    ...(name !== undefined && { name }),
    ...(strand !== undefined && { strand }),
  };
}

/**
 * Genes indexed by sequence name, in annotation order
 */
export class GeneIndex {
  private readonly bySeqname = new Map<string, Gene[]>();

  constructor(genes: Iterable<Gene>) {
    for (const gene of genes) {
      const onSeqname = this.bySeqname.get(gene.seqname);
      if (onSeqname === undefined) {
        this.bySeqname.set(gene.seqname, [gene]);
      } else {
        onSeqname.push(gene);
      }
    }
  }

  get size(): number {
    let size = 0;
    for (const genes of this.bySeqname.values()) {
      size += genes.length;
    }
    return size;
  }

  /**
   * First gene on `seqname` whose span contains `position`
   */
  find(seqname: string, position: number): Gene | undefined {
    return this.bySeqname
      .get(seqname)
      ?.find((gene) => gene.start <= position && position <= gene.end);
  }

  /**
   * Read genes from a GTF file
   *
   * Uses `gene` features. Annotations without them (transcript assemblies)
   * get one span per `gene_id`, covering all of its transcripts and exons.
   */
  static async fromGtf(path: string): Promise<GeneIndex> {
    const parser = new GtfParser({ includeFeatures: ["gene", "transcript", "exon"] });
    const genes: Gene[] = [];
    const spans = new Map<string, Gene>();

    for await (const feature of parser.parseFile(path)) {
      const id = getGtfAttribute(feature.attributes, "gene_id");
      if (id === undefined) {
        continue;
      }

      if (feature.feature === "gene") {
        genes.push(geneFromFeature(feature, id));
        continue;
      }

      const span = spans.get(id);
      if (span === undefined) {
        spans.set(id, geneFromFeature(feature, id));
      } else {
        spans.set(id, {
          ...span,
          start: Math.min(span.start, feature.start),
          end: Math.max(span.end, feature.end),
        });
      }
    }

    return new GeneIndex(genes.length > 0 ? genes : spans.values());
  }
}

/**
 * Everything needed to annotate fusions
 */
export interface Annotation {
  readonly genes: GeneIndex;
  readonly features: readonly TransposonFeature[];
}
