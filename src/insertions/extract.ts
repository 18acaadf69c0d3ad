/**
 * Insertion extraction
 *
 * Annotates transposon fusions with the gene and transposon feature they hit,
 * merges fusions describing the same insertion and derives FFPM values.
 */

import { findFeature, type TransposonFeature } from "../formats/features";
import type { Annotation, Gene } from "./annotation";
import type { GenomicStrand } from "../types";
import {
  createInsertion,
  fusionStrand,
  type Insertion,
  type InsertionMetadata,
  type Orientation,
  type TransposonFusion,
} from "./model";

export const DEFAULT_MERGE_DISTANCE = 10;

export interface ExtractOptions {
  /** Largest gap between genomic anchors of merged fusions (default: 10) */
  mergeDistance?: number;
  /** Sequenced fragments, for FFPM; FFPM is omitted when zero or absent */
  fragments?: number;
}

interface AnnotatedFusion {
  readonly fusion: TransposonFusion;
  readonly order: number;
  readonly strand: GenomicStrand;
  readonly gene: Gene;
  readonly feature: TransposonFeature | undefined;
}

function groupKey(annotated: AnnotatedFusion): string {
  return [
    annotated.fusion.seqname,
    annotated.strand,
    annotated.feature?.name ?? "",
    annotated.gene.id,
  ].join("\t");
}

/**
 * Split a group into runs of fusions whose anchors are at most `distance`
 * apart, walking in coordinate order
 */
function clusterByDistance(group: readonly AnnotatedFusion[], distance: number): AnnotatedFusion[][] {
  const sorted = [...group].sort(
    (a, b) => a.fusion.anchorGenome - b.fusion.anchorGenome || a.order - b.order
  );

  const clusters: AnnotatedFusion[][] = [];
  let current: AnnotatedFusion[] = [];
  let previous: number | undefined;

  for (const annotated of sorted) {
    if (previous !== undefined && annotated.fusion.anchorGenome - previous > distance) {
      clusters.push(current);
      current = [];
    }
    current.push(annotated);
    previous = annotated.fusion.anchorGenome;
  }
  if (current.length > 0) {
    clusters.push(current);
  }
  return clusters;
}

/**
 * Member with the most junction reads, earliest on ties
 */
function representative(cluster: readonly AnnotatedFusion[]): AnnotatedFusion | undefined {
  let best: AnnotatedFusion | undefined;
  for (const annotated of cluster) {
    if (
      best === undefined ||
      annotated.fusion.supportJunction > best.fusion.supportJunction ||
      (annotated.fusion.supportJunction === best.fusion.supportJunction && annotated.order < best.order)
    ) {
      best = annotated;
    }
  }
  return best;
}

/**
 * Fragments-per-million normalization
 */
export function ffpm(count: number, fragments: number): number {
  return (count * 1e6) / fragments;
}

function buildMetadata(
  best: AnnotatedFusion,
  supportJunction: number,
  supportSpanning: number,
  fragments: number | undefined
): InsertionMetadata {
  const { gene, feature, strand } = best;
  const orientation: Orientation = strand === gene.strand ? "sense" : "antisense";

  return {
    geneId: gene.id,
    ...(gene.name !== undefined && { geneName: gene.name }),
    ...(gene.strand !== undefined && {
      geneStrand: gene.strand,
      orientation,
    }),
    ...(feature !== undefined && {
      featureName: feature.name,
      featureType: feature.type,
      featureStrand: feature.strand,
    }),
    transposonAnchor: best.fusion.anchorTransposon,
    ...(fragments !== undefined &&
      fragments > 0 && {
        ffpmJunction: ffpm(supportJunction, fragments),
        ffpmSpanning: ffpm(supportSpanning, fragments),
        ffpm: ffpm(supportJunction + supportSpanning, fragments),
      }),
  };
}

/**
 * Derive insertions from transposon fusions
 *
 * Fusions outside any gene are dropped. Insertions are numbered `INS_1`,
 * `INS_2`, ... in order of first appearance.
 *
 * @example
 * ```typescript
 * const genes = await GeneIndex.fromGtf(reference.gtfPath);
 * const features = await reference.readFeatures();
 * const insertions = extractInsertions(fusions, { genes, features }, { fragments: 2_000_000 });
 * ```
 */
export function extractInsertions(
  fusions: Iterable<TransposonFusion>,
  annotation: Annotation,
  options: ExtractOptions = {}
): Insertion[] {
  const mergeDistance = options.mergeDistance ?? DEFAULT_MERGE_DISTANCE;

  const groups = new Map<string, AnnotatedFusion[]>();
  let order = 0;
  for (const fusion of fusions) {
    const gene = annotation.genes.find(fusion.seqname, fusion.anchorGenome);
    if (gene === undefined) {
      continue;
    }

    const annotated: AnnotatedFusion = {
      fusion,
      order: order++,
      strand: fusionStrand(fusion),
      gene,
      feature: findFeature(annotation.features, fusion.anchorTransposon),
    };

    const key = groupKey(annotated);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [annotated]);
    } else {
      group.push(annotated);
    }
  }

  const clusters = [...groups.values()]
    .flatMap((group) => clusterByDistance(group, mergeDistance))
    .map((cluster) => ({
      cluster,
      first: Math.min(...cluster.map((annotated) => annotated.order)),
    }))
    .sort((a, b) => a.first - b.first);

  const insertions: Insertion[] = [];
  for (const { cluster } of clusters) {
    const best = representative(cluster);
    if (best === undefined) {
      continue;
    }

    const supportJunction = cluster.reduce((sum, a) => sum + a.fusion.supportJunction, 0);
    const supportSpanning = cluster.reduce((sum, a) => sum + a.fusion.supportSpanning, 0);

    insertions.push(
      createInsertion({
        id: `INS_${insertions.length + 1}`,
        seqname: best.fusion.seqname,
        position: best.fusion.anchorGenome,
        strand: best.strand,
        supportJunction,
        supportSpanning,
        metadata: buildMetadata(best, supportJunction, supportSpanning, options.fragments),
      })
    );
  }

  return insertions;
}
