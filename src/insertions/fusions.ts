/**
 * Conversion of aligner fusion reports into transposon fusions
 *
 * Only fusions between the genome and the transposon are kept: fusions
 * between two genomic sequences, or of the transposon with itself, are not
 * insertions.
 */

import type { ChimericJunction } from "../formats/star-junctions";
import { SPANNING_PAIR_TYPE } from "../formats/star-junctions";
import type { TophatFusion } from "../formats/tophat-fusions";
import type { GenomicStrand } from "../types";
import type { TransposonFusion } from "./model";

interface FusionPartner {
  readonly seqname: string;
  readonly position: number;
  readonly strand: GenomicStrand;
  readonly flank?: number;
}

/**
 * Order two fusion partners as [genome, transposon]
 *
 * @returns undefined unless exactly one partner is the transposon
 */
function orientPartners(
  first: FusionPartner,
  second: FusionPartner,
  transposonName: string
): readonly [FusionPartner, FusionPartner] | undefined {
  const firstIsTransposon = first.seqname === transposonName;
  const secondIsTransposon = second.seqname === transposonName;
  if (firstIsTransposon === secondIsTransposon) {
    return undefined;
  }
  return firstIsTransposon ? [second, first] : [first, second];
}

function toFusion(
  genome: FusionPartner,
  transposon: FusionPartner,
  supportJunction: number,
  supportSpanning: number
): TransposonFusion {
  return {
    seqname: genome.seqname,
    anchorGenome: genome.position,
    anchorTransposon: transposon.position,
    strandGenome: genome.strand,
    strandTransposon: transposon.strand,
    ...(genome.flank !== undefined && { flankGenome: genome.flank }),
    ...(transposon.flank !== undefined && { flankTransposon: transposon.flank }),
    supportJunction,
    supportSpanning,
  };
}

/**
 * Transposon fusions from Tophat-Fusion records, in report order
 */
export async function* fusionsFromTophat(
  fusions: AsyncIterable<TophatFusion>,
  transposonName: string
): AsyncIterable<TransposonFusion> {
  for await (const fusion of fusions) {
    const partners = orientPartners(
      { seqname: fusion.seqname1, position: fusion.location1, strand: fusion.strand1, flank: fusion.flank1 },
      { seqname: fusion.seqname2, position: fusion.location2, strand: fusion.strand2, flank: fusion.flank2 },
      transposonName
    );
    if (partners !== undefined) {
      yield toFusion(partners[0], partners[1], fusion.supportJunction, fusion.supportSpanning);
    }
  }
}

interface JunctionGroup {
  readonly genome: FusionPartner;
  readonly transposon: FusionPartner;
  supportJunction: number;
  supportSpanning: number;
}

function sameSides(group: JunctionGroup, genome: FusionPartner, transposon: FusionPartner): boolean {
  return (
    group.genome.seqname === genome.seqname &&
    group.genome.strand === genome.strand &&
    group.transposon.strand === transposon.strand
  );
}

/**
 * Transposon fusions from STAR chimeric junctions
 *
 * Split reads are grouped by breakpoint into one fusion each, ordered by
 * first occurrence. Each spanning pair is credited to the nearest group with
 * the same chromosome and strands whose genomic breakpoint lies within
 * `maxSpanningDistance`; pairs without such a group are discarded.
 */
export async function fusionsFromStarJunctions(
  junctions: AsyncIterable<ChimericJunction>,
  transposonName: string,
  maxSpanningDistance: number
): Promise<TransposonFusion[]> {
  const groups = new Map<string, JunctionGroup>();
  const spanning: Array<readonly [FusionPartner, FusionPartner]> = [];

  for await (const junction of junctions) {
    const partners = orientPartners(
      { seqname: junction.donorSeqname, position: junction.donorBreakpoint, strand: junction.donorStrand },
      { seqname: junction.acceptorSeqname, position: junction.acceptorBreakpoint, strand: junction.acceptorStrand },
      transposonName
    );
    if (partners === undefined) {
      continue;
    }

    if (junction.junctionType === SPANNING_PAIR_TYPE) {
      spanning.push(partners);
      continue;
    }

    const [genome, transposon] = partners;
    const key = [genome.seqname, genome.position, genome.strand, transposon.position, transposon.strand].join(":");
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, { genome, transposon, supportJunction: 1, supportSpanning: 0 });
    } else {
      group.supportJunction++;
    }
  }

  for (const [genome, transposon] of spanning) {
    let nearest: JunctionGroup | undefined;
    let nearestDistance = Number.POSITIVE_INFINITY;
    for (const group of groups.values()) {
      if (!sameSides(group, genome, transposon)) {
        continue;
      }
      const distance = Math.abs(group.genome.position - genome.position);
      if (distance <= maxSpanningDistance && distance < nearestDistance) {
        nearest = group;
        nearestDistance = distance;
      }
    }
    if (nearest !== undefined) {
      nearest.supportSpanning++;
    }
  }

  return [...groups.values()].map((group) =>
    toFusion(group.genome, group.transposon, group.supportJunction, group.supportSpanning)
  );
}
