import { describe, expect, test } from "vitest";
import {
  createInsertionFilter,
  filterInsertions,
  hasSpliceFeature,
  isBlacklisted,
  isFeatureInGeneOrientation,
} from "../../src/insertions/filtering";
import { createInsertion, type Insertion, type InsertionMetadata } from "../../src/insertions/model";
import type { GenomicStrand } from "../../src/types";

function insertion(id: string, strand: GenomicStrand, metadata: InsertionMetadata): Insertion {
  return createInsertion({
    id,
    seqname: "1",
    position: 1000,
    strand,
    supportJunction: 5,
    supportSpanning: 1,
    metadata,
  });
}

const SENSE_SD = insertion("INS_1", 1, {
  geneId: "G1",
  geneName: "Alpha",
  geneStrand: 1,
  featureType: "SD",
  featureStrand: 1,
});
const ANTISENSE_SA = insertion("INS_2", -1, {
  geneId: "G2",
  geneName: "Beta",
  geneStrand: 1,
  featureType: "SA",
  featureStrand: -1,
});
const WRONG_WAY_SA = insertion("INS_3", 1, {
  geneId: "G3",
  geneStrand: 1,
  featureType: "SA",
  featureStrand: -1,
});
const POLY_A = insertion("INS_4", 1, { geneId: "G4", geneStrand: -1, featureType: "pA", featureStrand: -1 });
const NO_FEATURE = insertion("INS_5", 1, { geneId: "G5", geneStrand: 1 });

const ALL = [SENSE_SD, ANTISENSE_SA, WRONG_WAY_SA, POLY_A, NO_FEATURE];

describe("predicates", () => {
  test("splice features are SA and SD", () => {
    expect(ALL.map(hasSpliceFeature)).toEqual([true, true, true, false, false]);
  });

  test("feature orientation is insertion strand times feature strand", () => {
    expect(ALL.map(isFeatureInGeneOrientation)).toEqual([true, true, false, true, false]);
  });

  test("unknown gene strand fails the orientation check", () => {
    expect(isFeatureInGeneOrientation(insertion("INS_6", 1, { featureStrand: 1 }))).toBe(false);
  });

  test("blacklist matches gene id or name", () => {
    const blacklist = new Set(["G1", "Beta"]);
    expect(ALL.map((i) => isBlacklisted(i, blacklist))).toEqual([true, true, false, false, false]);
  });
});

describe("filterInsertions", () => {
  test("applies feature and orientation filters by default", () => {
    expect(filterInsertions(ALL).map((i) => i.id)).toEqual(["INS_1", "INS_2"]);
  });

  test("filters can be disabled one by one", () => {
    expect(filterInsertions(ALL, { filterOrientation: false }).map((i) => i.id)).toEqual([
      "INS_1",
      "INS_2",
      "INS_3",
    ]);
    expect(filterInsertions(ALL, { filterFeatures: false }).map((i) => i.id)).toEqual([
      "INS_1",
      "INS_2",
      "INS_4",
    ]);
    expect(filterInsertions(ALL, { filterFeatures: false, filterOrientation: false })).toHaveLength(5);
  });

  test("keeps ids of the unfiltered run and drops blacklisted genes", () => {
    const keep = createInsertionFilter({ filterBlacklist: ["Alpha"] });
    expect(ALL.filter(keep).map((i) => i.id)).toEqual(["INS_2"]);
  });
});
