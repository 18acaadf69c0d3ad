import { describe, expect, test } from "vitest";
import type { TransposonFeature } from "../../src/formats/features";
import { type Annotation, GeneIndex } from "../../src/insertions/annotation";
import { extractInsertions, ffpm } from "../../src/insertions/extract";
import { createInsertion, type TransposonFusion } from "../../src/insertions/model";

const FEATURES: TransposonFeature[] = [
  { name: "SD", start: 100, end: 200, strand: 1, type: "SD" },
  { name: "SA", start: 500, end: 600, strand: -1, type: "SA" },
];

const ANNOTATION: Annotation = {
  genes: new GeneIndex([
    { id: "G1", name: "Alpha", seqname: "1", start: 1000, end: 5000, strand: 1 },
    { id: "G2", seqname: "2", start: 1000, end: 5000, strand: -1 },
    { id: "G3", seqname: "3", start: 1000, end: 5000 },
  ]),
  features: FEATURES,
};

function fusion(overrides: Partial<TransposonFusion> = {}): TransposonFusion {
  return {
    seqname: "1",
    anchorGenome: 2000,
    anchorTransposon: 150,
    strandGenome: 1,
    strandTransposon: 1,
    supportJunction: 10,
    supportSpanning: 2,
    ...overrides,
  };
}

describe("extractInsertions", () => {
  test("annotates gene, feature and orientation", () => {
    const [insertion] = extractInsertions([fusion()], ANNOTATION);

    expect(insertion).toEqual({
      id: "INS_1",
      seqname: "1",
      position: 2000,
      strand: 1,
      supportJunction: 10,
      supportSpanning: 2,
      support: 12,
      metadata: {
        geneId: "G1",
        geneName: "Alpha",
        geneStrand: 1,
        orientation: "sense",
        featureName: "SD",
        featureType: "SD",
        featureStrand: 1,
        transposonAnchor: 150,
      },
    });
  });

  test("derives strand and orientation from both partners", () => {
    const [insertion] = extractInsertions(
      [fusion({ seqname: "2", strandGenome: 1, strandTransposon: -1, anchorTransposon: 550 })],
      ANNOTATION
    );

    expect(insertion?.strand).toBe(-1);
    expect(insertion?.metadata).toEqual({
      geneId: "G2",
      geneStrand: -1,
      orientation: "sense",
      featureName: "SA",
      featureType: "SA",
      featureStrand: -1,
      transposonAnchor: 550,
    });
  });

  test("omits orientation for unstranded genes and feature fields outside features", () => {
    const [insertion] = extractInsertions([fusion({ seqname: "3", anchorTransposon: 300 })], ANNOTATION);
    expect(insertion?.metadata).toEqual({ geneId: "G3", transposonAnchor: 300 });
  });

  test("drops fusions outside genes", () => {
    expect(extractInsertions([fusion({ anchorGenome: 999 }), fusion({ seqname: "4" })], ANNOTATION)).toEqual([]);
  });

  test("merges nearby fusions and keeps the best supported anchor", () => {
    const insertions = extractInsertions(
      [
        fusion({ anchorGenome: 2000, supportJunction: 4, supportSpanning: 1, anchorTransposon: 120 }),
        fusion({ anchorGenome: 2008, supportJunction: 9, supportSpanning: 3, anchorTransposon: 130 }),
        fusion({ anchorGenome: 2016, supportJunction: 9, supportSpanning: 0, anchorTransposon: 140 }),
      ],
      ANNOTATION
    );

    expect(insertions).toHaveLength(1);
    expect(insertions[0]).toMatchObject({
      position: 2008,
      supportJunction: 22,
      supportSpanning: 4,
      support: 26,
      metadata: { transposonAnchor: 130 },
    });
  });

  test("splits runs separated by more than the merge distance", () => {
    const fusions = [fusion({ anchorGenome: 2000 }), fusion({ anchorGenome: 2011 })];

    expect(extractInsertions(fusions, ANNOTATION).map((i) => i.position)).toEqual([2000, 2011]);
    expect(extractInsertions(fusions, ANNOTATION, { mergeDistance: 11 }).map((i) => i.position)).toEqual([2000]);
  });

  test("does not merge fusions with different strand or feature", () => {
    const insertions = extractInsertions(
      [
        fusion(),
        fusion({ anchorGenome: 2001, strandTransposon: -1 }),
        fusion({ anchorGenome: 2002, anchorTransposon: 550 }),
      ],
      ANNOTATION
    );
    expect(insertions).toHaveLength(3);
  });

  test("numbers insertions by first appearance", () => {
    const insertions = extractInsertions(
      [fusion({ anchorGenome: 4000 }), fusion({ seqname: "2" }), fusion({ anchorGenome: 3000 }), fusion({ anchorGenome: 4005 })],
      ANNOTATION
    );

    expect(insertions.map((i) => [i.id, i.seqname, i.position])).toEqual([
      ["INS_1", "1", 4000],
      ["INS_2", "2", 2000],
      ["INS_3", "1", 3000],
    ]);
  });

  test("adds FFPM when fragments are known", () => {
    const [insertion] = extractInsertions(
      [fusion({ supportJunction: 30, supportSpanning: 10 })],
      ANNOTATION,
      { fragments: 4_000_000 }
    );

    expect(insertion?.metadata).toMatchObject({ ffpmJunction: 7.5, ffpmSpanning: 2.5, ffpm: 10 });
  });

  test("omits FFPM for zero fragments", () => {
    const [insertion] = extractInsertions([fusion()], ANNOTATION, { fragments: 0 });
    expect(insertion?.metadata.ffpm).toBeUndefined();
  });

  test("returns frozen insertions", () => {
    const [insertion] = extractInsertions([fusion()], ANNOTATION);
    expect(Object.isFrozen(insertion)).toBe(true);
    expect(Object.isFrozen(insertion?.metadata)).toBe(true);
  });
});

describe("ffpm", () => {
  test("scales counts per million fragments", () => {
    expect(ffpm(5, 2_000_000)).toBe(2.5);
  });
});

describe("createInsertion", () => {
  test("derives total support", () => {
    const insertion = createInsertion({
      id: "INS_1",
      seqname: "1",
      position: 10,
      strand: -1,
      supportJunction: 3,
      supportSpanning: 4,
      metadata: {},
    });
    expect(insertion.support).toBe(7);
  });
});
