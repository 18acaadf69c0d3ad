import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { ChimericJunctionParser } from "../../src/formats/star-junctions";
import { TophatFusionParser } from "../../src/formats/tophat-fusions";
import { fusionsFromStarJunctions, fusionsFromTophat } from "../../src/insertions/fusions";
import { fusionStrand } from "../../src/insertions/model";
import { collect } from "../../src/io/stream-utils";
import { FIXTURES_DIR } from "../utils/tools";

function junction(
  donor: string,
  acceptor: string,
  type: number,
  readName: string
): string {
  return [...donor.split(" "), ...acceptor.split(" "), type, 0, 0, readName, 1, "50M50S", 1, "50S50M"].join("\t");
}

describe("fusionsFromTophat", () => {
  test("keeps genome-transposon fusions with the genome first", async () => {
    const parser = new TophatFusionParser();
    const fusions = await collect(
      fusionsFromTophat(
        parser.parseString(
          [
            "16-T2onc\t52141093\t1539\tfr\t400\t90\t12\t0\t40\t37",
            "5-7\t1000\t2000\tff\t50\t10\t0\t0\t40\t40",
            "T2onc-T2onc\t100\t1500\tff\t9\t9\t0\t0\t40\t40",
            "T2onc-11\t170\t45000200\trf\t15\t8\t2\t0\t38\t41",
          ].join("\n")
        ),
        "T2onc"
      )
    );

    expect(fusions).toEqual([
      {
        seqname: "16",
        anchorGenome: 52141093,
        anchorTransposon: 1539,
        strandGenome: 1,
        strandTransposon: -1,
        flankGenome: 40,
        flankTransposon: 37,
        supportJunction: 400,
        supportSpanning: 90,
      },
      {
        seqname: "11",
        anchorGenome: 45000200,
        anchorTransposon: 170,
        strandGenome: 1,
        strandTransposon: -1,
        flankGenome: 41,
        flankTransposon: 38,
        supportJunction: 15,
        supportSpanning: 8,
      },
    ]);
    expect(fusions.map(fusionStrand)).toEqual([-1, -1]);
  });

  test("keeps eleven fusions of the fixture", async () => {
    const fusions = await collect(
      fusionsFromTophat(new TophatFusionParser().parseFile(join(FIXTURES_DIR, "tophat", "fusions.out")), "T2onc")
    );
    expect(fusions).toHaveLength(11);
  });
});

describe("fusionsFromStarJunctions", () => {
  test("groups split reads and credits nearby spanning pairs", async () => {
    const fusions = await fusionsFromStarJunctions(
      new ChimericJunctionParser().parseFile(join(FIXTURES_DIR, "star", "Chimeric.out.junction")),
      "T2onc",
      300
    );

    expect(fusions).toEqual([
      {
        seqname: "16",
        anchorGenome: 52141093,
        anchorTransposon: 1539,
        strandGenome: 1,
        strandTransposon: -1,
        supportJunction: 3,
        supportSpanning: 1,
      },
      {
        seqname: "11",
        anchorGenome: 45000200,
        anchorTransposon: 170,
        strandGenome: 1,
        strandTransposon: 1,
        supportJunction: 2,
        supportSpanning: 0,
      },
    ]);
  });

  test("credits a spanning pair to the nearest matching group only", async () => {
    const lines = [
      junction("1 1000 +", "T2onc 1539 -", 1, "a"),
      junction("1 1100 +", "T2onc 1200 -", 1, "b"),
      junction("1 1090 +", "T2onc 1600 -", -1, "pair"),
      junction("1 1095 -", "T2onc 1600 -", -1, "other-strand"),
    ];

    const fusions = await fusionsFromStarJunctions(new ChimericJunctionParser().parseString(lines.join("\n")), "T2onc", 300);

    expect(fusions.map((fusion) => [fusion.anchorGenome, fusion.supportSpanning])).toEqual([
      [1000, 0],
      [1100, 1],
    ]);
  });

  test("drops spanning pairs beyond the maximum distance", async () => {
    const lines = [junction("1 1000 +", "T2onc 1539 -", 1, "a"), junction("1 1400 +", "T2onc 1600 -", -1, "pair")];

    const near = await fusionsFromStarJunctions(new ChimericJunctionParser().parseString(lines.join("\n")), "T2onc", 400);
    const far = await fusionsFromStarJunctions(new ChimericJunctionParser().parseString(lines.join("\n")), "T2onc", 399);

    expect(near[0]?.supportSpanning).toBe(1);
    expect(far[0]?.supportSpanning).toBe(0);
  });
});
