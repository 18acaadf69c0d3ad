import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { GeneIndex } from "../../src/insertions/annotation";
import { REFERENCE_FIXTURE, TempDirectories } from "../utils/tools";

describe("GeneIndex", () => {
  const temp = new TempDirectories();

  afterEach(() => {
    temp.cleanup();
  });

  test("finds the first gene containing a position, bounds inclusive", () => {
    const index = new GeneIndex([
      { id: "A", seqname: "1", start: 100, end: 200, strand: 1 },
      { id: "B", seqname: "1", start: 150, end: 300, strand: -1 },
      { id: "C", seqname: "2", start: 100, end: 200 },
    ]);

    expect(index.size).toBe(3);
    expect(index.find("1", 100)?.id).toBe("A");
    expect(index.find("1", 175)?.id).toBe("A");
    expect(index.find("1", 250)?.id).toBe("B");
    expect(index.find("2", 200)?.id).toBe("C");
    expect(index.find("1", 301)).toBeUndefined();
    expect(index.find("3", 150)).toBeUndefined();
  });

  test("reads gene features from a GTF", async () => {
    const index = await GeneIndex.fromGtf(join(REFERENCE_FIXTURE, "reference.gtf"));

    expect(index.size).toBe(9);
    expect(index.find("7", 88000123)).toEqual({
      id: "ENSMUSG00000100005",
      name: "Fel5",
      seqname: "7",
      start: 87900000,
      end: 88100000,
      strand: -1,
    });
  });

  test("spans transcripts and exons when there are no gene features", async () => {
    const path = join(temp.make("annotation-"), "transcripts.gtf");
    writeFileSync(
      path,
      [
        `1\tStringTie\ttranscript\t1000\t2000\t.\t+\t.\tgene_id "STRG.1"; transcript_id "STRG.1.1";`,
        `1\tStringTie\texon\t1000\t1200\t.\t+\t.\tgene_id "STRG.1"; transcript_id "STRG.1.1";`,
        `1\tStringTie\ttranscript\t1500\t2600\t.\t+\t.\tgene_id "STRG.1"; transcript_id "STRG.1.2";`,
        `1\tStringTie\ttranscript\t5000\t6000\t.\t.\t.\tgene_id "STRG.2"; transcript_id "STRG.2.1";`,
        "",
      ].join("\n")
    );

    const index = await GeneIndex.fromGtf(path);

    expect(index.size).toBe(2);
    expect(index.find("1", 2500)).toEqual({ id: "STRG.1", seqname: "1", start: 1000, end: 2600, strand: 1 });
    expect(index.find("1", 5500)).toEqual({ id: "STRG.2", seqname: "1", start: 5000, end: 6000 });
  });
});
