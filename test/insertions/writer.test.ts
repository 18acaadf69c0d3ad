import { readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { createInsertion } from "../../src/insertions/model";
import { formatInsertions, metadataColumns, toSnakeCase, writeInsertions } from "../../src/insertions/writer";
import { TempDirectories } from "../utils/tools";

const FIRST = createInsertion({
  id: "INS_1",
  seqname: "16",
  position: 52141093,
  strand: -1,
  supportJunction: 462,
  supportSpanning: 103,
  metadata: { geneId: "G1", geneName: "Dsp4", transposonAnchor: 1539, ffpm: 282.5, sample: "s1" },
});
const SECOND = createInsertion({
  id: "INS_2",
  seqname: "11",
  position: 45000200,
  strand: 1,
  supportJunction: 15,
  supportSpanning: 8,
  metadata: { geneId: "G2", featureName: "MSCV-SD", transposonAnchor: 170, batch: 3 },
});

describe("toSnakeCase", () => {
  test("converts camel case keys", () => {
    expect(toSnakeCase("geneId")).toBe("gene_id");
    expect(toSnakeCase("ffpmJunction")).toBe("ffpm_junction");
    expect(toSnakeCase("ffpm")).toBe("ffpm");
  });
});

describe("metadataColumns", () => {
  test("lists known keys in order, then other keys sorted", () => {
    expect(metadataColumns([FIRST, SECOND])).toEqual([
      "geneId",
      "geneName",
      "featureName",
      "transposonAnchor",
      "ffpm",
      "batch",
      "sample",
    ]);
  });
});

describe("formatInsertions", () => {
  test("writes a header and one row per insertion with empty missing values", () => {
    expect(formatInsertions([FIRST, SECOND])).toEqual([
      "id\tseqname\tposition\tstrand\tsupport_junction\tsupport_spanning\tsupport\tgene_id\tgene_name\tfeature_name\ttransposon_anchor\tffpm\tbatch\tsample",
      "INS_1\t16\t52141093\t-1\t462\t103\t565\tG1\tDsp4\t\t1539\t282.5\t\ts1",
      "INS_2\t11\t45000200\t1\t15\t8\t23\tG2\t\tMSCV-SD\t170\t\t3\t",
    ]);
  });

  test("writes only the header for no insertions", () => {
    expect(formatInsertions([])).toEqual([
      "id\tseqname\tposition\tstrand\tsupport_junction\tsupport_spanning\tsupport",
    ]);
  });
});

describe("writeInsertions", () => {
  const temp = new TempDirectories();

  afterEach(() => {
    temp.cleanup();
  });

  test("writes the table from an async source", async () => {
    async function* insertions() {
      yield FIRST;
    }
    const path = join(temp.make("writer-"), "insertions.txt");

    await writeInsertions(path, insertions());

    expect(readFileSync(path, "utf8")).toBe(
      "id\tseqname\tposition\tstrand\tsupport_junction\tsupport_spanning\tsupport\tgene_id\tgene_name\ttransposon_anchor\tffpm\tsample\n" +
        "INS_1\t16\t52141093\t-1\t462\t103\t565\tG1\tDsp4\t1539\t282.5\ts1\n"
    );
  });
});
