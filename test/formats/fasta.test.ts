/**
 * Tests for FASTA headers and concatenation
 */

import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterEach, describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { parseFastaHeader, readSequenceIds, writeConcatenatedFasta } from "../../src/formats/fasta";
import { FIXTURES_DIR, REFERENCE_FIXTURE, TempDirectories } from "../utils/tools";

const GENOME = join(FIXTURES_DIR, "build", "genome.fa");
const TRANSPOSON = join(REFERENCE_FIXTURE, "transposon.fa");

const temp = new TempDirectories();

afterEach(() => {
  temp.cleanup();
});

describe("parseFastaHeader", () => {
  test("splits id and description", () => {
    expect(parseFastaHeader(">T2onc synthetic transposon", 1)).toEqual({
      id: "T2onc",
      description: "synthetic transposon",
      lineNumber: 1,
    });
  });

  test("rejects a header without id", () => {
    expect(() => parseFastaHeader(">   ", 7)).toThrow(ParseError);
  });
});

describe("readSequenceIds", () => {
  test("lists ids in file order", async () => {
    expect(await readSequenceIds(GENOME)).toEqual(["1", "2"]);
    expect(await readSequenceIds(TRANSPOSON)).toEqual(["T2onc"]);
  });

  test("rejects sequence data before the first header", async () => {
    const path = join(temp.make("fasta-"), "bad.fa");
    writeFileSync(path, "ACGT\n>seq1\nACGT\n");

    await expect(readSequenceIds(path)).rejects.toThrow("Sequence data found before the first FASTA header");
  });
});

describe("writeConcatenatedFasta", () => {
  test("concatenates in order and drops blank lines", async () => {
    const output = join(temp.make("fasta-"), "reference.fa");
    await writeConcatenatedFasta([GENOME, TRANSPOSON], output);

    const lines = readFileSync(output, "utf8").split("\n");
    expect(lines.slice(0, 6)).toEqual([
      ">1 chromosome 1",
      "ACGTACGTAC",
      "GTACGTACGT",
      ">2 chromosome 2",
      "TTTTGGGGCC",
      ">T2onc synthetic transposon",
    ]);
    expect(await readSequenceIds(output)).toEqual(["1", "2", "T2onc"]);
  });

  test("decompresses gzipped inputs", async () => {
    const dir = temp.make("fasta-");
    const input = join(dir, "genome.fa.gz");
    writeFileSync(input, gzipSync(">chrM\nGATC\n"));

    const output = join(dir, "reference.fa");
    await writeConcatenatedFasta([input], output);
    expect(readFileSync(output, "utf8")).toBe(">chrM\nGATC\n");
  });
});
