import { copyFileSync, readlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { DependencyError, FileError, ValidationError } from "../../src/errors";
import type { AlignerDependencies } from "../../src/insertions/aligner";
import { TophatAligner } from "../../src/insertions/tophat-aligner";
import { collect } from "../../src/io/stream-utils";
import { TophatReference } from "../../src/reference/reference";
import {
  argAfter,
  FIXTURES_DIR,
  foundAll,
  foundOnly,
  RecordingRunner,
  REFERENCE_FIXTURE,
  TempDirectories,
} from "../utils/tools";

const FUSIONS = join(FIXTURES_DIR, "tophat", "fusions.out");
const reference = new TophatReference(REFERENCE_FIXTURE);
const temp = new TempDirectories();

afterEach(() => {
  temp.cleanup();
});

/** Emulates tophat2 by dropping the fixture report into its output directory */
function tophatRunner(): RecordingRunner {
  return new RecordingRunner((args) => {
    const outputDir = argAfter(args, "--output-dir");
    if (args[0] === "tophat2" && outputDir !== undefined) {
      copyFileSync(FUSIONS, join(outputDir, "fusions.out"));
    }
    const assembled = argAfter(args, "-o");
    if (args[0] === "stringtie" && assembled !== undefined) {
      copyFileSync(join(REFERENCE_FIXTURE, "reference.gtf"), assembled);
    }
  });
}

function dependencies(runner: RecordingRunner, fragments = 2_000_000): AlignerDependencies {
  return { runner, lookup: foundAll, countFragments: async () => fragments };
}

describe("TophatAligner", () => {
  test("declares tophat2 and bowtie, plus stringtie when assembling", () => {
    expect(new TophatAligner(reference).dependencies).toEqual(["tophat2", "bowtie"]);
    expect(new TophatAligner(reference, { assemble: true }).dependencies).toEqual([
      "tophat2",
      "bowtie",
      "stringtie",
    ]);
  });

  test("checkDependencies names missing programs", async () => {
    const aligner = new TophatAligner(reference, {}, { lookup: foundOnly("tophat2") });
    await expect(aligner.checkDependencies()).rejects.toThrow(DependencyError);
    await expect(aligner.checkDependencies()).rejects.toThrow("Missing external dependencies: bowtie");
  });

  test("applies option defaults", () => {
    expect(new TophatAligner(reference).options).toEqual({
      assemble: false,
      assembleArgs: {},
      minFlank: 12,
      threads: 1,
      extraArgs: {},
      filterFeatures: true,
      filterOrientation: true,
      filterBlacklist: undefined,
      mergeDistance: 10,
    });
  });

  test("rejects invalid options", () => {
    expect(() => new TophatAligner(reference, { threads: 0 })).toThrow(ValidationError);
    expect(() => new TophatAligner(reference, { minFlank: 2.5 })).toThrow("Invalid aligner options");
  });

  test("runs tophat2 with fusion search against the reference", async () => {
    const outputDir = temp.make("tophat-");
    const runner = tophatRunner();
    const aligner = new TophatAligner(reference, {}, dependencies(runner));

    await collect(aligner.identifyInsertions("reads.R1.fastq.gz", outputDir, "reads.R2.fastq.gz"));

    expect(runner.programs).toEqual(["tophat2"]);
    expect(runner.calls[0]?.args).toEqual([
      "tophat2",
      "--fusion-search",
      "--transcriptome-index",
      join(REFERENCE_FIXTURE, "transcriptome"),
      "--num-threads",
      "1",
      "--bowtie1",
      "--fusion-anchor-length",
      "12",
      "--output-dir",
      join(outputDir, "_tophat"),
      join(REFERENCE_FIXTURE, "reference"),
      "reads.R1.fastq.gz",
      "reads.R2.fastq.gz",
    ]);
    expect(readlinkSync(join(outputDir, "alignment.bam"))).toBe(join("_tophat", "accepted_hits.bam"));
  });

  test("extra arguments replace fixed flags in place", async () => {
    const outputDir = temp.make("tophat-");
    const runner = tophatRunner();
    const aligner = new TophatAligner(
      reference,
      { threads: 4, minFlank: 20, extraArgs: { "--num-threads": [8], "--library-type": ["fr-firststrand"] } },
      dependencies(runner)
    );

    await collect(aligner.identifyInsertions("reads.fastq", outputDir));

    const args = runner.calls[0]?.args ?? [];
    expect(args.slice(1, 12)).toEqual([
      "--fusion-search",
      "--transcriptome-index",
      join(REFERENCE_FIXTURE, "transcriptome"),
      "--num-threads",
      "8",
      "--bowtie1",
      "--fusion-anchor-length",
      "20",
      "--library-type",
      "fr-firststrand",
      "--output-dir",
    ]);
    expect(args[args.length - 1]).toBe("reads.fastq");
  });

  test("identifies filtered insertions with FFPM", async () => {
    const aligner = new TophatAligner(reference, {}, dependencies(tophatRunner()));
    const insertions = await collect(aligner.identifyInsertions("reads.fastq", temp.make("tophat-")));

    expect(insertions.map((insertion) => insertion.id)).toEqual([
      "INS_1",
      "INS_3",
      "INS_4",
      "INS_5",
      "INS_6",
      "INS_7",
      "INS_8",
    ]);
    expect(insertions[2]).toEqual({
      id: "INS_4",
      seqname: "16",
      position: 52141093,
      strand: -1,
      supportJunction: 462,
      supportSpanning: 103,
      support: 565,
      metadata: {
        geneId: "ENSMUSG00000100004",
        geneName: "Dsp4",
        geneStrand: 1,
        orientation: "antisense",
        featureName: "En2SA",
        featureType: "SA",
        featureStrand: -1,
        transposonAnchor: 1539,
        ffpmJunction: 231,
        ffpmSpanning: 51.5,
        ffpm: 282.5,
      },
    });
    expect(insertions[3]).toMatchObject({
      id: "INS_5",
      seqname: "7",
      position: 88000123,
      strand: -1,
      metadata: { geneName: "Fel5", orientation: "sense", featureName: "MSCV-SD" },
    });
  });

  test("filters can be disabled", async () => {
    const identify = async (options: ConstructorParameters<typeof TophatAligner>[1]): Promise<string[]> => {
      const aligner = new TophatAligner(reference, options, dependencies(tophatRunner()));
      const insertions = await collect(aligner.identifyInsertions("reads.fastq", temp.make("tophat-")));
      return insertions.map((insertion) => insertion.id);
    };

    expect(await identify({ filterOrientation: false })).toEqual([
      "INS_1",
      "INS_3",
      "INS_4",
      "INS_5",
      "INS_6",
      "INS_7",
      "INS_8",
      "INS_9",
    ]);
    expect(await identify({ filterFeatures: false })).toHaveLength(7);
    expect(await identify({ filterFeatures: false, filterOrientation: false })).toHaveLength(9);
    expect(await identify({ filterBlacklist: ["Olx7"] })).toEqual([
      "INS_1",
      "INS_3",
      "INS_4",
      "INS_5",
      "INS_6",
      "INS_8",
    ]);
  });

  test("omits FFPM without fragments", async () => {
    const aligner = new TophatAligner(reference, {}, dependencies(tophatRunner(), 0));
    const [first] = await collect(aligner.identifyInsertions("reads.fastq", temp.make("tophat-")));

    expect(first?.metadata.ffpm).toBeUndefined();
    expect(first?.metadata.transposonAnchor).toBe(1540);
  });

  test("annotates against assembled transcripts", async () => {
    const outputDir = temp.make("tophat-");
    const runner = tophatRunner();
    const aligner = new TophatAligner(
      reference,
      { assemble: true, assembleArgs: { "-p": [2] } },
      dependencies(runner)
    );

    const insertions = await collect(aligner.identifyInsertions("reads.fastq", outputDir));

    expect(runner.programs).toEqual(["tophat2", "stringtie"]);
    expect(runner.calls[1]?.args).toEqual([
      "stringtie",
      join(outputDir, "alignment.bam"),
      "-G",
      join(REFERENCE_FIXTURE, "reference.gtf"),
      "-o",
      join(outputDir, "_assemble", "transcripts.gtf"),
      "-p",
      "2",
    ]);
    expect(insertions).toHaveLength(7);
  });

  test("fails when tophat2 leaves no fusion report", async () => {
    const aligner = new TophatAligner(reference, {}, dependencies(new RecordingRunner()));
    await expect(collect(aligner.identifyInsertions("reads.fastq", temp.make("tophat-")))).rejects.toThrow(
      FileError
    );
  });

  test("yields nothing for an empty fusion report", async () => {
    const runner = new RecordingRunner((args) => {
      const outputDir = argAfter(args, "--output-dir");
      if (outputDir !== undefined) {
        writeFileSync(join(outputDir, "fusions.out"), "");
      }
    });
    const aligner = new TophatAligner(reference, {}, dependencies(runner));

    expect(await collect(aligner.identifyInsertions("reads.fastq", temp.make("tophat-")))).toEqual([]);
  });
});
