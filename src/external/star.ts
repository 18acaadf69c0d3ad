/**
 * STAR invocations: genome generation and chimeric alignment
 */

import { CompressionDetector } from "../compression/detector";
import { ensureDirectory } from "../io/file-writer";
import type { ArgMap } from "../types";
import { type CommandRunner, flattenArgs } from "./shell";

/**
 * Generate a STAR genome index
 *
 * STAR writes `Log.out` next to the prefix given by `outFileNamePrefix`, so
 * callers pass a scratch directory to keep the index directory clean.
 */
export async function starGenomeGenerate(
  runner: CommandRunner,
  options: {
    fastaPath: string;
    gtfPath: string;
    outputDir: string;
    scratchDir: string;
    overhang: number;
    threads: number;
    logPath?: string;
  }
): Promise<void> {
  await ensureDirectory(options.outputDir);

  const args = [
    "STAR",
    "--runMode",
    "genomeGenerate",
    "--genomeDir",
    options.outputDir,
    "--genomeFastaFiles",
    options.fastaPath,
    "--sjdbGTFfile",
    options.gtfPath,
    "--sjdbOverhang",
    String(options.overhang),
    "--runThreadN",
    String(options.threads),
    "--outFileNamePrefix",
    withTrailingSlash(options.scratchDir),
  ];
  await runner.run(args, { stdoutPath: options.logPath });
}

export interface StarAlignOptions {
  fastqPath: string;
  fastq2Path?: string;
  /** STAR genome directory */
  indexPath: string;
  /** Output directory, created when missing */
  outputDir: string;
  extraArgs?: ArgMap;
  stdoutPath?: string;
  stderrPath?: string;
}

function withTrailingSlash(path: string): string {
  return path.endsWith("/") ? path : `${path}/`;
}

/**
 * Build the STAR alignment command line
 *
 * STAR treats `--outFileNamePrefix` as a plain prefix, so the output
 * directory always gets a trailing slash. Gzipped reads are decompressed by
 * STAR through `--readFilesCommand gunzip -c`.
 */
export function buildStarAlignArgs(options: StarAlignOptions): string[] {
  const readFiles = [options.fastqPath];
  if (options.fastq2Path !== undefined) {
    readFiles.push(options.fastq2Path);
  }

  const args = [
    "STAR",
    "--genomeDir",
    options.indexPath,
    "--outFileNamePrefix",
    withTrailingSlash(options.outputDir),
    "--readFilesIn",
    ...readFiles,
  ];

  if (CompressionDetector.fromExtension(options.fastqPath) === "gzip") {
    args.push("--readFilesCommand", "gunzip", "-c");
  }

  args.push(...flattenArgs(options.extraArgs ?? {}));
  return args;
}

/**
 * Align reads with STAR
 */
export async function starAlign(runner: CommandRunner, options: StarAlignOptions): Promise<void> {
  await ensureDirectory(options.outputDir);
  await runner.run(buildStarAlignArgs(options), {
    stdoutPath: options.stdoutPath,
    stderrPath: options.stderrPath,
  });
}
