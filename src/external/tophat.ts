/**
 * Tophat2 invocations: transcriptome index building and fusion alignment
 */

import { ensureDirectory } from "../io/file-writer";
import type { ArgMap } from "../types";
import { type CommandRunner, flattenArgs } from "./shell";

/**
 * Build a Tophat2 transcriptome index
 *
 * Tophat requires an output directory for its own bookkeeping even when only
 * the index is wanted; `scratchDir` serves that purpose and can be discarded
 * afterwards.
 */
export async function tophat2TranscriptomeIndex(
  runner: CommandRunner,
  options: {
    indexPath: string;
    gtfPath: string;
    outputBase: string;
    scratchDir: string;
    logPath?: string;
  }
): Promise<void> {
  const args = [
    "tophat2",
    "--GTF",
    options.gtfPath,
    `--transcriptome-index=${options.outputBase}`,
    "--bowtie1",
    "--output-dir",
    options.scratchDir,
    options.indexPath,
  ];
  await runner.run(args, { stdoutPath: options.logPath });
}

export interface Tophat2AlignOptions {
  /** Reads, or first mates for paired-end data */
  fastqPath: string;
  /** Second mates; omitted for single-end data */
  fastq2Path?: string;
  /** Bowtie index base path */
  indexPath: string;
  /** Tophat output directory, created when missing */
  outputDir: string;
  /** Additional tophat2 flags, placed before the positional arguments */
  extraArgs?: ArgMap;
  stdoutPath?: string;
  stderrPath?: string;
}

/**
 * Build the tophat2 alignment command line
 */
export function buildTophat2AlignArgs(options: Tophat2AlignOptions): string[] {
  const args = [
    "tophat2",
    ...flattenArgs(options.extraArgs ?? {}),
    "--output-dir",
    options.outputDir,
    options.indexPath,
    options.fastqPath,
  ];
  if (options.fastq2Path !== undefined) {
    args.push(options.fastq2Path);
  }
  return args;
}

/**
 * Align reads with tophat2
 *
 * @example
 * ```typescript
 * await tophat2Align(runner, {
 *   fastqPath: "sample.R1.fastq.gz",
 *   fastq2Path: "sample.R2.fastq.gz",
 *   indexPath: reference.indexPath,
 *   outputDir: "out/_tophat",
 *   extraArgs: { "--fusion-search": [], "--num-threads": [4] },
 * });
 * ```
 */
export async function tophat2Align(
  runner: CommandRunner,
  options: Tophat2AlignOptions
): Promise<void> {
  await ensureDirectory(options.outputDir);
  await runner.run(buildTophat2AlignArgs(options), {
    stdoutPath: options.stdoutPath,
    stderrPath: options.stderrPath,
  });
}
