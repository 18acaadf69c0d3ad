import { join } from "node:path";
import { mergeArgs } from "../external/shell";
import { tophat2Align } from "../external/tophat";
import { TophatFusionParser } from "../formats/tophat-fusions";
import { replaceSymlink } from "../io/file-writer";
import { collect } from "../io/stream-utils";
import type { TophatReference } from "../reference/reference";
import type { ArgMap } from "../types";
import {
  Aligner,
  type AlignerDependencies,
  type AlignerOptions,
  type AlignmentRequest,
  type AlignmentResult,
  type ResolvedAlignerOptions,
  resolveAlignerOptions,
} from "./aligner";
import { fusionsFromTophat } from "./fusions";

/**
 * Identifies insertions with Tophat-Fusion
 *
 * Tophat writes to `<outputDir>/_tophat`; the alignment is linked as
 * `<outputDir>/alignment.bam` and `fusions.out` is the fusion report.
 *
 * @example
 * ```typescript
 * const aligner = new TophatAligner(new TophatReference("reference"), {
 *   threads: 4,
 *   extraArgs: { "--library-type": ["fr-firststrand"] },
 * });
 * await aligner.checkDependencies();
 * ```
 */
export class TophatAligner extends Aligner<TophatReference> {
  constructor(
    reference: TophatReference,
    options: AlignerOptions = {},
    dependencies: AlignerDependencies = {}
  ) {
    super(reference, resolveAlignerOptions(options), dependencies);
  }

  protected alignerDependencies(): readonly string[] {
    return ["tophat2", "bowtie"];
  }

  /**
   * Fixed tophat2 flags, before caller flags are merged in
   */
  static fixedArgs(reference: TophatReference, options: ResolvedAlignerOptions): ArgMap {
    return {
      "--fusion-search": [],
      "--transcriptome-index": [reference.transcriptomePath],
      "--num-threads": [options.threads],
      "--bowtie1": [],
      "--fusion-anchor-length": [options.minFlank],
    };
  }

  protected async align(request: AlignmentRequest): Promise<AlignmentResult> {
    const tophatDir = join(request.outputDir, "_tophat");

    await tophat2Align(this.runner, {
      fastqPath: request.fastqPath,
      fastq2Path: request.fastq2Path,
      indexPath: this.reference.indexPath,
      outputDir: tophatDir,
      extraArgs: mergeArgs(TophatAligner.fixedArgs(this.reference, this.options), this.options.extraArgs),
    });

    const bamPath = join(request.outputDir, "alignment.bam");
    await replaceSymlink(join("_tophat", "accepted_hits.bam"), bamPath);

    const report = new TophatFusionParser().parseFile(join(tophatDir, "fusions.out"));
    const fusions = await collect(fusionsFromTophat(report, request.transposonName));
    return { bamPath, fusions };
  }
}
