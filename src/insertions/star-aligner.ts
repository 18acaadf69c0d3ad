import { join } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import { mergeArgs } from "../external/shell";
import { starAlign } from "../external/star";
import { ChimericJunctionParser } from "../formats/star-junctions";
import { replaceSymlink } from "../io/file-writer";
import type { StarReference } from "../reference/reference";
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
import { fusionsFromStarJunctions } from "./fusions";

export interface StarAlignerOptions extends AlignerOptions {
  /** Largest distance between a spanning pair and its junction (default: 300) */
  maxSpanningDistance?: number;
}

export interface ResolvedStarAlignerOptions extends ResolvedAlignerOptions {
  readonly maxSpanningDistance: number;
}

export const DEFAULT_MAX_SPANNING_DISTANCE = 300;

const StarAlignerOptionsSchema = type({
  "maxSpanningDistance?": "number>=0",
});

/**
 * Identifies insertions with STAR chimeric alignment
 *
 * STAR writes to `<outputDir>/_star`; the sorted alignment is linked as
 * `<outputDir>/alignment.bam` and `Chimeric.out.junction` is the fusion
 * report.
 */
export class StarAligner extends Aligner<StarReference, ResolvedStarAlignerOptions> {
  constructor(
    reference: StarReference,
    options: StarAlignerOptions = {},
    dependencies: AlignerDependencies = {}
  ) {
    const validation = StarAlignerOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid STAR aligner options: ${validation.summary}`);
    }

    super(
      reference,
      {
        ...resolveAlignerOptions(options),
        maxSpanningDistance: options.maxSpanningDistance ?? DEFAULT_MAX_SPANNING_DISTANCE,
      },
      dependencies
    );
  }

  protected alignerDependencies(): readonly string[] {
    return ["STAR"];
  }

  /**
   * Fixed STAR flags, before caller flags are merged in
   */
  static fixedArgs(options: ResolvedAlignerOptions): ArgMap {
    return {
      "--runThreadN": [options.threads],
      "--chimSegmentMin": [options.minFlank],
      "--chimJunctionOverhangMin": [options.minFlank],
      "--outSAMtype": ["BAM", "SortedByCoordinate"],
      "--twopassMode": ["Basic"],
    };
  }

  protected async align(request: AlignmentRequest): Promise<AlignmentResult> {
    const starDir = join(request.outputDir, "_star");

    await starAlign(this.runner, {
      fastqPath: request.fastqPath,
      fastq2Path: request.fastq2Path,
      indexPath: this.reference.indexPath,
      outputDir: starDir,
      extraArgs: mergeArgs(StarAligner.fixedArgs(this.options), this.options.extraArgs),
    });

    const bamPath = join(request.outputDir, "alignment.bam");
    await replaceSymlink(join("_star", "Aligned.sortedByCoord.out.bam"), bamPath);

    const report = new ChimericJunctionParser().parseFile(join(starDir, "Chimeric.out.junction"));
    const fusions = await fusionsFromStarJunctions(
      report,
      request.transposonName,
      this.options.maxSpanningDistance
    );
    return { bamPath, fusions };
  }
}
