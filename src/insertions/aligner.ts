/**
 * Aligners: from reads to insertions
 *
 * An aligner runs an external fusion-aware aligner against a
 * {@link Reference}, parses its fusion report and turns the fusions into
 * annotated, filtered {@link Insertion} records.
 */

import { join } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import {
  checkDependencies,
  type CommandRunner,
  type ExecutableLookup,
  ProcessRunner,
  type ToolDependencies,
} from "../external/shell";
import { stringtieAssemble } from "../external/stringtie";
import { countFastqFragments } from "../formats/fastq";
import { createLogger, type Logger } from "../logging";
import type { Reference } from "../reference/reference";
import { type ArgMap, ArgMapSchema, PositiveIntegerSchema } from "../types";
import { GeneIndex } from "./annotation";
import { DEFAULT_MERGE_DISTANCE, extractInsertions } from "./extract";
import { createInsertionFilter } from "./filtering";
import type { Insertion, TransposonFusion } from "./model";

export interface AlignerOptions {
  /** Assemble transcripts with StringTie and annotate against them (default: false) */
  assemble?: boolean;
  /** Extra StringTie flags */
  assembleArgs?: ArgMap;
  /** Minimum bases on each side of a fusion junction (default: 12) */
  minFlank?: number;
  /** Aligner threads (default: 1) */
  threads?: number;
  /** Extra aligner flags, overriding fixed flags of the same name */
  extraArgs?: ArgMap;
  /** Keep only insertions in splice acceptors/donors (default: true) */
  filterFeatures?: boolean;
  /** Keep only insertions in gene orientation (default: true) */
  filterOrientation?: boolean;
  /** Genes (id or name) whose insertions are dropped */
  filterBlacklist?: readonly string[];
  /** Largest gap between merged fusions (default: 10) */
  mergeDistance?: number;
}

export interface ResolvedAlignerOptions {
  readonly assemble: boolean;
  readonly assembleArgs: ArgMap;
  readonly minFlank: number;
  readonly threads: number;
  readonly extraArgs: ArgMap;
  readonly filterFeatures: boolean;
  readonly filterOrientation: boolean;
  readonly filterBlacklist: readonly string[] | undefined;
  readonly mergeDistance: number;
}

export const AlignerOptionsSchema = type({
  "assemble?": "boolean",
  "assembleArgs?": ArgMapSchema,
  "minFlank?": PositiveIntegerSchema,
  "threads?": PositiveIntegerSchema,
  "extraArgs?": ArgMapSchema,
  "filterFeatures?": "boolean",
  "filterOrientation?": "boolean",
  "filterBlacklist?": "string[]",
  "mergeDistance?": "number>=0",
});

/**
 * Validate aligner options and apply defaults
 *
 * @throws {ValidationError} With the schema summary
 */
export function resolveAlignerOptions(options: AlignerOptions = {}): ResolvedAlignerOptions {
  const validation = AlignerOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid aligner options: ${validation.summary}`);
  }

  return {
    assemble: options.assemble ?? false,
    assembleArgs: options.assembleArgs ?? {},
    minFlank: options.minFlank ?? 12,
    threads: options.threads ?? 1,
    extraArgs: options.extraArgs ?? {},
    filterFeatures: options.filterFeatures ?? true,
    filterOrientation: options.filterOrientation ?? true,
    filterBlacklist: options.filterBlacklist,
    mergeDistance: options.mergeDistance ?? DEFAULT_MERGE_DISTANCE,
  };
}

export interface AlignerDependencies extends ToolDependencies {
  /** Counts sequenced fragments for FFPM (default: FASTQ records in the first read file) */
  countFragments?: (fastqPath: string) => Promise<number>;
}

export interface AlignmentRequest {
  readonly fastqPath: string;
  readonly fastq2Path?: string;
  readonly outputDir: string;
  readonly transposonName: string;
}

export interface AlignmentResult {
  /** Alignment BAM (`<outputDir>/alignment.bam`) */
  readonly bamPath: string;
  /** Genome-transposon fusions in report order */
  readonly fusions: readonly TransposonFusion[];
}

export abstract class Aligner<
  R extends Reference = Reference,
  O extends ResolvedAlignerOptions = ResolvedAlignerOptions,
> {
  readonly reference: R;
  readonly options: O;
  protected readonly runner: CommandRunner;
  protected readonly logger: Logger;
  private readonly lookup: ExecutableLookup | undefined;
  private readonly countFragments: (fastqPath: string) => Promise<number>;

  constructor(reference: R, options: O, dependencies: AlignerDependencies = {}) {
    this.reference = reference;
    this.options = options;
    this.logger = dependencies.logger ?? createLogger("aligner");
    this.runner = dependencies.runner ?? new ProcessRunner(this.logger);
    this.lookup = dependencies.lookup;
    this.countFragments = dependencies.countFragments ?? countFastqFragments;
  }

  /** External programs this aligner runs with its current options */
  get dependencies(): readonly string[] {
    return this.options.assemble
      ? [...this.alignerDependencies(), "stringtie"]
      : this.alignerDependencies();
  }

  /**
   * Verify that all external programs are available
   *
   * @throws {DependencyError} Naming every missing program
   */
  async checkDependencies(): Promise<void> {
    await checkDependencies(this.dependencies, this.lookup);
  }

  /**
   * Align reads and identify transposon insertions
   *
   * Every call reruns the whole alignment. Insertions are yielded in order of
   * first appearance in the aligner's report.
   *
   * @param fastqPath Reads, or first mates for paired-end data
   * @param outputDir Directory receiving aligner output
   * @param fastq2Path Second mates for paired-end data
   *
   * @throws {CommandError} If an external tool fails
   * @throws {FileError} If the aligner did not produce its fusion report
   * @throws {ParseError} If the fusion report is malformed
   *
   * @example
   * ```typescript
   * const aligner = new TophatAligner(new TophatReference("reference"), { threads: 4 });
   * for await (const insertion of aligner.identifyInsertions("R1.fastq.gz", "out", "R2.fastq.gz")) {
   *   console.log(insertion.id, insertion.metadata.geneName);
   * }
   * ```
   */
  async *identifyInsertions(
    fastqPath: string,
    outputDir: string,
    fastq2Path?: string
  ): AsyncIterable<Insertion> {
    const transposonName = await this.reference.readTransposonName();

    this.logger.info({ fastqPath, fastq2Path, outputDir }, "Aligning reads");
    const alignment = await this.align({ fastqPath, fastq2Path, outputDir, transposonName });

    const gtfPath = this.options.assemble
      ? await this.assemble(alignment.bamPath, outputDir)
      : this.reference.gtfPath;

    const [genes, features, fragments] = await Promise.all([
      GeneIndex.fromGtf(gtfPath),
      this.reference.readFeatures(),
      this.countFragments(fastqPath),
    ]);

    const insertions = extractInsertions(
      alignment.fusions,
      { genes, features },
      { mergeDistance: this.options.mergeDistance, fragments }
    );
    const keep = createInsertionFilter(this.options);
    const kept = insertions.filter(keep);

    this.logger.info(
      {
        genes: genes.size,
        fusions: alignment.fusions.length,
        insertions: insertions.length,
        kept: kept.length,
      },
      "Identified insertions"
    );
    yield* kept;
  }

  /**
   * Assemble transcripts from the alignment
   *
   * @returns Path of the assembled GTF
   */
  protected async assemble(bamPath: string, outputDir: string): Promise<string> {
    const outputPath = join(outputDir, "_assemble", "transcripts.gtf");
    this.logger.info({ bamPath }, "Assembling transcripts");
    await stringtieAssemble(this.runner, {
      bamPath,
      gtfPath: this.reference.gtfPath,
      outputPath,
      extraArgs: this.options.assembleArgs,
    });
    return outputPath;
  }

  /** Programs the aligner itself needs */
  protected abstract alignerDependencies(): readonly string[];

  /** Run the aligner and read its fusion report */
  protected abstract align(request: AlignmentRequest): Promise<AlignmentResult>;
}
