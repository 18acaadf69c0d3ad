/**
 * Reference indexers
 *
 * An indexer turns a host genome, its annotation and a transposon sequence
 * into a {@link Reference} directory, then builds the aligner specific
 * indices inside it with external tools.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import {
  checkDependencies,
  type CommandRunner,
  type ExecutableLookup,
  ProcessRunner,
  type ToolDependencies,
} from "../external/shell";
import { writeConcatenatedFasta } from "../formats/fasta";
import { exists } from "../io/file-reader";
import { copyFile, ensureDirectory } from "../io/file-writer";
import { createLogger, type Logger } from "../logging";
import type { Reference } from "../reference/reference";
import { FilePathSchema } from "../types";
import { writeFilteredGtf } from "./augment";

/**
 * Inputs of a reference build
 */
export interface BuildRequest {
  /** Host genome FASTA (may be gzipped) */
  referenceFastaPath: string;
  /** Host gene annotation GTF (may be gzipped) */
  referenceGtfPath: string;
  /** Transposon sequence FASTA */
  transposonFastaPath: string;
  /** Transposon feature table */
  transposonFeaturesPath: string;
  /** Reference directory to create; must not exist yet */
  outputDir: string;
  /** Genes (id or name) left out of the reference annotation */
  blacklistGenes?: readonly string[];
}

const BuildRequestSchema = type({
  referenceFastaPath: FilePathSchema,
  referenceGtfPath: FilePathSchema,
  transposonFastaPath: FilePathSchema,
  transposonFeaturesPath: FilePathSchema,
  outputDir: FilePathSchema,
  "blacklistGenes?": "string[]",
});

export abstract class Indexer<R extends Reference = Reference> {
  protected readonly runner: CommandRunner;
  protected readonly logger: Logger;
  private readonly lookup: ExecutableLookup | undefined;

  constructor(dependencies: ToolDependencies = {}) {
    this.logger = dependencies.logger ?? createLogger("indexer");
    this.runner = dependencies.runner ?? new ProcessRunner(this.logger);
    this.lookup = dependencies.lookup;
  }

  /** External programs this indexer runs */
  abstract get dependencies(): readonly string[];

  /**
   * Verify that all external programs are available
   *
   * @throws {DependencyError} Naming every missing program
   */
  async checkDependencies(): Promise<void> {
    await checkDependencies(this.dependencies, this.lookup);
  }

  /**
   * Build a reference directory
   *
   * @throws {DependencyError} If external programs are missing
   * @throws {ValidationError} If the output directory already exists
   * @throws {CommandError} If an external build step fails
   *
   * @example
   * ```typescript
   * const reference = await new TophatIndexer().build({
   *   referenceFastaPath: "GRCm38.fa",
   *   referenceGtfPath: "GRCm38.gtf",
   *   transposonFastaPath: "t2onc.fa",
   *   transposonFeaturesPath: "t2onc.features.txt",
   *   outputDir: "reference",
   * });
   * ```
   */
  async build(request: BuildRequest): Promise<R> {
    const validation = BuildRequestSchema(request);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid build request: ${validation.summary}`);
    }

    await this.checkDependencies();

    if (await exists(request.outputDir)) {
      throw new ValidationError(
        `Output directory already exists: ${request.outputDir}`,
        undefined,
        "Remove it or choose another path; references are never overwritten"
      );
    }
    await ensureDirectory(request.outputDir);

    const reference = this.createReference(request.outputDir);

    this.logger.info({ outputDir: request.outputDir }, "Building augmented reference");
    await writeConcatenatedFasta(
      [request.referenceFastaPath, request.transposonFastaPath],
      reference.fastaPath
    );
    await writeFilteredGtf(request.referenceGtfPath, reference.gtfPath, request.blacklistGenes);
    await copyFile(request.transposonFastaPath, reference.transposonFastaPath);
    await copyFile(request.transposonFeaturesPath, reference.featuresPath);

    await this.buildIndices(reference);
    this.logger.info({ reference: reference.basePath }, "Reference complete");

    return reference;
  }

  /** Reference layout for a base directory */
  protected abstract createReference(basePath: string): R;

  /** Build aligner indices for an augmented reference */
  protected abstract buildIndices(reference: R): Promise<void>;
}
