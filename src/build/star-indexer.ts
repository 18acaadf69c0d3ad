import { join } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import type { ToolDependencies } from "../external/shell";
import { starGenomeGenerate } from "../external/star";
import { withTempDirectory } from "../io/temp";
import { StarReference } from "../reference/reference";
import { PositiveIntegerSchema } from "../types";
import { Indexer } from "./indexer";

export interface StarIndexerOptions {
  /** Threads for genome generation (default: 1) */
  threads?: number;
  /** Splice junction overhang, ideally read length - 1 (default: 100) */
  overhang?: number;
}

const StarIndexerOptionsSchema = type({
  "threads?": PositiveIntegerSchema,
  "overhang?": PositiveIntegerSchema,
});

/**
 * Builds a STAR genome index with splice junctions from the annotation
 */
export class StarIndexer extends Indexer<StarReference> {
  readonly threads: number;
  readonly overhang: number;

  constructor(options: StarIndexerOptions = {}, dependencies: ToolDependencies = {}) {
    super(dependencies);

    const validation = StarIndexerOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid STAR indexer options: ${validation.summary}`);
    }

    this.threads = options.threads ?? 1;
    this.overhang = options.overhang ?? 100;
  }

  get dependencies(): readonly string[] {
    return ["STAR"];
  }

  protected createReference(basePath: string): StarReference {
    return new StarReference(basePath);
  }

  protected async buildIndices(reference: StarReference): Promise<void> {
    this.logger.info({ threads: this.threads, overhang: this.overhang }, "Building STAR index");
    await withTempDirectory(
      (scratchDir) =>
        starGenomeGenerate(this.runner, {
          fastaPath: reference.fastaPath,
          gtfPath: reference.gtfPath,
          outputDir: reference.indexPath,
          scratchDir,
          overhang: this.overhang,
          threads: this.threads,
          logPath: join(reference.basePath, "star.log"),
        }),
      { prefix: "star-index-" }
    );
  }
}
