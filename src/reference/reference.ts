/**
 * Reference directory layout
 *
 * A reference is a directory built once by an indexer and read by aligners:
 *
 * ```
 * <base>/
 *   reference.fa              genome + transposon sequence
 *   reference.gtf             gene annotation (blacklisted genes removed)
 *   transposon.fa             transposon sequence
 *   transposon.features.txt   transposon feature table
 *   ...                       aligner specific indices
 * ```
 */

import { join } from "node:path";
import { ValidationError } from "../errors";
import { readSequenceIds } from "../formats/fasta";
import { readTransposonFeatures, type TransposonFeature } from "../formats/features";

export class Reference {
  readonly basePath: string;

  constructor(basePath: string) {
    if (basePath === "") {
      throw new ValidationError("Reference path cannot be empty");
    }
    this.basePath = basePath;
  }

  get fastaPath(): string {
    return join(this.basePath, "reference.fa");
  }

  get gtfPath(): string {
    return join(this.basePath, "reference.gtf");
  }

  /** Base path of the aligner index */
  get indexPath(): string {
    return join(this.basePath, "reference");
  }

  get transposonFastaPath(): string {
    return join(this.basePath, "transposon.fa");
  }

  get featuresPath(): string {
    return join(this.basePath, "transposon.features.txt");
  }

  /**
   * Name of the transposon sequence, as it appears in aligner output
   *
   * @throws {ValidationError} If the transposon FASTA holds no sequence
   */
  async readTransposonName(): Promise<string> {
    const [name] = await readSequenceIds(this.transposonFastaPath);
    if (name === undefined) {
      throw new ValidationError(
        `No transposon sequence found in ${this.transposonFastaPath}`,
        undefined,
        `Reference: ${this.basePath}`
      );
    }
    return name;
  }

  readFeatures(): Promise<TransposonFeature[]> {
    return readTransposonFeatures(this.featuresPath);
  }
}

/**
 * Reference with bowtie and Tophat transcriptome indices
 */
export class TophatReference extends Reference {
  /** Bowtie index base */
  override get indexPath(): string {
    return join(this.basePath, "reference");
  }

  /** Tophat transcriptome index base */
  get transcriptomePath(): string {
    return join(this.basePath, "transcriptome");
  }
}

/**
 * Reference with a STAR genome directory
 */
export class StarReference extends Reference {
  override get indexPath(): string {
    return join(this.basePath, "star");
  }
}
