import { join } from "node:path";
import { bowtieBuild } from "../external/bowtie";
import { tophat2TranscriptomeIndex } from "../external/tophat";
import { withTempDirectory } from "../io/temp";
import { TophatReference } from "../reference/reference";
import { Indexer } from "./indexer";

/**
 * Builds bowtie and Tophat2 transcriptome indices
 *
 * The transcriptome step needs a Tophat output directory; it gets a scratch
 * directory that is removed whether or not tophat2 succeeds.
 */
export class TophatIndexer extends Indexer<TophatReference> {
  get dependencies(): readonly string[] {
    return ["bowtie-build", "tophat2"];
  }

  protected createReference(basePath: string): TophatReference {
    return new TophatReference(basePath);
  }

  protected async buildIndices(reference: TophatReference): Promise<void> {
    this.logger.info("Building bowtie index");
    await bowtieBuild(this.runner, reference.fastaPath, reference.indexPath, {
      logPath: join(reference.basePath, "bowtie.log"),
    });

    this.logger.info("Building transcriptome index");
    await withTempDirectory(
      (scratchDir) =>
        tophat2TranscriptomeIndex(this.runner, {
          indexPath: reference.indexPath,
          gtfPath: reference.gtfPath,
          outputBase: reference.transcriptomePath,
          scratchDir,
          logPath: join(reference.basePath, "transcriptome.log"),
        }),
      { prefix: "tophat-index-" }
    );
  }
}
