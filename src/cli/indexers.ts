/**
 * Command line configuration of the indexers
 */

import { type } from "arktype";
import type { Command } from "commander";
import type { Indexer } from "../build/indexer";
import { StarIndexer } from "../build/star-indexer";
import { TophatIndexer } from "../build/tophat-indexer";
import { ValidationError } from "../errors";
import type { ToolDependencies } from "../external/shell";
import { parsePositiveInteger } from "./arguments";

export interface IndexerEntry {
  readonly description: string;
  /** Add indexer specific flags to a sub-command */
  configure(command: Command): Command;
  /**
   * Build an indexer from parsed flag values
   *
   * @throws {ValidationError} If the values do not match the declared flags
   */
  create(values: Readonly<Record<string, unknown>>, dependencies?: ToolDependencies): Indexer;
}

export const tophatIndexerEntry: IndexerEntry = {
  description: "build a reference with bowtie and Tophat2 transcriptome indices",

  configure(command) {
    return command;
  },

  create(_values, dependencies) {
    return new TophatIndexer(dependencies);
  },
};

const StarIndexerArguments = type({
  star_threads: "number",
  overhang: "number",
});

export const starIndexerEntry: IndexerEntry = {
  description: "build a reference with a STAR genome index",

  configure(command) {
    return command
      .option("--star_threads <n>", "threads used by STAR", parsePositiveInteger, 1)
      .option("--overhang <n>", "splice junction overhang, ideally read length - 1", parsePositiveInteger, 100);
  },

  create(values, dependencies) {
    const args = StarIndexerArguments(values);
    if (args instanceof type.errors) {
      throw new ValidationError(`Invalid STAR arguments: ${args.summary}`);
    }
    return new StarIndexer({ threads: args.star_threads, overhang: args.overhang }, dependencies);
  },
};
