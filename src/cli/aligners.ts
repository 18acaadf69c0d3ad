/**
 * Command line configuration of the aligners
 *
 * Each entry declares the flags of its `insertions <aligner>` sub-command and
 * builds the aligner from the parsed values.
 */

import { type } from "arktype";
import type { Command } from "commander";
import { ValidationError } from "../errors";
import { parseExtraArgs } from "../external/shell";
import type { Aligner, AlignerDependencies, AlignerOptions } from "../insertions/aligner";
import { DEFAULT_MAX_SPANNING_DISTANCE, StarAligner } from "../insertions/star-aligner";
import { TophatAligner } from "../insertions/tophat-aligner";
import { StarReference, TophatReference } from "../reference/reference";
import { configureSharedAlignerOptions, parsePositiveInteger, sharedAlignerArguments } from "./arguments";

export interface AlignerEntry {
  readonly description: string;
  /** Add aligner specific flags to a sub-command */
  configure(command: Command): Command;
  /**
   * Build an aligner from parsed flag values
   *
   * @throws {ValidationError} If the values do not match the declared flags
   */
  create(
    referencePath: string,
    values: Readonly<Record<string, unknown>>,
    dependencies?: AlignerDependencies
  ): Aligner;
}

interface SharedAlignerArguments {
  assemble: boolean;
  assemble_args?: string;
  no_filter_orientation: boolean;
  no_filter_feature: boolean;
  blacklisted_genes?: string[];
}

function sharedAlignerOptions(args: SharedAlignerArguments): AlignerOptions {
  return {
    assemble: args.assemble,
    assembleArgs: args.assemble_args === undefined ? {} : parseExtraArgs(args.assemble_args),
    filterOrientation: !args.no_filter_orientation,
    filterFeatures: !args.no_filter_feature,
    ...(args.blacklisted_genes !== undefined && { filterBlacklist: args.blacklisted_genes }),
  };
}

const TophatArguments = type({
  ...sharedAlignerArguments,
  tophat_threads: "number",
  tophat_min_flank: "number",
  "tophat_args?": "string",
});

export const tophatAlignerEntry: AlignerEntry = {
  description: "identify insertions with Tophat-Fusion",

  configure(command) {
    return configureSharedAlignerOptions(
      command
        .option("--tophat_threads <n>", "threads used by tophat2", parsePositiveInteger, 1)
        .option("--tophat_min_flank <n>", "minimum flank length of fusion junctions", parsePositiveInteger, 12)
        .option("--tophat_args <args>", "extra tophat2 arguments, e.g. '--library-type fr-firststrand'")
    );
  },

  create(referencePath, values, dependencies) {
    const args = TophatArguments(values);
    if (args instanceof type.errors) {
      throw new ValidationError(`Invalid tophat arguments: ${args.summary}`);
    }

    return new TophatAligner(
      new TophatReference(referencePath),
      {
        ...sharedAlignerOptions(args),
        threads: args.tophat_threads,
        minFlank: args.tophat_min_flank,
        extraArgs: args.tophat_args === undefined ? {} : parseExtraArgs(args.tophat_args),
      },
      dependencies
    );
  },
};

const StarArguments = type({
  ...sharedAlignerArguments,
  star_threads: "number",
  star_min_flank: "number",
  star_max_spanning_distance: "number",
  "star_args?": "string",
});

export const starAlignerEntry: AlignerEntry = {
  description: "identify insertions with STAR chimeric alignment",

  configure(command) {
    return configureSharedAlignerOptions(
      command
        .option("--star_threads <n>", "threads used by STAR", parsePositiveInteger, 1)
        .option("--star_min_flank <n>", "minimum segment and overhang length of chimeric alignments", parsePositiveInteger, 12)
        .option(
          "--star_max_spanning_distance <n>",
          "largest distance between a spanning pair and its junction",
          parsePositiveInteger,
          DEFAULT_MAX_SPANNING_DISTANCE
        )
        .option("--star_args <args>", "extra STAR arguments, e.g. '--limitBAMsortRAM 2000000000'")
    );
  },

  create(referencePath, values, dependencies) {
    const args = StarArguments(values);
    if (args instanceof type.errors) {
      throw new ValidationError(`Invalid STAR arguments: ${args.summary}`);
    }

    return new StarAligner(
      new StarReference(referencePath),
      {
        ...sharedAlignerOptions(args),
        threads: args.star_threads,
        minFlank: args.star_min_flank,
        maxSpanningDistance: args.star_max_spanning_distance,
        extraArgs: args.star_args === undefined ? {} : parseExtraArgs(args.star_args),
      },
      dependencies
    );
  },
};
