/**
 * Shared command line argument handling
 */

import { type Command, InvalidArgumentError } from "commander";

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Flags shared by all aligners: assembly and insertion filters
 */
export function configureSharedAlignerOptions(command: Command): Command {
  return command
    .option("--assemble", "assemble transcripts with StringTie before annotating", false)
    .option("--assemble_args <args>", "extra StringTie arguments, e.g. '-f 0.05'")
    .option("--no_filter_orientation", "keep insertions against the gene orientation", false)
    .option("--no_filter_feature", "keep insertions outside splice acceptors/donors", false)
    .option("--blacklisted_genes <genes...>", "genes (id or name) whose insertions are dropped");
}

export const sharedAlignerArguments = {
  assemble: "boolean",
  "assemble_args?": "string",
  no_filter_orientation: "boolean",
  no_filter_feature: "boolean",
  "blacklisted_genes?": "string[]",
} as const;
