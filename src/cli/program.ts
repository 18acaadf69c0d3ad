/**
 * tnfusion command line program
 *
 * ```
 * tnfusion build <indexer> --reference_seq ... --output_dir reference
 * tnfusion insertions <aligner> --fastq ... --reference reference --output_dir out
 * ```
 */

import { join } from "node:path";
import { type } from "arktype";
import { Command } from "commander";
import { ValidationError } from "../errors";
import type { AlignerDependencies } from "../insertions/aligner";
import { writeInsertions } from "../insertions/writer";
import { ensureDirectory } from "../io/file-writer";
import { createLogger, type Logger } from "../logging";
import type { Registry } from "../registry";
import type { AlignerEntry } from "./aligners";
import type { IndexerEntry } from "./indexers";

export const INSERTIONS_FILE = "insertions.txt";

export interface CliContext {
  readonly indexers: Registry<IndexerEntry>;
  readonly aligners: Registry<AlignerEntry>;
  /** Collaborators passed to every indexer and aligner */
  readonly dependencies?: AlignerDependencies;
  readonly logger?: Logger;
}

const BuildArguments = type({
  reference_seq: "string>0",
  reference_gtf: "string>0",
  transposon_seq: "string>0",
  transposon_features: "string>0",
  output_dir: "string>0",
  "blacklist_genes?": "string[]",
});

const InsertionArguments = type({
  fastq: "string>0",
  "fastq2?": "string>0",
  reference: "string>0",
  output_dir: "string>0",
});

function addBuildCommand(program: Command, context: CliContext, logger: Logger): void {
  const build = program.command("build").description("build a transposon-augmented reference");

  for (const name of context.indexers.names()) {
    const entry = context.indexers.get(name);
    const command = build
      .command(name)
      .description(entry.description)
      .requiredOption("--reference_seq <path>", "reference genome FASTA")
      .requiredOption("--reference_gtf <path>", "reference gene annotation GTF")
      .requiredOption("--transposon_seq <path>", "transposon sequence FASTA")
      .requiredOption("--transposon_features <path>", "transposon feature table")
      .requiredOption("--output_dir <path>", "reference directory to create")
      .option("--blacklist_genes <genes...>", "genes (id or name) excluded from the annotation");

    entry.configure(command).action(async () => {
      const values = command.opts();
      const args = BuildArguments(values);
      if (args instanceof type.errors) {
        throw new ValidationError(`Invalid arguments: ${args.summary}`);
      }

      const indexer = entry.create(values, context.dependencies);
      const reference = await indexer.build({
        referenceFastaPath: args.reference_seq,
        referenceGtfPath: args.reference_gtf,
        transposonFastaPath: args.transposon_seq,
        transposonFeaturesPath: args.transposon_features,
        outputDir: args.output_dir,
        ...(args.blacklist_genes !== undefined && { blacklistGenes: args.blacklist_genes }),
      });
      logger.info({ indexer: name, reference: reference.basePath }, "Built reference");
    });
  }
}

function addInsertionsCommand(program: Command, context: CliContext, logger: Logger): void {
  const insertions = program
    .command("insertions")
    .description("identify transposon insertions from RNA-seq reads");

  for (const name of context.aligners.names()) {
    const entry = context.aligners.get(name);
    const command = insertions
      .command(name)
      .description(entry.description)
      .requiredOption("--fastq <path>", "reads, or first mates of paired-end reads")
      .option("--fastq2 <path>", "second mates of paired-end reads")
      .requiredOption("--reference <path>", "reference directory built by 'tnfusion build'")
      .requiredOption("--output_dir <path>", "output directory");

    entry.configure(command).action(async () => {
      const values = command.opts();
      const args = InsertionArguments(values);
      if (args instanceof type.errors) {
        throw new ValidationError(`Invalid arguments: ${args.summary}`);
      }

      const aligner = entry.create(args.reference, values, context.dependencies);
      await aligner.checkDependencies();
      await ensureDirectory(args.output_dir);

      const outputPath = join(args.output_dir, INSERTIONS_FILE);
      await writeInsertions(
        outputPath,
        aligner.identifyInsertions(args.fastq, args.output_dir, args.fastq2)
      );
      logger.info({ aligner: name, output: outputPath }, "Wrote insertions");
    });
  }
}

/**
 * Build the command line program for the given registries
 *
 * Commander errors are thrown as `CommanderError` instead of exiting.
 */
export function createProgram(context: CliContext): Command {
  const logger = context.logger ?? createLogger("cli");

  const program = new Command()
    .name("tnfusion")
    .description("Identify transposon insertions from RNA-seq fusion reads")
    .version("0.1.0")
    .exitOverride();

  addBuildCommand(program, context, logger);
  addInsertionsCommand(program, context, logger);
  return program;
}
