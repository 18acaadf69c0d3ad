/**
 * tnfusion - transposon insertion detection from RNA-seq fusion reads
 *
 * Builds transposon-augmented references and turns the fusion reports of
 * Tophat-Fusion or STAR into annotated insertion tables.
 */

// Errors
export {
  CommandError,
  DependencyError,
  describeError,
  FileError,
  ParseError,
  TnFusionError,
  ValidationError,
} from "./errors";

// Shared types
export type { ArgMap, GenomicStrand, Strand } from "./types";
export { toGenomicStrand } from "./types";

// Logging
export { createLogger, getLogLevel, LOG_LEVEL_ENV, type Logger, type LogLevel } from "./logging";

// External tools
export {
  checkDependencies,
  type CommandRunner,
  type ExecutableLookup,
  findExecutable,
  flattenArgs,
  mergeArgs,
  parseExtraArgs,
  ProcessRunner,
  type RunOptions,
  type ToolDependencies,
} from "./external/shell";
export { bowtieBuild } from "./external/bowtie";
export { buildStarAlignArgs, starAlign, starGenomeGenerate } from "./external/star";
export { stringtieAssemble } from "./external/stringtie";
export { buildTophat2AlignArgs, tophat2Align, tophat2TranscriptomeIndex } from "./external/tophat";

// Formats
export { GtfParser, parseGtfAttributes, type GtfFeature, type GtfParserOptions } from "./formats/gtf";
export {
  findFeature,
  readTransposonFeatures,
  type TransposonFeature,
  TransposonFeatureParser,
} from "./formats/features";
export { readSequenceIds, writeConcatenatedFasta } from "./formats/fasta";
export { countFastqFragments } from "./formats/fastq";
export { type TophatFusion, TophatFusionParser } from "./formats/tophat-fusions";
export { type ChimericJunction, ChimericJunctionParser } from "./formats/star-junctions";

// References and indexers
export { Reference, StarReference, TophatReference } from "./reference/reference";
export { type BuildRequest, Indexer } from "./build/indexer";
export { StarIndexer, type StarIndexerOptions } from "./build/star-indexer";
export { TophatIndexer } from "./build/tophat-indexer";

// Insertions
export {
  Aligner,
  type AlignerDependencies,
  type AlignerOptions,
  resolveAlignerOptions,
  type ResolvedAlignerOptions,
} from "./insertions/aligner";
export { type Gene, GeneIndex } from "./insertions/annotation";
export { extractInsertions, ffpm } from "./insertions/extract";
export { createInsertionFilter, filterInsertions, type FilterOptions } from "./insertions/filtering";
export { fusionsFromStarJunctions, fusionsFromTophat } from "./insertions/fusions";
export {
  createInsertion,
  type Insertion,
  type InsertionMetadata,
  type Orientation,
  type TransposonFusion,
} from "./insertions/model";
export { StarAligner, type StarAlignerOptions } from "./insertions/star-aligner";
export { TophatAligner } from "./insertions/tophat-aligner";
export { formatInsertions, writeInsertions } from "./insertions/writer";

// Registries and CLI
export { createAlignerRegistry, createIndexerRegistry, Registry } from "./registry";
export type { AlignerEntry } from "./cli/aligners";
export type { IndexerEntry } from "./cli/indexers";
export { main } from "./cli/main";
export { type CliContext, createProgram } from "./cli/program";
