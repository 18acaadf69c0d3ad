/**
 * FASTA helpers
 *
 * Only what reference building needs: sequence ids from headers and
 * concatenation of FASTA files into one augmented reference.
 */

import { ParseError } from "../errors";
import { readFileLines } from "../io/file-reader";
import { writeLines } from "../io/file-writer";

export interface FastaHeader {
  /** Sequence id: header text up to the first whitespace */
  readonly id: string;
  /** Remaining header text */
  readonly description: string;
  readonly lineNumber: number;
}

/**
 * Parse a `>` header line
 *
 * @throws {ParseError} If the header has no id
 */
export function parseFastaHeader(line: string, lineNumber: number): FastaHeader {
  const header = line.slice(1).trim();
  const match = header.match(/^(\S+)\s*(.*)$/);
  const id = match?.[1];
  if (id === undefined) {
    throw new ParseError("FASTA header without a sequence id", "FASTA", lineNumber, `Line: ${line}`);
  }
  return { id, description: match?.[2] ?? "", lineNumber };
}

/**
 * Stream the headers of a FASTA file
 *
 * @throws {ParseError} If sequence data appears before the first header
 */
export async function* readFastaHeaders(path: string): AsyncIterable<FastaHeader> {
  let lineNumber = 0;
  let seenHeader = false;

  for await (const line of readFileLines(path)) {
    lineNumber++;
    if (line.startsWith(">")) {
      seenHeader = true;
      yield parseFastaHeader(line, lineNumber);
    } else if (!seenHeader && line.trim() !== "" && !line.startsWith(";")) {
      throw new ParseError(
        "Sequence data found before the first FASTA header",
        "FASTA",
        lineNumber,
        `File: ${path}`
      );
    }
  }
}

/**
 * Sequence ids of a FASTA file, in file order
 */
export async function readSequenceIds(path: string): Promise<string[]> {
  const ids: string[] = [];
  for await (const header of readFastaHeaders(path)) {
    ids.push(header.id);
  }
  return ids;
}

async function* concatenateLines(paths: readonly string[]): AsyncIterable<string> {
  for (const path of paths) {
    for await (const line of readFileLines(path)) {
      if (line !== "") {
        yield line;
      }
    }
  }
}

/**
 * Write several FASTA files, in order, into one uncompressed file
 *
 * Gzipped inputs are decompressed; blank lines are dropped.
 *
 * @example
 * ```typescript
 * await writeConcatenatedFasta(["mm10.fa.gz", "t2onc.fa"], "reference/reference.fa");
 * ```
 */
export async function writeConcatenatedFasta(
  inputPaths: readonly string[],
  outputPath: string
): Promise<void> {
  await writeLines(outputPath, concatenateLines(inputPaths));
}
