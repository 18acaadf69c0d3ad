/**
 * Abstract base parser for line-oriented text formats
 *
 * Provides the shared line loop (comment skipping, line numbering, file
 * error wrapping) for GTF, transposon feature tables and aligner fusion
 * reports. Each format only implements `parseLine`.
 */

import { ParseError, TnFusionError, describeError } from "../errors";
import { readFileLines } from "../io/file-reader";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T> {
  /**
   * Parse records from string data
   */
  async *parseString(data: string): AsyncIterable<T> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse records from a file, streaming line by line
   *
   * @throws {FileError} If the file cannot be read
   * @throws {ParseError} On the first malformed line
   */
  async *parseFile(filePath: string): AsyncIterable<T> {
    try {
      yield* this.parseLines(readFileLines(filePath));
    } catch (error) {
      if (error instanceof TnFusionError) {
        throw error;
      }
      throw new ParseError(
        `Failed to parse ${this.getFormatName()} file '${filePath}': ${describeError(error)}`,
        this.getFormatName(),
        undefined,
        `File path: ${filePath}`
      );
    }
  }

  /**
   * Parse a sequence of lines
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<T> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (this.shouldSkipLine(line)) {
        continue;
      }

      const record = this.parseLine(line, lineNumber);
      if (record !== undefined) {
        yield record;
      }
    }
  }

  /**
   * Blank lines and `#` comments carry no records
   */
  protected shouldSkipLine(line: string): boolean {
    const trimmed = line.trim();
    return trimmed === "" || trimmed.startsWith("#");
  }

  /**
   * Parse one data line
   *
   * @returns The record, or undefined when the line carries none
   * @throws {ParseError} If the line is malformed
   */
  protected abstract parseLine(line: string, lineNumber: number): T | undefined;

  /**
   * Format identifier used in messages (e.g. "GTF")
   */
  protected abstract getFormatName(): string;
}
