/**
 * File reading utilities
 *
 * Streams files through the `@effect/platform` FileSystem service, with
 * transparent gzip decompression, and exposes them as web streams and
 * async line iterators for the format parsers.
 */

import { DecompressionStream } from "node:stream/web";
import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { CompressionDetector } from "../compression/detector";
import { FileError, TnFusionError } from "../errors";
import { runWithPlatform } from "./runtime";

const DEFAULT_CHUNK_SIZE = 65_536;
const MAX_LINE_LENGTH = 10_000_000;
const NEWLINE = 0x0a;

export interface FileReaderOptions {
  /** Decompress gzip input detected from the file extension (default: true) */
  autoDecompress?: boolean;
  /** Read chunk size in bytes */
  chunkSize?: number;
}

/**
 * Check whether a path exists
 */
export async function exists(path: string): Promise<boolean> {
  return runWithPlatform(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return yield* fs.exists(path);
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)))
  );
}

/**
 * Open a file as a byte stream
 *
 * @throws {FileError} If the file does not exist
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const { autoDecompress = true, chunkSize = DEFAULT_CHUNK_SIZE } = options;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) {
      return yield* Effect.fail(
        new FileError(`File does not exist: ${path}`, path, "read", undefined, `Path: ${path}`)
      );
    }
    return Stream.toReadableStream(fs.stream(path, { chunkSize }));
  }).pipe(
    Effect.mapError((error) =>
      error instanceof FileError ? error : FileError.fromSystemError("read", path, error)
    )
  );

  const stream = await runWithPlatform(program);

  if (autoDecompress && CompressionDetector.fromExtension(path) === "gzip") {
    return stream.pipeThrough(new DecompressionStream("gzip"));
  }
  return stream;
}

/**
 * Convert a byte stream into complete lines
 *
 * Handles `\n` and `\r\n` endings. A final line without a terminator is
 * still yielded.
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        yield stripCarriageReturn(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");
      }

      if (buffer.length > MAX_LINE_LENGTH) {
        throw new TnFusionError(
          `Line too long: more than ${MAX_LINE_LENGTH} characters without a line break`,
          "BUFFER_ERROR"
        );
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield stripCarriageReturn(buffer);
    }
  } finally {
    reader.releaseLock();
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Read a file line by line
 *
 * @throws {FileError} If the file cannot be opened or read
 *
 * @example
 * ```typescript
 * for await (const line of readFileLines("reference/transposon.features.txt")) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readFileLines(
  path: string,
  options: FileReaderOptions = {}
): AsyncIterable<string> {
  const stream = await createStream(path, options);
  try {
    yield* readLines(stream);
  } catch (error) {
    if (error instanceof TnFusionError) {
      throw error;
    }
    throw FileError.fromSystemError("read", path, error);
  }
}

/**
 * Count the lines of a (possibly gzipped) file
 *
 * A trailing line without a newline counts as a line; an empty file has
 * zero lines.
 */
export async function countLines(path: string, options: FileReaderOptions = {}): Promise<number> {
  const stream = await createStream(path, options);
  const reader = stream.getReader();
  let count = 0;
  let lastByte: number | undefined;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      for (const byte of value) {
        if (byte === NEWLINE) {
          count++;
        }
      }
      if (value.length > 0) {
        lastByte = value[value.length - 1];
      }
    }
  } catch (error) {
    throw FileError.fromSystemError("read", path, error);
  } finally {
    reader.releaseLock();
  }

  if (lastByte !== undefined && lastByte !== NEWLINE) {
    count++;
  }
  return count;
}
