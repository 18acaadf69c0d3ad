/**
 * File writing operations using Effect Platform
 *
 * Line-oriented writers for building references and reporting insertions.
 * All Effect plumbing stays inside this module; callers get promises and
 * {@link FileError}s.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, Stream } from "effect";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

type LineSource = Iterable<string> | AsyncIterable<string>;

function isAsyncIterable(source: LineSource): source is AsyncIterable<string> {
  return Symbol.asyncIterator in source;
}

function toStream(source: LineSource): Stream.Stream<string, unknown> {
  return isAsyncIterable(source)
    ? Stream.fromAsyncIterable(source, (error) => error)
    : Stream.fromIterable(source);
}

/**
 * Write lines to a file, each terminated by a newline
 *
 * The file is created or truncated. Lines are streamed, so the source may be
 * an arbitrarily large async iterable.
 *
 * @example
 * ```typescript
 * await writeLines("out/reference.gtf", filterGtfLines(readFileLines(gtfPath)));
 * ```
 */
export async function writeLines(path: string, lines: LineSource): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* toStream(lines).pipe(
      Stream.map((line) => `${line}\n`),
      Stream.encodeText,
      Stream.run(fs.sink(path))
    );
  }).pipe(
    Effect.mapError((error) =>
      error instanceof FileError ? error : FileError.fromSystemError("write", path, error)
    )
  );

  await runWithPlatform(program);
}

/**
 * Copy a file
 */
export async function copyFile(from: string, to: string): Promise<void> {
  await runWithPlatform(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      yield* fs.copyFile(from, to);
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", to, error)))
  );
}

/**
 * Create a directory and any missing parents
 */
export async function ensureDirectory(path: string): Promise<void> {
  await runWithPlatform(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      yield* fs.makeDirectory(path, { recursive: true });
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)))
  );
}

/**
 * Point `linkPath` at `target`, replacing an existing link
 *
 * `target` is stored as given, so relative targets resolve against the
 * link's directory.
 */
export async function replaceSymlink(target: string, linkPath: string): Promise<void> {
  await runWithPlatform(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const existing = yield* fs.readLink(linkPath).pipe(Effect.option);
      if (Option.isSome(existing)) {
        yield* fs.remove(linkPath);
      }
      yield* fs.symlink(target, linkPath);
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("link", linkPath, error)))
  );
}
