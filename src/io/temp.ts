/**
 * Scoped scratch directories
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

/**
 * Run `fn` with a fresh temporary directory
 *
 * The directory lives in an Effect scope: it is removed with its contents
 * once `fn` settles, on success and on failure alike. Whatever `fn` rejects
 * with is rethrown unchanged.
 *
 * @example
 * ```typescript
 * await withTempDirectory(async (tmpDir) => {
 *   await runner.run(["tophat2", "--output-dir", tmpDir, indexPath]);
 * });
 * ```
 */
export async function withTempDirectory<A>(
  fn: (directory: string) => Promise<A>,
  options: { prefix?: string } = {}
): Promise<A> {
  const prefix = options.prefix ?? "tnfusion-";

  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const directory = yield* fs
        .makeTempDirectoryScoped({ prefix })
        .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", prefix, error)));
      return yield* Effect.tryPromise({
        try: () => fn(directory),
        catch: (error: unknown) => error,
      });
    })
  );

  return runWithPlatform(program);
}
