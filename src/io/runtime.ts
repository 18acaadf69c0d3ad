/**
 * Effect platform layer selection
 *
 * All file and process work goes through `@effect/platform` services. This
 * module provides the Node.js layer and the single place where Effect
 * programs are turned back into promises.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Services available to programs run through {@link runWithPlatform}
 */
export type PlatformServices = NodeContext.NodeContext;

/**
 * Get the Effect platform layer
 *
 * Provides FileSystem, Path and CommandExecutor for Node.js.
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program with the platform layer and return its result
 *
 * A typed failure is rethrown as-is, so callers see the package's own error
 * classes rather than Effect wrappers.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, PlatformServices>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
