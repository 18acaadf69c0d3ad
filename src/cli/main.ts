/**
 * CLI entry point
 */

import { CommanderError } from "commander";
import { describeError, TnFusionError } from "../errors";
import { createLogger } from "../logging";
import { createAlignerRegistry, createIndexerRegistry } from "../registry";
import { type CliContext, createProgram } from "./program";

/**
 * Run the command line program
 *
 * @param argv Full process arguments (`node`, script, then user arguments)
 * @returns Process exit code
 */
export async function main(argv: readonly string[], context: Partial<CliContext> = {}): Promise<number> {
  const logger = context.logger ?? createLogger("cli");
  const program = createProgram({
    indexers: context.indexers ?? createIndexerRegistry(),
    aligners: context.aligners ?? createAlignerRegistry(),
    logger,
    ...(context.dependencies !== undefined && { dependencies: context.dependencies }),
  });

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or usage errors
      return error.exitCode;
    }
    if (error instanceof TnFusionError) {
      logger.error({ err: error, code: error.code }, error.toString());
    } else {
      logger.error({ err: error }, describeError(error));
    }
    return 1;
  }
}
