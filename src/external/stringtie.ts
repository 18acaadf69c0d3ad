/**
 * StringTie transcript assembly
 */

import { dirname } from "node:path";
import { ensureDirectory } from "../io/file-writer";
import type { ArgMap } from "../types";
import { type CommandRunner, flattenArgs } from "./shell";

/**
 * Assemble transcripts from an alignment, guided by a reference annotation
 *
 * Runs `stringtie <bam> -G <gtf> -o <output> <extra…>`.
 */
export async function stringtieAssemble(
  runner: CommandRunner,
  options: { bamPath: string; gtfPath: string; outputPath: string; extraArgs?: ArgMap }
): Promise<void> {
  await ensureDirectory(dirname(options.outputPath));
  await runner.run([
    "stringtie",
    options.bamPath,
    "-G",
    options.gtfPath,
    "-o",
    options.outputPath,
    ...flattenArgs(options.extraArgs ?? {}),
  ]);
}
