/**
 * Bowtie index building
 */

import type { CommandRunner } from "./shell";

/**
 * Build a bowtie (v1) index for a reference genome
 *
 * Runs `bowtie-build <fasta> <outputBase>`.
 *
 * @param fastaPath Reference genome FASTA
 * @param outputBase Base path of the index files
 * @param options.logPath File receiving bowtie-build's stdout
 */
export async function bowtieBuild(
  runner: CommandRunner,
  fastaPath: string,
  outputBase: string,
  options: { logPath?: string } = {}
): Promise<void> {
  await runner.run(["bowtie-build", fastaPath, outputBase], { stdoutPath: options.logPath });
}
