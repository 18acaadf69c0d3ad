/**
 * External command execution
 *
 * Every external tool (bowtie, tophat2, STAR, stringtie) is invoked through a
 * {@link CommandRunner}. The default runner executes processes with the
 * `@effect/platform` Command service; tests substitute a recording runner.
 */

import { delimiter } from "node:path";
import { Command, CommandExecutor, FileSystem, Path } from "@effect/platform";
import { Effect, Option, Stream } from "effect";
import { CommandError, DependencyError, ValidationError } from "../errors";
import { runWithPlatform } from "../io/runtime";
import { createLogger, type Logger } from "../logging";
import type { ArgMap } from "../types";

/** Characters of stderr kept for error messages */
const STDERR_TAIL_LENGTH = 4_000;

/** Any execute bit (owner, group or other) */
const EXECUTABLE_BITS = 0o111;

export interface RunOptions {
  /** Write the command's stdout to this file instead of discarding it */
  stdoutPath?: string;
  /** Write the command's stderr to this file instead of keeping its tail */
  stderrPath?: string;
  /** Working directory for the command */
  cwd?: string;
}

/**
 * Runs external programs
 *
 * `args[0]` is the program, the rest its arguments. Resolves when the
 * program exits with status 0.
 */
export interface CommandRunner {
  run(args: readonly string[], options?: RunOptions): Promise<void>;
}

/**
 * Spawn, wait and check the exit status of one command
 */
function runProcess(
  args: readonly [string, ...string[]],
  options: RunOptions
): Effect.Effect<void, CommandError, FileSystem.FileSystem | CommandExecutor.CommandExecutor> {
  const [program, ...rest] = args;

  return Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;

      let command = Command.make(program, ...rest);
      if (options.cwd !== undefined) {
        command = Command.workingDirectory(command, options.cwd);
      }

      const child = yield* Command.start(command);

      const stdout =
        options.stdoutPath !== undefined
          ? Stream.run(child.stdout, fs.sink(options.stdoutPath))
          : Stream.runDrain(child.stdout);

      const stderr =
        options.stderrPath !== undefined
          ? Stream.run(child.stderr, fs.sink(options.stderrPath)).pipe(Effect.as(""))
          : Stream.runFold(Stream.decodeText(child.stderr), "", (tail, chunk) =>
              (tail + chunk).slice(-STDERR_TAIL_LENGTH)
            );

      const [exitCode, , stderrTail] = yield* Effect.all([child.exitCode, stdout, stderr], {
        concurrency: "unbounded",
      });

      if (exitCode !== 0) {
        return yield* Effect.fail(CommandError.forExitCode(args, exitCode, stderrTail));
      }
    })
  ).pipe(
    Effect.mapError((error) =>
      error instanceof CommandError ? error : CommandError.fromSystemError(args, error)
    )
  );
}

/**
 * Default {@link CommandRunner} backed by child processes
 *
 * @example
 * ```typescript
 * const runner = new ProcessRunner();
 * await runner.run(["bowtie-build", "reference.fa", "reference"], {
 *   stdoutPath: "bowtie.log",
 * });
 * ```
 */
export class ProcessRunner implements CommandRunner {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger("shell");
  }

  async run(args: readonly string[], options: RunOptions = {}): Promise<void> {
    const [program, ...rest] = args;
    if (program === undefined || program === "") {
      throw new ValidationError("Cannot run an empty command");
    }

    this.logger.debug({ args }, `Running ${program}`);
    await runWithPlatform(runProcess([program, ...rest], options));
  }
}

/**
 * Flatten an {@link ArgMap} into command line arguments
 *
 * Values are converted to strings; flags without values are emitted bare.
 *
 * @example
 * ```typescript
 * flattenArgs({ "--bowtie1": [], "--num-threads": [4] });
 * // ["--bowtie1", "--num-threads", "4"]
 * ```
 */
export function flattenArgs(args: ArgMap): string[] {
  const flattened: string[] = [];
  for (const [flag, values] of Object.entries(args)) {
    flattened.push(flag, ...values.map(String));
  }
  return flattened;
}

/**
 * Overlay caller supplied flags onto a tool's fixed flags
 *
 * An extra flag replaces the fixed flag of the same name in place; new flags
 * are appended.
 */
export function mergeArgs(fixed: ArgMap, extra: ArgMap = {}): ArgMap {
  return { ...fixed, ...extra };
}

const TOKEN_PATTERN = /"([^"]*)"|'([^']*)'|(\S+)/g;
const FLAG_PATTERN = /^--?[A-Za-z]/;

/**
 * Parse a raw argument string into an {@link ArgMap}
 *
 * Quoted tokens are kept together. Negative numbers are values, not flags.
 *
 * @example
 * ```typescript
 * parseExtraArgs("--limitBAMsortRAM 2000 --outSAMstrandField intronMotif");
 * // { "--limitBAMsortRAM": ["2000"], "--outSAMstrandField": ["intronMotif"] }
 * ```
 *
 * @throws {ValidationError} If a value appears before any flag
 */
export function parseExtraArgs(text: string): Record<string, string[]> {
  const parsed: Record<string, string[]> = {};
  let current: string[] | undefined;

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const token = match[1] ?? match[2] ?? match[3] ?? "";
    const quoted = match[3] === undefined;

    if (!quoted && FLAG_PATTERN.test(token)) {
      current = [];
      parsed[token] = current;
    } else if (current === undefined) {
      throw new ValidationError(
        `Argument value '${token}' is not preceded by a flag`,
        undefined,
        `Arguments: ${text}`
      );
    } else {
      current.push(token);
    }
  }

  return parsed;
}

/**
 * Locate an executable on `$PATH`
 *
 * Names containing a path separator are checked directly.
 *
 * @returns The full path of the executable, or undefined when not found
 */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | undefined> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const candidates = name.includes(path.sep)
      ? [name]
      : (env["PATH"] ?? "")
          .split(delimiter)
          .filter((directory) => directory !== "")
          .map((directory) => path.join(directory, name));

    for (const candidate of candidates) {
      const info = yield* fs.stat(candidate).pipe(Effect.option);
      if (
        Option.isSome(info) &&
        info.value.type === "File" &&
        (info.value.mode & EXECUTABLE_BITS) !== 0
      ) {
        return candidate;
      }
    }
    return undefined;
  });

  return runWithPlatform(program);
}

export type ExecutableLookup = (name: string) => Promise<string | undefined>;

/**
 * Collaborators of indexers and aligners, replaceable in tests
 */
export interface ToolDependencies {
  /** Runs external programs (default: child processes) */
  runner?: CommandRunner;
  logger?: Logger;
  /** Resolves program names on `$PATH` */
  lookup?: ExecutableLookup;
}

/**
 * Check that every program is available
 *
 * @throws {DependencyError} Naming all missing programs
 */
export async function checkDependencies(
  programs: readonly string[],
  lookup: ExecutableLookup = findExecutable
): Promise<void> {
  const missing: string[] = [];
  for (const program of programs) {
    if ((await lookup(program)) === undefined) {
      missing.push(program);
    }
  }

  if (missing.length > 0) {
    throw new DependencyError(missing);
  }
}
