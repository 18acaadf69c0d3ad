/**
 * Error handling for reference building and insertion detection
 *
 * Every failure surfaced by this package is a {@link TnFusionError}. The
 * subclasses separate bad input (validation, parsing, files) from problems
 * with the external toolchain (missing binaries, failing commands).
 */

/**
 * Base error class for all tnfusion errors
 */
export class TnFusionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "TnFusionError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options, arguments or registry lookups
 */
export class ValidationError extends TnFusionError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends TnFusionError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * File I/O errors
 */
export class FileError extends TnFusionError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "mkdir" | "link" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Required external programs are not available on `$PATH`
 *
 * This is a configuration problem: nothing was run yet.
 *
 * @example
 * ```typescript
 * try {
 *   await aligner.checkDependencies();
 * } catch (error) {
 *   if (error instanceof DependencyError) {
 *     console.error(`Install: ${error.missing.join(", ")}`);
 *   }
 * }
 * ```
 */
export class DependencyError extends TnFusionError {
  constructor(public readonly missing: readonly string[]) {
    super(
      `Missing external dependencies: ${missing.join(", ")}`,
      "DEPENDENCY_ERROR",
      undefined,
      "Install the listed programs and make sure they are on $PATH"
    );
    this.name = "DependencyError";
  }
}

/**
 * An external program could not be started or exited unsuccessfully
 */
export class CommandError extends TnFusionError {
  constructor(
    message: string,
    public readonly args: readonly string[],
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message, "COMMAND_ERROR", undefined, `Command: ${args.join(" ")}`);
    this.name = "CommandError";
  }

  get program(): string {
    return this.args[0] ?? "";
  }

  static forExitCode(args: readonly string[], exitCode: number, stderr: string): CommandError {
    return new CommandError(
      `${args[0] ?? "command"} exited with code ${exitCode}`,
      args,
      exitCode,
      stderr
    );
  }

  static fromSystemError(args: readonly string[], systemError: unknown): CommandError {
    return new CommandError(
      `Failed to run ${args[0] ?? "command"}: ${describeError(systemError)}`,
      args
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.exitCode !== undefined) {
      msg += `\nExit code: ${this.exitCode}`;
    }
    if (this.stderr !== undefined && this.stderr.trim() !== "") {
      msg += `\nStderr (tail):\n${this.stderr.trimEnd()}`;
    }
    return msg;
  }
}

/**
 * Render an unknown thrown value as text
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
