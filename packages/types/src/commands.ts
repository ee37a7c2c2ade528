/**
 * Command boundary types.
 *
 * Every probe and applier reaches the operating system through a CommandRunner,
 * so tests can swap in a scripted runner and production code spawns real tools.
 */

/**
 * Captured result of one external command.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface InvokeOptions {
  /** Extra environment variables merged over the current process environment */
  env?: Record<string, string>;
  /** Working directory for the command */
  cwd?: string;
}

/**
 * Uniform interface to external command-line tools.
 *
 * invoke() resolves with the exit code even when it is non-zero.
 * It rejects only when the process could not be started at all.
 */
export interface CommandRunner {
  invoke(argv: readonly string[], options?: InvokeOptions): Promise<CommandResult>;
}
