/**
 * Command boundary - the one place that spawns external tools.
 *
 * SpawnCommandRunner captures stdout/stderr and resolves with the exit code.
 * runChecked() turns a non-zero exit into a CommandError so plugins can
 * let tool failures propagate as probe/apply failures.
 */

import { spawn } from 'child_process';
import type { CommandResult, CommandRunner, InvokeOptions, Logger } from '@provision/types';
import { CommandError } from '../errors/ProvisionError.js';

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly logger?: Logger) {}

  invoke(argv: readonly string[], options: InvokeOptions = {}): Promise<CommandResult> {
    const [command, ...args] = argv;
    if (command === undefined) {
      return Promise.reject(new CommandError(argv, null, '', 'empty command line'));
    }

    this.logger?.trace('exec', { argv: [...argv] });

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        reject(new CommandError(argv, null, stderr, err.message));
      });

      proc.on('close', (code, signal) => {
        // Killed by a signal: report it the way shells do
        const exitCode = code ?? (signal ? 128 : 1);
        resolve({ stdout, stderr, exitCode });
      });
    });
  }
}

/**
 * Run a command and require exit code 0.
 * @throws CommandError on non-zero exit or spawn failure
 */
export async function runChecked(
  runner: CommandRunner,
  argv: readonly string[],
  options?: InvokeOptions
): Promise<CommandResult> {
  const result = await runner.invoke(argv, options);
  if (result.exitCode !== 0) {
    throw new CommandError(argv, result.exitCode, result.stderr);
  }
  return result;
}
