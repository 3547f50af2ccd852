/**
 * External process runner
 *
 * Every tool a build drives (figure scripts, Mermaid, pdflatex, bibtex)
 * runs through here, so tests can replace one module instead of
 * child_process.
 */

import { spawn } from 'child_process';
import { withTimeout } from '../utils/resilience';
import { manuscriptLogger } from '../utils/logger';

const log = manuscriptLogger.child('Process');

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
  /** Name used in timeout errors; defaults to the command */
  operationName?: string;
}

/**
 * Run a command and capture output. A non-zero exit is a result, not an
 * error; a missing executable rejects, and so does the timeout.
 *
 * @throws TimeoutError when the command runs longer than `timeoutMs`
 */
export async function runCommand(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
  const { cwd, timeoutMs, operationName = command } = options;
  log.debug('Running command', { command, args, cwd });

  let kill: () => void = () => undefined;

  const run = (): Promise<CommandResult> =>
    new Promise((resolve, reject) => {
      // No shell: arguments are passed through untouched
      const proc = spawn(command, args, { cwd });
      kill = () => {
        proc.kill('SIGTERM');
      };

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err: Error) => {
        reject(err);
      });

      proc.on('close', (code: number | null) => {
        resolve({ stdout, stderr, exitCode: code ?? 1 });
      });
    });

  return withTimeout(run, {
    timeoutMs,
    operationName,
    onTimeout: () => kill(),
  });
}
