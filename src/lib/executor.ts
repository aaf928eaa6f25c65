/**
 * Command execution with a hard wall-clock deadline.
 *
 * Commands run as argv arrays with shell:false. Output is captured for
 * diagnostics but never inspected to decide the result: classification is
 * based on the exit code, the deadline and the abort signal alone.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { constants } from 'node:os';
import type { AttemptResult, AttemptStatus, CommandSpec } from '../types/outcome.js';
import { hasErrnoCode } from './fs.js';

/** Delay between SIGTERM and SIGKILL when a command overruns its deadline */
export const KILL_GRACE_MS = 1000;

/** Captured output is truncated to this many characters (tail kept) */
export const MAX_OUTPUT_CHARS = 64 * 1024;

/** Exit code reported when the executable cannot be found */
export const EXIT_COMMAND_NOT_FOUND = 127;

/**
 * Anything able to run one command under a deadline.
 */
export interface CommandRunner {
  run(command: CommandSpec, timeoutMs: number, signal?: AbortSignal): Promise<AttemptResult>;
}

/**
 * Renders a command for logs: `git push 'origin' 'HEAD'`.
 */
export function formatCommand(command: CommandSpec): string {
  const quote = (arg: string): string => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`);
  return [command.cmd, ...command.args].map(quote).join(' ');
}

/**
 * Maps a terminating signal to the shell convention 128 + signo.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

function appendOutput(current: string, chunk: string): string {
  const combined = current + chunk;
  return combined.length > MAX_OUTPUT_CHARS ? combined.slice(combined.length - MAX_OUTPUT_CHARS) : combined;
}

/**
 * Runs commands as child processes.
 */
export class ProcessCommandRunner implements CommandRunner {
  constructor(private readonly killGraceMs: number = KILL_GRACE_MS) {}

  /**
   * Executes one command.
   *
   * @param timeoutMs - Deadline in milliseconds (0 means no deadline)
   *
   * On a deadline or abort the command gets SIGTERM, then SIGKILL after the
   * grace period; the result resolves only once the process has exited.
   *
   * @example
   * ```typescript
   * const runner = new ProcessCommandRunner();
   * const attempt = await runner.run({ cmd: 'git', args: ['fetch', 'origin'] }, 60000);
   * if (attempt.status.kind === 'timeout') { ... }
   * ```
   */
  run(command: CommandSpec, timeoutMs: number, signal?: AbortSignal): Promise<AttemptResult> {
    const startTime = Date.now();
    const commandLine = formatCommand(command);
    let output = '';

    return new Promise<AttemptResult>((resolve) => {
      let child: ChildProcess | null = null;
      let timeoutId: NodeJS.Timeout | null = null;
      let killTimer: NodeJS.Timeout | null = null;
      // Set once the deadline or the abort signal has fired; reported when the child closes.
      let forced: AttemptStatus | null = null;
      let settled = false;

      const finish = (status: AttemptStatus): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        if (killTimer) {
          clearTimeout(killTimer);
        }
        signal?.removeEventListener('abort', onAbort);
        const finishedAt = Date.now();
        resolve({
          command: commandLine,
          started_at: new Date(startTime).toISOString(),
          finished_at: new Date(finishedAt).toISOString(),
          duration_ms: finishedAt - startTime,
          status,
          output,
        });
      };

      const isRunning = (target: ChildProcess): boolean => target.exitCode === null && target.signalCode === null;

      // The promise settles from 'close' only, so a forced command is gone before the caller moves on.
      const terminate = (status: AttemptStatus): void => {
        if (forced || !child || !isRunning(child)) {
          return;
        }
        forced = status;
        const target = child;
        target.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (isRunning(target)) {
            target.kill('SIGKILL');
          }
        }, this.killGraceMs);
      };

      const onAbort = (): void => {
        terminate({ kind: 'interrupted' });
      };

      if (signal?.aborted) {
        finish({ kind: 'interrupted' });
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          output = appendOutput(output, `\n[Command timed out after ${timeoutMs}ms]`);
          terminate({ kind: 'timeout' });
        }, timeoutMs);
      }

      try {
        child = spawn(command.cmd, command.args, {
          cwd: command.cwd,
          shell: false,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        output = appendOutput(output, `[Failed to spawn process: ${error instanceof Error ? error.message : String(error)}]`);
        finish({ kind: 'failure', exit_code: 1 });
        return;
      }

      const spawned = child;

      spawned.stdout?.on('data', (data: Buffer) => {
        output = appendOutput(output, data.toString());
      });
      spawned.stderr?.on('data', (data: Buffer) => {
        output = appendOutput(output, data.toString());
      });

      spawned.on('error', (error: Error) => {
        output = appendOutput(output, `\n[Process error: ${error.message}]`);
        // A process that did start is still reported from 'close'.
        if (spawned.pid === undefined) {
          finish({ kind: 'failure', exit_code: hasErrnoCode(error, 'ENOENT') ? EXIT_COMMAND_NOT_FOUND : 1 });
        }
      });

      spawned.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
        if (forced) {
          finish(forced);
        } else if (code === 0) {
          finish({ kind: 'success' });
        } else if (code !== null) {
          finish({ kind: 'failure', exit_code: code });
        } else {
          finish({ kind: 'failure', exit_code: exitSignal ? signalExitCode(exitSignal) : 1 });
        }
      });
    });
  }
}
