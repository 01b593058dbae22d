/**
 * Tool Runner
 *
 * The single capability the validation stages use to reach external tools:
 * run an argv with a timeout and capture stdout, stderr and the exit code.
 * Tests substitute their own implementation.
 */

import { spawn, ChildProcess } from 'child_process';
import * as path from 'path';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config';
import { ToolError } from '../../utils/errors';
import { log as logger } from '../../utils/logger';

export interface ToolRunOptions {
  timeout: number;
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface ToolResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  duration: number;
}

export interface ToolRunner {
  run(argv: readonly string[], options: ToolRunOptions): Promise<ToolResult>;
}

export interface ChildProcessToolRunnerConfig {
  /** SIGTERM→SIGKILL grace period (ms). */
  killGraceMs: number;
}

/**
 * Spawns the tool directly (no shell). A missing executable is
 * ToolError.ToolNotFound and an expired timeout is ToolError.Timeout; a
 * non-zero exit is returned to the caller, which decides what it means.
 */
export class ChildProcessToolRunner extends EventEmitter implements ToolRunner {
  private config: ChildProcessToolRunnerConfig;

  constructor(runnerConfig: Partial<ChildProcessToolRunnerConfig> = {}) {
    super();
    this.config = { killGraceMs: config.toolchain.killGraceMs, ...runnerConfig };
  }

  run(argv: readonly string[], options: ToolRunOptions): Promise<ToolResult> {
    const [command, ...args] = argv;
    if (!command) {
      return Promise.reject(ToolError.notFound('<empty command>'));
    }
    const tool = path.basename(command);
    const jobId = uuidv4();

    return new Promise((resolve, reject) => {
      const startTime = Date.now();
      let stdout = '';
      let stderr = '';
      let settled = false;

      logger.debug(`Running ${tool}`, { jobId, argv: [...argv], cwd: options.cwd });
      this.emit('tool:start', { jobId, tool, argv });

      const proc: ChildProcess = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      // --- Graceful kill helper: SIGTERM first, SIGKILL after grace period ---
      const gracefulKill = (error: ToolError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        options.signal?.removeEventListener('abort', onAbort);
        logger.warn(`Killing ${tool}: ${error.message}`, { jobId });
        proc.kill('SIGTERM');
        const escalation = setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) {
            proc.kill('SIGKILL');
          }
        }, this.config.killGraceMs);
        escalation.unref();
        reject(error);
      };

      const timeoutHandle = setTimeout(() => {
        gracefulKill(ToolError.timeout(tool, options.timeout));
      }, options.timeout);

      const onAbort = (): void => {
        gracefulKill(ToolError.cancelled(tool));
      };
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code: number | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        options.signal?.removeEventListener('abort', onAbort);

        const result: ToolResult = {
          stdout,
          stderr,
          exitCode: code ?? -1,
          duration: Date.now() - startTime,
        };
        this.emit('tool:complete', { jobId, tool, exitCode: result.exitCode, duration: result.duration });
        resolve(result);
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        options.signal?.removeEventListener('abort', onAbort);

        if (error.code === 'ENOENT') {
          reject(ToolError.notFound(command));
          return;
        }
        reject(new ToolError('NonZeroExit', tool, `${tool} failed to start: ${error.message}`, { operation: 'run' }));
      });
    });
  }
}

/**
 * Run a tool and turn a non-zero exit into ToolError.NonZeroExit.
 */
export async function runChecked(
  runner: ToolRunner,
  argv: readonly string[],
  options: ToolRunOptions
): Promise<ToolResult> {
  const result = await runner.run(argv, options);
  if (result.exitCode !== 0) {
    throw ToolError.nonZeroExit(path.basename(argv[0] ?? ''), result.exitCode, result.stderr);
  }
  return result;
}
