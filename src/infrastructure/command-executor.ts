/**
 * Command Executor - runs external CLIs (podman, git) without a shell
 */

import { spawn } from 'node:child_process';
import type { Logger } from 'pino';

export type OutputStream = 'stdout' | 'stderr';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before SIGTERM; 0 disables the timeout */
  timeout?: number;
  maxBuffer?: number;
  /** Receives output chunks as they arrive, e.g. to mirror a build log */
  onOutput?: (chunk: string, stream: OutputStream) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Anything able to run a command; tests substitute a scripted fake
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
}

export class CommandExecutor implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 30000,
      maxBuffer = 10 * 1024 * 1024,
      onOutput,
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const child = spawn(command, args, { cwd, env, shell: false });

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, timeout);
      }

      child.stdout.on('data', (data: Buffer) => {
        const chunk = data.toString();
        onOutput?.(chunk, 'stdout');
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        }
      });

      child.stderr.on('data', (data: Buffer) => {
        const chunk = data.toString();
        onOutput?.(chunk, 'stderr');
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode, timedOut });
      });

      child.on('error', (error: Error) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(error);
      });
    });
  }
}
