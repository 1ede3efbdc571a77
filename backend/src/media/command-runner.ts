import { spawn } from 'node:child_process';
import path from 'node:path';
import { Logger } from '@nestjs/common';
import { ToolUnavailableError } from '../common/errors';

export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');

export interface CommandResult {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

const STDERR_TAIL_BYTES = 16 * 1024;

/** Install locations of static ffmpeg builds that are often missing from PATH. */
export const EXTRA_TOOL_DIRS = ['/usr/local/bin', '/opt/ffmpeg/bin'];

export function toolSearchPath(current: string | undefined): string {
  const entries = (current ?? '').split(path.delimiter).filter(Boolean);
  const missing = EXTRA_TOOL_DIRS.filter((dir) => !entries.includes(dir));
  return [...entries, ...missing].join(path.delimiter);
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EACCES');
}

/** Runs external tools with `spawn`, buffering stdout and keeping the tail of stderr. */
export class SpawnCommandRunner implements CommandRunner {
  private readonly logger = new Logger(SpawnCommandRunner.name);

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.logger.debug(`Executing: ${[command, ...args].join(' ')}`);

    return new Promise<CommandResult>((resolve, reject) => {
      const processHandle = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, PATH: toolSearchPath(process.env.PATH) },
      });
      const stdout: Buffer[] = [];
      let stderr = '';

      processHandle.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      processHandle.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
      });

      processHandle.on('error', (error) => {
        if (isMissingBinary(error)) {
          reject(new ToolUnavailableError(`Command not found: ${command}`, { cause: error }));
        } else {
          reject(error);
        }
      });
      processHandle.on('close', (code) => {
        resolve({ code, stdout: Buffer.concat(stdout), stderr });
      });
    });
  }
}
