/**
 * Command Execution Wrapper
 * 
 * Runs external tools (ffmpeg, ffprobe) without a shell and captures
 * their output. Arguments are passed through verbatim.
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, no limit when omitted
  maxOutputSize?: number; // bytes
}

/**
 * Anything that can run a command the way executeCommand does.
 * Lets probes and transcoders run against a stand-in toolchain.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 * 
 * Resolves with the exit code even when the command fails; rejects only
 * when the process cannot be spawned at all (e.g. ENOENT).
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    let timeoutId: NodeJS.Timeout | null = null;
    if (timeout !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        // Force kill after 10 seconds
        setTimeout(() => child.kill('SIGKILL'), 10000).unref();
      }, timeout);
    }

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, signal) => {
      if (timeoutId) clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      if (timeoutId) clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * Render a command line for logs, quoting arguments that contain spaces
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (part.includes(' ') ? `"${part}"` : part))
    .join(' ');
}
