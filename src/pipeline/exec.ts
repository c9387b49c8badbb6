import { spawn } from 'node:child_process';
import { ProcessingError } from '../errors';
import type { ExecResult } from '../types';

export interface ExecOptions {
  /** 0 disables the timeout */
  timeout?: number;
}

export interface RunningProcess {
  exited: Promise<ExecResult>;
  kill(): void;
}

/**
 * Spawn a command and collect its output. The returned promise rejects only
 * when the process cannot be started at all.
 */
export function start(cmd: string[]): RunningProcess {
  const [command, ...args] = cmd;
  const proc = spawn(command, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const exited = new Promise<ExecResult>((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    proc.on('error', (err) => {
      reject(new ProcessingError(`Failed to start ${command}: ${err.message}`, { command }, err));
    });
    proc.on('close', (code, signal) => {
      resolve({ stdout, stderr, exitCode: code ?? (signal ? 128 : 1) });
    });
  });

  return {
    exited,
    kill: () => {
      proc.kill();
    },
  };
}

export async function exec(
  cmd: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const { timeout = 300000 } = options;
  const proc = start(cmd);

  if (timeout <= 0) {
    return proc.exited;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      proc.kill();
      reject(new ProcessingError(`Command timed out after ${timeout}ms`, { command: cmd[0] }));
    }, timeout);
  });

  try {
    return await Promise.race([proc.exited, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

export async function execOrThrow(
  cmd: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const result = await exec(cmd, options);
  if (result.exitCode !== 0) {
    throw new ProcessingError(
      `${cmd[0]} failed with exit code ${result.exitCode}: ${result.stderr.trim()}`,
      { command: cmd[0], exitCode: result.exitCode }
    );
  }
  return result;
}
