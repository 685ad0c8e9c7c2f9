/**
 * infra/hostRuntime.ts
 *
 * Responsibilities:
 * 1. Hold every side effect a provisioning step may have on the host.
 * 2. Run external commands and report their exit status with an output tail.
 *
 * Steps only ever talk to the HostRuntime they are handed, so tests swap in
 * an in-process fake.
 */

import { execFile as execFileCallback } from 'node:child_process';
import { chmodSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { userInfo } from 'node:os';
import { promisify } from 'node:util';
import { DEFAULTS } from '../config/defaults';
import { taggedLogger } from '../utils/logger';

const execLog = taggedLogger('EXEC');

const execFileAsync = promisify(execFileCallback);

const MAX_OUTPUT_CHARS = 4000;

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  error?: string;
  exitCode: number | null;
}

export interface HostRuntime {
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
  getUid(): number | null;
  currentUser(): string;
  pathExists(path: string): boolean;
  // Returns true when at least one directory had to be created
  makeDirectory(path: string): boolean;
  writeFile(path: string, content: string, mode: number): void;
  runCommand(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

export function outputTail(result: { stdout?: string; stderr?: string }): string {
  const combined = [result.stdout || '', result.stderr || ''].filter(Boolean).join('\n').trim();
  if (combined.length <= MAX_OUTPUT_CHARS) {
    return combined;
  }
  return combined.slice(-MAX_OUTPUT_CHARS);
}

// Fields node:child_process sets on the error of a failed execFile
export interface ExecFailure extends Error {
  stdout?: unknown;
  stderr?: unknown;
  code?: unknown;
  killed?: unknown;
  signal?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function describeExecFailure(error: ExecFailure, timeoutMs: number): string {
  const signal = typeof error.signal === 'string' ? error.signal : null;
  // A string code (ENOENT, ERR_CHILD_PROCESS_STDIO_MAXBUFFER) is not a timeout kill
  if (error.killed === true && typeof error.code !== 'string') {
    return `timed out after ${timeoutMs} ms (killed by ${signal ?? 'SIGTERM'})`;
  }
  if (signal) {
    return `killed by ${signal}`;
  }
  return error.message;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

export function createHostRuntime(timeoutMs: number = DEFAULTS.COMMAND_TIMEOUT_MS): HostRuntime {
  return {
    cwd: process.cwd(),
    env: process.env,
    getUid: () => (typeof process.getuid === 'function' ? process.getuid() : null),
    currentUser: () => userInfo().username,
    pathExists: (path) => existsSync(path),
    makeDirectory: (path) => mkdirSync(path, { recursive: true }) !== undefined,
    writeFile: (path, content, mode) => {
      writeFileSync(path, content, { mode });
      // mode only applies on creation; an overwritten file keeps its old bits otherwise
      chmodSync(path, mode);
    },
    runCommand: async (command, args, options = {}) => {
      const limit = options.timeoutMs || timeoutMs;
      execLog.info(formatCommand(command, args));
      try {
        const { stdout, stderr } = await execFileAsync(command, [...args], {
          cwd: options.cwd,
          env: options.env || process.env,
          timeout: limit,
          maxBuffer: 32 * 1024 * 1024,
        });
        return { ok: true, stdout: stdout || '', stderr: stderr || '', exitCode: 0 };
      } catch (error) {
        if (!isExecFailure(error)) {
          return { ok: false, stdout: '', stderr: '', error: String(error), exitCode: null };
        }
        return {
          ok: false,
          stdout: text(error.stdout),
          stderr: text(error.stderr),
          error: describeExecFailure(error, limit),
          exitCode: typeof error.code === 'number' ? error.code : null,
        };
      }
    },
  };
}
