import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PackageInstallError } from '../core/errors';
import { runChecked } from '../core/steps';
import { createHostRuntime, describeExecFailure, formatCommand, outputTail } from '../infra/hostRuntime';

const NODE = process.execPath;

describe('createHostRuntime', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'host-runtime-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('reports whether a directory had to be created', () => {
    const host = createHostRuntime();
    const nested = join(root, 'opt', 'bot', 'data');

    expect(host.makeDirectory(nested)).toBe(true);
    expect(host.makeDirectory(nested)).toBe(false);
    expect(host.pathExists(nested)).toBe(true);
  });

  it('applies the mode to an overwritten file', () => {
    const host = createHostRuntime();
    const script = join(root, 'start-bot.sh');
    writeFileSync(script, 'old', { mode: 0o644 });

    host.writeFile(script, '#!/bin/bash\n', 0o755);

    expect(readFileSync(script, 'utf8')).toBe('#!/bin/bash\n');
    expect(statSync(script).mode & 0o777).toBe(0o755);
  });
});

describe('createHostRuntime().runCommand', () => {
  it('returns stdout of a command that succeeds', async () => {
    const result = await createHostRuntime().runCommand(NODE, ['-e', 'console.log("ready")']);

    expect(result).toEqual({ ok: true, stdout: 'ready\n', stderr: '', exitCode: 0 });
  });

  it('keeps the exit status and stderr of a failing command', async () => {
    const result = await createHostRuntime().runCommand(NODE, ['-e', 'console.error("boom"); process.exit(3)']);

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('boom\n');
  });

  it('reports a missing binary without an exit status', async () => {
    const host = createHostRuntime();

    const result = await host.runCommand('provision-missing-binary', []);
    expect(result.ok).toBe(false);
    expect(result.exitCode).toBeNull();

    const failure = await runChecked(host, PackageInstallError, 'provision-missing-binary', []).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(PackageInstallError);
    expect(failure).toMatchObject({
      exitCode: 1,
      step: 'packages',
      message: '`provision-missing-binary` failed: spawn provision-missing-binary ENOENT',
    });
  });

  it('names the timeout when a command runs past its limit', async () => {
    const host = createHostRuntime(200);

    const result = await host.runCommand(NODE, ['-e', 'setTimeout(() => {}, 5000)']);

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.error).toBe('timed out after 200 ms (killed by SIGTERM)');
  });

  it('lets a per-command timeout override the runtime default', async () => {
    const host = createHostRuntime();

    const failure = await runChecked(host, PackageInstallError, NODE, ['-e', 'setTimeout(() => {}, 5000)'], {
      timeoutMs: 200,
    }).catch((err: unknown) => err);

    expect(failure).toMatchObject({
      exitCode: 1,
      message: `\`${NODE} -e setTimeout(() => {}, 5000)\` failed: timed out after 200 ms (killed by SIGTERM)`,
    });
  });
});

describe('describeExecFailure', () => {
  it('names the signal of a process killed from outside', () => {
    const error = Object.assign(new Error('Command failed: apt-get update'), { killed: false, signal: 'SIGKILL', code: null });

    expect(describeExecFailure(error, 1000)).toBe('killed by SIGKILL');
  });

  it('keeps the message of an output overflow', () => {
    const error = Object.assign(new Error('stdout maxBuffer length exceeded'), {
      killed: true,
      signal: 'SIGTERM',
      code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
    });

    expect(describeExecFailure(error, 1000)).toBe('stdout maxBuffer length exceeded');
  });

  it('keeps the message of an ordinary non-zero exit', () => {
    const error = Object.assign(new Error('Command failed: pip install -r requirements.txt'), {
      killed: false,
      signal: null,
      code: 1,
    });

    expect(describeExecFailure(error, 1000)).toBe('Command failed: pip install -r requirements.txt');
  });
});

describe('outputTail', () => {
  it('joins stdout and stderr and keeps only the end of long output', () => {
    expect(outputTail({ stdout: 'fetching\n', stderr: 'E: broken\n' })).toBe('fetching\n\nE: broken');
    expect(outputTail({ stdout: 'x'.repeat(5000) })).toHaveLength(4000);
  });
});

describe('formatCommand', () => {
  it('renders the command line the way it is logged', () => {
    expect(formatCommand('apt-get', ['install', '-y', 'tmux'])).toBe('apt-get install -y tmux');
  });
});
