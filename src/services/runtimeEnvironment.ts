import { posix } from 'node:path';
import { DependencyInstallError, EnvironmentCreateError } from '../core/errors';
import { alreadyPresent, created, guardStep, runChecked } from '../core/steps';
import type { HostRuntime } from '../infra/hostRuntime';
import type { RuntimeEnvironment, StepResult } from '../types';
import { taggedLogger } from '../utils/logger';

const venvLog = taggedLogger('VENV');

export const venvBin = (env: RuntimeEnvironment, tool: string) => posix.join(env.root, 'bin', tool);

/**
 * An existing directory counts as a usable environment; it is never
 * inspected or rebuilt. Dependency installation runs on every pass since
 * pip itself is idempotent.
 */
export function provisionRuntimeEnvironment(env: RuntimeEnvironment, host: HostRuntime): Promise<StepResult> {
  return guardStep('runtime', DependencyInstallError, async () => {
    const existed = host.pathExists(env.root);

    if (existed) {
      venvLog.warn(`${env.root} already exists, skipping creation`);
    } else {
      await runChecked(host, EnvironmentCreateError, env.python, ['-m', 'venv', env.root]);
      venvLog.success(`Created ${env.root}`);
    }

    if (!host.pathExists(env.manifest)) {
      throw new DependencyInstallError(`Dependency manifest ${env.manifest} not found`);
    }

    const pip = venvBin(env, 'pip');
    await runChecked(host, DependencyInstallError, pip, ['install', '--upgrade', 'pip']);
    await runChecked(host, DependencyInstallError, pip, ['install', '-r', env.manifest]);
    venvLog.success(`Dependencies from ${env.manifest} installed`);

    return existed ? alreadyPresent(env.root) : created(env.root);
  });
}
