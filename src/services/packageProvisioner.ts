import { type DeploymentMode, isProduction } from '../config/deploymentMode';
import { PackageInstallError } from '../core/errors';
import { created, alreadyPresent, guardStep, runChecked } from '../core/steps';
import type { HostRuntime } from '../infra/hostRuntime';
import type { PackageSet, StepResult } from '../types';
import { taggedLogger } from '../utils/logger';

const packagesLog = taggedLogger('PACKAGES');

const APT_ENV = { DEBIAN_FRONTEND: 'noninteractive' };

/**
 * Production: refresh the apt index, then install the whole set in one call.
 * apt-get already treats installed packages as a no-op.
 *
 * Development has no package manager access; the set names the interpreter
 * to verify instead.
 */
export function provisionPackages(mode: DeploymentMode, packages: PackageSet, host: HostRuntime): Promise<StepResult> {
  return guardStep('packages', PackageInstallError, async () => {
    if (packages.length === 0) {
      throw new PackageInstallError('No packages requested');
    }

    if (!isProduction(mode)) {
      const [python] = packages;
      const result = await host.runCommand(python, ['--version']);
      if (!result.ok) {
        throw new PackageInstallError(`${python} is not installed; install it before provisioning`, {
          commandExitCode: result.exitCode,
        });
      }
      // Older interpreters print the version on stderr
      const version = (result.stdout.trim() || result.stderr.trim()).replace(/^Python\s+/, '');
      packagesLog.success(`${python} version: ${version}`);
      return alreadyPresent(`${python} ${version}`);
    }

    const env = { ...host.env, ...APT_ENV };
    await runChecked(host, PackageInstallError, 'apt-get', ['update'], { env });
    await runChecked(host, PackageInstallError, 'apt-get', ['install', '-y', ...packages], { env });

    packagesLog.success(`${packages.length} system packages present`);
    return created(packages.join(', '));
  });
}
