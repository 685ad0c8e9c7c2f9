import { type DeploymentMode, isProduction } from '../config/deploymentMode';
import { PrivilegeError } from '../core/errors';
import { alreadyPresent, guardStep } from '../core/steps';
import type { HostRuntime } from '../infra/hostRuntime';
import type { StepResult } from '../types';

/**
 * Production needs root to touch /opt, /etc and the account database.
 * Development runs the service as the invoking account, which therefore
 * must not be root either.
 */
export function checkPrivileges(mode: DeploymentMode, host: HostRuntime): Promise<StepResult> {
  return guardStep('privileges', PrivilegeError, () => {
    const uid = host.getUid();

    if (isProduction(mode)) {
      if (uid !== 0) {
        throw new PrivilegeError(`Production provisioning must run as root (current uid: ${uid ?? 'unknown'})`);
      }
      return alreadyPresent('running as root');
    }

    if (uid === 0) {
      throw new PrivilegeError('Development provisioning must not run as root: the service would run as root too');
    }
    return alreadyPresent(`running as ${host.currentUser()}`);
  });
}
