import { ArtifactDeployError } from '../core/errors';
import { created, guardStep, runChecked } from '../core/steps';
import type { HostRuntime } from '../infra/hostRuntime';
import type { HostPaths, ServiceIdentity, StepResult } from '../types';
import { taggedLogger } from '../utils/logger';

const deployLog = taggedLogger('DEPLOY');

// sourceDir is trusted to be the service's source tree
export function deployArtifacts(
  sourceDir: string,
  paths: HostPaths,
  identity: ServiceIdentity,
  host: HostRuntime
): Promise<StepResult> {
  return guardStep('artifacts', ArtifactDeployError, async () => {
    await runChecked(host, ArtifactDeployError, 'cp', ['-r', `${sourceDir}/.`, `${paths.projectRoot}/`]);
    await runChecked(host, ArtifactDeployError, 'chown', ['-R', `${identity.user}:${identity.group}`, paths.projectRoot]);

    deployLog.success(`${sourceDir} copied to ${paths.projectRoot}`);
    return created(paths.projectRoot);
  });
}
