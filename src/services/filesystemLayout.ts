import { posix } from 'node:path';
import { FilesystemProvisionError } from '../core/errors';
import { alreadyPresent, created, guardStep, runChecked } from '../core/steps';
import type { HostRuntime } from '../infra/hostRuntime';
import type { HostPaths, ServiceIdentity, StepResult } from '../types';
import { taggedLogger } from '../utils/logger';

const layoutLog = taggedLogger('LAYOUT');

export function layoutDirectories(paths: HostPaths): string[] {
  const roots = [paths.projectRoot, paths.logRoot];
  if (paths.configRoot) roots.push(paths.configRoot);

  const all = [...roots, ...paths.subdirectories.map(dir => posix.join(paths.projectRoot, dir))];
  return Array.from(new Set(all));
}

/**
 * Creates the tree with mkdir -p semantics, then hands the project and log
 * roots to the service account. The chown is skipped for a non-dedicated
 * identity: the invoking account already owns what it just created.
 */
export function provisionLayout(paths: HostPaths, identity: ServiceIdentity, host: HostRuntime): Promise<StepResult> {
  return guardStep('filesystem', FilesystemProvisionError, async () => {
    const missing: string[] = [];

    for (const dir of layoutDirectories(paths)) {
      try {
        if (host.makeDirectory(dir)) missing.push(dir);
      } catch (err) {
        throw new FilesystemProvisionError(`Cannot create ${dir}`, { cause: err });
      }
    }

    if (identity.dedicated) {
      const owner = `${identity.user}:${identity.group}`;
      for (const root of [paths.projectRoot, paths.logRoot]) {
        await runChecked(host, FilesystemProvisionError, 'chown', ['-R', owner, root]);
      }
    }

    if (missing.length === 0) {
      layoutLog.info('All directories already present');
      return alreadyPresent(paths.projectRoot);
    }

    layoutLog.success(`Created ${missing.join(', ')}`);
    return created(`${missing.length} directories`);
  });
}
