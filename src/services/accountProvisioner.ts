import { AccountCreationError } from '../core/errors';
import { alreadyPresent, created, guardStep, runChecked } from '../core/steps';
import type { HostRuntime } from '../infra/hostRuntime';
import type { ServiceIdentity, StepResult } from '../types';
import { taggedLogger } from '../utils/logger';

const accountLog = taggedLogger('ACCOUNT');

export const ACCOUNT_SHELL = '/bin/bash';

// Check-then-act; a concurrent useradd between the two calls is not guarded against
export function provisionAccount(identity: ServiceIdentity, host: HostRuntime): Promise<StepResult> {
  return guardStep('account', AccountCreationError, async () => {
    const lookup = await host.runCommand('id', [identity.user]);
    if (lookup.ok) {
      accountLog.warn(`User ${identity.user} already exists`);
      return alreadyPresent(`user ${identity.user} exists`);
    }

    await runChecked(host, AccountCreationError, 'useradd', ['-m', '-s', ACCOUNT_SHELL, identity.user]);
    accountLog.success(`User ${identity.user} created`);
    return created(`user ${identity.user}`);
  });
}
