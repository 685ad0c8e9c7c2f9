import { posix } from 'node:path';
import { ENVIRONMENT_TEMPLATE } from '../config/defaults';
import { ConfigRenderError, describeError, type ProvisionErrorOptions } from '../core/errors';
import { alreadyPresent, created, guardStep } from '../core/steps';
import { loadTemplate, renderTemplate, TEMPLATE_DIR } from '../core/templates';
import type { HostRuntime } from '../infra/hostRuntime';
import type { HostPaths, StepResult, WebSettings } from '../types';
import { taggedLogger } from '../utils/logger';

const envLog = taggedLogger('ENV');

export const ENV_FILE_NAME = '.env';

class EnvironmentFileError extends ConfigRenderError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super(message, options, 'environment');
  }
}

export function environmentValues(web: WebSettings) {
  return {
    API_KEY: ENVIRONMENT_TEMPLATE.API_KEY_PLACEHOLDER,
    API_SECRET: ENVIRONMENT_TEMPLATE.API_SECRET_PLACEHOLDER,
    TRADING_SYMBOL: ENVIRONMENT_TEMPLATE.TRADING_SYMBOL,
    TRADING_LEVERAGE: ENVIRONMENT_TEMPLATE.TRADING_LEVERAGE,
    LOG_LEVEL: ENVIRONMENT_TEMPLATE.LOG_LEVEL,
    LOG_FILE: ENVIRONMENT_TEMPLATE.LOG_FILE,
    WEB_HOST: web.host,
    WEB_PORT: web.port,
  };
}

/**
 * Write-once: an existing .env belongs to the operator and is never read,
 * rewritten or merged, whatever the template looks like today.
 */
export function writeEnvironmentTemplate(
  paths: HostPaths,
  web: WebSettings,
  host: HostRuntime,
  templateDir: string = TEMPLATE_DIR
): Promise<StepResult> {
  return guardStep('environment', EnvironmentFileError, () => {
    const target = posix.join(paths.projectRoot, ENV_FILE_NAME);
    if (host.pathExists(target)) {
      return alreadyPresent(target);
    }

    const content = renderTemplate(loadTemplate('env', templateDir, 'environment'), environmentValues(web), 'environment');
    try {
      // Holds credentials once edited
      host.writeFile(target, content, 0o600);
    } catch (err) {
      throw new EnvironmentFileError(`Cannot write ${target}: ${describeError(err)}`, { cause: err });
    }

    envLog.warn(`Created ${target}; edit it and set your API keys`);
    return created(target);
  });
}
