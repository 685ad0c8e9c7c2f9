import { buildPlan, loadEnvFile, readSettings, validateSettings } from './config/env';
import type { DeploymentMode } from './config/deploymentMode';
import { ConfigurationError, describeError } from './core/errors';
import { Orchestrator } from './core/orchestrator';
import { createHostRuntime, type HostRuntime } from './infra/hostRuntime';
import type { RunReport } from './types';
import { Logger } from './utils/logger';

export interface ProvisionOptions {
  host?: HostRuntime;
  env?: NodeJS.ProcessEnv;
  templateDir?: string;
}

/**
 * One provisioning run for a fixed mode. Never throws: every failure,
 * including bad settings, comes back as a report with a non-zero exitCode.
 */
export async function provision(mode: DeploymentMode, options: ProvisionOptions = {}): Promise<RunReport> {
  const env = options.env ?? options.host?.env ?? process.env;
  const settings = readSettings(mode, env);

  try {
    validateSettings(mode, settings);
  } catch (err) {
    const failure = err instanceof ConfigurationError ? err : new ConfigurationError(describeError(err), { cause: err });
    Logger.error(failure.message);
    return { mode, ok: false, steps: [], failure, exitCode: failure.exitCode };
  }

  const host = options.host ?? createHostRuntime(settings.commandTimeoutMs);
  const plan = buildPlan(mode, settings, host);
  return new Orchestrator(plan, host, options.templateDir).run();
}

export function usage(command: string, mode: DeploymentMode): string {
  const where =
    mode === 'PRODUCTION'
      ? 'Run as root from the trading bot source tree. Installs into /opt, /var/log and /etc.'
      : 'Run as a regular user from the trading bot source tree. Installs into the current directory.';
  return [
    `Usage: ${command}`,
    '',
    `Provisions the trading bot in ${mode} mode.`,
    where,
    '',
    'Settings are read from PROVISION_* environment variables (a .env file in the current directory is loaded).',
  ].join('\n');
}

export async function runCli(mode: DeploymentMode, command: string, argv: readonly string[]): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(usage(command, mode));
    return 0;
  }
  if (argv.length > 0) {
    console.error(`${command}: unexpected argument(s): ${argv.join(' ')}\n\n${usage(command, mode)}`);
    return 2;
  }

  loadEnvFile();
  const report = await provision(mode);
  return report.exitCode;
}

export { Orchestrator } from './core/orchestrator';
export * from './core/errors';
export type * from './types';
export type { DeploymentMode } from './config/deploymentMode';
