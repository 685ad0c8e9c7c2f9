import dotenv from 'dotenv';
import { posix } from 'node:path';
import { ConfigurationError } from '../core/errors';
import type { HostRuntime } from '../infra/hostRuntime';
import type { ProvisionPlan } from '../types';
import { Logger } from '../utils/logger';
import { DEFAULTS, DEVELOPMENT_SUBDIRECTORIES, PRODUCTION_SUBDIRECTORIES, SYSTEM_PACKAGES } from './defaults';
import { type DeploymentMode, describeMode, isProduction } from './deploymentMode';

/**
 * Every knob is a PROVISION_* variable so the service's own keys
 * (BINANCE_API_KEY, WEB_PORT, ...) in the same .env never collide with ours.
 */
export interface ProvisionSettings {
  projectName: string;
  serviceUser: string;
  python: string;
  entryScript: string;
  manifest: string;
  webHost: string;
  webPort: number;
  commandTimeoutMs: number;
  supervisorConfDir: string;
}

const ACCOUNT_NAME = /^[a-z_][a-z0-9_-]*$/;

export function loadEnvFile(path?: string) {
  dotenv.config(path ? { path } : undefined);
}

export function readSettings(mode: DeploymentMode, env: NodeJS.ProcessEnv = process.env): ProvisionSettings {
  const defaultPort = isProduction(mode) ? DEFAULTS.PRODUCTION_WEB_PORT : DEFAULTS.DEVELOPMENT_WEB_PORT;

  return {
    projectName: env.PROVISION_PROJECT_NAME || DEFAULTS.PROJECT_NAME,
    serviceUser: env.PROVISION_SERVICE_USER || DEFAULTS.SERVICE_USER,
    python: env.PROVISION_PYTHON || DEFAULTS.PYTHON,
    entryScript: env.PROVISION_ENTRY_SCRIPT || DEFAULTS.ENTRY_SCRIPT,
    manifest: env.PROVISION_MANIFEST || DEFAULTS.MANIFEST,
    webHost: env.PROVISION_WEB_HOST || DEFAULTS.WEB_HOST,
    webPort: Number(env.PROVISION_WEB_PORT || defaultPort),
    commandTimeoutMs: Number(env.PROVISION_COMMAND_TIMEOUT_MS || DEFAULTS.COMMAND_TIMEOUT_MS),
    supervisorConfDir: env.PROVISION_SUPERVISOR_CONF_DIR || DEFAULTS.SUPERVISOR_CONF_DIR,
  };
}

export function validateSettings(mode: DeploymentMode, settings: ProvisionSettings) {
  const problems: string[] = [];

  if (!ACCOUNT_NAME.test(settings.projectName)) {
    problems.push(`PROVISION_PROJECT_NAME="${settings.projectName}" must match ${ACCOUNT_NAME.source}`);
  }

  // ---- Production only: the dedicated account ----
  if (isProduction(mode)) {
    if (!ACCOUNT_NAME.test(settings.serviceUser)) {
      problems.push(`PROVISION_SERVICE_USER="${settings.serviceUser}" must match ${ACCOUNT_NAME.source}`);
    } else if (settings.serviceUser === 'root') {
      problems.push('PROVISION_SERVICE_USER must not be root');
    }
  }

  if (!Number.isInteger(settings.webPort) || settings.webPort < 1 || settings.webPort > 65535) {
    problems.push(`PROVISION_WEB_PORT must be an integer between 1 and 65535`);
  }
  if (!Number.isInteger(settings.commandTimeoutMs) || settings.commandTimeoutMs <= 0) {
    problems.push('PROVISION_COMMAND_TIMEOUT_MS must be a positive integer');
  }
  if (!posix.isAbsolute(settings.supervisorConfDir)) {
    problems.push('PROVISION_SUPERVISOR_CONF_DIR must be an absolute path');
  }
  if (posix.isAbsolute(settings.entryScript) || settings.entryScript.includes('/')) {
    problems.push('PROVISION_ENTRY_SCRIPT must be a file name inside the project root');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`[CONFIG_FATAL] Invalid ${mode} settings: ${problems.join('; ')}`);
  }

  // ---- Logging (exactly once at boot) ----
  Logger.info(describeMode(mode));
}

export function buildPlan(mode: DeploymentMode, settings: ProvisionSettings, host: HostRuntime): ProvisionPlan {
  const sourceDir = host.cwd;

  if (isProduction(mode)) {
    const projectRoot = posix.join('/opt', settings.projectName);
    const venvRoot = posix.join(projectRoot, 'venv');
    return {
      mode,
      projectName: settings.projectName,
      sourceDir,
      paths: {
        projectRoot,
        venvRoot,
        logRoot: posix.join('/var/log', settings.projectName),
        configRoot: posix.join('/etc', settings.projectName),
        subdirectories: PRODUCTION_SUBDIRECTORIES,
      },
      identity: { user: settings.serviceUser, group: settings.serviceUser, dedicated: true },
      packages: SYSTEM_PACKAGES,
      // Dependencies resolve from the source tree; the deploy step copies it over later
      runtime: { root: venvRoot, python: settings.python, manifest: posix.join(sourceDir, settings.manifest) },
      entryScript: settings.entryScript,
      web: { host: settings.webHost, port: settings.webPort },
      supervisorConfDir: settings.supervisorConfDir,
    };
  }

  const user = host.currentUser();
  const venvRoot = posix.join(sourceDir, 'venv');
  return {
    mode,
    projectName: settings.projectName,
    sourceDir,
    paths: {
      projectRoot: sourceDir,
      venvRoot,
      logRoot: posix.join(sourceDir, 'logs'),
      configRoot: null,
      subdirectories: DEVELOPMENT_SUBDIRECTORIES,
    },
    identity: { user, group: user, dedicated: false },
    packages: [settings.python],
    runtime: { root: venvRoot, python: settings.python, manifest: posix.join(sourceDir, settings.manifest) },
    entryScript: settings.entryScript,
    web: { host: settings.webHost, port: settings.webPort },
    supervisorConfDir: settings.supervisorConfDir,
  };
}
