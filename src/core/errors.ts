import type { StepName } from '../types';

export type ProvisionErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PRIVILEGE_ERROR'
  | 'PACKAGE_INSTALL_ERROR'
  | 'ACCOUNT_CREATION_ERROR'
  | 'FILESYSTEM_PROVISION_ERROR'
  | 'ENVIRONMENT_CREATE_ERROR'
  | 'DEPENDENCY_INSTALL_ERROR'
  | 'ARTIFACT_DEPLOY_ERROR'
  | 'CONFIG_RENDER_ERROR';

export interface ProvisionErrorOptions {
  // Exit status of the external command that failed, when there was one
  commandExitCode?: number | null;
  output?: string;
  cause?: unknown;
}

/**
 * Base class for every fatal provisioning failure.
 * exitCode is what the process exits with: the failing command's own status
 * when it reported a non-zero one, otherwise 1.
 */
export class ProvisionError extends Error {
  public readonly code: ProvisionErrorCode;
  public readonly step: StepName | null;
  public readonly exitCode: number;
  public readonly output: string;

  constructor(code: ProvisionErrorCode, step: StepName | null, message: string, options: ProvisionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.step = step;
    this.output = options.output ?? '';
    const status = options.commandExitCode;
    this.exitCode = typeof status === 'number' && status > 0 ? status : 1;
  }
}

export class ConfigurationError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('CONFIGURATION_ERROR', null, message, options);
  }
}

export class PrivilegeError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('PRIVILEGE_ERROR', 'privileges', message, options);
  }
}

export class PackageInstallError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('PACKAGE_INSTALL_ERROR', 'packages', message, options);
  }
}

export class AccountCreationError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('ACCOUNT_CREATION_ERROR', 'account', message, options);
  }
}

export class FilesystemProvisionError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('FILESYSTEM_PROVISION_ERROR', 'filesystem', message, options);
  }
}

export class EnvironmentCreateError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('ENVIRONMENT_CREATE_ERROR', 'runtime', message, options);
  }
}

export class DependencyInstallError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('DEPENDENCY_INSTALL_ERROR', 'runtime', message, options);
  }
}

export class ArtifactDeployError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super('ARTIFACT_DEPLOY_ERROR', 'artifacts', message, options);
  }
}

export class ConfigRenderError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions, step: StepName = 'supervision') {
    super('CONFIG_RENDER_ERROR', step, message, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
