/**
 * types/index.ts
 *
 * Shared shapes for one provisioning run.
 * Everything here is a plain fact about the target host; nothing holds live state.
 */

import type { DeploymentMode } from '../config/deploymentMode';
import type { ProvisionError } from '../core/errors';

export interface HostPaths {
  projectRoot: string;
  venvRoot: string;
  logRoot: string;
  // Production only; development keeps everything under the project root
  configRoot: string | null;
  // Relative to projectRoot
  subdirectories: readonly string[];
}

export interface ServiceIdentity {
  user: string;
  group: string;
  // True when the account is provisioned by this run (production)
  dedicated: boolean;
}

export type PackageSet = readonly string[];

export interface RuntimeEnvironment {
  root: string;
  python: string;
  manifest: string;
}

export interface WebSettings {
  host: string;
  port: number;
}

export interface ProvisionPlan {
  mode: DeploymentMode;
  projectName: string;
  sourceDir: string;
  paths: HostPaths;
  identity: ServiceIdentity;
  packages: PackageSet;
  runtime: RuntimeEnvironment;
  entryScript: string;
  web: WebSettings;
  supervisorConfDir: string;
}

export interface LogStream {
  path: string;
  maxBytes: string;
  backups: number;
}

export interface SupervisionDescriptor {
  program: string;
  command: string;
  directory: string;
  user: string;
  autostart: boolean;
  autorestart: boolean;
  startSecs: number;
  stopWaitSecs: number;
  stdout: LogStream;
  stderr: LogStream;
  environment: Record<string, string>;
}

export type StepName =
  | 'privileges'
  | 'packages'
  | 'account'
  | 'filesystem'
  | 'runtime'
  | 'artifacts'
  | 'supervision'
  | 'environment';

// CREATED: the step changed (or rewrote) host state
export type StepResult =
  | { step: StepName; status: 'CREATED'; detail: string }
  | { step: StepName; status: 'ALREADY_PRESENT'; detail: string }
  | { step: StepName; status: 'FAILED'; error: ProvisionError };

export type StepStatus = StepResult['status'];

export interface StepRecord {
  step: StepName;
  title: string;
  status: StepStatus | 'SKIPPED';
  detail?: string;
}

export interface RunReport {
  mode: DeploymentMode;
  ok: boolean;
  steps: StepRecord[];
  failure?: ProvisionError;
  exitCode: number;
}
