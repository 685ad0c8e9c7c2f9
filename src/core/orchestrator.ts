/**
 * core/orchestrator.ts
 *
 * The provisioning run.
 *
 * Responsibilities:
 * 1. Run the steps for the plan's mode in their fixed order.
 * 2. Stop at the first FAILED step; completed steps stay as they are.
 * 3. Report every step's outcome and print the closing summary.
 */

import { posix } from 'node:path';
import { type DeploymentMode, isProduction } from '../config/deploymentMode';
import type { HostRuntime } from '../infra/hostRuntime';
import { provisionAccount } from '../services/accountProvisioner';
import { deployArtifacts } from '../services/artifactDeployer';
import { writeEnvironmentTemplate } from '../services/environmentTemplate';
import { provisionLayout } from '../services/filesystemLayout';
import { provisionPackages } from '../services/packageProvisioner';
import { checkPrivileges } from '../services/privilegeGate';
import { provisionRuntimeEnvironment } from '../services/runtimeEnvironment';
import { buildDevScripts, generateSupervisionConfig, supervisorConfPath } from '../services/supervisionConfig';
import type { ProvisionPlan, RunReport, StepName, StepRecord, StepResult } from '../types';
import { Logger } from '../utils/logger';
import { TEMPLATE_DIR } from './templates';

export interface StepDefinition {
  step: StepName;
  title: string;
  modes: readonly DeploymentMode[];
  run: () => Promise<StepResult>;
}

const BOTH: readonly DeploymentMode[] = ['PRODUCTION', 'DEVELOPMENT'];
const PRODUCTION_ONLY: readonly DeploymentMode[] = ['PRODUCTION'];
const DEVELOPMENT_ONLY: readonly DeploymentMode[] = ['DEVELOPMENT'];

export class Orchestrator {
  private readonly plan: ProvisionPlan;
  private readonly host: HostRuntime;
  private readonly templateDir: string;

  constructor(plan: ProvisionPlan, host: HostRuntime, templateDir: string = TEMPLATE_DIR) {
    this.plan = plan;
    this.host = host;
    this.templateDir = templateDir;
  }

  public steps(): StepDefinition[] {
    const { plan, host } = this;
    const all: StepDefinition[] = [
      {
        step: 'privileges',
        title: 'Checking privileges',
        modes: BOTH,
        run: () => checkPrivileges(plan.mode, host),
      },
      {
        step: 'packages',
        title: isProduction(plan.mode) ? 'Installing system packages' : 'Checking the Python interpreter',
        modes: BOTH,
        run: () => provisionPackages(plan.mode, plan.packages, host),
      },
      {
        step: 'account',
        title: `Creating service user ${plan.identity.user}`,
        modes: PRODUCTION_ONLY,
        run: () => provisionAccount(plan.identity, host),
      },
      {
        step: 'filesystem',
        title: 'Creating the directory layout',
        modes: BOTH,
        run: () => provisionLayout(plan.paths, plan.identity, host),
      },
      {
        step: 'runtime',
        title: 'Setting up the Python virtual environment',
        modes: BOTH,
        run: () => provisionRuntimeEnvironment(plan.runtime, host),
      },
      {
        step: 'artifacts',
        title: 'Deploying project files',
        modes: PRODUCTION_ONLY,
        run: () => deployArtifacts(plan.sourceDir, plan.paths, plan.identity, host),
      },
      {
        step: 'supervision',
        title: isProduction(plan.mode) ? 'Writing the supervisor configuration' : 'Writing start/stop scripts',
        modes: BOTH,
        run: () => generateSupervisionConfig(plan, host, this.templateDir),
      },
      {
        step: 'environment',
        title: 'Writing the environment file',
        modes: DEVELOPMENT_ONLY,
        run: () => writeEnvironmentTemplate(plan.paths, plan.web, host, this.templateDir),
      },
    ];

    return all.filter(def => def.modes.includes(plan.mode));
  }

  public async run(): Promise<RunReport> {
    const steps = this.steps();
    const records: StepRecord[] = steps.map((def): StepRecord => ({ step: def.step, title: def.title, status: 'SKIPPED' }));

    Logger.info(`Provisioning ${this.plan.projectName} (${this.plan.mode})...`);

    for (const [index, def] of steps.entries()) {
      const tag = `[STEP ${index + 1}/${steps.length}]`;
      Logger.info(`${tag} ${def.title}...`);

      const result = await def.run();
      const record = records[index];

      if (result.status === 'FAILED') {
        record.status = 'FAILED';
        record.detail = result.error.message;
        Logger.error(`${tag} ${def.title} failed: ${result.error.message}`, result.error.output || undefined);
        Logger.error(`Provisioning aborted; ${steps.length - index - 1} remaining step(s) not attempted`);
        return { mode: this.plan.mode, ok: false, steps: records, failure: result.error, exitCode: result.error.exitCode };
      }

      record.status = result.status;
      record.detail = result.detail;
      Logger.success(`${tag} ${def.title}: ${result.status === 'CREATED' ? 'done' : 'already in place'}`);
    }

    Logger.info(this.summary().join('\n'));
    Logger.success(`${isProduction(this.plan.mode) ? 'Production' : 'Development'} provisioning complete`);
    return { mode: this.plan.mode, ok: true, steps: records, exitCode: 0 };
  }

  public summary(): string[] {
    const { plan } = this;
    const { paths, web } = plan;
    const configFile = posix.join(paths.projectRoot, 'config.jsonc');

    if (isProduction(plan.mode)) {
      const url = `http://${web.host === '0.0.0.0' ? '<server-ip>' : web.host}:${web.port}`;
      return [
        '',
        '=== Production provisioning summary ===',
        `Project directory:   ${paths.projectRoot}`,
        `Virtual environment: ${paths.venvRoot}`,
        `Log directory:       ${paths.logRoot}`,
        `Config directory:    ${paths.configRoot ?? '-'}`,
        `Supervisor config:   ${supervisorConfPath(plan)}`,
        `Service user:        ${plan.identity.user}`,
        '',
        'Start commands:',
        '  supervisorctl reread',
        '  supervisorctl update',
        `  supervisorctl start ${plan.projectName}`,
        '',
        `Web interface: ${url}`,
        '',
        'Next steps:',
        `  1. Edit the configuration file: ${configFile}`,
        '  2. Configure the exchange API credentials',
        `  3. Start the service: supervisorctl start ${plan.projectName}`,
        '',
      ];
    }

    const scripts = buildDevScripts(plan).map(script => script.file);
    return [
      '',
      '=== Development provisioning summary ===',
      `Project directory:   ${paths.projectRoot}`,
      `Virtual environment: ${paths.venvRoot}`,
      '',
      'Start commands:',
      ...scripts.map(file => `  ./${file}`),
      '  ./stop-all.sh',
      '',
      `Web interface: http://localhost:${web.port}`,
      '',
      'Next steps:',
      `  1. Edit the configuration file: ${configFile}`,
      `  2. Set the exchange API keys in ${posix.join(paths.projectRoot, '.env')}`,
      '  3. Start the service: ./start-both.sh',
      '',
    ];
  }
}
