import { posix } from 'node:path';
import { SUPERVISION_POLICY } from '../config/defaults';
import { isProduction } from '../config/deploymentMode';
import { ConfigRenderError, describeError } from '../core/errors';
import { created, guardStep } from '../core/steps';
import { loadTemplate, renderTemplate, TEMPLATE_DIR } from '../core/templates';
import type { HostRuntime } from '../infra/hostRuntime';
import type { ProvisionPlan, StepResult, SupervisionDescriptor } from '../types';
import { taggedLogger } from '../utils/logger';
import { venvBin } from './runtimeEnvironment';

const scriptsLog = taggedLogger('SCRIPTS');
const supervisorLog = taggedLogger('SUPERVISOR');

export const DEV_LOG_LEVEL = 'INFO';

export interface DevScript {
  file: string;
  description: string;
  // Everything after the entry script on the command line
  args: string;
}

export const supervisorConfPath = (plan: ProvisionPlan) =>
  posix.join(plan.supervisorConfDir, `${plan.projectName}.conf`);

export function buildSupervisionDescriptor(plan: ProvisionPlan): SupervisionDescriptor {
  const { paths, web } = plan;
  const python = venvBin(plan.runtime, 'python');
  const entry = posix.join(paths.projectRoot, plan.entryScript);

  return {
    program: plan.projectName,
    command: `${python} ${entry} --mode both --host ${web.host} --port ${web.port}`,
    directory: paths.projectRoot,
    user: plan.identity.user,
    autostart: SUPERVISION_POLICY.AUTOSTART,
    autorestart: SUPERVISION_POLICY.AUTORESTART,
    startSecs: SUPERVISION_POLICY.START_SECS,
    stopWaitSecs: SUPERVISION_POLICY.STOP_WAIT_SECS,
    stdout: {
      path: posix.join(paths.logRoot, SUPERVISION_POLICY.STDOUT_LOG),
      maxBytes: SUPERVISION_POLICY.LOG_MAX_BYTES,
      backups: SUPERVISION_POLICY.LOG_BACKUPS,
    },
    stderr: {
      path: posix.join(paths.logRoot, SUPERVISION_POLICY.STDERR_LOG),
      maxBytes: SUPERVISION_POLICY.LOG_MAX_BYTES,
      backups: SUPERVISION_POLICY.LOG_BACKUPS,
    },
    environment: { PYTHONPATH: paths.projectRoot },
  };
}

// supervisord's KEY="value",KEY2="value" form
export function formatEnvironment(environment: Record<string, string>): string {
  return Object.entries(environment)
    .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
    .join(',');
}

export function renderSupervisorConfig(descriptor: SupervisionDescriptor, template: string): string {
  return renderTemplate(template, {
    PROGRAM: descriptor.program,
    COMMAND: descriptor.command,
    DIRECTORY: descriptor.directory,
    USER: descriptor.user,
    AUTOSTART: descriptor.autostart,
    AUTORESTART: descriptor.autorestart,
    START_SECS: descriptor.startSecs,
    STOP_WAIT_SECS: descriptor.stopWaitSecs,
    STDOUT_LOGFILE: descriptor.stdout.path,
    STDOUT_MAXBYTES: descriptor.stdout.maxBytes,
    STDOUT_BACKUPS: descriptor.stdout.backups,
    STDERR_LOGFILE: descriptor.stderr.path,
    STDERR_MAXBYTES: descriptor.stderr.maxBytes,
    STDERR_BACKUPS: descriptor.stderr.backups,
    ENVIRONMENT: formatEnvironment(descriptor.environment),
  });
}

export function buildDevScripts(plan: ProvisionPlan): DevScript[] {
  const listen = `--host ${plan.web.host} --port ${plan.web.port}`;
  return [
    { file: 'start-bot.sh', description: 'Start the trading bot only', args: `--mode bot --log-level ${DEV_LOG_LEVEL}` },
    { file: 'start-web.sh', description: 'Start the web server only', args: `--mode web ${listen} --log-level ${DEV_LOG_LEVEL}` },
    {
      file: 'start-both.sh',
      description: 'Start the trading bot and the web server together',
      args: `--mode both ${listen} --log-level ${DEV_LOG_LEVEL}`,
    },
  ];
}

export function renderDevScripts(plan: ProvisionPlan, templateDir: string = TEMPLATE_DIR): Map<string, string> {
  const start = loadTemplate('start.sh', templateDir);
  const stop = loadTemplate('stop-all.sh', templateDir);
  const scripts = new Map<string, string>();

  for (const script of buildDevScripts(plan)) {
    scripts.set(
      script.file,
      renderTemplate(start, {
        DESCRIPTION: script.description,
        PROJECT_DIR: plan.paths.projectRoot,
        VENV_DIR: plan.runtime.root,
        ENTRY_SCRIPT: plan.entryScript,
        ARGS: script.args,
      })
    );
  }
  scripts.set('stop-all.sh', renderTemplate(stop, { ENTRY_SCRIPT: plan.entryScript }));
  return scripts;
}

function writeOrFail(host: HostRuntime, path: string, content: string, mode: number) {
  try {
    host.writeFile(path, content, mode);
  } catch (err) {
    throw new ConfigRenderError(`Cannot write ${path}: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Pure renderer: the launched command is never checked. Output is rewritten
 * on every run.
 */
export function generateSupervisionConfig(
  plan: ProvisionPlan,
  host: HostRuntime,
  templateDir: string = TEMPLATE_DIR
): Promise<StepResult> {
  return guardStep('supervision', ConfigRenderError, () => {
    if (isProduction(plan.mode)) {
      const target = supervisorConfPath(plan);
      const content = renderSupervisorConfig(buildSupervisionDescriptor(plan), loadTemplate('supervisor.conf', templateDir));
      writeOrFail(host, target, content, 0o644);
      supervisorLog.success(`Wrote ${target}`);
      return created(target);
    }

    const scripts = renderDevScripts(plan, templateDir);
    for (const [file, content] of scripts) {
      writeOrFail(host, posix.join(plan.paths.projectRoot, file), content, 0o755);
    }
    scriptsLog.success(`Wrote ${[...scripts.keys()].join(', ')}`);
    return created([...scripts.keys()].join(', '));
  });
}
