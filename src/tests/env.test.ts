import { describe, expect, it } from 'vitest';
import { buildPlan, readSettings, validateSettings } from '../config/env';
import { ConfigurationError } from '../core/errors';
import { FakeHost, SOURCE_DIR } from './fakeHost';

describe('readSettings', () => {
  it('falls back to the defaults for each mode', () => {
    const production = readSettings('PRODUCTION', {});
    const development = readSettings('DEVELOPMENT', {});

    expect(production).toEqual({
      projectName: 'binance-trading-bot',
      serviceUser: 'tradingbot',
      python: 'python3',
      entryScript: 'run.py',
      manifest: 'requirements.txt',
      webHost: '0.0.0.0',
      webPort: 8000,
      commandTimeoutMs: 1_800_000,
      supervisorConfDir: '/etc/supervisor/conf.d',
    });
    expect(development.webPort).toBe(8001);
  });

  it('reads PROVISION_* overrides and ignores the service keys', () => {
    const settings = readSettings('DEVELOPMENT', {
      PROVISION_WEB_PORT: '9100',
      PROVISION_PYTHON: 'python3.11',
      WEB_PORT: '1234',
    });

    expect(settings.webPort).toBe(9100);
    expect(settings.python).toBe('python3.11');
  });
});

describe('validateSettings', () => {
  it('accepts the defaults', () => {
    expect(() => validateSettings('PRODUCTION', readSettings('PRODUCTION', {}))).not.toThrow();
  });

  it('rejects root as the production service account', () => {
    const settings = readSettings('PRODUCTION', { PROVISION_SERVICE_USER: 'root' });

    expect(() => validateSettings('PRODUCTION', settings)).toThrow(
      new ConfigurationError('[CONFIG_FATAL] Invalid PRODUCTION settings: PROVISION_SERVICE_USER must not be root')
    );
  });

  it('collects every problem in one error', () => {
    const settings = readSettings('PRODUCTION', {
      PROVISION_PROJECT_NAME: 'Bad Name',
      PROVISION_WEB_PORT: 'http',
      PROVISION_COMMAND_TIMEOUT_MS: '-5',
    });

    expect(() => validateSettings('PRODUCTION', settings)).toThrow(
      new ConfigurationError(
        '[CONFIG_FATAL] Invalid PRODUCTION settings: ' +
          'PROVISION_PROJECT_NAME="Bad Name" must match ^[a-z_][a-z0-9_-]*$; ' +
          'PROVISION_WEB_PORT must be an integer between 1 and 65535; ' +
          'PROVISION_COMMAND_TIMEOUT_MS must be a positive integer'
      )
    );
  });

  it('does not check the service account in development', () => {
    const settings = readSettings('DEVELOPMENT', { PROVISION_SERVICE_USER: 'root' });

    expect(() => validateSettings('DEVELOPMENT', settings)).not.toThrow();
  });

  it('keeps the entry script inside the project root', () => {
    const settings = readSettings('DEVELOPMENT', { PROVISION_ENTRY_SCRIPT: '../run.py' });

    expect(() => validateSettings('DEVELOPMENT', settings)).toThrow(ConfigurationError);
  });
});

describe('buildPlan', () => {
  it('targets the system-wide layout in production', () => {
    const host = new FakeHost({ uid: 0 });

    const plan = buildPlan('PRODUCTION', readSettings('PRODUCTION', {}), host);

    expect(plan.paths).toEqual({
      projectRoot: '/opt/binance-trading-bot',
      venvRoot: '/opt/binance-trading-bot/venv',
      logRoot: '/var/log/binance-trading-bot',
      configRoot: '/etc/binance-trading-bot',
      subdirectories: ['data', 'logs', 'scripts', 'backups'],
    });
    expect(plan.identity).toEqual({ user: 'tradingbot', group: 'tradingbot', dedicated: true });
    expect(plan.runtime.manifest).toBe(`${SOURCE_DIR}/requirements.txt`);
    expect(plan.sourceDir).toBe(SOURCE_DIR);
    expect(plan.packages).toContain('supervisor');
  });

  it('targets the working directory and the invoking account in development', () => {
    const host = new FakeHost({ user: 'alice' });

    const plan = buildPlan('DEVELOPMENT', readSettings('DEVELOPMENT', {}), host);

    expect(plan.paths).toEqual({
      projectRoot: SOURCE_DIR,
      venvRoot: `${SOURCE_DIR}/venv`,
      logRoot: `${SOURCE_DIR}/logs`,
      configRoot: null,
      subdirectories: ['logs', 'data', 'backups'],
    });
    expect(plan.identity).toEqual({ user: 'alice', group: 'alice', dedicated: false });
    expect(plan.packages).toEqual(['python3']);
    expect(plan.web).toEqual({ host: '0.0.0.0', port: 8001 });
  });
});
