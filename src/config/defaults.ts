/**
 * config/defaults.ts
 *
 * Responsibilities:
 * 1. Store fallback values for every PROVISION_* setting.
 * 2. Define the fixed supervisor restart policy and log rotation limits.
 */

export const DEFAULTS = {
  PROJECT_NAME: 'binance-trading-bot',
  SERVICE_USER: 'tradingbot',
  PYTHON: 'python3',
  ENTRY_SCRIPT: 'run.py',
  MANIFEST: 'requirements.txt',
  WEB_HOST: '0.0.0.0',
  PRODUCTION_WEB_PORT: 8000,
  DEVELOPMENT_WEB_PORT: 8001,
  COMMAND_TIMEOUT_MS: 30 * 60 * 1000, // apt-get and pip can be slow on a fresh host
  SUPERVISOR_CONF_DIR: '/etc/supervisor/conf.d',
};

export const SYSTEM_PACKAGES = [
  'python3',
  'python3-pip',
  'python3-venv',
  'python3-dev',
  'build-essential',
  'libssl-dev',
  'libffi-dev',
  'supervisor',
  'nginx',
  'git',
  'curl',
  'wget',
  'tmux',
] as const;

export const PRODUCTION_SUBDIRECTORIES = ['data', 'logs', 'scripts', 'backups'] as const;
export const DEVELOPMENT_SUBDIRECTORIES = ['logs', 'data', 'backups'] as const;

export const SUPERVISION_POLICY = {
  AUTOSTART: true,
  AUTORESTART: true,
  START_SECS: 10,
  STOP_WAIT_SECS: 60,
  LOG_MAX_BYTES: '10MB',
  LOG_BACKUPS: 10,
  STDOUT_LOG: 'trading-bot.log',
  STDERR_LOG: 'trading-bot-error.log',
};

// Written once into a development checkout; operators replace the credentials
export const ENVIRONMENT_TEMPLATE = {
  API_KEY_PLACEHOLDER: 'your_api_key_here',
  API_SECRET_PLACEHOLDER: 'your_api_secret_here',
  TRADING_SYMBOL: 'BTCUSDT',
  TRADING_LEVERAGE: 10,
  LOG_LEVEL: 'INFO',
  LOG_FILE: 'logs/trading-bot.log',
};
