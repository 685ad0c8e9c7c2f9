#!/usr/bin/env node
import { runCli } from './index';
import { Logger } from './utils/logger';

runCli('PRODUCTION', 'provision-trading-bot', process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    Logger.error('Fatal Provisioning Error', err);
    process.exitCode = 1;
  });
