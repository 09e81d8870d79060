#!/usr/bin/env node

import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { CliError, type CliOptions, parseOptions, USAGE } from './cli.js';
import { errorMessage } from './errors.js';
import { LogSink } from './log-sink.js';
import log, { configureLogger } from './logger.js';
import { ProcessRunner } from './process-runner.js';
import { defaultSettingsPath, loadSettings } from './settings.js';
import { renderApp } from './ui.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

let options: CliOptions;
try {
  options = parseOptions();
} catch (err) {
  if (err instanceof CliError) {
    console.error(`${err.message}\n\n${USAGE}`);
    process.exit(1);
  }
  throw err;
}

if (options.help) {
  console.log(USAGE);
  process.exit(0);
}

if (options.version) {
  console.log(readVersion());
  process.exit(0);
}

const settingsPath = options.configPath ? resolve(options.configPath) : defaultSettingsPath();
configureLogger(join(dirname(settingsPath), 'logs', 'archiver.log'));
log.info(`Starting with settings from ${settingsPath}`);

const settings = loadSettings(settingsPath);
const sink = new LogSink();
const runner = new ProcessRunner(sink);

renderApp(settings, settingsPath, runner, sink).then(
  () => log.info('Exited'),
  (err: unknown) => {
    log.error(`Exited with error: ${errorMessage(err)}`);
    console.error(errorMessage(err));
    process.exitCode = 1;
  },
);
