#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { userConfiguration } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { createLogger, isLogLevel, LOG_LEVELS } from '../core/logger.js';
import { ModuleManager } from '../core/module-manager.js';
import { CreatedFiles, ExecutedActions } from '../core/persistence.js';
import { Runtime } from '../core/runtime.js';
import { resolveDataDirectory } from '../lib/paths.js';
import { formatModuleStatuses } from './status-format.js';

async function main(): Promise<number> {
  const argv = yargs(hideBin(process.argv))
    .scriptName('solstice')
    .usage('$0 [options]')
    .option('module', {
      type: 'string',
      array: true,
      describe: 'Enable only these modules, overriding enabled_modules',
    })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      describe: 'Log every action instead of executing it',
    })
    .option('test', {
      type: 'boolean',
      default: false,
      describe: 'Exit after the first iteration',
    })
    .option('logging-level', {
      type: 'string',
      choices: LOG_LEVELS,
      describe: 'Defaults to $SOLSTICE_LOGGING_LEVEL, else info',
    })
    .option('cleanup', {
      type: 'string',
      array: true,
      describe: 'Remove files created by these modules and restore what they replaced',
    })
    .option('reset-setup', {
      type: 'string',
      array: true,
      describe: 'Forget the executed on_setup actions of these modules',
    })
    .option('list-modules', {
      type: 'boolean',
      default: false,
      describe: 'Print the enabled modules and their current events',
    })
    .option('config-directory', {
      type: 'string',
      describe: 'Defaults to $SOLSTICE_CONFIG_HOME, else $XDG_CONFIG_HOME/solstice',
    })
    .strict()
    .help()
    .parseSync();

  const envLevel = process.env.SOLSTICE_LOGGING_LEVEL?.toLowerCase();
  const level = argv['logging-level'] ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');
  const logger = createLogger({ level });
  const dryRun = argv['dry-run'];

  if (argv.cleanup || argv['reset-setup']) {
    const dataDirectory = resolveDataDirectory();
    const createdFiles = new CreatedFiles(dataDirectory, logger);
    for (const module of argv.cleanup ?? []) createdFiles.cleanup(module, dryRun);
    for (const module of argv['reset-setup'] ?? []) {
      new ExecutedActions(module, dataDirectory, logger).reset();
    }
    return 0;
  }

  if (argv['list-modules']) {
    const { configDirectory, configFile, config } = userConfiguration({
      configDirectory: argv['config-directory'],
      logger,
    });
    const manager = new ModuleManager({
      config,
      configDirectory,
      configFile,
      modules: argv.module,
      dryRun: true,
      logger,
    });
    const statuses = manager.moduleNames().flatMap((name) => {
      const module = manager.module(name);
      if (!module) return [];
      return [
        {
          name,
          event: module.event(),
          nextEvent: module.eventListener.timeUntilNextEvent(),
          keepRunning: module.keepRunning,
        },
      ];
    });
    for (const line of formatModuleStatuses(statuses)) process.stdout.write(`${line}\n`);
    return 0;
  }

  const runtime = new Runtime({
    configDirectory: argv['config-directory'],
    modules: argv.module,
    dryRun,
    test: argv.test,
    logger,
  });

  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, `Received ${signal}, exiting`);
    runtime.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await runtime.run();
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`solstice: ${errorMessage(error)}\n`);
    process.exit(1);
  },
);
