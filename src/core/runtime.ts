import { setTimeout as sleep } from 'node:timers/promises';

import { parseGlobalSettings, userConfiguration } from './config.js';
import { errorMessage } from './errors.js';
import { ModuleManager } from './module-manager.js';
import { ProcessLock } from './process-lock.js';
import type { Clock, Logger } from './types.js';
import { resolveDataDirectory } from '../lib/paths.js';

export interface RuntimeOptions {
  configDirectory?: string;
  dataDirectory?: string;
  temporaryDirectory?: string;
  /** Replaces the configured `enabled_modules`. */
  modules?: string[];
  dryRun?: boolean;
  /** Stop after the first iteration. */
  test?: boolean;
  logger: Logger;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

/**
 * The solstice process: builds the module manager from the user
 * configuration and runs it until nothing is left to wait for or a stop is
 * requested.
 */
export class Runtime {
  private current: ModuleManager | undefined;
  private stopping = false;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: RuntimeOptions) {
    this.logger = options.logger;
    this.env = options.env ?? process.env;
  }

  get manager(): ModuleManager | undefined {
    return this.current;
  }

  private dataDirectory(): string {
    return this.options.dataDirectory ?? resolveDataDirectory(this.env);
  }

  /**
   * Read the configuration and build a manager from it.
   */
  createManager(): ModuleManager {
    const { configDirectory, configFile, config } = userConfiguration({
      configDirectory: this.options.configDirectory,
      env: this.env,
      logger: this.logger,
    });
    return new ModuleManager({
      config,
      configDirectory,
      configFile,
      dataDirectory: this.dataDirectory(),
      temporaryDirectory: this.options.temporaryDirectory,
      modules: this.options.modules,
      dryRun: this.options.dryRun,
      logger: this.logger,
      clock: this.options.clock,
      env: this.env,
    });
  }

  async run(): Promise<void> {
    const test = this.options.test ?? false;
    if (!test && !this.options.dryRun) {
      new ProcessLock(this.dataDirectory(), this.logger).acquire();
    }

    if (!test) {
      const { config, configDirectory } = userConfiguration({
        configDirectory: this.options.configDirectory,
        env: this.env,
      });
      const { startupDelay } = parseGlobalSettings(config, configDirectory);
      if (startupDelay > 0) {
        this.logger.info({ startupDelay }, `Delayed startup for ${startupDelay} seconds`);
        await sleep(startupDelay * 1000);
      }
    }

    this.current = this.createManager();
    try {
      await this.current.finishTasks();
      if (test) {
        this.logger.debug('Test mode, exiting after the first iteration');
        return;
      }

      while (!this.stopping && this.current.keepRunning) {
        const manager = this.current;
        const wait = manager.timeUntilNextEvent();
        this.logger.debug({ wait }, `Waiting ${Math.round(wait / 1000)} seconds for the next event`);
        await manager.queue.wait(wait);
        if (this.stopping) break;

        await manager.handleModifications();
        if (manager.configModified) {
          await this.reload();
          continue;
        }
        await manager.finishTasks();
      }
    } finally {
      await this.exit();
    }
  }

  /**
   * Replace the manager with one built from the re-read configuration. The
   * old manager stays when the new one cannot be built.
   */
  async reload(): Promise<void> {
    const previous = this.current;
    let next: ModuleManager;
    try {
      next = this.createManager();
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        'Could not reload the configuration, keeping the running modules',
      );
      if (previous) previous.configModified = false;
      return;
    }

    if (previous) await previous.exit();
    this.current = next;
    await next.finishTasks();
  }

  /**
   * Ask the main loop to stop. Safe to call before the manager exists.
   */
  stop(): void {
    this.stopping = true;
    this.current?.queue.wake();
  }

  async exit(): Promise<void> {
    const manager = this.current;
    if (!manager) return;
    try {
      await manager.exit();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to exit cleanly');
    }
  }
}
