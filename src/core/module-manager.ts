import path from 'node:path';

import {
  CONFIG_FILE_NAME,
  collectModules,
  contextFromConfig,
  createContextLoader,
  EnabledModules,
  parseGlobalSettings,
  type GlobalSettings,
} from './config.js';
import type { ContextStore } from './context-store.js';
import { DirectoryWatcher } from './directory-watcher.js';
import { errorMessage } from './errors.js';
import { ONE_HUNDRED_YEARS } from './event-listeners/event-listener.js';
import { ModificationQueue } from './modification-queue.js';
import { isModuleEnabled, Module } from './module.js';
import { CreatedFiles, ExecutedActions } from './persistence.js';
import { dropMissingModuleDependencies } from './requirements.js';
import { TemplateManager } from './template-manager.js';
import { TemporaryFiles } from './temporary-files.js';
import { ACTION_TYPES, systemClock, type BlockName, type Clock, type ConfigObject, type Logger } from './types.js';
import { runningProcessCount, terminateRunningProcesses } from '../lib/exec.js';
import { resolveDataDirectory } from '../lib/paths.js';

export interface ModuleManagerOptions {
  /** Parsed top-level configuration file. */
  config: ConfigObject;
  configDirectory: string;
  /** Path of the top-level configuration file, watched for hot reload. */
  configFile?: string;
  dataDirectory?: string;
  temporaryDirectory?: string;
  /** Replaces the configured `enabled_modules`. */
  modules?: string[];
  dryRun?: boolean;
  logger: Logger;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

/**
 * Owns every enabled module and drives them through their life: setup and
 * startup, event changes, file modifications and exit.
 */
export class ModuleManager {
  readonly settings: GlobalSettings;
  readonly contextStore: ContextStore;
  readonly createdFiles: CreatedFiles;
  readonly queue = new ModificationQueue();
  readonly configDirectory: string;
  readonly configFile: string;
  readonly dataDirectory: string;
  readonly dryRun: boolean;
  /** Set when the top-level configuration file changed with hot reload on. */
  configModified = false;

  private readonly modules = new Map<string, Module>();
  private readonly templates: TemplateManager;
  private readonly temporaryFiles: TemporaryFiles;
  private readonly watcher: DirectoryWatcher;
  private readonly logger: Logger;
  private readonly knownEvents = new Map<string, string>();
  private startupDone = false;
  private exited = false;

  constructor(options: ModuleManagerOptions) {
    const env = options.env ?? process.env;
    this.logger = options.logger;
    this.dryRun = options.dryRun ?? false;
    this.configDirectory = options.configDirectory;
    this.configFile = options.configFile ?? path.join(options.configDirectory, CONFIG_FILE_NAME);
    this.dataDirectory = options.dataDirectory ?? resolveDataDirectory(env);
    this.settings = parseGlobalSettings(options.config, options.configDirectory);

    this.templates = new TemplateManager(this.logger, env);
    this.contextStore = contextFromConfig(options.config);
    this.createdFiles = new CreatedFiles(this.dataDirectory, this.logger);
    this.temporaryFiles = new TemporaryFiles(this.logger, options.temporaryDirectory);

    const enabled = new EnabledModules(
      options.modules ?? this.settings.enabledModules,
      this.settings.modulesDirectory,
      this.logger,
    );
    const collected = collectModules({
      config: options.config,
      configDirectory: options.configDirectory,
      enabled,
      context: this.contextStore,
      templates: this.templates,
      logger: this.logger,
      env,
    });
    this.contextStore.mergePreserve(collected.context);

    const contextLoader = createContextLoader(this.templates, { env, logger: this.logger });
    for (const definition of collected.modules) {
      if (!isModuleEnabled(definition.config)) {
        this.logger.debug({ module: definition.name }, `[module/${definition.name}] Disabled`);
        continue;
      }
      let module: Module;
      try {
        module = new Module({
          name: definition.name,
          config: definition.config,
          directory: definition.directory,
          contextStore: this.contextStore,
          contextLoader,
          templates: this.templates,
          createdFiles: this.createdFiles,
          temporaryFiles: this.temporaryFiles,
          dataDirectory: this.dataDirectory,
          logger: this.logger,
          clock: options.clock ?? systemClock,
          env,
        });
      } catch (error) {
        this.logger.error(
          { module: definition.name, error: errorMessage(error) },
          `[module/${definition.name}] Invalid configuration, disabling module`,
        );
        continue;
      }
      if (!module.requirementsSatisfied(this.settings.requiresTimeout)) continue;
      this.modules.set(module.name, module);
    }
    dropMissingModuleDependencies(this.modules, this.logger);

    for (const module of this.modules.values()) this.knownEvents.set(module.name, module.event());

    this.watcher = new DirectoryWatcher({
      directories: [options.configDirectory, this.settings.modulesDirectory],
      onModified: (filePath) => this.onModified(filePath),
      logger: this.logger,
    });

    this.logger.info(
      { modules: [...this.modules.keys()] },
      `Enabled modules: ${[...this.modules.keys()].join(', ') || '(none)'}`,
    );
  }

  get size(): number {
    return this.modules.size;
  }

  module(name: string): Module | undefined {
    return this.modules.get(name);
  }

  moduleNames(): string[] {
    return [...this.modules.keys()];
  }

  /**
   * Current event of every module.
   */
  moduleEvents(): Record<string, string> {
    return Object.fromEntries([...this.modules].map(([name, module]) => [name, module.event()]));
  }

  /**
   * Event of every module when its on_event block last ran, or at startup.
   */
  get lastKnownEvents(): Record<string, string> {
    return Object.fromEntries(this.knownEvents);
  }

  private changedModules(): Module[] {
    return [...this.modules.values()].filter(
      (module) => this.knownEvents.get(module.name) !== module.event(),
    );
  }

  /**
   * Run `block` of every given module, one action kind at a time across all
   * of them. A failing module never stops the others.
   */
  private async executeBlock(block: BlockName, modules: Module[], filePath?: string): Promise<void> {
    for (const action of ACTION_TYPES) {
      for (const module of modules) {
        try {
          await module.execute({
            action,
            block,
            path: filePath,
            dryRun: this.dryRun,
            defaultTimeout: this.settings.runTimeout,
          });
        } catch (error) {
          this.logger.error(
            { module: module.name, block, action, error: errorMessage(error) },
            `[module/${module.name}] Failed to execute ${action} actions of ${block}`,
          );
        }
      }
    }
  }

  /**
   * Run on_setup blocks; each action executes once per configuration ever.
   */
  async setup(): Promise<void> {
    await this.executeBlock('on_setup', [...this.modules.values()]);
  }

  async startup(): Promise<void> {
    if (this.startupDone) return;
    await this.setup();
    await this.executeBlock('on_startup', [...this.modules.values()]);
    this.startupDone = true;

    try {
      await this.watcher.start();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Could not watch the configuration directory');
    }
  }

  /**
   * True when a module changed event, or a modified file awaits handling.
   */
  hasUnfinishedTasks(): boolean {
    return this.queue.size > 0 || this.changedModules().length > 0;
  }

  /**
   * Start up on the first call; later calls handle modified files and run
   * on_event for modules whose event changed.
   */
  async finishTasks(): Promise<void> {
    if (!this.startupDone) {
      await this.startup();
      return;
    }

    await this.handleModifications();
    const changed = this.changedModules();
    if (changed.length === 0) return;

    const events = new Map(changed.map((module) => [module.name, module.event()]));
    for (const module of changed) {
      this.logger.info(
        { module: module.name, event: events.get(module.name) },
        `[module/${module.name}] New event "${events.get(module.name) ?? ''}". Executing actions.`,
      );
    }
    await this.executeBlock('on_event', changed);
    for (const [name, event] of events) this.knownEvents.set(name, event);
  }

  /**
   * Milliseconds until the earliest possible event change of any module.
   */
  timeUntilNextEvent(): number {
    let wait = ONE_HUNDRED_YEARS;
    for (const module of this.modules.values()) {
      wait = Math.min(wait, module.eventListener.timeUntilNextEvent());
    }
    return wait;
  }

  /**
   * Queue a modified file. It is handled by the next `finishTasks()`.
   */
  onModified(filePath: string): void {
    this.queue.push(filePath);
  }

  async handleModifications(): Promise<void> {
    for (const filePath of this.queue.drain()) await this.fileModified(filePath);
  }

  /**
   * React to a change of `filePath`: on_modified blocks registered for it,
   * else reprocessing of the templates and copies made from it.
   */
  async fileModified(filePath: string): Promise<void> {
    if (filePath === this.configFile && this.settings.hotReloadConfig) {
      this.logger.info({ path: filePath }, 'Configuration file modified, reloading');
      this.configModified = true;
      return;
    }

    const modules = [...this.modules.values()].filter((module) => module.modifiedBlock(filePath));
    if (modules.length > 0) {
      await this.executeBlock('on_modified', modules, filePath);
      return;
    }

    if (!this.settings.reprocessModifiedFiles) return;
    for (const module of this.modules.values()) {
      try {
        module.reprocess(filePath, { dryRun: this.dryRun });
      } catch (error) {
        this.logger.error(
          { module: module.name, path: filePath, error: errorMessage(error) },
          `[module/${module.name}] Could not reprocess "${filePath}"`,
        );
      }
    }
  }

  /**
   * Whether the process has anything left to wait for.
   */
  get keepRunning(): boolean {
    if ([...this.modules.values()].some((module) => module.keepRunning)) return true;
    if (this.settings.hotReloadConfig || this.settings.reprocessModifiedFiles) return true;
    return runningProcessCount() > 0;
  }

  /**
   * Run on_exit blocks and release everything the manager holds.
   */
  async exit(): Promise<void> {
    if (this.exited) return;
    this.exited = true;

    await this.executeBlock('on_exit', [...this.modules.values()]);
    this.temporaryFiles.closeAll();
    await this.watcher.stop();
    this.queue.wake();
    terminateRunningProcesses(this.logger);
  }

  /**
   * Remove every file `module` created and restore what they replaced.
   */
  cleanup(module: string, dryRun = this.dryRun): void {
    this.createdFiles.cleanup(module, dryRun);
  }

  /**
   * Forget the executed on_setup actions of `module`.
   */
  resetSetup(module: string): void {
    new ExecutedActions(module, this.dataDirectory, this.logger).reset();
  }
}
