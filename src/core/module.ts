import { formatIssues } from './config.js';
import type { ContextLoader, ContextStore } from './context-store.js';
import { ConfigurationError } from './errors.js';
import { createEventListener, StaticEventListener, type EventListener } from './event-listeners/index.js';
import { ExecutedActions, type CreatedFiles } from './persistence.js';
import { checkRequirement, requiresSchema, type Requirement } from './requirements.js';
import type { TemplateManager } from './template-manager.js';
import type { TemporaryFiles } from './temporary-files.js';
import {
  ACTION_TYPES,
  isConfigObject,
  systemClock,
  type ActionSelector,
  type BlockName,
  type Clock,
  type ConfigObject,
  type ConfigValue,
  type ExecuteOptions,
  type Logger,
  type ShellResult,
} from './types.js';
import { ActionBlock } from './actions/action-block.js';
import type { ActionContext } from './actions/action.js';
import type { Trigger } from './actions/trigger.js';
import { expandPath } from '../lib/paths.js';

const DISABLED_VALUES = new Set<ConfigValue>([false, 'false', 'off', 'disabled', 'not', '0', 0]);

const PROMOTED_KEYS = [...ACTION_TYPES, 'trigger'];

/**
 * False when a module section switches itself off with `enabled`.
 */
export function isModuleEnabled(config: unknown): boolean {
  if (!isConfigObject(config)) return true;
  const enabled = config.enabled;
  return enabled === undefined || !DISABLED_VALUES.has(enabled);
}

export interface ModuleOptions {
  name: string;
  config: unknown;
  /** Anchor of relative paths in the module configuration. */
  directory: string;
  contextStore: ContextStore;
  contextLoader: ContextLoader;
  templates: TemplateManager;
  createdFiles: CreatedFiles;
  temporaryFiles: TemporaryFiles;
  dataDirectory: string;
  logger: Logger;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

export interface ModuleExecuteOptions extends ExecuteOptions {
  action?: ActionSelector;
  block: BlockName;
  /** Modified file, for `on_modified`. */
  path?: string;
}

/**
 * A named unit of configuration: an event listener and the action blocks
 * run at each phase of its life.
 */
export class Module {
  readonly name: string;
  readonly directory: string;
  readonly eventListener: EventListener;
  readonly requirements: Requirement[];
  /** Modules that must be enabled for this one to run. */
  readonly dependsOn: string[];
  readonly setupLedger: ExecutedActions;

  private readonly blocks: Record<Exclude<BlockName, 'on_modified'>, ActionBlock>;
  private readonly modifiedBlocks = new Map<string, ActionBlock>();
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ModuleOptions) {
    this.name = options.name;
    this.directory = options.directory;
    this.logger = options.logger;
    this.env = options.env ?? process.env;

    const rawConfig = options.config ?? {};
    if (!isConfigObject(rawConfig)) {
      throw new ConfigurationError(`[module/${this.name}] Module configuration must be a mapping`);
    }
    const config = this.promoteRootActions(rawConfig);

    this.eventListener = createEventListener(config.event_listener ?? config.timer, {
      clock: options.clock ?? systemClock,
      logger: options.logger,
    });

    const requires = requiresSchema.optional().safeParse(config.requires);
    if (!requires.success) {
      throw new ConfigurationError(
        `[module/${this.name}] Invalid requires: ${formatIssues(requires.error)}`,
      );
    }
    this.requirements =
      requires.data === undefined ? [] : Array.isArray(requires.data) ? requires.data : [requires.data];
    this.dependsOn = this.requirements.flatMap((requirement) =>
      requirement.module === undefined ? [] : [requirement.module],
    );

    const context: ActionContext = {
      module: this.name,
      directory: this.directory,
      replacer: (value) => this.interpolateString(value),
      contextStore: options.contextStore,
      contextLoader: options.contextLoader,
      templates: options.templates,
      createdFiles: options.createdFiles,
      temporaryFiles: options.temporaryFiles,
      logger: options.logger,
      env: this.env,
    };

    this.setupLedger = new ExecutedActions(this.name, options.dataDirectory, options.logger);
    this.blocks = {
      on_setup: new ActionBlock('on_setup', config.on_setup, context, this.setupLedger),
      on_startup: new ActionBlock('on_startup', config.on_startup, context),
      on_event: new ActionBlock('on_event', config.on_event, context),
      on_exit: new ActionBlock('on_exit', config.on_exit, context),
    };

    const modified = config.on_modified;
    if (isConfigObject(modified)) {
      for (const [relativePath, blockConfig] of Object.entries(modified)) {
        const absolutePath = expandPath(relativePath, this.directory);
        this.modifiedBlocks.set(
          absolutePath,
          new ActionBlock(`on_modified:${relativePath}`, blockConfig, context),
        );
      }
    } else if (modified !== undefined && modified !== null) {
      throw new ConfigurationError(
        `[module/${this.name}] on_modified must map file paths to action blocks`,
      );
    }
  }

  /**
   * Move action keys written at the root of the module into `on_startup`.
   */
  private promoteRootActions(config: ConfigObject): ConfigObject {
    const rootActions = PROMOTED_KEYS.filter((key) => config[key] !== undefined);
    if (rootActions.length === 0) return config;

    const startup: ConfigObject = isConfigObject(config.on_startup) ? { ...config.on_startup } : {};
    const promoted: ConfigObject = { ...config };
    for (const key of rootActions) {
      const value = config[key];
      if (value === undefined) continue;
      if (startup[key] !== undefined) {
        this.logger.error(
          { module: this.name, action: key },
          `[module/${this.name}] Action "${key}" is given both at the module root and in on_startup. ` +
            'Using the root one.',
        );
      }
      startup[key] = value;
      delete promoted[key];
    }
    promoted.on_startup = startup;
    return promoted;
  }

  /**
   * Check the shell, env and installed requirements, logging the outcome.
   */
  requirementsSatisfied(timeout: number): boolean {
    for (const requirement of this.requirements) {
      const check = checkRequirement(requirement, { directory: this.directory, timeout, env: this.env });
      if (!check.satisfied) {
        this.logger.warn(
          { module: this.name },
          `[module/${this.name}] ${check.summary}. Disabling module!`,
        );
        return false;
      }
      this.logger.debug({ module: this.name }, `[module/${this.name}] ${check.summary}`);
    }
    return true;
  }

  event(): string {
    return this.eventListener.event();
  }

  block(name: Exclude<BlockName, 'on_modified'>): ActionBlock {
    return this.blocks[name];
  }

  modifiedBlock(filePath: string): ActionBlock | undefined {
    return this.modifiedBlocks.get(filePath);
  }

  modifiedPaths(): string[] {
    return [...this.modifiedBlocks.keys()];
  }

  /**
   * A module with nothing to react to needs no polling.
   */
  get keepRunning(): boolean {
    if ([...this.modifiedBlocks.values()].some((block) => !block.isEmpty())) return true;
    return !this.blocks.on_event.isEmpty() && !(this.eventListener instanceof StaticEventListener);
  }

  /**
   * Substitute `{event}` with the current event and `{template}` with the
   * space separated targets `template` has been compiled to. `${VAR}` is
   * left for environment expansion.
   */
  interpolateString(value: string): string {
    return value.replace(/(\$?)\{([^{}\s]+)\}/g, (placeholder: string, dollar: string, key: string) => {
      if (dollar) return placeholder;
      if (key === 'event') return this.event();
      // Regular expression quantifiers such as {2} or {1,3}.
      if (/^\d+(,\d*)?$/.test(key)) return placeholder;

      const targets = this.performedCompilations().get(expandPath(key, this.directory));
      if (targets === undefined || targets.size === 0) {
        this.logger.error(
          { module: this.name, placeholder },
          `[module/${this.name}] String placeholder ${placeholder} could not be replaced. ` +
            `"${key}" has not been compiled.`,
        );
        return placeholder;
      }
      return [...targets].join(' ');
    });
  }

  private triggeredBlock(trigger: Trigger): ActionBlock | undefined {
    if (trigger.block !== 'on_modified') return this.blocks[trigger.block];

    const target = trigger.absolutePath === undefined ? undefined : this.modifiedBlocks.get(trigger.absolutePath);
    if (!target) {
      this.logger.warn(
        { module: this.name, path: trigger.specifiedPath },
        `[module/${this.name}] Triggered on_modified block for "${trigger.specifiedPath ?? ''}" does not exist`,
      );
    }
    return target;
  }

  /**
   * `root` followed by every block it triggers, depth first. A block is
   * visited once; a trigger back into a visited block is reported.
   */
  private blockSequence(root: ActionBlock): ActionBlock[] {
    const sequence: ActionBlock[] = [];
    const visited = new Set<ActionBlock>();
    const stack: ActionBlock[] = [root];

    for (let block = stack.pop(); block !== undefined; block = stack.pop()) {
      if (visited.has(block)) {
        this.logger.warn(
          { module: this.name, block: block.name },
          `[module/${this.name}] Block "${block.name}" triggered more than once, skipping it to avoid a cycle`,
        );
        continue;
      }
      visited.add(block);
      sequence.push(block);

      const triggered: ActionBlock[] = [];
      for (const trigger of block.triggers()) {
        const next = this.triggeredBlock(trigger);
        if (next) triggered.push(next);
      }
      stack.push(...triggered.reverse());
    }
    return sequence;
  }

  /**
   * Execute one action kind, or all of them, for `block` and every block it
   * triggers. Each kind runs across all those blocks before the next kind.
   */
  async execute(options: ModuleExecuteOptions): Promise<ShellResult[]> {
    let root: ActionBlock | undefined;
    if (options.block === 'on_modified') {
      root = options.path === undefined ? undefined : this.modifiedBlocks.get(options.path);
    } else {
      root = this.blocks[options.block];
    }
    if (!root) return [];

    const sequence = this.blockSequence(root);
    const selected = options.action ?? 'all';
    const results: ShellResult[] = [];
    for (const action of selected === 'all' ? ACTION_TYPES : [selected]) {
      for (const block of sequence) {
        results.push(
          ...(await block.execute({
            action,
            dryRun: options.dryRun,
            defaultTimeout: options.defaultTimeout,
          })),
        );
      }
    }
    return results;
  }

  /**
   * Template path mapped to every target any block compiled it to.
   */
  performedCompilations(): Map<string, Set<string>> {
    const compilations = new Map<string, Set<string>>();
    for (const block of [...Object.values(this.blocks), ...this.modifiedBlocks.values()]) {
      for (const [template, targets] of block.performedCompilations()) {
        const merged = compilations.get(template) ?? new Set<string>();
        for (const target of targets) merged.add(target);
        compilations.set(template, merged);
      }
    }
    return compilations;
  }

  /**
   * Compile or copy a modified source again wherever this module put it.
   */
  reprocess(source: string, options: ExecuteOptions = {}): boolean {
    let handled = false;
    for (const block of [...Object.values(this.blocks), ...this.modifiedBlocks.values()]) {
      if (block.reprocess(source, options)) handled = true;
    }
    return handled;
  }

  toString(): string {
    return `Module(${this.name})`;
  }
}
