import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';

import { formatIssues } from '../config.js';
import type { ContextLoader, ContextStore } from '../context-store.js';
import { ConfigurationError } from '../errors.js';
import type { CreatedFiles } from '../persistence.js';
import type { TemplateManager } from '../template-manager.js';
import type { TemporaryFiles } from '../temporary-files.js';
import type { ActionType, ExecuteOptions, Logger, Replacer } from '../types.js';
import { expandEnvironmentVariables, expandPath } from '../../lib/paths.js';

/**
 * Everything an action needs from its module and manager.
 */
export interface ActionContext {
  module: string;
  /** Absolute anchor of relative paths. */
  directory: string;
  replacer: Replacer;
  contextStore: ContextStore;
  contextLoader: ContextLoader;
  templates: TemplateManager;
  createdFiles: CreatedFiles;
  temporaryFiles: TemporaryFiles;
  logger: Logger;
  env: NodeJS.ProcessEnv;
}

/**
 * Anything an action block can execute: an action, or an action behind the
 * setup gate.
 */
export interface Executable<R> {
  readonly type: ActionType | 'trigger';
  readonly nullObject: boolean;
  execute(options?: ExecuteOptions): R;
}

function isEmptyOptions(options: unknown): boolean {
  if (options === undefined || options === null) return true;
  return typeof options === 'object' && Object.keys(options).length === 0;
}

/**
 * One configured action. Options are validated once, at construction; empty
 * options make a null object whose `execute()` does nothing.
 */
export abstract class Action<TOptions extends object, TResult> implements Executable<TResult> {
  readonly nullObject: boolean;
  protected readonly options: TOptions | undefined;

  constructor(
    readonly type: ActionType | 'trigger',
    readonly rawOptions: unknown,
    schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>,
    protected readonly context: ActionContext,
  ) {
    this.nullObject = isEmptyOptions(rawOptions);
    if (this.nullObject) return;

    const result = schema.safeParse(rawOptions);
    if (!result.success) {
      throw new ConfigurationError(
        `[module/${context.module}] Invalid ${type} action: ${formatIssues(result.error)}`,
      );
    }
    this.options = result.data;
  }

  get directory(): string {
    return this.context.directory;
  }

  protected get logger(): Logger {
    return this.context.logger;
  }

  /**
   * A string option with placeholders and environment variables substituted.
   * Evaluated on every call, since placeholders such as `{event}` change.
   */
  protected option(value: string): string {
    return expandEnvironmentVariables(this.context.replacer(value), this.context.env);
  }

  /**
   * A path option made absolute against the action directory.
   */
  protected pathOption(value: string): string {
    return expandPath(this.option(value), this.directory);
  }

  abstract execute(options?: ExecuteOptions): TResult;

  toString(): string {
    return `${this.constructor.name}(${JSON.stringify(this.rawOptions)})`;
  }
}

/**
 * Base of actions that write files into the filesystem. Pre-existing
 * targets the module does not own are backed up; created parent
 * directories are recorded so that cleanup can remove them.
 */
export abstract class FileAction<TOptions extends object> extends Action<TOptions, Map<string, string>> {
  /**
   * Create the parent directory of `target` and clear the way for writing it.
   */
  protected prepareTarget(target: string, options: { track?: boolean } = {}): void {
    const track = options.track ?? true;
    const created = this.ensureDirectory(path.dirname(target));
    if (track) this.context.createdFiles.insertDirectories(this.context.module, created);

    if (track) this.context.createdFiles.backup(this.context.module, target);

    // Writes through an existing symlink would land in the file it points to.
    const stats = lstatOrUndefined(target);
    if (stats?.isSymbolicLink()) fs.rmSync(target);
  }

  /**
   * `mkdir -p`, returning the directories that did not exist before,
   * outermost first.
   */
  protected ensureDirectory(directory: string): string[] {
    const missing: string[] = [];
    let current = directory;
    while (!fs.existsSync(current)) {
      missing.unshift(current);
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
    if (missing.length > 0) fs.mkdirSync(directory, { recursive: true });
    return missing;
  }

  protected record(method: 'compiled' | 'copied' | 'symlinked', mapping: Map<string, string>): void {
    if (mapping.size === 0) return;
    this.context.createdFiles.insert(this.context.module, method, mapping.entries());
  }

  protected skipped(message: string): void {
    this.logger.info({ module: this.context.module }, `SKIPPED: ${message}`);
  }
}

export function lstatOrUndefined(target: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(target);
  } catch {
    return undefined;
  }
}
