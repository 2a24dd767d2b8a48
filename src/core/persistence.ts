import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { errorCode, errorMessage } from './errors.js';
import { YamlFileStore } from './state.js';
import type { ActionType, Logger } from './types.js';

export const CREATED_FILES_NAME = 'created_files.yml';
export const SETUP_LEDGER_NAME = 'setup.yml';
export const BACKUP_DIRECTORY_NAME = 'backups';

export type CreationMethod = 'compiled' | 'copied' | 'symlinked' | 'mkdir';

const creationInfoSchema = z.object({
  content: z.string().nullable().default(null),
  method: z.enum(['compiled', 'copied', 'symlinked', 'mkdir']).nullable().default(null),
  hash: z.string().nullable().default(null),
  backup: z.string().nullable().default(null),
});

export type CreationInfo = z.output<typeof creationInfoSchema>;

const creationsSchema = z.record(z.record(creationInfoSchema));

type Creations = z.output<typeof creationsSchema>;

function lstatOrUndefined(target: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(target);
  } catch {
    return undefined;
  }
}

function moveFile(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') throw error;
    fs.cpSync(from, to, { verbatimSymlinks: true });
    fs.rmSync(from);
  }
}

/**
 * MD5 of a file's bytes, or of the link text for a symlink. Undefined when
 * the path cannot be read.
 */
export function hashPath(target: string): string | undefined {
  try {
    const stats = fs.lstatSync(target);
    const bytes = stats.isSymbolicLink() ? fs.readlinkSync(target) : fs.readFileSync(target);
    return createHash('md5').update(bytes).digest('hex');
  } catch {
    return undefined;
  }
}

/**
 * Ledger of files and directories created by each module, persisted in
 * `created_files.yml`, together with backups of the files they replaced.
 */
export class CreatedFiles {
  private readonly store: YamlFileStore<typeof creationsSchema>;

  constructor(
    private readonly dataDirectory: string,
    private readonly logger: Logger,
  ) {
    this.store = new YamlFileStore(
      path.join(dataDirectory, CREATED_FILES_NAME),
      creationsSchema,
      logger,
    );
  }

  get filePath(): string {
    return this.store.filePath;
  }

  read(): Creations {
    return this.store.read();
  }

  private update(mutate: (creations: Creations) => boolean): void {
    const creations = this.store.read();
    if (mutate(creations)) this.store.write(creations);
  }

  /**
   * Record `targets` as created by `module` from the matching `contents`.
   * Targets that do not exist are skipped.
   */
  insert(
    module: string,
    method: CreationMethod,
    pairs: Iterable<readonly [content: string | null, target: string]>,
  ): void {
    this.update((creations) => {
      let changed = false;
      const section = creations[module] ?? {};
      for (const [content, target] of pairs) {
        if (!lstatOrUndefined(target)) continue;
        const existing = section[target];
        const hash = method === 'mkdir' ? null : (hashPath(target) ?? null);
        if (
          existing &&
          existing.content === content &&
          existing.method === method &&
          existing.hash === hash
        ) {
          continue;
        }
        section[target] = {
          content,
          method,
          hash,
          backup: existing?.backup ?? null,
        };
        changed = true;
      }
      if (changed) creations[module] = section;
      return changed;
    });
  }

  /**
   * Record directories created on behalf of `module`.
   */
  insertDirectories(module: string, directories: readonly string[]): void {
    if (directories.length === 0) return;
    this.insert(
      module,
      'mkdir',
      directories.map((directory) => [null, directory] as const),
    );
  }

  isTracked(module: string, target: string): boolean {
    return this.store.read()[module]?.[target] !== undefined;
  }

  by(module: string): string[] {
    return Object.keys(this.store.read()[module] ?? {});
  }

  /**
   * Move a pre-existing `target` that `module` does not own into the backup
   * directory before it is replaced. Returns the backup path, if one was made.
   */
  backup(module: string, target: string, dryRun = false): string | undefined {
    const stats = lstatOrUndefined(target);
    if (!stats || stats.isDirectory() || this.isTracked(module, target)) return undefined;

    const backupPath = this.freeBackupPath(module, target);
    const message = `[Backup] "${target}" -> "${backupPath}"`;
    if (dryRun) {
      this.logger.info({ module, target }, `SKIPPED: ${message}`);
      return undefined;
    }

    this.logger.info({ module, target }, message);
    fs.mkdirSync(path.dirname(backupPath), { recursive: true });
    moveFile(target, backupPath);
    this.update((creations) => {
      const section = creations[module] ?? {};
      section[target] = { content: null, method: null, hash: null, backup: backupPath };
      creations[module] = section;
      return true;
    });
    return backupPath;
  }

  // Files sharing a basename and content get numbered suffixes.
  private freeBackupPath(module: string, target: string): string {
    const directory = path.join(this.dataDirectory, BACKUP_DIRECTORY_NAME, module.replace(/[/\\]/g, '_'));
    const name = `${path.basename(target)}-${hashPath(target) ?? 'unknown'}`;
    let candidate = path.join(directory, name);
    for (let counter = 1; lstatOrUndefined(candidate); counter += 1) {
      candidate = path.join(directory, `${name}-${counter}`);
    }
    return candidate;
  }

  /**
   * Delete everything `module` created, restore the backups it made, and
   * remove the directories it created once they are empty.
   */
  cleanup(module: string, dryRun = false): void {
    const section = this.store.read()[module] ?? {};
    const entries = Object.entries(section);
    const files = entries.filter(([, info]) => info.method !== 'mkdir');
    const directories = entries
      .filter(([, info]) => info.method === 'mkdir')
      .map(([directory]) => directory)
      .sort((a, b) => b.split(path.sep).length - a.split(path.sep).length || b.localeCompare(a));

    for (const [target, info] of files) {
      const message = info.method
        ? `[Cleanup] Deleting "${target}" (${info.method} content from "${info.content ?? ''}")`
        : `[Cleanup] Restoring "${target}"`;
      if (dryRun) {
        this.logger.info({ module, target }, `SKIPPED: ${message}`);
        continue;
      }

      try {
        if (info.method && lstatOrUndefined(target)) {
          this.logger.info({ module, target }, message);
          fs.rmSync(target);
        } else if (info.method) {
          this.logger.info({ module, target }, `${message} [No longer exists!]`);
        }
        if (info.backup && lstatOrUndefined(info.backup)) {
          this.logger.info({ module, target }, `[Cleanup] Restoring backup "${info.backup}"`);
          fs.mkdirSync(path.dirname(target), { recursive: true });
          moveFile(info.backup, target);
        }
      } catch (error) {
        this.logger.error(
          { module, target, error: errorMessage(error) },
          `Could not clean up "${target}"`,
        );
      }
    }

    for (const directory of directories) {
      const message = `[Cleanup] Deleting directory "${directory}"`;
      if (dryRun) {
        this.logger.info({ module, directory }, `SKIPPED: ${message}`);
        continue;
      }
      try {
        if (fs.readdirSync(directory).length > 0) {
          this.logger.info({ module, directory }, `${message} [Not empty, kept]`);
          continue;
        }
        this.logger.info({ module, directory }, message);
        fs.rmdirSync(directory);
      } catch (error) {
        this.logger.debug({ module, directory, error: errorMessage(error) }, `${message} [No longer exists!]`);
      }
    }

    if (!dryRun) {
      this.update((creations) => {
        if (!(module in creations)) return false;
        delete creations[module];
        return true;
      });
    }
  }
}

const ledgerSchema = z.record(z.record(z.array(z.unknown())));

type Ledger = z.output<typeof ledgerSchema>;

/**
 * JSON with object keys sorted, so that equal option mappings compare equal
 * regardless of key order.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function isEmptyOptions(options: unknown): boolean {
  if (options === undefined || options === null) return true;
  if (Array.isArray(options)) return options.length === 0;
  if (typeof options === 'object') return Object.keys(options).length === 0;
  return false;
}

/**
 * Setup ledger of one module, persisted in `setup.yml`: which action
 * configurations have already been executed once.
 */
export class ExecutedActions {
  private readonly store: YamlFileStore<typeof ledgerSchema>;
  private oldActions: Ledger[string];
  private readonly newActions = new Map<ActionType, unknown[]>();

  constructor(
    readonly module: string,
    dataDirectory: string,
    private readonly logger: Logger,
  ) {
    this.store = new YamlFileStore(path.join(dataDirectory, SETUP_LEDGER_NAME), ledgerSchema, logger);
    this.oldActions = this.store.read()[module] ?? {};
  }

  /**
   * True if this configuration of `actionType` has never been executed for
   * the module. A new configuration is remembered until `write()`.
   */
  isNew(actionType: ActionType, options: unknown): boolean {
    if (isEmptyOptions(options)) return false;

    const key = stableStringify(options);
    const seen = [...(this.oldActions[actionType] ?? []), ...(this.newActions.get(actionType) ?? [])];
    if (seen.some((executed) => stableStringify(executed) === key)) return false;

    this.newActions.set(actionType, [...(this.newActions.get(actionType) ?? []), options]);
    return true;
  }

  hasUnsavedActions(): boolean {
    return this.newActions.size > 0;
  }

  /**
   * Persist every configuration checked as new since the last write.
   */
  write(): void {
    if (this.newActions.size === 0) return;

    const ledger = this.store.read();
    const section = ledger[this.module] ?? {};
    for (const [actionType, options] of this.newActions) {
      section[actionType] = [...(section[actionType] ?? []), ...options];
    }
    ledger[this.module] = section;
    this.store.write(ledger);
    this.oldActions = section;
    this.newActions.clear();
  }

  /**
   * Forget every executed setup action of the module.
   */
  reset(): void {
    const ledger = this.store.read();
    const removed = ledger[this.module];
    if (!removed) {
      this.logger.error(
        { module: this.module },
        `No saved executed on_setup actions for module "${this.module}"!`,
      );
    } else {
      delete ledger[this.module];
      this.store.write(ledger);
      this.logger.info(
        { module: this.module },
        `Reset the following actions for module "${this.module}":\n${YAML.stringify({ [this.module]: removed })}`,
      );
    }
    this.oldActions = {};
    this.newActions.clear();
  }
}
