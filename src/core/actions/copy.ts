import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { errorMessage } from '../errors.js';
import type { ExecuteOptions } from '../types.js';
import { applyPermissions } from '../../lib/permissions.js';
import { FileAction, type ActionContext } from './action.js';
import { permissionsSchema } from './compile.js';
import { filenamePattern, resolveTargets } from './file-targets.js';

export const copyOptionsSchema = z
  .object({
    content: z.string().min(1),
    target: z.string().optional(),
    include: z.string().default('(.+)'),
    permissions: permissionsSchema.optional(),
  })
  .strict();

export type CopyOptions = z.output<typeof copyOptionsSchema>;

/**
 * Copy a file, or the matching files of a directory, to the target
 * (the action directory when none is given).
 */
export class CopyAction extends FileAction<CopyOptions> {
  private readonly copies = new Map<string, Set<string>>();

  constructor(options: unknown, context: ActionContext) {
    super('copy', options, copyOptionsSchema, context);
  }

  private permissions(): string | number | undefined {
    const permissions = this.options?.permissions;
    return typeof permissions === 'string' ? this.option(permissions) : permissions;
  }

  execute(options: ExecuteOptions = {}): Map<string, string> {
    const mapping = new Map<string, string>();
    if (!this.options) return mapping;

    const content = this.pathOption(this.options.content);
    const target =
      this.options.target === undefined ? this.directory : this.pathOption(this.options.target);
    if (!fs.existsSync(content)) {
      this.logger.error(
        { module: this.context.module, content },
        `Could not copy "${content}". No such path!`,
      );
      return mapping;
    }

    const include = filenamePattern(this.option(this.options.include));
    for (const [source, destination] of resolveTargets(content, target, include)) {
      if (path.resolve(source) === path.resolve(destination)) {
        this.logger.warn({ module: this.context.module, source }, `Refusing to copy "${source}" onto itself`);
        continue;
      }
      if (options.dryRun) {
        this.skipped(`[Copying] Content: "${source}" -> Target: "${destination}"`);
        mapping.set(source, destination);
        continue;
      }
      if (this.copyFile(source, destination)) mapping.set(source, destination);
    }

    if (!options.dryRun) this.record('copied', mapping);
    return mapping;
  }

  private copyFile(source: string, destination: string): boolean {
    try {
      this.prepareTarget(destination);
      this.logger.info(
        { module: this.context.module, source, destination },
        `[Copying] Content: "${source}" -> Target: "${destination}"`,
      );
      fs.copyFileSync(source, destination);
      applyPermissions(destination, source, this.permissions());
    } catch (error) {
      this.logger.error(
        { module: this.context.module, source, destination, error: errorMessage(error) },
        `Could not copy "${source}" to "${destination}"`,
      );
      return false;
    }
    const destinations = this.copies.get(source) ?? new Set<string>();
    destinations.add(destination);
    this.copies.set(source, destinations);
    return true;
  }

  manages(source: string): boolean {
    return this.copies.has(source);
  }

  /**
   * Copy `source` again to every destination it was copied to.
   */
  recopy(source: string, options: ExecuteOptions = {}): Map<string, string> {
    const mapping = new Map<string, string>();
    for (const destination of this.copies.get(source) ?? []) {
      if (options.dryRun) {
        this.skipped(`[Copying] Content: "${source}" -> Target: "${destination}"`);
        mapping.set(source, destination);
      } else if (this.copyFile(source, destination)) {
        mapping.set(source, destination);
      }
    }
    if (!options.dryRun) this.record('copied', mapping);
    return mapping;
  }
}
