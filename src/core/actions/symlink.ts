import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { errorMessage } from '../errors.js';
import type { ExecuteOptions } from '../types.js';
import { FileAction, lstatOrUndefined, type ActionContext } from './action.js';
import { filenamePattern, resolveTargets } from './file-targets.js';

export const symlinkOptionsSchema = z
  .object({
    content: z.string().min(1),
    target: z.string().optional(),
    include: z.string().default('(.+)'),
  })
  .strict();

export type SymlinkOptions = z.output<typeof symlinkOptionsSchema>;

function linksTo(link: string, content: string): boolean {
  try {
    return path.resolve(path.dirname(link), fs.readlinkSync(link)) === content;
  } catch {
    return false;
  }
}

/**
 * Symlink a file, or the matching files of a directory, from the target
 * (the action directory when none is given).
 */
export class SymlinkAction extends FileAction<SymlinkOptions> {
  constructor(options: unknown, context: ActionContext) {
    super('symlink', options, symlinkOptionsSchema, context);
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
        `Could not symlink to "${content}". No such path!`,
      );
      return mapping;
    }

    const include = filenamePattern(this.option(this.options.include));
    for (const [source, link] of resolveTargets(content, target, include)) {
      if (path.resolve(source) === path.resolve(link)) {
        this.logger.warn({ module: this.context.module, source }, `Refusing to symlink "${source}" to itself`);
        continue;
      }
      if (lstatOrUndefined(link)?.isSymbolicLink() && linksTo(link, source)) {
        mapping.set(source, link);
        continue;
      }
      if (options.dryRun) {
        this.skipped(`[Symlinking] Link: "${link}" -> Content: "${source}"`);
        mapping.set(source, link);
        continue;
      }

      try {
        this.prepareTarget(link);
        if (lstatOrUndefined(link)) fs.rmSync(link);
        this.logger.info(
          { module: this.context.module, source, link },
          `[Symlinking] Link: "${link}" -> Content: "${source}"`,
        );
        fs.symlinkSync(source, link);
        mapping.set(source, link);
      } catch (error) {
        this.logger.error(
          { module: this.context.module, source, link, error: errorMessage(error) },
          `Could not symlink "${link}" to "${source}"`,
        );
      }
    }

    if (!options.dryRun) this.record('symlinked', mapping);
    return mapping;
  }
}
