import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { errorMessage } from '../errors.js';
import type { ExecuteOptions } from '../types.js';
import { FileAction, type ActionContext } from './action.js';
import { filenamePattern, isDirectory, resolveTargets } from './file-targets.js';

export const permissionsSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

export const compileOptionsSchema = z
  .object({
    content: z.string().min(1),
    target: z.string().optional(),
    include: z.string().default('(.+)'),
    permissions: permissionsSchema.optional(),
  })
  .strict();

export type CompileOptions = z.output<typeof compileOptionsSchema>;

/**
 * Render a template, or every matching template of a directory, into its
 * target. Without a target, a temporary file (or directory) is allocated
 * once and reused for every later compilation.
 */
export class CompileAction extends FileAction<CompileOptions> {
  private readonly performed = new Map<string, Set<string>>();
  private readonly implicitTargets = new Map<string, string>();
  private readonly untracked = new Set<string>();

  constructor(options: unknown, context: ActionContext) {
    super('compile', options, compileOptionsSchema, context);
  }

  private permissions(): string | number | undefined {
    const permissions = this.options?.permissions;
    return typeof permissions === 'string' ? this.option(permissions) : permissions;
  }

  private implicitTarget(content: string, dryRun: boolean): string {
    const existing = this.implicitTargets.get(content);
    if (existing !== undefined) return existing;

    const name = path.basename(content);
    if (dryRun) return path.join(os.tmpdir(), `${name}-(temporary)`);

    const target = isDirectory(content)
      ? this.context.temporaryFiles.createDirectory(name)
      : this.context.temporaryFiles.createFile(name);
    this.implicitTargets.set(content, target);
    return target;
  }

  execute(options: ExecuteOptions = {}): Map<string, string> {
    const mapping = new Map<string, string>();
    if (!this.options) return mapping;

    const dryRun = options.dryRun ?? false;
    const content = this.pathOption(this.options.content);
    const implicit = this.options.target === undefined;
    if (!fs.existsSync(content)) {
      this.logger.error(
        { module: this.context.module, content },
        `Could not compile template "${content}". No such path!`,
      );
      return mapping;
    }

    const target =
      this.options.target === undefined
        ? this.implicitTarget(content, dryRun)
        : this.pathOption(this.options.target);
    const include = filenamePattern(this.option(this.options.include));

    for (const [template, targetFile] of resolveTargets(content, target, include)) {
      if (dryRun) {
        this.skipped(`[Compiling] Template: "${template}" -> Target: "${targetFile}"`);
        mapping.set(template, targetFile);
        continue;
      }
      if (this.compileFile(template, targetFile, !implicit)) mapping.set(template, targetFile);
    }

    if (!implicit && !dryRun) this.record('compiled', mapping);
    return mapping;
  }

  private compileFile(template: string, target: string, track: boolean): boolean {
    try {
      this.prepareTarget(target, { track });
      this.context.templates.compileTemplate({
        template,
        target,
        context: this.context.contextStore,
        shellDirectory: this.directory,
        permissions: this.permissions(),
      });
    } catch (error) {
      this.logger.error(
        { module: this.context.module, template, target, error: errorMessage(error) },
        `Could not compile template "${template}" to target "${target}"`,
      );
      return false;
    }

    if (!track) this.untracked.add(target);
    const targets = this.performed.get(template) ?? new Set<string>();
    targets.add(target);
    this.performed.set(template, targets);
    return true;
  }

  /**
   * True if `template` has been compiled by this action.
   */
  manages(template: string): boolean {
    return this.performed.has(template);
  }

  /**
   * Compile `template` again into every target it was compiled to.
   */
  recompile(template: string, options: ExecuteOptions = {}): Map<string, string> {
    const mapping = new Map<string, string>();
    for (const target of this.performed.get(template) ?? []) {
      if (options.dryRun) {
        this.skipped(`[Compiling] Template: "${template}" -> Target: "${target}"`);
        mapping.set(template, target);
      } else if (this.compileFile(template, target, !this.untracked.has(target))) {
        mapping.set(template, target);
      }
    }
    return mapping;
  }

  /**
   * Template path mapped to every target it has been compiled to.
   */
  performedCompilations(): Map<string, Set<string>> {
    return new Map([...this.performed].map(([template, targets]) => [template, new Set(targets)]));
  }
}
