import { z } from 'zod';

import type { ExecuteOptions } from '../types.js';
import { Action, type ActionContext, type Executable } from './action.js';
import { CompileAction, permissionsSchema } from './compile.js';
import { CopyAction } from './copy.js';
import { SymlinkAction } from './symlink.js';

export const stowOptionsSchema = z
  .object({
    content: z.string().min(1),
    target: z.string().optional(),
    templates: z.string().default('template\\.(.+)'),
    non_templates: z.enum(['symlink', 'copy', 'ignore']).default('symlink'),
    permissions: permissionsSchema.optional(),
  })
  .strict();

export type StowOptions = z.output<typeof stowOptionsSchema>;

/**
 * Compile the templates of a directory and symlink, copy or ignore the
 * rest, keeping the directory structure under the target.
 */
export class StowAction extends Action<StowOptions, Map<string, string>> {
  readonly compileAction: CompileAction | undefined;
  readonly nonTemplateAction: Executable<Map<string, string>> | undefined;

  constructor(options: unknown, context: ActionContext) {
    super('stow', options, stowOptionsSchema, context);
    if (!this.options) return;

    const { content, templates, permissions } = this.options;
    const target = this.options.target ?? '.';
    this.compileAction = new CompileAction(
      { content, target, include: templates, ...(permissions === undefined ? {} : { permissions }) },
      context,
    );

    // Every base name the templates pattern does not match.
    const include = `(?!(?:${templates})).+`;
    if (this.options.non_templates === 'copy') {
      this.nonTemplateAction = new CopyAction(
        { content, target, include, ...(permissions === undefined ? {} : { permissions }) },
        context,
      );
    } else if (this.options.non_templates === 'symlink') {
      this.nonTemplateAction = new SymlinkAction({ content, target, include }, context);
    }
  }

  execute(options: ExecuteOptions = {}): Map<string, string> {
    const mapping = new Map<string, string>();
    for (const action of [this.compileAction, this.nonTemplateAction]) {
      for (const [content, target] of action?.execute(options) ?? []) mapping.set(content, target);
    }
    return mapping;
  }
}
