import path from 'node:path';
import { z } from 'zod';

import { BLOCK_NAMES, type BlockName } from '../types.js';
import { Action, type ActionContext } from './action.js';

export const triggerOptionsSchema = z
  .object({
    block: z.enum(BLOCK_NAMES),
    path: z.string().min(1).optional(),
  })
  .strict()
  .refine((options) => options.block !== 'on_modified' || options.path !== undefined, {
    message: 'on_modified triggers need a path',
    path: ['path'],
  });

export type TriggerOptions = z.output<typeof triggerOptionsSchema>;

/**
 * Instruction to execute another block of the same module.
 */
export interface Trigger {
  block: BlockName;
  /** Path as written in the configuration, for on_modified blocks. */
  specifiedPath?: string;
  /** Relative to the module directory. */
  relativePath?: string;
  absolutePath?: string;
}

export class TriggerAction extends Action<TriggerOptions, Trigger | undefined> {
  constructor(options: unknown, context: ActionContext) {
    super('trigger', options, triggerOptionsSchema, context);
  }

  execute(): Trigger | undefined {
    if (!this.options) return undefined;

    const block = this.options.block;
    if (block !== 'on_modified' || this.options.path === undefined) return { block };

    const specifiedPath = this.option(this.options.path);
    const absolutePath = this.pathOption(this.options.path);
    return {
      block,
      specifiedPath,
      relativePath: path.relative(this.directory, absolutePath),
      absolutePath,
    };
  }
}
