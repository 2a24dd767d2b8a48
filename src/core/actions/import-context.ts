import { z } from 'zod';

import { errorMessage } from '../errors.js';
import type { ExecuteOptions } from '../types.js';
import { Action, type ActionContext } from './action.js';

export const importContextOptionsSchema = z
  .object({
    from_path: z.string().min(1),
    from_section: z.string().optional(),
    to_section: z.string().optional(),
  })
  .strict();

export type ImportContextOptions = z.output<typeof importContextOptionsSchema>;

/**
 * Merge sections of a context file into the shared context store. The
 * import also happens in dry runs, since it only touches memory.
 */
export class ImportContextAction extends Action<ImportContextOptions, void> {
  constructor(options: unknown, context: ActionContext) {
    super('import_context', options, importContextOptionsSchema, context);
  }

  execute(_options?: ExecuteOptions): void {
    if (!this.options) return;

    const fromPath = this.pathOption(this.options.from_path);
    const fromSection =
      this.options.from_section === undefined ? undefined : this.option(this.options.from_section);
    const toSection =
      this.options.to_section === undefined ? undefined : this.option(this.options.to_section);

    this.logger.info(
      { module: this.context.module, fromPath, fromSection, toSection },
      `[import_context] Importing context section ${fromSection ?? '(all)'} from "${fromPath}"`,
    );
    try {
      this.context.contextStore.importContext(
        { fromPath, fromSection, toSection },
        this.context.contextLoader,
      );
    } catch (error) {
      this.logger.error(
        { module: this.context.module, fromPath, error: errorMessage(error) },
        `Could not import context from "${fromPath}"`,
      );
    }
  }
}
