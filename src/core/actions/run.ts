import { z } from 'zod';

import type { ExecuteOptions, ShellResult } from '../types.js';
import { runShell } from '../../lib/exec.js';
import { Action, type ActionContext } from './action.js';

export const runOptionsSchema = z
  .object({
    shell: z.string().min(1),
    timeout: z.number().nonnegative().optional(),
  })
  .strict();

export type RunOptions = z.output<typeof runOptionsSchema>;

/**
 * Run a shell command in the action directory. Timeouts and non-zero exit
 * codes are logged, never thrown.
 */
export class RunAction extends Action<RunOptions, Promise<ShellResult | undefined>> {
  constructor(options: unknown, context: ActionContext) {
    super('run', options, runOptionsSchema, context);
  }

  async execute(options: ExecuteOptions = {}): Promise<ShellResult | undefined> {
    if (!this.options) return undefined;

    const command = this.option(this.options.shell);
    if (options.dryRun) {
      this.logger.info({ module: this.context.module, command }, `SKIPPED: Running command "${command}".`);
      return [command, ''];
    }

    const timeout = this.options.timeout || options.defaultTimeout || 0;
    this.logger.info({ module: this.context.module, command }, `Running command "${command}".`);
    const stdout = await runShell(command, {
      cwd: this.directory,
      timeout,
      logger: this.logger,
      env: this.context.env,
    });
    return [command, stdout];
  }
}
