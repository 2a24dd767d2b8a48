import type { ExecutedActions } from '../persistence.js';
import {
  ACTION_TYPES,
  isConfigObject,
  type ActionSelector,
  type ActionType,
  type ExecuteOptions,
  type ShellResult,
} from '../types.js';
import { errorMessage } from '../errors.js';
import type { ActionContext, Executable } from './action.js';
import { CompileAction } from './compile.js';
import { CopyAction } from './copy.js';
import { ImportContextAction } from './import-context.js';
import { RunAction } from './run.js';
import { SetupAction } from './setup.js';
import { StowAction } from './stow.js';
import { SymlinkAction } from './symlink.js';
import { TriggerAction, type Trigger } from './trigger.js';

export interface BlockExecuteOptions extends ExecuteOptions {
  action?: ActionSelector;
}

const BLOCK_KEYS = new Set<string>([...ACTION_TYPES, 'trigger']);

function optionList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

type FileExecutable = Executable<Map<string, string> | undefined>;
type RunExecutable = Executable<Promise<ShellResult | undefined> | undefined>;

/**
 * The actions one lifecycle phase of a module declares, executed kind by
 * kind in a fixed order. With a setup ledger every action runs at most once
 * per configuration.
 */
export class ActionBlock {
  private readonly imports: Array<Executable<void | undefined>> = [];
  private readonly fileActions: Record<'compile' | 'copy' | 'symlink' | 'stow', FileExecutable[]> = {
    compile: [],
    copy: [],
    symlink: [],
    stow: [],
  };
  private readonly runs: RunExecutable[] = [];
  private readonly triggerActions: TriggerAction[] = [];

  // Unwrapped, so that modified sources can be processed again.
  private readonly compileActions: CompileAction[] = [];
  private readonly copyActions: CopyAction[] = [];

  constructor(
    readonly name: string,
    config: unknown,
    private readonly context: ActionContext,
    private readonly ledger?: ExecutedActions,
  ) {
    if (config === undefined || config === null) return;
    if (!isConfigObject(config)) {
      context.logger.error(
        { module: context.module, block: name },
        `[module/${context.module}] Action block "${name}" must be a mapping, ignoring it`,
      );
      return;
    }

    for (const key of Object.keys(config)) {
      if (!BLOCK_KEYS.has(key)) {
        context.logger.warn(
          { module: context.module, block: name, key },
          `[module/${context.module}] Unknown action type "${key}" in block "${name}"`,
        );
      }
    }

    for (const options of optionList(config.import_context)) {
      this.imports.push(this.gated(new ImportContextAction(options, context)));
    }
    for (const options of optionList(config.compile)) {
      const action = new CompileAction(options, context);
      this.compileActions.push(action);
      this.fileActions.compile.push(this.gated(action));
    }
    for (const options of optionList(config.copy)) {
      const action = new CopyAction(options, context);
      this.copyActions.push(action);
      this.fileActions.copy.push(this.gated(action));
    }
    for (const options of optionList(config.symlink)) {
      this.fileActions.symlink.push(this.gated(new SymlinkAction(options, context)));
    }
    for (const options of optionList(config.stow)) {
      const action = new StowAction(options, context);
      if (action.compileAction) this.compileActions.push(action.compileAction);
      if (action.nonTemplateAction instanceof CopyAction) this.copyActions.push(action.nonTemplateAction);
      this.fileActions.stow.push(this.gated(action));
    }
    for (const options of optionList(config.run)) {
      this.runs.push(this.gated(new RunAction(options, context)));
    }
    for (const options of optionList(config.trigger)) {
      this.triggerActions.push(new TriggerAction(options, context));
    }
  }

  private gated<R>(action: Executable<R> & { readonly rawOptions: unknown }): Executable<R | undefined> {
    return this.ledger ? new SetupAction(action, this.ledger) : action;
  }

  private attempt<R>(type: ActionType | 'trigger', run: () => R): R | undefined {
    try {
      return run();
    } catch (error) {
      this.context.logger.error(
        { module: this.context.module, block: this.name, action: type, error: errorMessage(error) },
        `[module/${this.context.module}] ${type} action failed in block "${this.name}"`,
      );
      return undefined;
    }
  }

  /**
   * Execute one action kind, or all kinds in order. Returns the results of
   * the Run actions that executed.
   */
  async execute(options: BlockExecuteOptions = {}): Promise<ShellResult[]> {
    const selected = options.action ?? 'all';
    const executeOptions: ExecuteOptions = {
      dryRun: options.dryRun,
      defaultTimeout: options.defaultTimeout,
    };
    const results: ShellResult[] = [];

    for (const type of selected === 'all' ? ACTION_TYPES : [selected]) {
      if (type === 'import_context') {
        for (const action of this.imports) this.attempt(type, () => action.execute(executeOptions));
      } else if (type === 'run') {
        for (const action of this.runs) {
          try {
            const result = await action.execute(executeOptions);
            if (result) results.push(result);
          } catch (error) {
            this.context.logger.error(
              { module: this.context.module, block: this.name, action: type, error: errorMessage(error) },
              `[module/${this.context.module}] run action failed in block "${this.name}"`,
            );
          }
        }
      } else {
        for (const action of this.fileActions[type]) this.attempt(type, () => action.execute(executeOptions));
      }
    }

    if (this.ledger && !options.dryRun) this.ledger.write();
    return results;
  }

  async importContext(options: ExecuteOptions = {}): Promise<void> {
    await this.execute({ ...options, action: 'import_context' });
  }

  async compile(options: ExecuteOptions = {}): Promise<void> {
    await this.execute({ ...options, action: 'compile' });
  }

  async copy(options: ExecuteOptions = {}): Promise<void> {
    await this.execute({ ...options, action: 'copy' });
  }

  async symlink(options: ExecuteOptions = {}): Promise<void> {
    await this.execute({ ...options, action: 'symlink' });
  }

  async stow(options: ExecuteOptions = {}): Promise<void> {
    await this.execute({ ...options, action: 'stow' });
  }

  run(options: ExecuteOptions = {}): Promise<ShellResult[]> {
    return this.execute({ ...options, action: 'run' });
  }

  /**
   * Blocks this block asks its module to execute as well.
   */
  triggers(): Trigger[] {
    const triggers: Trigger[] = [];
    for (const action of this.triggerActions) {
      const trigger = this.attempt('trigger', () => action.execute());
      if (trigger) triggers.push(trigger);
    }
    return triggers;
  }

  performedCompilations(): Map<string, Set<string>> {
    const compilations = new Map<string, Set<string>>();
    for (const action of this.compileActions) {
      for (const [template, targets] of action.performedCompilations()) {
        const merged = compilations.get(template) ?? new Set<string>();
        for (const target of targets) merged.add(target);
        compilations.set(template, merged);
      }
    }
    return compilations;
  }

  /**
   * Compile or copy `source` again wherever this block has put it before.
   * True if any action handled it.
   */
  reprocess(source: string, options: ExecuteOptions = {}): boolean {
    let handled = false;
    for (const action of this.compileActions) {
      if (!action.manages(source)) continue;
      handled = true;
      this.attempt('compile', () => action.recompile(source, options));
    }
    for (const action of this.copyActions) {
      if (!action.manages(source)) continue;
      handled = true;
      this.attempt('copy', () => action.recopy(source, options));
    }
    return handled;
  }

  isEmpty(): boolean {
    const actions: Array<{ nullObject: boolean }> = [
      ...this.imports,
      ...Object.values(this.fileActions).flat(),
      ...this.runs,
      ...this.triggerActions,
    ];
    return actions.every((action) => action.nullObject);
  }
}
