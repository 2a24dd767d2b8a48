import type { ExecutedActions } from '../persistence.js';
import type { ExecuteOptions } from '../types.js';
import type { Executable } from './action.js';

/**
 * Runs the wrapped action only the first time its configuration is seen
 * for the module, across process lifetimes.
 */
export class SetupAction<R> implements Executable<R | undefined> {
  constructor(
    private readonly action: Executable<R> & { readonly rawOptions: unknown },
    private readonly ledger: ExecutedActions,
  ) {}

  get type(): Executable<R>['type'] {
    return this.action.type;
  }

  get nullObject(): boolean {
    return this.action.nullObject;
  }

  execute(options?: ExecuteOptions): R | undefined {
    if (this.action.nullObject) return undefined;
    const type = this.action.type;
    if (type !== 'trigger' && !this.ledger.isNew(type, this.action.rawOptions)) return undefined;
    return this.action.execute(options);
  }
}
