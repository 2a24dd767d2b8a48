/**
 * Stand-in for chokidar: watchers never touch the filesystem. Tests emit
 * 'change' events on them directly.
 */
import { EventEmitter } from 'node:events';

export class MockWatcher extends EventEmitter {
  readonly close = jest.fn(() => Promise.resolve());

  constructor(readonly paths: string[]) {
    super();
    setImmediate(() => this.emit('ready'));
  }
}

export const watch = jest.fn((paths: string | string[]) => new MockWatcher([paths].flat()));
