import { watch } from 'chokidar';

import { DirectoryWatcher } from '../../src/core/directory-watcher.js';
import { createMockLogger, loggedMessages } from '../mocks/index.js';

jest.mock('chokidar', () => jest.requireActual('../mocks/chokidar'));

function lastWatcher() {
  const result = jest.mocked(watch).mock.results.at(-1);
  if (result?.type !== 'return') throw new Error('No watcher was started');
  return result.value;
}

describe('DirectoryWatcher', () => {
  beforeEach(() => {
    jest.mocked(watch).mockClear();
  });

  it('should watch each directory once, without initial events', async () => {
    const watcher = new DirectoryWatcher({ directories: ['/config', '/config', '/modules'], onModified: jest.fn(), logger: createMockLogger() });

    await watcher.start();

    expect(watcher.watching).toBe(true);
    expect(jest.mocked(watch)).toHaveBeenCalledWith(['/config', '/modules'], expect.objectContaining({ ignoreInitial: true }));
    await watcher.stop();
  });

  it('should report changed files only', async () => {
    const onModified = jest.fn();
    const watcher = new DirectoryWatcher({ directories: ['/config'], onModified, logger: createMockLogger() });
    await watcher.start();

    lastWatcher().emit('add', '/config/new.yml');
    lastWatcher().emit('change', '/config/solstice.yml');

    expect(onModified.mock.calls).toEqual([['/config/solstice.yml']]);
    await watcher.stop();
  });

  it('should log watcher errors', async () => {
    const logger = createMockLogger();
    const watcher = new DirectoryWatcher({ directories: ['/config'], onModified: jest.fn(), logger });
    await watcher.start();

    lastWatcher().emit('error', new Error('EMFILE'));

    expect(loggedMessages(logger, 'error')).toEqual(['Directory watcher failed']);
    await watcher.stop();
  });

  it('should start once and close on stop', async () => {
    const watcher = new DirectoryWatcher({ directories: ['/config'], onModified: jest.fn(), logger: createMockLogger() });

    await watcher.start();
    await watcher.start();
    const chokidarWatcher = lastWatcher();
    await watcher.stop();
    await watcher.stop();

    expect(jest.mocked(watch)).toHaveBeenCalledTimes(1);
    expect(jest.mocked(chokidarWatcher.close)).toHaveBeenCalledTimes(1);
    expect(watcher.watching).toBe(false);
  });
});
