import { watch, type FSWatcher } from 'chokidar';

import { errorMessage } from './errors.js';
import type { Logger } from './types.js';

export interface DirectoryWatcherOptions {
  directories: string[];
  /** Called with the absolute path of every file whose content changed. */
  onModified: (filePath: string) => void;
  logger: Logger;
}

/**
 * Recursive watch of the configuration directories. Only content changes
 * of existing files are reported.
 */
export class DirectoryWatcher {
  private watcher: FSWatcher | undefined;

  constructor(private readonly options: DirectoryWatcherOptions) {}

  get watching(): boolean {
    return this.watcher !== undefined;
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    const directories = [...new Set(this.options.directories)];
    const watcher = watch(directories, {
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 50 },
    });
    this.watcher = watcher;

    watcher.on('change', (filePath: string) => {
      this.options.logger.debug({ path: filePath }, `File modified: "${filePath}"`);
      this.options.onModified(filePath);
    });
    watcher.on('error', (error: unknown) => {
      this.options.logger.error({ error: errorMessage(error) }, 'Directory watcher failed');
    });

    await new Promise<void>((resolve) => {
      watcher.on('ready', resolve);
    });
    this.options.logger.debug({ directories }, 'Watching configuration directories');
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    if (!watcher) return;
    this.watcher = undefined;
    await watcher.close();
  }
}
