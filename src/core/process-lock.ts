import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { errorCode, errorMessage } from './errors.js';
import { YamlFileStore } from './state.js';
import type { Logger } from './types.js';

export const PID_FILE_NAME = 'solstice.pid';

const processIdentitySchema = z.object({
  pid: z.number().int().positive().optional(),
  create_time: z.number().optional(),
  username: z.string().optional(),
});

export type ProcessIdentity = z.output<typeof processIdentitySchema>;

export function currentProcessIdentity(): ProcessIdentity {
  return {
    pid: process.pid,
    create_time: Math.round(Date.now() / 1000 - process.uptime()),
    username: os.userInfo().username,
  };
}

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive, but owned by someone else.
    return errorCode(error) === 'EPERM';
  }
}

// Guards against a recycled pid now belonging to an unrelated program.
function looksLikeSolstice(pid: number): boolean {
  try {
    return fs.readFileSync(`/proc/${pid}/cmdline`, 'utf8').includes('solstice');
  } catch {
    return !fs.existsSync('/proc');
  }
}

/**
 * Remembers the running instance in `solstice.pid` so that a new instance
 * can terminate the previous one.
 */
export class ProcessLock {
  private readonly store: YamlFileStore<typeof processIdentitySchema>;

  constructor(
    dataDirectory: string,
    private readonly logger: Logger,
  ) {
    this.store = new YamlFileStore(path.join(dataDirectory, PID_FILE_NAME), processIdentitySchema, logger);
  }

  get filePath(): string {
    return this.store.filePath;
  }

  previous(): ProcessIdentity {
    return this.store.read();
  }

  /**
   * Terminate the previously recorded instance, if it still runs, and record
   * this process instead.
   */
  acquire(): void {
    const previous = this.previous();
    const current = currentProcessIdentity();
    const pid = previous.pid;

    if (
      pid !== undefined &&
      pid !== current.pid &&
      previous.username === current.username &&
      isRunning(pid) &&
      looksLikeSolstice(pid)
    ) {
      this.logger.info({ pid }, `Killing duplicate solstice process with pid ${pid}`);
      try {
        process.kill(pid, 'SIGTERM');
      } catch (error) {
        this.logger.error({ pid, error: errorMessage(error) }, `Could not kill process with pid ${pid}`);
      }
    }

    this.store.write(current);
  }
}
