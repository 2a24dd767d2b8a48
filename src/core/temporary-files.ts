import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import { errorMessage } from './errors.js';
import type { Logger } from './types.js';
import { resolveTempDirectory } from '../lib/paths.js';

/**
 * Files and directories that live as long as the module manager, used as
 * compile targets when none is configured.
 */
export class TemporaryFiles {
  private readonly created: string[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly directory: string = resolveTempDirectory(),
  ) {}

  private allocate(name: string): string {
    fs.mkdirSync(this.directory, { recursive: true });
    const target = path.join(this.directory, `${name}-${randomBytes(4).toString('hex')}`);
    this.created.push(target);
    return target;
  }

  createFile(name: string): string {
    const target = this.allocate(name);
    fs.writeFileSync(target, '');
    return target;
  }

  createDirectory(name: string): string {
    const target = this.allocate(name);
    fs.mkdirSync(target);
    return target;
  }

  get paths(): readonly string[] {
    return this.created;
  }

  closeAll(): void {
    for (const target of this.created.splice(0)) {
      try {
        fs.rmSync(target, { recursive: true, force: true });
      } catch (error) {
        this.logger.warn({ target, error: errorMessage(error) }, 'Could not remove temporary file');
      }
    }
  }
}
