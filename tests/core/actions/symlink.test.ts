import fs from 'node:fs';
import path from 'node:path';

import { SymlinkAction } from '../../../src/core/actions/symlink.js';
import { createActionContext } from '../../mocks/actions.js';
import { loggedMessages, makeTempDirectory, removeTempDirectories, writeFiles } from '../../mocks/index.js';

describe('SymlinkAction', () => {
  let directory: string;

  beforeEach(() => {
    directory = makeTempDirectory();
    writeFiles(directory, { 'content/file1': 'one', 'content/sub/file2': 'two' });
  });

  afterEach(() => {
    removeTempDirectories();
  });

  it('should link every file of a directory', () => {
    const context = createActionContext(directory);
    const action = new SymlinkAction({ content: 'content', target: 'links' }, context);

    action.execute();

    const link = path.join(directory, 'links', 'sub', 'file2');
    expect(fs.lstatSync(link).isSymbolicLink()).toBe(true);
    expect(fs.readlinkSync(link)).toBe(path.join(directory, 'content', 'sub', 'file2'));
    expect(fs.readFileSync(link, 'utf8')).toBe('two');
    expect(context.createdFiles.read().test?.[link]?.method).toBe('symlinked');
  });

  it('should keep links that already point to the content', () => {
    const context = createActionContext(directory);
    const action = new SymlinkAction({ content: 'content/file1', target: 'link' }, context);
    action.execute();
    context.logger.info.mockClear();

    const mapping = action.execute();

    expect(mapping.get(path.join(directory, 'content', 'file1'))).toBe(path.join(directory, 'link'));
    expect(context.logger.info).not.toHaveBeenCalled();
  });

  it('should back up a replaced file and restore it on cleanup', () => {
    writeFiles(directory, { link: 'original' });
    const context = createActionContext(directory);
    const action = new SymlinkAction({ content: 'content/file1', target: 'link' }, context);

    action.execute();
    expect(fs.readFileSync(path.join(directory, 'link'), 'utf8')).toBe('one');

    context.createdFiles.cleanup('test');
    const restored = path.join(directory, 'link');
    expect(fs.lstatSync(restored).isSymbolicLink()).toBe(false);
    expect(fs.readFileSync(restored, 'utf8')).toBe('original');
  });

  it('should replace a stale link', () => {
    fs.symlinkSync(path.join(directory, 'content', 'sub', 'file2'), path.join(directory, 'link'));
    const context = createActionContext(directory);
    context.createdFiles.insert('test', 'symlinked', [['/old', path.join(directory, 'link')]]);

    new SymlinkAction({ content: 'content/file1', target: 'link' }, context).execute();

    expect(fs.readlinkSync(path.join(directory, 'link'))).toBe(path.join(directory, 'content', 'file1'));
  });

  it('should leave the filesystem alone in dry run', () => {
    const context = createActionContext(directory);

    new SymlinkAction({ content: 'content/file1', target: 'link' }, context).execute({ dryRun: true });

    expect(fs.existsSync(path.join(directory, 'link'))).toBe(false);
    expect(loggedMessages(context.logger, 'info')).toEqual([
      `SKIPPED: [Symlinking] Link: "${path.join(directory, 'link')}" -> Content: "${path.join(directory, 'content', 'file1')}"`,
    ]);
  });
});
