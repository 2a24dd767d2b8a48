import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';

import { CompileAction } from '../../../src/core/actions/compile.js';
import { ContextStore } from '../../../src/core/context-store.js';
import { ConfigurationError } from '../../../src/core/errors.js';
import { createActionContext } from '../../mocks/actions.js';
import { loggedMessages, makeTempDirectory, removeTempDirectories, writeFiles } from '../../mocks/index.js';

/**
 * Rewrite a file and move its modification time forward, so that cached
 * templates are read again.
 */
function touch(file: string, content: string): void {
  fs.writeFileSync(file, content);
  const later = new Date(Date.now() + 10_000);
  fs.utimesSync(file, later, later);
}

describe('CompileAction', () => {
  let directory: string;

  beforeEach(() => {
    directory = makeTempDirectory();
    writeFiles(directory, { 'template.txt': 'hello {{name}}' });
  });

  afterEach(() => {
    removeTempDirectories();
  });

  const contextWithName = () =>
    createActionContext(directory, { contextStore: new ContextStore({ name: 'world' }) });

  it('should render the template into the target and track it', () => {
    const context = contextWithName();
    const action = new CompileAction({ content: 'template.txt', target: 'out/result.txt' }, context);
    const template = path.join(directory, 'template.txt');
    const target = path.join(directory, 'out', 'result.txt');

    const mapping = action.execute();

    expect(mapping).toEqual(new Map([[template, target]]));
    expect(fs.readFileSync(target, 'utf8')).toBe('hello world');
    expect(context.createdFiles.read().test).toEqual({
      [path.join(directory, 'out')]: { content: null, method: 'mkdir', hash: null, backup: null },
      [target]: expect.objectContaining({ content: template, method: 'compiled', backup: null }),
    });
    expect(action.performedCompilations()).toEqual(new Map([[template, new Set([target])]]));
  });

  it('should reuse one temporary target when none is configured', () => {
    const context = contextWithName();
    const action = new CompileAction({ content: 'template.txt' }, context);

    const first = action.execute().get(path.join(directory, 'template.txt'));
    const second = action.execute().get(path.join(directory, 'template.txt'));

    expect(first).toBeDefined();
    expect(second).toBe(first);
    expect(path.dirname(first ?? '')).toBe(path.join(directory, '.tmp'));
    expect(fs.readFileSync(first ?? '', 'utf8')).toBe('hello world');
    expect(context.createdFiles.read()).toEqual({});
  });

  it('should compile the matching templates of a directory under renamed targets', () => {
    writeFiles(directory, {
      'templates/template.a': 'A {{name}}',
      'templates/nested/template.b': 'B',
      'templates/plain': 'ignored',
    });
    const context = contextWithName();
    const action = new CompileAction(
      { content: 'templates', target: 'out', include: 'template\\.(.+)' },
      context,
    );

    const mapping = action.execute();

    expect([...mapping.values()]).toEqual([
      path.join(directory, 'out', 'nested', 'b'),
      path.join(directory, 'out', 'a'),
    ]);
    expect(fs.readFileSync(path.join(directory, 'out', 'a'), 'utf8')).toBe('A world');
    expect(fs.existsSync(path.join(directory, 'out', 'plain'))).toBe(false);
  });

  it('should substitute environment variables and placeholders in paths', () => {
    const context = createActionContext(directory, {
      env: { SOLSTICE_TEST_OUT: 'from-env' },
      replacer: (value) => value.replace('{event}', 'night'),
    });
    const action = new CompileAction({ content: 'template.txt', target: '$SOLSTICE_TEST_OUT/{event}.txt' }, context);

    action.execute();

    expect(fs.existsSync(path.join(directory, 'from-env', 'night.txt'))).toBe(true);
  });

  it('should log an error for missing templates', () => {
    const context = contextWithName();
    const action = new CompileAction({ content: 'missing.txt', target: 'out' }, context);

    expect(action.execute().size).toBe(0);
    expect(loggedMessages(context.logger, 'error')).toEqual([
      `Could not compile template "${path.join(directory, 'missing.txt')}". No such path!`,
    ]);
  });

  it('should only log what it would do in dry run', () => {
    const context = contextWithName();
    const action = new CompileAction({ content: 'template.txt', target: 'out/result.txt' }, context);
    const target = path.join(directory, 'out', 'result.txt');

    const mapping = action.execute({ dryRun: true });

    expect(mapping.get(path.join(directory, 'template.txt'))).toBe(target);
    expect(fs.existsSync(path.join(directory, 'out'))).toBe(false);
    expect(loggedMessages(context.logger, 'info')).toEqual([
      `SKIPPED: [Compiling] Template: "${path.join(directory, 'template.txt')}" -> Target: "${target}"`,
    ]);
    expect(context.createdFiles.read()).toEqual({});
  });

  it('should back up an existing target and restore it on cleanup', () => {
    writeFiles(directory, { 'config.txt': 'original' });
    const context = contextWithName();
    const action = new CompileAction({ content: 'template.txt', target: 'config.txt' }, context);
    const target = path.join(directory, 'config.txt');

    action.execute();
    expect(fs.readFileSync(target, 'utf8')).toBe('hello world');

    context.createdFiles.cleanup('test');
    expect(fs.readFileSync(target, 'utf8')).toBe('original');
  });

  it('should compile a modified template again into the same targets', () => {
    const context = contextWithName();
    const action = new CompileAction({ content: 'template.txt', target: 'result.txt' }, context);
    const template = path.join(directory, 'template.txt');
    action.execute();

    touch(template, 'goodbye {{name}}');

    expect(action.manages(template)).toBe(true);
    expect(action.recompile(template)).toEqual(new Map([[template, path.join(directory, 'result.txt')]]));
    expect(fs.readFileSync(path.join(directory, 'result.txt'), 'utf8')).toBe('goodbye world');
    expect(action.manages(path.join(directory, 'other.txt'))).toBe(false);
  });

  it('should apply configured permissions', () => {
    const action = new CompileAction(
      { content: 'template.txt', target: 'script.sh', permissions: '700' },
      contextWithName(),
    );

    action.execute();

    expect(fs.statSync(path.join(directory, 'script.sh')).mode & 0o777).toBe(0o700);
  });

  it('should read integer permissions from YAML as octal', () => {
    const options: unknown = YAML.parse('content: template.txt\ntarget: script.sh\npermissions: 755\n');
    const action = new CompileAction(options, contextWithName());

    action.execute();

    expect(fs.statSync(path.join(directory, 'script.sh')).mode & 0o7777).toBe(0o755);
  });

  it('should log templates that fail to render', () => {
    writeFiles(directory, { 'broken.txt': '{{#if}}' });
    const context = contextWithName();
    const action = new CompileAction({ content: 'broken.txt', target: 'out.txt' }, context);

    expect(action.execute().size).toBe(0);
    expect(loggedMessages(context.logger, 'error')).toEqual([
      `Could not compile template "${path.join(directory, 'broken.txt')}" to target "${path.join(directory, 'out.txt')}"`,
    ]);
  });

  it('should do nothing without options', () => {
    const action = new CompileAction({}, contextWithName());

    expect(action.nullObject).toBe(true);
    expect(action.execute().size).toBe(0);
  });

  it('should reject unknown options', () => {
    expect(() => new CompileAction({ content: 'template.txt', into: 'x' }, contextWithName())).toThrow(
      ConfigurationError,
    );
  });
});
