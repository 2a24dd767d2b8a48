import path from 'node:path';

import { TriggerAction } from '../../../src/core/actions/trigger.js';
import { ConfigurationError } from '../../../src/core/errors.js';
import { createActionContext } from '../../mocks/actions.js';

describe('TriggerAction', () => {
  const directory = path.join(path.sep, 'modules', 'theme');

  it('should name the triggered block', () => {
    const action = new TriggerAction({ block: 'on_event' }, createActionContext(directory));

    expect(action.execute()).toEqual({ block: 'on_event' });
  });

  it('should resolve the path of on_modified triggers', () => {
    const action = new TriggerAction({ block: 'on_modified', path: 'colors.yml' }, createActionContext(directory));

    expect(action.execute()).toEqual({
      block: 'on_modified',
      specifiedPath: 'colors.yml',
      relativePath: 'colors.yml',
      absolutePath: path.join(directory, 'colors.yml'),
    });
  });

  it('should make on_modified paths relative to the module directory', () => {
    const absolute = path.join(directory, 'colors', 'dark.yml');
    const action = new TriggerAction({ block: 'on_modified', path: absolute }, createActionContext(directory));

    expect(action.execute()).toEqual({
      block: 'on_modified',
      specifiedPath: absolute,
      relativePath: path.join('colors', 'dark.yml'),
      absolutePath: absolute,
    });
  });

  it('should require a path for on_modified triggers', () => {
    expect(() => new TriggerAction({ block: 'on_modified' }, createActionContext(directory))).toThrow(
      ConfigurationError,
    );
  });

  it('should reject unknown blocks', () => {
    expect(() => new TriggerAction({ block: 'on_boot' }, createActionContext(directory))).toThrow(ConfigurationError);
  });
});
