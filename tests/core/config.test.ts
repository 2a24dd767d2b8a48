/**
 * Tests for configuration loading
 * Files live in a throwaway configuration directory
 */
import fs from 'node:fs';
import path from 'node:path';

import {
  collectModules,
  contextFromConfig,
  EnabledModules,
  loadTemplatedYamlFile,
  loadYamlFile,
  moduleSections,
  parseGlobalSettings,
  parseYaml,
  preprocessYaml,
  userConfiguration,
} from '../../src/core/config.js';
import { ContextStore } from '../../src/core/context-store.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { TemplateManager } from '../../src/core/template-manager.js';
import {
  createMockLogger,
  makeTempDirectory,
  removeTempDirectories,
  writeFiles,
} from '../mocks/index.js';

afterEach(() => {
  removeTempDirectories();
});

describe('preprocessYaml', () => {
  it('should substitute environment variables and leave unknown ones', () => {
    const text = 'home: ${HOME_DIR}\nother: ${NOT_SET}';

    expect(preprocessYaml(text, { env: { HOME_DIR: '/home/test' } })).toBe(
      'home: /home/test\nother: ${NOT_SET}',
    );
  });

  it('should substitute command output', () => {
    expect(preprocessYaml('greeting: $(echo hello)', { env: process.env })).toBe('greeting: hello');
  });
});

describe('parseYaml', () => {
  it('should return an empty mapping for empty documents', () => {
    expect(parseYaml('', 'empty.yml')).toEqual({});
  });

  it('should reject documents that are not mappings', () => {
    expect(() => parseYaml('- a\n- b\n', 'list.yml')).toThrow('list.yml must contain a mapping at its root');
  });

  it('should wrap syntax errors', () => {
    expect(() => parseYaml('a: [b', 'broken.yml')).toThrow(ConfigurationError);
  });
});

describe('loadYamlFile', () => {
  it('should preprocess and parse the file', () => {
    const directory = makeTempDirectory();
    writeFiles(directory, { 'a.yml': 'name: ${WHO}\nnested:\n  key: 1\n' });

    expect(loadYamlFile(path.join(directory, 'a.yml'), { env: { WHO: 'me' } })).toEqual({
      name: 'me',
      nested: { key: 1 },
    });
  });
});

describe('loadTemplatedYamlFile', () => {
  it('should render the file against the context before parsing it', () => {
    const directory = makeTempDirectory();
    writeFiles(directory, { 'ctx.yml': 'colors:\n  fg: {{palette.[2]}}\n' });
    const context = new ContextStore({ palette: { 1: 'red' } });

    const loaded = loadTemplatedYamlFile(
      path.join(directory, 'ctx.yml'),
      context,
      new TemplateManager(createMockLogger(), {}),
      { env: {} },
    );

    expect(loaded).toEqual({ colors: { fg: 'red' } });
  });
});

describe('parseGlobalSettings', () => {
  it('should apply defaults', () => {
    expect(parseGlobalSettings({}, '/config')).toEqual({
      hotReloadConfig: false,
      startupDelay: 0,
      runTimeout: 0,
      requiresTimeout: 1,
      reprocessModifiedFiles: false,
      modulesDirectory: '/config/modules',
      enabledModules: ['*', '*::*'],
    });
  });

  it('should read both settings sections', () => {
    const settings = parseGlobalSettings(
      {
        'config/solstice': { hot_reload_config: true, startup_delay: 3 },
        'config/modules': {
          run_timeout: 5,
          recompile_modified_templates: true,
          modules_directory: '/elsewhere',
          enabled_modules: ['main', { name: 'themes::*' }],
        },
      },
      '/config',
    );

    expect(settings).toEqual({
      hotReloadConfig: true,
      startupDelay: 3,
      runTimeout: 5,
      requiresTimeout: 1,
      reprocessModifiedFiles: true,
      modulesDirectory: '/elsewhere',
      enabledModules: ['main', 'themes::*'],
    });
  });

  it('should reject invalid settings', () => {
    expect(() => parseGlobalSettings({ 'config/modules': { run_timeout: 'soon' } }, '/config')).toThrow(
      /Invalid "config\/modules" section: run_timeout/,
    );
  });
});

describe('sections', () => {
  it('should strip the module/ prefix', () => {
    expect(moduleSections({ 'module/a': { x: 1 }, 'context/b': {}, 'module/': {} })).toEqual({ a: { x: 1 } });
  });

  it('should build the context from context/ sections', () => {
    expect(contextFromConfig({ 'context/colors': { fg: 'red' }, 'module/a': {} }).toObject()).toEqual({
      colors: { fg: 'red' },
    });
  });
});

describe('EnabledModules', () => {
  let modulesDirectory: string;

  beforeEach(() => {
    modulesDirectory = makeTempDirectory();
    writeFiles(modulesDirectory, {
      'themes/modules.yml': '',
      'tools/modules.yml': '',
      'not-a-source/readme.txt': '',
    });
  });

  it('should enable everything with the wildcards', () => {
    const enabled = new EnabledModules(['*', '*::*'], modulesDirectory, createMockLogger());

    expect(enabled.isEnabled('anything')).toBe(true);
    expect(enabled.isEnabled('themes::dark')).toBe(true);
    expect(enabled.isEnabled('not-a-source::x')).toBe(false);
    expect(enabled.enabledDirectories()).toEqual(['themes', 'tools']);
  });

  it('should select single modules', () => {
    const enabled = new EnabledModules(['main', 'themes::dark'], modulesDirectory, createMockLogger());

    expect(enabled.isEnabled('main')).toBe(true);
    expect(enabled.isEnabled('other')).toBe(false);
    expect(enabled.isEnabled('themes::dark')).toBe(true);
    expect(enabled.isEnabled('themes::light')).toBe(false);
    expect(enabled.isEnabled('tools::git')).toBe(false);
  });

  it('should log invalid statements', () => {
    const logger = createMockLogger();
    new EnabledModules(['a::b::c'], modulesDirectory, logger);

    expect(logger.error).toHaveBeenCalledWith(
      { statement: 'a::b::c' },
      'Invalid module name syntax "a::b::c" in enabled_modules',
    );
  });
});

describe('collectModules', () => {
  it('should gather modules from the main configuration and module directories', () => {
    const configDirectory = makeTempDirectory();
    const modulesDirectory = path.join(configDirectory, 'modules');
    writeFiles(modulesDirectory, {
      'themes/modules.yml': [
        'context/theme:',
        '  name: dark',
        'module/dark:',
        '  run:',
        '    shell: echo {{greeting}}',
        'module/light: {}',
        '',
      ].join('\n'),
    });
    const logger = createMockLogger();

    const collected = collectModules({
      config: { 'module/main': { enabled: true }, 'module/skipped': {} },
      configDirectory,
      enabled: new EnabledModules(['main', 'themes::dark'], modulesDirectory, logger),
      context: new ContextStore({ greeting: 'hi' }),
      templates: new TemplateManager(logger, {}),
      logger,
      env: {},
    });

    expect(collected.modules).toEqual([
      { name: 'main', config: { enabled: true }, directory: configDirectory },
      {
        name: 'themes::dark',
        config: { run: { shell: 'echo hi' } },
        directory: path.join(modulesDirectory, 'themes'),
      },
    ]);
    expect(collected.context).toEqual({ theme: { name: 'dark' } });
    expect(collected.sourceFiles).toEqual([path.join(modulesDirectory, 'themes', 'modules.yml')]);
  });
});

describe('userConfiguration', () => {
  it('should warn and return an empty configuration without a file', () => {
    const configDirectory = makeTempDirectory();
    const logger = createMockLogger();

    const result = userConfiguration({ configDirectory, logger, env: {} });

    expect(result).toEqual({
      configDirectory,
      configFile: path.join(configDirectory, 'solstice.yml'),
      config: {},
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should read solstice.yml from SOLSTICE_CONFIG_HOME', () => {
    const configDirectory = makeTempDirectory();
    fs.writeFileSync(path.join(configDirectory, 'solstice.yml'), 'module/a:\n  enabled: false\n');

    const result = userConfiguration({ env: { SOLSTICE_CONFIG_HOME: configDirectory } });

    expect(result.config).toEqual({ 'module/a': { enabled: false } });
    expect(result.configFile).toBe(path.join(configDirectory, 'solstice.yml'));
  });
});
