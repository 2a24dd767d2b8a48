import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { ContextStore, type ContextLoader } from './context-store.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { TemplateManager } from './template-manager.js';
import { isConfigObject, type ConfigObject, type ConfigValue, type Logger } from './types.js';
import { runShellSync } from '../lib/exec.js';
import { expandPath, resolveConfigDirectory } from '../lib/paths.js';

export const CONFIG_FILE_NAME = 'solstice.yml';
export const MODULES_FILE_NAME = 'modules.yml';

export interface PreprocessOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Working directory of `$(command)` substitutions. */
  shellDirectory?: string;
}

const ENV_REFERENCE = /\$\{(\w+)\}/g;
const COMMAND_SUBSTITUTION = /\$\(([^)]*)\)/g;

/**
 * Substitute `${VAR}` with environment values and `$(command)` with command
 * output, one line at a time. Unknown variables are left as written.
 */
export function preprocessYaml(text: string, options: PreprocessOptions = {}): string {
  const env = options.env ?? process.env;
  return text
    .split('\n')
    .map((line) =>
      line
        .replace(ENV_REFERENCE, (match, name: string) => env[name] ?? match)
        .replace(COMMAND_SUBSTITUTION, (_match, command: string) =>
          runShellSync(command, {
            cwd: options.shellDirectory,
            timeout: 1,
            logger: options.logger,
            env,
          }),
        ),
    )
    .join('\n');
}

export function parseYaml(text: string, source: string): ConfigObject {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Could not parse YAML in ${source}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isConfigObject(parsed)) {
    throw new ConfigurationError(`${source} must contain a mapping at its root`);
  }
  return parsed;
}

export function loadYamlFile(filePath: string, options: PreprocessOptions = {}): ConfigObject {
  const text = fs.readFileSync(filePath, 'utf8');
  return parseYaml(
    preprocessYaml(text, { shellDirectory: path.dirname(filePath), ...options }),
    filePath,
  );
}

/**
 * Load a YAML file that is also a template rendered against `context`.
 */
export function loadTemplatedYamlFile(
  filePath: string,
  context: ContextStore,
  templates: TemplateManager,
  options: PreprocessOptions = {},
): ConfigObject {
  const shellDirectory = path.dirname(filePath);
  const text = preprocessYaml(fs.readFileSync(filePath, 'utf8'), { shellDirectory, ...options });
  const rendered = templates.render(text, context, { name: filePath, shellDirectory });
  return parseYaml(rendered, filePath);
}

export function createContextLoader(
  templates: TemplateManager,
  options: PreprocessOptions = {},
): ContextLoader {
  return (filePath, context) => loadTemplatedYamlFile(filePath, context, templates, options);
}

export function dumpYamlFile(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, YAML.stringify(data));
}

const enablingStatementSchema = z
  .object({
    name: z.string().min(1),
    trusted: z.boolean().optional(),
  })
  .passthrough();

export const solsticeSettingsSchema = z
  .object({
    hot_reload_config: z.boolean().default(false),
    startup_delay: z.number().nonnegative().default(0),
  })
  .passthrough();

export const modulesSettingsSchema = z
  .object({
    run_timeout: z.number().nonnegative().default(0),
    requires_timeout: z.number().nonnegative().default(1),
    reprocess_modified_files: z.boolean().optional(),
    recompile_modified_templates: z.boolean().optional(),
    modules_directory: z.string().default('modules'),
    enabled_modules: z
      .array(z.union([z.string().min(1), enablingStatementSchema]))
      .default([{ name: '*' }, { name: '*::*' }]),
  })
  .passthrough();

export interface GlobalSettings {
  hotReloadConfig: boolean;
  /** Seconds to wait before the first tick. */
  startupDelay: number;
  /** Seconds Run actions wait unless they declare their own timeout. */
  runTimeout: number;
  requiresTimeout: number;
  reprocessModifiedFiles: boolean;
  modulesDirectory: string;
  enabledModules: string[];
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseSection<T extends z.ZodTypeAny>(
  schema: T,
  value: ConfigValue | undefined,
  section: string,
): z.output<T> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid "${section}" section: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseGlobalSettings(config: ConfigObject, configDirectory: string): GlobalSettings {
  const solstice = parseSection(solsticeSettingsSchema, config['config/solstice'], 'config/solstice');
  const modules = parseSection(modulesSettingsSchema, config['config/modules'], 'config/modules');
  return {
    hotReloadConfig: solstice.hot_reload_config,
    startupDelay: solstice.startup_delay,
    runTimeout: modules.run_timeout,
    requiresTimeout: modules.requires_timeout,
    reprocessModifiedFiles:
      modules.reprocess_modified_files ?? modules.recompile_modified_templates ?? false,
    modulesDirectory: expandPath(modules.modules_directory, configDirectory),
    enabledModules: modules.enabled_modules.map((statement) =>
      typeof statement === 'string' ? statement : statement.name,
    ),
  };
}

function prefixedSections(config: ConfigObject, prefix: string): Array<[string, ConfigValue]> {
  return Object.entries(config)
    .filter(([key]) => key.toLowerCase().startsWith(prefix) && key.length > prefix.length)
    .map(([key, value]) => [key.slice(prefix.length), value]);
}

/**
 * `context/<name>` sections keyed by `<name>`.
 */
export function contextSections(config: ConfigObject): ConfigObject {
  return Object.fromEntries(prefixedSections(config, 'context/'));
}

/**
 * `module/<name>` sections keyed by `<name>`.
 */
export function moduleSections(config: ConfigObject): ConfigObject {
  return Object.fromEntries(prefixedSections(config, 'module/'));
}

export interface ModuleDefinition {
  name: string;
  config: ConfigValue;
  /** Anchor of the module's relative paths. */
  directory: string;
}

const DIRECTORY_MODULE = /^([^:]+)::(\w[\w-]*|\*)$/;

/**
 * Which modules the `enabled_modules` statements turn on.
 *
 * `*` enables every module of the main configuration file and `*::*` every
 * module of every `<modules_directory>/<dir>/modules.yml`. `dir::name` and
 * `dir::*` select inside one directory; a bare name selects a module of the
 * main file.
 */
export class EnabledModules {
  readonly allGlobalModules: boolean;
  private readonly globalNames = new Set<string>();
  private readonly directories = new Map<string, Set<string>>();

  constructor(
    statements: readonly string[],
    readonly modulesDirectory: string,
    private readonly logger: Logger,
  ) {
    let allGlobal = false;
    for (const statement of statements) {
      if (statement === '*') {
        allGlobal = true;
      } else if (statement === '*::*') {
        for (const directory of this.moduleDirectories()) this.enable(directory, '*');
      } else {
        const match = DIRECTORY_MODULE.exec(statement);
        if (match?.[1] !== undefined && match[2] !== undefined) {
          this.enable(match[1], match[2]);
        } else if (statement.includes('::')) {
          this.logger.error({ statement }, `Invalid module name syntax "${statement}" in enabled_modules`);
        } else {
          this.globalNames.add(statement);
        }
      }
    }
    this.allGlobalModules = allGlobal;
  }

  private enable(directory: string, name: string): void {
    const names = this.directories.get(directory) ?? new Set<string>();
    names.add(name);
    this.directories.set(directory, names);
  }

  private moduleDirectories(): string[] {
    try {
      return fs
        .readdirSync(this.modulesDirectory, { withFileTypes: true })
        .filter(
          (entry) =>
            entry.isDirectory() &&
            fs.existsSync(path.join(this.modulesDirectory, entry.name, MODULES_FILE_NAME)),
        )
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      this.logger.debug(
        { directory: this.modulesDirectory, error },
        'Modules directory not found, no directory modules enabled',
      );
      return [];
    }
  }

  isGlobalModuleEnabled(name: string): boolean {
    return this.allGlobalModules || this.globalNames.has(name);
  }

  isEnabled(name: string): boolean {
    const separator = name.indexOf('::');
    if (separator === -1) return this.isGlobalModuleEnabled(name);
    const names = this.directories.get(name.slice(0, separator));
    return names !== undefined && (names.has('*') || names.has(name.slice(separator + 2)));
  }

  enabledDirectories(): string[] {
    return [...this.directories.keys()];
  }
}

export interface CollectedModules {
  modules: ModuleDefinition[];
  /** `context/*` sections declared by module directories. */
  context: ConfigObject;
  /** Configuration files the modules were read from. */
  sourceFiles: string[];
}

/**
 * Gather every enabled module definition: those in the main configuration
 * and those in module directories. Directory modules are named
 * `<dir>::<name>` and anchored at their directory.
 */
export function collectModules(options: {
  config: ConfigObject;
  configDirectory: string;
  enabled: EnabledModules;
  context: ContextStore;
  templates: TemplateManager;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}): CollectedModules {
  const { config, configDirectory, enabled, logger } = options;
  const modules: ModuleDefinition[] = [];
  const context: ConfigObject = {};
  const sourceFiles: string[] = [];

  for (const [name, moduleConfig] of Object.entries(moduleSections(config))) {
    if (enabled.isGlobalModuleEnabled(name)) {
      modules.push({ name, config: moduleConfig, directory: configDirectory });
    }
  }

  for (const directoryName of enabled.enabledDirectories()) {
    const directory = path.join(enabled.modulesDirectory, directoryName);
    const file = path.join(directory, MODULES_FILE_NAME);
    let sourceConfig: ConfigObject;
    try {
      sourceConfig = loadTemplatedYamlFile(file, options.context, options.templates, {
        env: options.env,
        logger,
      });
    } catch (error) {
      logger.error(
        { source: file, error },
        `Could not read module configuration "${file}", skipping its modules`,
      );
      continue;
    }
    sourceFiles.push(file);
    Object.assign(context, contextSections(sourceConfig));

    for (const [name, moduleConfig] of Object.entries(moduleSections(sourceConfig))) {
      const qualified = `${directoryName}::${name}`;
      if (enabled.isEnabled(qualified)) {
        modules.push({ name: qualified, config: moduleConfig, directory });
      }
    }
  }

  return { modules, context, sourceFiles };
}

export interface UserConfiguration {
  configDirectory: string;
  configFile: string;
  config: ConfigObject;
}

/**
 * Read `solstice.yml` from the configuration directory. A missing file gives
 * an empty configuration.
 */
export function userConfiguration(
  options: { configDirectory?: string; env?: NodeJS.ProcessEnv; logger?: Logger } = {},
): UserConfiguration {
  const env = options.env ?? process.env;
  const configDirectory = options.configDirectory
    ? expandPath(options.configDirectory, process.cwd())
    : resolveConfigDirectory(env);
  const configFile = path.join(configDirectory, CONFIG_FILE_NAME);

  if (!fs.existsSync(configFile)) {
    options.logger?.warn({ configFile }, `Configuration file not found in its expected path ${configFile}`);
    return { configDirectory, configFile, config: {} };
  }

  options.logger?.info({ configFile }, `Using configuration file "${configFile}"`);
  return {
    configDirectory,
    configFile,
    config: loadYamlFile(configFile, { env, logger: options.logger }),
  };
}

export function contextFromConfig(config: ConfigObject): ContextStore {
  return new ContextStore(contextSections(config));
}
