import { z } from 'zod';

import type { Logger } from './types.js';
import { spawnShellSync } from '../lib/exec.js';

export const requirementSchema = z
  .object({
    shell: z.string().optional(),
    timeout: z.number().nonnegative().optional(),
    env: z.string().optional(),
    installed: z.string().optional(),
    module: z.string().optional(),
  })
  .strict();

export const requiresSchema = z.union([requirementSchema, z.array(requirementSchema)]);

export type Requirement = z.output<typeof requirementSchema>;

export interface RequirementCheck {
  satisfied: boolean;
  summary: string;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Evaluate the shell, env and installed conditions of one requirement.
 * Module dependencies are resolved separately, once every module is known.
 */
export function checkRequirement(
  requirement: Requirement,
  options: { directory: string; timeout: number; env?: NodeJS.ProcessEnv },
): RequirementCheck {
  const env = options.env ?? process.env;
  const findings: string[] = [];
  let satisfied = true;

  if (requirement.shell !== undefined) {
    const outcome = spawnShellSync(requirement.shell, {
      cwd: options.directory,
      timeout: requirement.timeout ?? options.timeout,
      env,
    });
    if (outcome.timedOut || outcome.exitCode !== 0) {
      satisfied = false;
      findings.push(`Unsuccessful command: "${requirement.shell}"`);
    } else {
      findings.push(`Successful command: "${requirement.shell}" (OK)`);
    }
  }

  if (requirement.env !== undefined) {
    if (env[requirement.env] === undefined) {
      satisfied = false;
      findings.push(`Missing environment variable: "${requirement.env}"`);
    } else {
      findings.push(`Found environment variable: "${requirement.env}" (OK)`);
    }
  }

  if (requirement.installed !== undefined) {
    const outcome = spawnShellSync(`command -v ${shellQuote(requirement.installed)}`, {
      timeout: options.timeout,
      env,
    });
    if (outcome.exitCode !== 0 || !outcome.stdout.trim()) {
      satisfied = false;
      findings.push(`Program not installed: "${requirement.installed}"`);
    } else {
      findings.push(`Program installed: "${requirement.installed}" (OK)`);
    }
  }

  return {
    satisfied,
    summary: `Module requirements: ${findings.length > 0 ? findings.join(', ') : 'No requirements (OK)'}`,
  };
}

/**
 * Drop modules whose `module` requirements name a module that is not
 * enabled, repeating until no more modules are dropped.
 */
export function dropMissingModuleDependencies<T extends { dependsOn: readonly string[] }>(
  modules: Map<string, T>,
  logger: Logger,
): Map<string, T> {
  let dropped = true;
  while (dropped) {
    dropped = false;
    for (const [name, module] of modules) {
      const missing = module.dependsOn.find((dependency) => !modules.has(dependency));
      if (missing === undefined) continue;
      logger.error(
        { module: name, dependency: missing },
        `[module/${name}] Missing module dependency: "${missing}". Disabling module!`,
      );
      modules.delete(name);
      dropped = true;
    }
  }
  return modules;
}
