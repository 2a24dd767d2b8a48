import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export const APPLICATION_NAME = 'solstice';

/**
 * Expands `$VAR` and `${VAR}` references from the environment.
 * Unknown variables are left as written.
 */
export function expandEnvironmentVariables(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return value.replace(/\$(?:\{(\w+)\}|(\w+))/g, (match, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (!name) return match;
    const resolved = env[name];
    return resolved === undefined ? match : resolved;
  });
}

/**
 * Return an absolute path from a (possibly) relative path.
 * `~` is expanded to the home directory and relative paths are anchored at `directory`.
 */
export function expandPath(target: string, directory: string): string {
  let expanded = target;
  if (expanded === '~') {
    expanded = os.homedir();
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(os.homedir(), expanded.slice(2));
  }
  return path.isAbsolute(expanded) ? path.normalize(expanded) : path.resolve(directory, expanded);
}

export function resolveConfigDirectory(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SOLSTICE_CONFIG_HOME) {
    return expandPath(env.SOLSTICE_CONFIG_HOME, process.cwd());
  }
  const configHome = env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(expandPath(configHome, process.cwd()), APPLICATION_NAME);
}

/**
 * Application data directory ($XDG_DATA_HOME/solstice), created on first use.
 */
export function resolveDataDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const dataHome = env.XDG_DATA_HOME ?? path.join(os.homedir(), '.local', 'share');
  const directory = path.join(expandPath(dataHome, process.cwd()), APPLICATION_NAME);
  fs.mkdirSync(directory, { recursive: true });
  return directory;
}

export function resolveTempDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const directory = path.join(env.TMPDIR ?? os.tmpdir(), APPLICATION_NAME);
  fs.mkdirSync(directory, { recursive: true });
  return directory;
}
