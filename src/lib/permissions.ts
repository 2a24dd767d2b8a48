import fs from 'node:fs';

import { ConfigurationError } from '../core/errors.js';

export type Permissions = string | number;

const OCTAL = /^(?:0o?)?([0-7]{1,4})$/i;
const SYMBOLIC_CLAUSE = /^([ugoa]*)([+\-=])([rwx]*)$/;

const WHO_MASKS: Record<string, number> = {
  u: 0o700,
  g: 0o070,
  o: 0o007,
  a: 0o777,
};

const PERMISSION_BITS: Record<string, number> = {
  r: 0o444,
  w: 0o222,
  x: 0o111,
};

function applySymbolic(mode: string, base: number): number {
  let result = base;
  for (const clause of mode.split(',')) {
    const match = SYMBOLIC_CLAUSE.exec(clause.trim());
    if (!match) {
      throw new ConfigurationError(`Invalid permissions "${mode}"`);
    }
    const [, who = '', operator, perms = ''] = match;
    const whoMask = (who || 'a').split('').reduce((mask, letter) => mask | (WHO_MASKS[letter] ?? 0), 0);
    const bits = perms.split('').reduce((mask, letter) => mask | (PERMISSION_BITS[letter] ?? 0), 0) & whoMask;

    if (operator === '+') result |= bits;
    else if (operator === '-') result &= ~bits;
    else result = (result & ~whoMask) | bits;
  }
  return result;
}

/**
 * Resolve a permissions option into mode bits.
 *
 * Integers are written the way they appear in YAML, so their decimal digits
 * are octal digits (`755` is `0o755`). Strings are octal (`755`, `0755`,
 * `0o755`) or symbolic (`u+x`, `go-w`, `a=r`) relative to `baseMode`. Without an
 * option, `baseMode` is kept.
 */
export function resolveMode(permissions: Permissions | undefined, baseMode: number): number {
  const base = baseMode & 0o7777;
  if (permissions === undefined) return base;
  const text = typeof permissions === 'number' ? String(permissions) : permissions.trim();
  const octal = OCTAL.exec(text);
  if (octal?.[1] !== undefined) return parseInt(octal[1], 8);
  if (typeof permissions === 'number') {
    throw new ConfigurationError(`Invalid permissions ${permissions}, expected octal digits`);
  }
  return applySymbolic(permissions, base);
}

/**
 * Apply `permissions` to `target`, defaulting to the mode of `source`.
 */
export function applyPermissions(
  target: string,
  source: string,
  permissions: Permissions | undefined,
): void {
  const sourceMode = fs.statSync(source).mode;
  fs.chmodSync(target, resolveMode(permissions, sourceMode));
}
