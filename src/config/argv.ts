// src/config/argv.ts
import type { ArgMap } from '../types.js';

/**
 * Parse CLI arguments of the form `--key=value`, `--flag` or `--no-flag`.
 * Positional args are ignored.
 */
export function parseArgv(argv = process.argv.slice(2)): ArgMap {
  const out: ArgMap = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      out[body.slice(0, eq)] = body.slice(eq + 1);
    } else if (body.startsWith('no-')) {
      out[body.slice(3)] = false;
    } else {
      out[body] = true;
    }
  }
  return out;
}
