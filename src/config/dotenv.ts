// src/config/dotenv.ts
import fs from 'node:fs';
import path from 'node:path';
import { stripInlineComment } from './parsers.js';

/**
 * Parses `.env` text into key/value pairs.
 * - `KEY=VALUE` and `export KEY=VALUE` lines
 * - single/double quoted values are taken verbatim
 * - inline comments (# or ;) are stripped from unquoted values
 */
export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('export ')) line = line.slice('export '.length).trim();

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    const quoted =
      value.length >= 2 &&
      ((value.startsWith("'") && value.endsWith("'")) || (value.startsWith('"') && value.endsWith('"')));
    value = quoted ? value.slice(1, -1) : stripInlineComment(value);

    if (key) out[key] = value;
  }
  return out;
}

/**
 * Loads `.env` from the working directory into process.env, without
 * overriding variables that are already set.
 */
export function loadDotEnvIfPresent(envPath = path.resolve(process.cwd(), '.env')): void {
  if (!fs.existsSync(envPath)) return;
  const pairs = parseDotEnv(fs.readFileSync(envPath, 'utf8'));
  for (const [key, value] of Object.entries(pairs)) {
    if (!(key in process.env)) process.env[key] = value;
  }
}
