// src/erc20/tokens.ts
/**
 * Static table of well-known ERC-20 contracts, keyed by lowercase address.
 * Loaded once from data/erc20-tokens.json and read-only afterwards.
 */
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const TokenFileSchema = z.record(
  z.string().min(1),
  z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 20-byte hex address'),
);

const defaultTokensPath = fileURLToPath(new URL('../../data/erc20-tokens.json', import.meta.url));

/**
 * Parses a `{ label: address }` JSON document into an address → label map.
 */
export function parseTokenTable(json: string): ReadonlyMap<string, string> {
  const parsed = TokenFileSchema.parse(JSON.parse(json));
  const out = new Map<string, string>();
  for (const [label, address] of Object.entries(parsed)) {
    out.set(address.toLowerCase(), label);
  }
  return out;
}

const lookup: ReadonlyMap<string, string> = parseTokenTable(fs.readFileSync(defaultTokensPath, 'utf8'));

/**
 * Human-readable label of a token contract, or `ERC20(<address>)` when unknown.
 */
export function tokenLabel(address: string, table: ReadonlyMap<string, string> = lookup): string {
  return table.get(address.toLowerCase()) ?? `ERC20(${address})`;
}

export function knownTokenCount(): number {
  return lookup.size;
}
