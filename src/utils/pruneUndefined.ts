/**
 * Recursively drops `undefined` properties and array items. Nulls stay.
 */
export function pruneUndefined(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) {
    return value.map(pruneUndefined).filter((v) => v !== undefined);
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    const pv = pruneUndefined(v);
    if (pv !== undefined) out[k] = pv;
  }
  return out;
}
