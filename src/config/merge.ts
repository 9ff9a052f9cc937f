export function isObject(item: unknown): item is Record<string, unknown> {
  return Boolean(item) && typeof item === 'object' && !Array.isArray(item);
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (isObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = cloneValue(v);
    return out;
  }
  return value;
}

/**
 * Merge `source` into `target` in place. Arrays replace, objects merge
 * key by key, undefined leaves the target value untouched.
 */
function mergeRecords(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = target[key];
    if (isObject(sourceValue) && isObject(targetValue)) {
      mergeRecords(targetValue, sourceValue);
      continue;
    }
    target[key] = cloneValue(sourceValue);
  }
}

export function deepMerge(...sources: Array<Record<string, unknown> | undefined | null>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const source of sources) {
    if (!source) continue;
    mergeRecords(out, source);
  }
  return out;
}
