export type Mapping = ReadonlyMap<unknown, unknown>;

/**
 * View a mapping-shaped value as an ordered map.
 * Returns undefined for scalars, arrays and null.
 */
export function asMapping(value: unknown): Mapping | undefined {
  if (value instanceof Map) {
    return value;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return new Map<unknown, unknown>(Object.entries(value));
  }
  return undefined;
}

