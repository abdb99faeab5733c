/**
 * True for plain YAML/JSON mappings (not arrays, not null)
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
