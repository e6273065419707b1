/**
 * Naming transforms between wire names (snake_case) and handler names (camelCase).
 */

/**
 * Convert a PascalCase or camelCase name to snake_case.
 * Acronyms stay together: `TestURLString` becomes `test_url_string`.
 */
export function toSnakeCase(name: string): string {
  if (!name) return name;
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Convert a snake_case name to camelCase. Names without underscores pass through.
 */
export function toCamelCase(name: string): string {
  if (!name.includes('_')) return name;
  return name.replace(/_+([a-zA-Z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Rename the top-level keys of a plain object to snake_case. Nested values are
 * payload data and keep their keys; non-objects are returned as-is.
 */
export function snakeCaseKeys(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[toSnakeCase(key)] = inner;
  }
  return out;
}

export type JsonTypeName = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'null';

/** JSON type name of a value, as shown in schemas and parameter errors. */
export function jsonTypeOf(value: unknown): JsonTypeName {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
    case 'bigint':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}
