/**
 * Parameter adaptation for registry entries.
 *
 * Wire names are snake_case, handler names camelCase. Incoming keys are
 * camelCased before matching; values are coerced to the declared type.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { jsonTypeOf, toCamelCase, toSnakeCase } from '@hostbridge/utils/casing';
import { MissingParameterError, ParameterTypeError } from '@hostbridge/utils/errors';
import { dispatchLog as log } from '@hostbridge/utils/logger';

export type ParamType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'any';

export interface ParamSpec {
  /** Handler-side (camelCase) name; the wire name is its snake_case form */
  name: string;
  type: ParamType;
  required?: boolean;
  description?: string;
  /** Used when an optional parameter is absent */
  default?: unknown;
}

const numericString = z.string().trim().min(1).pipe(z.coerce.number().finite());

const booleanString = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false']))
  .transform((value) => value === 'true');

/** Accepting schemas: what a caller may send for each declared type */
const COERCERS: Record<ParamType, z.ZodType<unknown>> = {
  string: z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
  number: z.union([z.number().finite(), numericString]),
  integer: z.union([z.number().int(), numericString.pipe(z.number().int())]),
  boolean: z.union([
    z.boolean(),
    booleanString,
    z.literal(0).transform(() => false),
    z.literal(1).transform(() => true),
  ]),
  array: z.array(z.unknown()),
  object: z.record(z.unknown()),
  any: z.unknown(),
};

/** Declared schemas: what the published input schema advertises */
function declaredSchema(type: ParamType): z.ZodType<unknown> {
  switch (type) {
    case 'string':
      return z.string();
    case 'number':
      return z.number();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
    case 'any':
      return z.unknown();
  }
}

export function wireName(spec: ParamSpec): string {
  return toSnakeCase(spec.name);
}

export function coerceParam(spec: ParamSpec, value: unknown): unknown {
  const parsed = COERCERS[spec.type].safeParse(value);
  if (!parsed.success) {
    throw new ParameterTypeError(wireName(spec), spec.type, jsonTypeOf(value));
  }
  return parsed.data;
}

/**
 * Normalize incoming keys to camelCase.
 */
export function normalizeKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    out[toCamelCase(key)] = value;
  }
  return out;
}

/**
 * Match incoming parameters against declared specs.
 *
 * With no declared specs, every (camelCased) key passes through unchanged.
 *
 * @throws MissingParameterError naming the wire name of the first missing required parameter
 * @throws ParameterTypeError when a value cannot be coerced
 */
export function adaptParameters(
  specs: readonly ParamSpec[] | undefined,
  raw: Record<string, unknown>,
  command = ''
): Record<string, unknown> {
  const normalized = normalizeKeys(raw);
  if (!specs) return normalized;

  const out: Record<string, unknown> = {};
  const declared = new Set<string>();

  for (const spec of specs) {
    declared.add(spec.name);
    const value = normalized[spec.name];

    if (value === undefined || value === null) {
      if (spec.required) {
        throw new MissingParameterError(wireName(spec));
      }
      if (spec.default !== undefined) {
        out[spec.name] = spec.default;
      }
      continue;
    }

    out[spec.name] = coerceParam(spec, value);
  }

  const ignored = Object.keys(normalized).filter((key) => !declared.has(key));
  if (ignored.length > 0) {
    log.debug('Ignoring undeclared parameters', { command, ignored: ignored.map(toSnakeCase) });
  }

  return out;
}

/**
 * JSON Schema advertised for a parameter list (wire names).
 */
export function buildInputSchema(specs: readonly ParamSpec[] | undefined): Record<string, unknown> {
  const shape: Record<string, z.ZodType<unknown>> = {};
  for (const spec of specs ?? []) {
    let field = declaredSchema(spec.type);
    if (spec.description) field = field.describe(spec.description);
    if (!spec.required) {
      field = spec.default !== undefined ? field.default(spec.default) : field.optional();
    }
    shape[wireName(spec)] = field;
  }

  const jsonSchema = zodToJsonSchema(z.object(shape), { target: 'jsonSchema7', $refStrategy: 'none' });
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(jsonSchema)) {
    if (key !== '$schema') out[key] = value;
  }
  return out;
}
