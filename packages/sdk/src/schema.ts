/**
 * Shape of the host's get_schema result.
 */

import { z } from 'zod';
import { ProtocolError } from '@hostbridge/utils/errors';

export const ToolInfoSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  example: z.string().default(''),
  inputSchema: z.record(z.unknown()).default({ type: 'object', properties: {} }),
});

export const ResourceInfoSchema = ToolInfoSchema.extend({
  urlPattern: z.string().default(''),
});

export const HostSchemaSchema = z.object({
  tools: z.array(ToolInfoSchema).default([]),
  resources: z.array(ResourceInfoSchema).default([]),
});

export type ToolInfo = z.infer<typeof ToolInfoSchema>;
export type ResourceInfo = z.infer<typeof ResourceInfoSchema>;
export type HostSchema = z.infer<typeof HostSchemaSchema>;

export function parseHostSchema(value: unknown): HostSchema {
  const parsed = HostSchemaSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ProtocolError(`Invalid schema from host: ${detail}`);
  }
  return parsed.data;
}
