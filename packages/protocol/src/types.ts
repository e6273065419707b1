/**
 * hostbridge envelope types
 *
 * These types define the JSON carried inside each frame.
 */

import { z } from 'zod';
import { isPlainObject } from '@hostbridge/utils/casing';
import { errorMessage } from '@hostbridge/utils/errors';

/** Reserved command name for resource reads; the real name travels in `resource_name`. */
export const ACCESS_RESOURCE_COMMAND = 'access_resource';

/** Id used for replies to payloads that could not be parsed at all. */
export const INVALID_JSON_ID = 'error';
/** Id used for replies to requests that carry no id. */
export const MISSING_ID = 'error_id';

export type ResponseStatus = 'success' | 'error';

export const RequestEnvelopeSchema = z.object({
  id: z.string().min(1),
  command: z.string().min(1),
  parameters: z.record(z.unknown()).nullish(),
  client_timestamp: z.number().optional(),
});

export const ResponseEnvelopeSchema = z.object({
  id: z.string(),
  type: z.literal('response'),
  status: z.enum(['success', 'error']),
  result: z.unknown().optional(),
  error: z.string().optional(),
  server_timestamp: z.number().optional(),
  client_timestamp: z.number().optional(),
});

export const CloseNoticeSchema = z.object({
  type: z.literal('close'),
  reason: z.string().default('closed'),
});

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;
export type CloseNotice = z.infer<typeof CloseNoticeSchema>;

export type Envelope = RequestEnvelope | ResponseEnvelope | CloseNotice;

/**
 * A decoded frame payload, sorted by what the receiver has to do with it.
 */
export type InboundEnvelope =
  | { kind: 'request'; envelope: RequestEnvelope }
  | { kind: 'response'; envelope: ResponseEnvelope }
  | { kind: 'close'; envelope: CloseNotice }
  | { kind: 'invalid'; id: string; error: string; clientTimestamp?: number };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Classify an already-parsed JSON value.
 */
export function classifyEnvelope(value: unknown): InboundEnvelope {
  if (!isPlainObject(value)) {
    return { kind: 'invalid', id: INVALID_JSON_ID, error: 'Invalid request: expected a JSON object' };
  }

  if (value.type === 'close') {
    const close = CloseNoticeSchema.safeParse(value);
    if (close.success) return { kind: 'close', envelope: close.data };
  }

  const id = value.id;
  if (typeof id !== 'string' || id.length === 0) {
    return { kind: 'invalid', id: MISSING_ID, error: 'Invalid request: Missing ID' };
  }
  const clientTimestamp = typeof value.client_timestamp === 'number' ? value.client_timestamp : undefined;

  if (value.command !== undefined) {
    const parsed = RequestEnvelopeSchema.safeParse(value);
    if (parsed.success) return { kind: 'request', envelope: parsed.data };
    return { kind: 'invalid', id, error: `Invalid request: ${formatIssues(parsed.error)}`, clientTimestamp };
  }

  if (value.type === 'response') {
    const parsed = ResponseEnvelopeSchema.safeParse(value);
    if (parsed.success) return { kind: 'response', envelope: parsed.data };
    return { kind: 'invalid', id, error: `Invalid response: ${formatIssues(parsed.error)}`, clientTimestamp };
  }

  return { kind: 'invalid', id, error: 'Unknown request type', clientTimestamp };
}

/**
 * Parse a frame payload as JSON and classify it.
 */
export function decodeEnvelope(payload: Buffer | string): InboundEnvelope {
  const text = typeof payload === 'string' ? payload : payload.toString('utf-8');
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    return { kind: 'invalid', id: INVALID_JSON_ID, error: `Invalid JSON format: ${errorMessage(err)}` };
  }
  return classifyEnvelope(value);
}

export function successResponse(id: string, result: unknown, clientTimestamp?: number): ResponseEnvelope {
  const response: ResponseEnvelope = {
    id,
    type: 'response',
    status: 'success',
    result: result ?? null,
    server_timestamp: Date.now(),
  };
  if (clientTimestamp !== undefined) response.client_timestamp = clientTimestamp;
  return response;
}

export function errorResponse(id: string, error: string, clientTimestamp?: number): ResponseEnvelope {
  const response: ResponseEnvelope = {
    id,
    type: 'response',
    status: 'error',
    error: error || 'Unknown error',
    server_timestamp: Date.now(),
  };
  if (clientTimestamp !== undefined) response.client_timestamp = clientTimestamp;
  return response;
}

export function closeNotice(reason: string): CloseNotice {
  return { type: 'close', reason };
}
