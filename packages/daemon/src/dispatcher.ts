/**
 * Dispatcher
 * Maps a request envelope to a registry entry, invokes it and packages the
 * outcome as a response envelope. Nothing thrown by a handler escapes.
 */

import { performance } from 'node:perf_hooks';
import {
  ACCESS_RESOURCE_COMMAND,
  errorResponse,
  successResponse,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '@hostbridge/protocol';
import { DEFAULT_PUMP_CONFIG } from '@hostbridge/config';
import { isPlainObject } from '@hostbridge/utils/casing';
import { CommandError, UnknownCommandError, UnknownResourceError, errorMessage } from '@hostbridge/utils/errors';
import { dispatchLog, type Logger } from '@hostbridge/utils/logger';
import type { InvocationContext } from './context.js';
import type { ExecutionMonitor } from './monitor.js';
import type { CommandRegistry, RegistryEntry } from './registry.js';

export interface DispatcherOptions {
  /** Invocations slower than this are logged (default: 100ms) */
  slowCommandWarnMs?: number;
  monitor?: ExecutionMonitor;
  logger?: Logger;
}

interface Target {
  entry: RegistryEntry;
  params: Record<string, unknown>;
}

export class Dispatcher {
  private readonly slowCommandWarnMs: number;
  private readonly monitor?: ExecutionMonitor;
  private readonly log: Logger;

  constructor(
    private readonly registry: CommandRegistry,
    options: DispatcherOptions = {}
  ) {
    this.slowCommandWarnMs = options.slowCommandWarnMs ?? DEFAULT_PUMP_CONFIG.slowCommandWarnMs;
    this.monitor = options.monitor;
    this.log = options.logger ?? dispatchLog;
  }

  async dispatch(request: RequestEnvelope, ctx: InvocationContext): Promise<ResponseEnvelope> {
    const started = performance.now();
    const params = request.parameters ?? {};
    let operation = request.command;
    let success = false;

    try {
      const target = this.resolve(request.command, params);
      operation = target.entry.kind === 'resource' ? `resource:${target.entry.name}` : target.entry.name;
      const result = await target.entry.invoke(target.params, ctx);
      success = true;
      return successResponse(request.id, result, request.client_timestamp);
    } catch (err) {
      return errorResponse(request.id, this.describeFailure(request, err), request.client_timestamp);
    } finally {
      const elapsedMs = performance.now() - started;
      this.monitor?.record(operation, elapsedMs, success);
      if (elapsedMs > this.slowCommandWarnMs) {
        this.log.warn('Slow command', {
          command: operation,
          requestId: request.id,
          elapsedMs: Math.round(elapsedMs),
        });
      }
    }
  }

  private resolve(command: string, params: Record<string, unknown>): Target {
    if (command === ACCESS_RESOURCE_COMMAND) {
      const name = params.resource_name ?? params.resourceName;
      if (typeof name !== 'string' || name.length === 0) {
        throw new CommandError("Missing or invalid 'resource_name' parameter");
      }
      const entry = this.registry.lookup(name, 'resource');
      if (!entry) throw new UnknownResourceError(name);
      const nested = params.parameters;
      return { entry, params: isPlainObject(nested) ? nested : {} };
    }

    const entry = this.registry.lookup(command, 'tool');
    if (!entry) throw new UnknownCommandError(command);
    return { entry, params: this.unwrapNested(entry, params) };
  }

  /**
   * Older callers send `{parameters: {...}}` for tools too.
   */
  private unwrapNested(entry: RegistryEntry, params: Record<string, unknown>): Record<string, unknown> {
    const keys = Object.keys(params);
    if (keys.length !== 1 || keys[0] !== 'parameters') return params;
    if (entry.params?.some((spec) => spec.name === 'parameters')) return params;
    const nested = params.parameters;
    return isPlainObject(nested) ? nested : params;
  }

  private describeFailure(request: RequestEnvelope, err: unknown): string {
    if (err instanceof CommandError) {
      this.log.warn('Command failed', { command: request.command, requestId: request.id, error: err.message });
      return err.message;
    }

    this.log.error('Unexpected error executing command', {
      command: request.command,
      requestId: request.id,
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    return `Error executing command ${request.command}: ${errorMessage(err)}`;
  }
}
