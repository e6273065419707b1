/**
 * Command Registry
 *
 * Name-indexed table of invocable tools and resources. Built once at startup
 * through explicit register() calls, then frozen and only read.
 */

import { snakeCaseKeys } from '@hostbridge/utils/casing';
import { HostBridgeError } from '@hostbridge/utils/errors';
import { dispatchLog as log } from '@hostbridge/utils/logger';
import type { InvocationContext } from './context.js';
import { adaptParameters, buildInputSchema, type ParamSpec } from './params.js';

export type CommandKind = 'tool' | 'resource';

/** How result object keys are named on the wire */
export type ResultNaming = 'snake_case' | 'preserve';

export type CommandHandler = (
  params: Record<string, unknown>,
  ctx: InvocationContext
) => unknown;

export interface CommandSpec {
  description?: string;
  example?: string;
  /** Declared parameters; omit to receive every (camelCased) parameter as sent */
  params?: ParamSpec[];
  resultNaming?: ResultNaming;
  handler: CommandHandler;
}

export interface ResourceSpec extends CommandSpec {
  /** e.g. "hostbridge://objects/{object_id}" */
  urlPattern: string;
}

export interface RegistryEntry {
  readonly name: string;
  readonly kind: CommandKind;
  readonly params: readonly ParamSpec[] | undefined;
  readonly description: string;
  readonly example: string;
  readonly urlPattern?: string;
  readonly resultNaming: ResultNaming;
  /** Adapt parameters, call the handler and name the result for the wire */
  invoke(params: Record<string, unknown>, ctx: InvocationContext): Promise<unknown>;
}

export interface ToolSchema {
  name: string;
  description: string;
  example: string;
  inputSchema: Record<string, unknown>;
}

export interface ResourceSchema extends ToolSchema {
  urlPattern: string;
}

export interface RegistrySchema {
  tools: ToolSchema[];
  resources: ResourceSchema[];
}

class Entry implements RegistryEntry {
  readonly params: readonly ParamSpec[] | undefined;
  readonly description: string;
  readonly example: string;
  readonly resultNaming: ResultNaming;
  private readonly handler: CommandHandler;

  constructor(
    readonly name: string,
    readonly kind: CommandKind,
    spec: CommandSpec,
    readonly urlPattern?: string
  ) {
    this.params = spec.params ? [...spec.params] : undefined;
    this.description = spec.description ?? '';
    this.example = spec.example ?? '';
    this.resultNaming = spec.resultNaming ?? 'snake_case';
    this.handler = spec.handler;
  }

  async invoke(params: Record<string, unknown>, ctx: InvocationContext): Promise<unknown> {
    const adapted = adaptParameters(this.params, params, this.name);
    const result: unknown = await this.handler(adapted, ctx);
    return this.resultNaming === 'preserve' ? result : snakeCaseKeys(result);
  }
}

export class CommandRegistry {
  private tools: Map<string, RegistryEntry> = new Map();
  private resources: Map<string, RegistryEntry> = new Map();
  private _frozen = false;

  get frozen(): boolean {
    return this._frozen;
  }

  get size(): number {
    return this.tools.size + this.resources.size;
  }

  /**
   * Register a tool. Re-registering a name replaces the previous entry.
   */
  register(name: string, spec: CommandSpec): RegistryEntry {
    return this.add(this.tools, new Entry(this.checkName(name), 'tool', spec));
  }

  /**
   * Register a resource, reachable through the access_resource command.
   */
  registerResource(name: string, spec: ResourceSpec): RegistryEntry {
    return this.add(this.resources, new Entry(this.checkName(name), 'resource', spec, spec.urlPattern));
  }

  /**
   * Exact, case-sensitive lookup.
   */
  lookup(name: string, kind: CommandKind = 'tool'): RegistryEntry | undefined {
    return (kind === 'tool' ? this.tools : this.resources).get(name);
  }

  list(kind?: CommandKind): RegistryEntry[] {
    if (kind === 'tool') return Array.from(this.tools.values());
    if (kind === 'resource') return Array.from(this.resources.values());
    return [...this.tools.values(), ...this.resources.values()];
  }

  /** Refuse further registration */
  freeze(): this {
    this._frozen = true;
    return this;
  }

  getSchema(): RegistrySchema {
    return {
      tools: this.list('tool').map((entry) => ({
        name: entry.name,
        description: entry.description,
        example: entry.example,
        inputSchema: buildInputSchema(entry.params),
      })),
      resources: this.list('resource').map((entry) => ({
        name: entry.name,
        description: entry.description,
        example: entry.example,
        urlPattern: entry.urlPattern ?? '',
        inputSchema: buildInputSchema(entry.params),
      })),
    };
  }

  private checkName(name: string): string {
    if (this._frozen) {
      throw new HostBridgeError(`Registry is frozen; cannot register ${name}`);
    }
    if (!name.trim()) {
      throw new HostBridgeError('Command name must not be empty');
    }
    return name;
  }

  private add(table: Map<string, RegistryEntry>, entry: RegistryEntry): RegistryEntry {
    if (table.has(entry.name)) {
      log.warn('Replacing registered command', { name: entry.name, kind: entry.kind });
    } else {
      log.debug('Registered command', { name: entry.name, kind: entry.kind });
    }
    table.set(entry.name, entry);
    return entry;
  }
}
