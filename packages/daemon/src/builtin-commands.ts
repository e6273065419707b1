/**
 * Commands every host exposes.
 */

import type { ExecutionMonitor } from './monitor.js';
import type { CommandRegistry } from './registry.js';

export const GET_SCHEMA_COMMAND = 'get_schema';
export const GET_METRICS_COMMAND = 'get_metrics';

export function registerBuiltinCommands(registry: CommandRegistry, monitor: ExecutionMonitor): void {
  registry.register(GET_SCHEMA_COMMAND, {
    description: 'List every registered tool and resource with its input schema',
    example: '{"id":"req_1","command":"get_schema"}',
    params: [],
    // Schema keys (inputSchema, urlPattern) are part of the published format
    resultNaming: 'preserve',
    handler: () => registry.getSchema(),
  });

  registry.register(GET_METRICS_COMMAND, {
    description: 'Per-command call counts and timings since the host started',
    example: '{"id":"req_2","command":"get_metrics","parameters":{"command":"get_schema"}}',
    params: [{ name: 'command', type: 'string', description: 'Only report this command' }],
    // Keys are command names
    resultNaming: 'preserve',
    handler: (params) => {
      const command = typeof params.command === 'string' ? params.command : undefined;
      if (command) {
        return { [command]: monitor.get(command) ?? null };
      }
      return monitor.snapshot();
    },
  });
}
