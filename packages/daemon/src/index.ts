/**
 * @hostbridge/daemon
 *
 * Host side of the bridge:
 * - BridgeServer accepts connections and queues decoded traffic
 * - HostPump drains the queue on the host's own tick
 * - CommandRegistry and Dispatcher resolve and invoke commands
 */

export * from './server.js';
export * from './connection.js';
export * from './context.js';
export * from './inbound.js';
export * from './pump.js';
export * from './params.js';
export * from './registry.js';
export * from './dispatcher.js';
export * from './monitor.js';
export * from './builtin-commands.js';
