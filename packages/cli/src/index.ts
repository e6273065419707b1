/**
 * hostbridge CLI
 * Run a demo host, or call commands on a running one.
 */

import { Command } from 'commander';
import { DEFAULT_TICK_MS, startDemoHost, type HostCommandOptions } from './commands/host.js';
import { runCall, runPing, runRead, runSchema, type ClientCommandOptions } from './commands/client.js';

export const VERSION = '0.1.0';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function withConnectionOptions(command: Command): Command {
  return command
    .option('-H, --host <host>', 'Host address (default: 127.0.0.1, or HOSTBRIDGE_HOST)')
    .option('-p, --port <port>', 'Port (default: 8080, or HOSTBRIDGE_PORT)')
    .option('-c, --config <path>', 'JSON config file (default: ./hostbridge.config.json if present)');
}

function withClientOptions(command: Command): Command {
  return withConnectionOptions(command).option('-t, --timeout <ms>', 'Request timeout in milliseconds');
}

export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name('hostbridge')
    .description('Bridge remote clients to commands running inside a host application')
    .version(VERSION);

  withConnectionOptions(
    program
      .command('host')
      .description('Run a demo host serving echo, add, get_host_info and the host_info resource')
      .option('--tick-ms <ms>', 'Interval between queue drains', String(DEFAULT_TICK_MS))
  ).action(async (options: HostCommandOptions) => {
    const host = await startDemoHost(options);
    io.out(`Host listening on ${host.address.host}:${host.address.port}. Press Ctrl+C to stop.`);

    const shutdown = (): void => {
      io.out('Shutting down...');
      host
        .stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          io.err(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  withClientOptions(
    program
      .command('call')
      .description('Invoke a command and print its result')
      .argument('<command>', 'Command name')
      .argument('[params]', 'Parameters as a JSON object')
  ).action(async (command: string, params: string | undefined, options: ClientCommandOptions) => {
    io.out(await runCall(command, params, options));
  });

  withClientOptions(
    program
      .command('read')
      .description('Read a resource and print it')
      .argument('<resource>', 'Resource name')
      .argument('[params]', 'Parameters as a JSON object')
  ).action(async (resource: string, params: string | undefined, options: ClientCommandOptions) => {
    io.out(await runRead(resource, params, options));
  });

  withClientOptions(program.command('schema').description("List the host's tools and resources")).action(
    async (options: ClientCommandOptions) => {
      for (const line of await runSchema(options)) {
        io.out(line);
      }
    }
  );

  withClientOptions(program.command('ping').description('Check that a host is reachable')).action(
    async (options: ClientCommandOptions) => {
      io.out(await runPing(options));
    }
  );

  return program;
}

export { startDemoHost, type DemoHost, type HostCommandOptions } from './commands/host.js';
export {
  parseParams,
  formatResult,
  formatSchema,
  runCall,
  runRead,
  runSchema,
  runPing,
  type ClientCommandOptions,
} from './commands/client.js';
export { registerDemoCommands, HOST_INFO_URL } from './demo-commands.js';
export { startTickLoop, type TickLoop } from './tick.js';
