/**
 * Fixed-interval tick that drives a BridgeServer's drain().
 */

import type { BridgeServer } from '@hostbridge/daemon';
import { errorMessage } from '@hostbridge/utils/errors';
import type { Logger } from '@hostbridge/utils/logger';

export interface TickLoop {
  readonly ticks: number;
  stop(): void;
}

export function startTickLoop(server: BridgeServer, intervalMs: number, log: Logger): TickLoop {
  let ticks = 0;
  const timer = setInterval(() => {
    ticks++;
    server.drain().catch((err: unknown) => {
      log.error('Drain failed', { error: errorMessage(err) });
    });
  }, intervalMs);

  return {
    get ticks() {
      return ticks;
    },
    stop: () => clearInterval(timer),
  };
}
