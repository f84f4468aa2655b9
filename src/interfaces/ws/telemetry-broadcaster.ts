import type { StatusSnapshot } from '../../application/index.js';
import type { TelemetryLogger } from './websocket-server.js';

export interface StatusBroadcastTarget {
  readonly clientCount: number;
  broadcastStatus(snapshot: StatusSnapshot): number;
}

/**
 * Pushes a fresh status snapshot to every telemetry client on a fixed
 * interval. Ticks with no connected clients skip building the snapshot.
 *
 * Returns a stop function for the onClose hook.
 */
export function startTelemetryBroadcast(
  target: StatusBroadcastTarget,
  buildSnapshot: () => StatusSnapshot,
  intervalSeconds: number,
  log: TelemetryLogger,
): () => void {
  const timer = setInterval(() => {
    if (target.clientCount === 0) return;

    try {
      target.broadcastStatus(buildSnapshot());
    } catch (err: unknown) {
      log.error({ err }, 'Telemetry status broadcast failed');
    }
  }, intervalSeconds * 1000);

  log.info({ intervalSeconds }, 'Telemetry status broadcast started');

  return () => {
    clearInterval(timer);
  };
}
