import { z } from 'zod';
import type { StatusSnapshot } from '../../application/index.js';

/**
 * Client → server commands on /ws/telemetry:
 *
 *   {"action": "subscribe", "modules": ["certsig", "caleon"]}
 *   {"action": "unsubscribe", "modules": ["certsig"]}
 *   {"action": "ping"}
 */
const clientMessageSchema = z.object({
  action: z.string(),
  modules: z.array(z.string()).default([]),
});

export type TelemetryMessage =
  | { type: 'welcome'; message: string; available_modules: string[]; timestamp: string }
  | { type: 'subscription_update'; subscribed_modules: string[]; timestamp: string }
  | { type: 'pong'; timestamp: string }
  | { type: 'error'; message: string; timestamp: string }
  | { type: 'status_update'; data: StatusSnapshot & { connected_clients: number }; timestamp: string };

export function welcomeMessage(availableModules: readonly string[], timestamp: string): TelemetryMessage {
  return {
    type: 'welcome',
    message: 'Connected to DALS telemetry stream',
    available_modules: [...availableModules],
    timestamp,
  };
}

/**
 * Applies one client text message to that client's subscriptions and
 * returns the reply to send back.
 */
export function handleClientMessage(
  raw: string,
  subscriptions: Set<string>,
  timestamp: string,
): TelemetryMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { type: 'error', message: 'Invalid JSON message', timestamp };
  }

  const parsed = clientMessageSchema.safeParse(json);
  if (!parsed.success) {
    return { type: 'error', message: 'Invalid message format', timestamp };
  }

  const { action, modules } = parsed.data;

  switch (action) {
    case 'subscribe':
      for (const m of modules) subscriptions.add(m);
      return { type: 'subscription_update', subscribed_modules: [...subscriptions], timestamp };

    case 'unsubscribe':
      for (const m of modules) subscriptions.delete(m);
      return { type: 'subscription_update', subscribed_modules: [...subscriptions], timestamp };

    case 'ping':
      return { type: 'pong', timestamp };

    default:
      return { type: 'error', message: `Unknown action: ${action}`, timestamp };
  }
}
