import type { Server as HttpServer } from 'node:http';
import type { Socket } from 'node:net';
import { createHash } from 'node:crypto';
import type { BaseLogger } from 'pino';
import { filterSnapshot } from '../../application/index.js';
import type { StatusSnapshot } from '../../application/index.js';
import {
  OPCODE_CLOSE,
  OPCODE_PING,
  OPCODE_PONG,
  OPCODE_TEXT,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from './frames.js';
import { handleClientMessage, welcomeMessage } from './telemetry-protocol.js';
import type { TelemetryMessage } from './telemetry-protocol.js';

/**
 * Telemetry WebSocket server on raw Node.js HTTP upgrade.
 *
 * - accepts clients on /ws/telemetry and greets them with the module list
 * - answers subscribe / unsubscribe / ping text commands
 * - pushes status snapshots filtered by each client's subscriptions
 * - server heartbeat PING every 30 s, silent clients dropped
 */

/** The log methods the telemetry socket uses; satisfied by pino and Fastify loggers. */
export type TelemetryLogger = Pick<BaseLogger, 'info' | 'debug' | 'warn' | 'error'>;

const WS_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';
const HEARTBEAT_MS = 30_000;

export const TELEMETRY_PATH = '/ws/telemetry';

let nextClientId = 1;

interface TelemetryClient {
  id: number;
  socket: Socket;
  alive: boolean;
  closed: boolean;
  buffer: Buffer;
  subscriptions: Set<string>;
}

export interface TelemetrySocketServerOptions {
  availableModules: readonly string[];
  /** ISO timestamp source for outgoing messages. */
  nowIso?: () => string;
}

export class TelemetrySocketServer {
  private clients: Set<TelemetryClient> = new Set();
  private readonly log: TelemetryLogger;
  private readonly availableModules: readonly string[];
  private readonly nowIso: () => string;
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(log: TelemetryLogger, options: TelemetrySocketServerOptions) {
    this.log = log;
    this.availableModules = options.availableModules;
    this.nowIso = options.nowIso ?? (() => new Date().toISOString());
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    server.on('upgrade', (req, socket, head: Buffer) => {
      // Node.js upgrade socket is always net.Socket
      const sock = socket as Socket;

      if (req.url !== TELEMETRY_PATH) {
        sock.destroy();
        return;
      }

      const key = req.headers['sec-websocket-key'];
      if (!key || Array.isArray(key)) {
        sock.destroy();
        return;
      }

      const accept = createHash('sha1')
        .update(key + WS_GUID)
        .digest('base64');

      sock.write(
        'HTTP/1.1 101 Switching Protocols\r\n' +
          'Upgrade: websocket\r\n' +
          'Connection: Upgrade\r\n' +
          `Sec-WebSocket-Accept: ${accept}\r\n` +
          '\r\n',
      );

      // The HTTP parser pushes EOF into the upgraded socket; without
      // allowHalfOpen that ends the connection right after the 101.
      sock.allowHalfOpen = true;
      sock.setTimeout(0);
      sock.setNoDelay(true);
      sock.setKeepAlive(true, HEARTBEAT_MS);

      const client: TelemetryClient = {
        id: nextClientId++,
        socket: sock,
        alive: true,
        closed: false,
        buffer: head.length > 0 ? Buffer.from(head) : Buffer.alloc(0),
        subscriptions: new Set(),
      };

      this.clients.add(client);
      this.log.info(
        { clientId: client.id, clientCount: this.clients.size },
        'Telemetry client connected',
      );

      this.send(client, welcomeMessage(this.availableModules, this.nowIso()));

      sock.on('data', (chunk: Buffer) => this.onData(client, chunk));

      sock.on('end', () => {
        // Spurious readable EOF after upgrade; real disconnects arrive as 'close'.
        this.log.debug({ clientId: client.id }, 'Socket end event ignored');
      });

      sock.on('close', (hadError: boolean) => {
        this.gracefulClose(client, hadError ? 'close_error' : 'close');
      });

      sock.on('error', (err: Error) => {
        if (!client.closed) {
          this.log.debug({ clientId: client.id, err: String(err) }, 'Socket error event');
        }
        this.gracefulClose(client, 'error');
      });

      sock.resume();

      if (client.buffer.length > 0) this.onData(client, Buffer.alloc(0));
    });

    this.pingInterval = setInterval(() => this.heartbeat(), HEARTBEAT_MS);

    this.log.info({ path: TELEMETRY_PATH }, 'Telemetry WebSocket attached');
  }

  /* ------------------------------------------------------------------ */
  /*  Broadcast                                                         */
  /* ------------------------------------------------------------------ */

  broadcastStatus(snapshot: StatusSnapshot): number {
    let sent = 0;
    const timestamp = this.nowIso();

    for (const client of this.clients) {
      const data = {
        ...filterSnapshot(snapshot, client.subscriptions),
        connected_clients: this.clients.size,
      };
      if (this.send(client, { type: 'status_update', data, timestamp })) sent++;
    }

    this.log.debug({ clientCount: this.clients.size, sent }, 'Status update broadcast');
    return sent;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const client of this.clients) {
      this.gracefulClose(client, 'server_shutdown');
    }
    this.clients.clear();
  }

  /* ------------------------------------------------------------------ */
  /*  Private — inbound frames                                          */
  /* ------------------------------------------------------------------ */

  private onData(client: TelemetryClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    while (client.buffer.length > 0) {
      let frame: ReturnType<typeof tryParseFrame>;
      try {
        frame = tryParseFrame(client.buffer);
      } catch (err: unknown) {
        this.log.warn({ clientId: client.id, err }, 'Frame parse error, closing client');
        this.gracefulClose(client, 'frame_parse_error');
        return;
      }

      if (!frame) break; // need more bytes

      client.buffer = client.buffer.subarray(frame.nextOffset);
      client.alive = true;

      switch (frame.opcode) {
        case OPCODE_PONG:
          break;

        case OPCODE_PING:
          this.safeWrite(client, encodeControlFrame(OPCODE_PONG, frame.payload));
          break;

        case OPCODE_CLOSE:
          this.safeWrite(client, encodeControlFrame(OPCODE_CLOSE, frame.payload));
          this.gracefulClose(client, 'close_frame');
          return;

        case OPCODE_TEXT:
          if (frame.fin) {
            const reply = handleClientMessage(
              frame.payload.toString('utf-8'),
              client.subscriptions,
              this.nowIso(),
            );
            this.send(client, reply);
          }
          break;

        default:
          // binary and fragmented messages are not part of the protocol
          break;
      }
    }
  }

  private heartbeat(): void {
    for (const client of this.clients) {
      if (!client.alive) {
        this.gracefulClose(client, 'heartbeat_timeout');
        continue;
      }
      client.alive = false;
      this.safeWrite(client, encodeControlFrame(OPCODE_PING, Buffer.alloc(0)));
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private — lifecycle                                               */
  /* ------------------------------------------------------------------ */

  private send(client: TelemetryClient, message: TelemetryMessage): boolean {
    return this.safeWrite(client, encodeTextFrame(JSON.stringify(message)));
  }

  /** Idempotent; `reason` is logged so operators can see why a client dropped. */
  private gracefulClose(client: TelemetryClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client);

    if (!client.socket.destroyed) {
      client.socket.destroy();
    }

    this.log.info(
      { clientId: client.id, reason, clientCount: this.clients.size },
      'Telemetry client disconnected',
    );
  }

  private safeWrite(client: TelemetryClient, data: Buffer): boolean {
    if (client.closed || client.socket.destroyed) return false;
    try {
      client.socket.write(data);
      return true;
    } catch (err: unknown) {
      this.log.warn({ clientId: client.id, err }, 'Socket write failed');
      this.gracefulClose(client, 'write_error');
      return false;
    }
  }
}
