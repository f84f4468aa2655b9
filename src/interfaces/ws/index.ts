export { TelemetrySocketServer, TELEMETRY_PATH } from './websocket-server.js';
export type { TelemetrySocketServerOptions, TelemetryLogger } from './websocket-server.js';
export { startTelemetryBroadcast } from './telemetry-broadcaster.js';
export type { StatusBroadcastTarget } from './telemetry-broadcaster.js';
export { handleClientMessage, welcomeMessage } from './telemetry-protocol.js';
export type { TelemetryMessage } from './telemetry-protocol.js';
