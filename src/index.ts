import { buildApp } from './app.js';
import { buildStatusSnapshot } from './application/index.js';
import {
  createModuleRegistry,
  createStardateEncoder,
  createStatusNormalizer,
} from './domain/index.js';
import {
  InMemoryModuleStateSource,
  loadFileConfig,
  loadServiceConfig,
} from './infrastructure/index.js';
import { TelemetrySocketServer, startTelemetryBroadcast } from './interfaces/ws/index.js';

/**
 * Bootstrap the DALS server.
 *
 * Order:
 * 1) Environment + YAML configuration
 * 2) Core services and Fastify app
 * 3) Register shutdown hooks
 * 4) listen()
 * 5) Telemetry WebSocket
 */
async function main(): Promise<void> {

  const config = loadServiceConfig();
  const fileConfig = loadFileConfig(config.modulesConfigPath);

  const encoder = createStardateEncoder({ epoch: config.stardateEpoch });
  const normalizer = createStatusNormalizer(createModuleRegistry());
  const moduleSource = new InMemoryModuleStateSource(fileConfig.modules);

  const fastify = await buildApp({
    logLevel: config.logLevel,
    encoder,
    normalizer,
    moduleSource,
  });

  for (const name of Object.keys(fileConfig.modules)) {
    if (!normalizer.registry.has(name)) {
      fastify.log.warn({ module: name }, 'Configured module is not registered; ignoring');
    }
  }

  for (const [name, issues] of Object.entries(fileConfig.counterIssues)) {
    fastify.log.warn({ module: name, issues }, 'Configured counters are not all numbers; dropping them');
  }

  let wsServer: TelemetrySocketServer | null = null;
  let stopBroadcast: null | (() => void) = null;

  // onClose must be registered before listen()
  fastify.addHook('onClose', async () => {
    if (stopBroadcast) stopBroadcast();
    if (wsServer) wsServer.close();
  });

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  fastify.log.info(
    { epoch: encoder.epochIso, telemetry: fileConfig.telemetry },
    'DALS configuration loaded',
  );

  if (fileConfig.telemetry.enabled) {
    const telemetry = new TelemetrySocketServer(fastify.log, {
      availableModules: [...normalizer.registry.keys()],
    });
    telemetry.attach(fastify.server);
    wsServer = telemetry;

    stopBroadcast = startTelemetryBroadcast(
      telemetry,
      () => buildStatusSnapshot(encoder, normalizer, moduleSource),
      fileConfig.telemetry.interval_seconds,
      fastify.log,
    );
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
