import { buildApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';

async function start(): Promise<void> {
  const config = loadServiceConfig();
  const { app } = await buildApp({ config });

  try {
    await app.listen({ host: config.host, port: config.port });
    app.log.info(
      { host: config.host, port: config.port, backend: config.backend.kind, rootPath: config.rootPath },
      'gridvfs service listening'
    );
  } catch (err) {
    app.log.error({ err }, 'failed to start gridvfs service');
    await app.close();
    throw err;
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down gridvfs');
    try {
      await app.close();
    } catch (closeErr) {
      app.log.error({ err: closeErr }, 'error during gridvfs shutdown');
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

start().catch((err) => {
  console.error('[gridvfs] fatal startup error', err);
  process.exit(1);
});
