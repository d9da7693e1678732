import fastify from 'fastify';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { createBackend, createIdentityDirectory } from './backends/registry';
import type { StorageBackend } from './backends/types';
import type { IdentityDirectory } from './identity/directory';
import { createServiceLoggerOptions } from './logger';
import { metricsPlugin } from './plugins/metrics';
import { registerSystemRoutes } from './routes/system';
import { registerV1Routes } from './routes/v1/index';
import { GridVirtualFileSystem } from './vfs/virtualFileSystem';

export type BuildAppOptions = {
  config?: ServiceConfig;
  backend?: StorageBackend;
  identities?: IdentityDirectory;
};

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();

  const app = fastify({
    logger: createServiceLoggerOptions(config.logLevel)
  });

  const backend = options?.backend ?? createBackend(config);
  const identities = options?.identities ?? createIdentityDirectory(config);

  const vfs = await GridVirtualFileSystem.open({
    backend,
    identities,
    rootPath: config.rootPath,
    logger: app.log,
    onOperation: (operation, outcome) => {
      if (app.metrics.enabled) {
        app.metrics.vfsOperationsTotal.labels(operation, outcome).inc();
      }
    }
  });

  await app.register(metricsPlugin, {
    enabled: config.metricsEnabled,
    inodeCount: () => vfs.inodeCount
  });
  await registerSystemRoutes(app, vfs);
  await registerV1Routes(app, vfs);

  return { app, config, vfs };
}
