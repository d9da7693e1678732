import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { GridVirtualFileSystem } from '../vfs/virtualFileSystem';

export async function registerSystemRoutes(app: FastifyInstance, vfs: GridVirtualFileSystem): Promise<void> {
  app.get('/health', async () => ({
    status: 'ok',
    rootPath: vfs.rootPath,
    inodes: vfs.inodeCount
  }));

  async function readinessCheck(_request: FastifyRequest, reply: FastifyReply) {
    try {
      await vfs.getAttributes(vfs.getRootHandle());
    } catch (err) {
      reply.status(503);
      return {
        status: 'unavailable',
        reason: err instanceof Error ? err.message : 'root attributes unavailable'
      };
    }
    return { status: 'ok' };
  }

  app.get('/ready', readinessCheck);
  app.get('/readyz', readinessCheck);
}
