import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { VfsError } from '../../errors';
import { parseHandle } from '../../inodes/fileHandle';
import type { Handle } from '../../inodes/types';
import type { AttributeRecord, DirectoryEntry } from '../../vfs/types';
import type { GridVirtualFileSystem } from '../../vfs/virtualFileSystem';

const handleParamsSchema = z.object({
  handle: z.string().min(1)
});

const childParamsSchema = handleParamsSchema.extend({
  name: z.string().min(1)
});

const accessBodySchema = z.object({
  mask: z.number().int().nonnegative()
});

const createBodySchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['file', 'directory']),
  mode: z.number().int().nonnegative().default(0o644),
  owner: z
    .object({
      uid: z.number().int().nonnegative(),
      gid: z.number().int().nonnegative(),
      name: z.string().min(1).optional()
    })
    .default({ uid: 0, gid: 0 })
});

function serializeHandle(handle: Handle): string {
  return handle.toString();
}

function serializeAttributes(attributes: AttributeRecord) {
  return {
    ino: serializeHandle(attributes.ino),
    fileId: serializeHandle(attributes.fileId),
    type: attributes.type,
    mode: attributes.mode,
    nlink: attributes.nlink,
    uid: attributes.uid,
    gid: attributes.gid,
    size: attributes.size,
    dev: attributes.dev,
    rdev: attributes.rdev,
    atime: new Date(attributes.atimeMs).toISOString(),
    mtime: new Date(attributes.mtimeMs).toISOString(),
    ctime: new Date(attributes.ctimeMs).toISOString(),
    generation: attributes.generation
  };
}

function serializeEntry(entry: DirectoryEntry) {
  return {
    name: entry.name,
    handle: serializeHandle(entry.handle),
    attributes: serializeAttributes(entry.attributes)
  };
}

function mapVfsErrorToHttpStatus(err: VfsError): number {
  switch (err.code) {
    case 'INVALID_ARGUMENT':
      return 400;
    case 'PERMISSION_DENIED':
      return 403;
    case 'NOT_FOUND':
      return 404;
    case 'ALREADY_EXISTS':
    case 'ALREADY_MAPPED':
      return 409;
    case 'NOT_SUPPORTED':
      return 501;
    case 'IO_FAILURE':
      return 502;
    default:
      return 500;
  }
}

function sendError(reply: FastifyReply, err: unknown) {
  if (err instanceof VfsError) {
    const status = mapVfsErrorToHttpStatus(err);
    if (status >= 500) {
      reply.log.error({ err }, 'gridvfs operation failed');
    }
    return reply.status(status).send({
      error: {
        code: err.code,
        message: err.message,
        details: err.details ?? null
      }
    });
  }

  if (err instanceof z.ZodError) {
    return reply.status(400).send({
      error: {
        code: 'INVALID_REQUEST',
        message: 'Request validation failed',
        details: err.flatten()
      }
    });
  }

  reply.log.error({ err }, 'unhandled error in gridvfs route');
  return reply.status(500).send({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Unexpected error occurred'
    }
  });
}

export async function registerV1Routes(app: FastifyInstance, vfs: GridVirtualFileSystem): Promise<void> {
  app.get('/v1/root', async (_request, reply) => {
    return reply.send({ handle: serializeHandle(vfs.getRootHandle()), path: vfs.rootPath });
  });

  app.get('/v1/inodes/:handle/attributes', async (request, reply) => {
    try {
      const params = handleParamsSchema.parse(request.params);
      const attributes = await vfs.getAttributes(parseHandle(params.handle));
      return reply.send({ data: serializeAttributes(attributes) });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post('/v1/inodes/:handle/access', async (request, reply) => {
    try {
      const params = handleParamsSchema.parse(request.params);
      const body = accessBodySchema.parse(request.body ?? {});
      const granted = await vfs.checkAccess(parseHandle(params.handle), body.mask);
      return reply.send({ data: { requested: body.mask, granted } });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get('/v1/inodes/:handle/children', async (request, reply) => {
    try {
      const params = handleParamsSchema.parse(request.params);
      const entries = await vfs.list(parseHandle(params.handle));
      return reply.send({ data: entries.map(serializeEntry) });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post('/v1/inodes/:handle/children', async (request, reply) => {
    try {
      const params = handleParamsSchema.parse(request.params);
      const body = createBodySchema.parse(request.body ?? {});
      const handle = await vfs.create(parseHandle(params.handle), body.name, body.kind, body.owner, body.mode);
      const attributes = await vfs.getAttributes(handle);
      return reply.status(201).send({
        data: { handle: serializeHandle(handle), attributes: serializeAttributes(attributes) }
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get('/v1/inodes/:handle/children/:name', async (request, reply) => {
    try {
      const params = childParamsSchema.parse(request.params);
      const handle = await vfs.lookup(parseHandle(params.handle), params.name);
      return reply.send({ data: { handle: serializeHandle(handle) } });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get('/v1/inodes/:handle/parent', async (request, reply) => {
    try {
      const params = handleParamsSchema.parse(request.params);
      const handle = await vfs.parentOf(parseHandle(params.handle));
      return reply.send({ data: { handle: serializeHandle(handle) } });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get('/v1/fsstat', async (_request, reply) => {
    try {
      return reply.send({ data: await vfs.getFsStat() });
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
