/**
 * Document Routes
 * ===============
 * Folder tree, file upload and download, per-role folder permissions and the
 * document dashboard.
 */

import type { FastifyInstance } from 'fastify';
import { requireAuth, requireDocumentManager } from '../middleware/auth.js';
import { readUpload } from '../middleware/fileUpload.js';
import { createLogger } from '../utils/loggingConfig.js';
import { toId, type IdParams } from './params.js';

const logger = createLogger('document-routes');

interface UploadQuery {
  name?: string;
  description?: string;
}

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/**
 * Attachment header for a download. Names outside printable ASCII get an
 * underscore fallback in `filename` and the exact name in `filename*`.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '\\$&');
  if (PRINTABLE_ASCII.test(filename)) {
    return `attachment; filename="${fallback}"`;
  }
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

export async function registerDocumentRoutes(fastify: FastifyInstance) {
  const { documents } = fastify.services;

  fastify.get('/dashboard', { preHandler: requireDocumentManager }, async request => {
    return documents.dashboard(request.user);
  });

  // Folders
  fastify.get('/folders', { preHandler: requireDocumentManager }, async request => {
    return documents.listFolders(request.user);
  });

  fastify.get('/folders/accessible', { preHandler: requireAuth }, async request => {
    return documents.getAccessibleFolders(request.user);
  });

  fastify.post('/folders', { preHandler: requireDocumentManager }, async (request, reply) => {
    const folder = await documents.createFolder(request.user, request.body);
    return reply.code(201).send(folder);
  });

  fastify.get<{ Params: IdParams }>('/folders/:id', { preHandler: requireAuth }, async request => {
    return documents.getFolderDetail(request.user, toId(request.params.id));
  });

  fastify.get<{ Params: IdParams }>(
    '/folders/:id/parent-choices',
    { preHandler: requireAuth },
    async request => {
      return documents.parentChoices(request.user, toId(request.params.id));
    },
  );

  fastify.put<{ Params: IdParams }>('/folders/:id', { preHandler: requireAuth }, async request => {
    return documents.updateFolder(request.user, toId(request.params.id), request.body);
  });

  fastify.delete<{ Params: IdParams }>(
    '/folders/:id',
    { preHandler: requireAuth },
    async (request, reply) => {
      await documents.deleteFolder(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  // Files
  fastify.post<{ Params: IdParams; Querystring: UploadQuery }>(
    '/folders/:id/files',
    { preHandler: requireAuth },
    async (request, reply) => {
      const { filename, data } = readUpload(request);
      const file = await documents.uploadFile(request.user, {
        folderId: toId(request.params.id),
        filename,
        data,
        name: request.query.name,
        description: request.query.description,
      });
      return reply.code(201).send(file);
    },
  );

  fastify.get<{ Params: IdParams }>('/files/:id', { preHandler: requireAuth }, async request => {
    return documents.getFileDetail(request.user, toId(request.params.id));
  });

  fastify.get<{ Params: IdParams }>(
    '/files/:id/download',
    { preHandler: requireAuth },
    async (request, reply) => {
      const { file, stream } = await documents.openDownload(request.user, toId(request.params.id));
      reply.raw.once('close', () => stream.destroy());
      logger.debug(`Serving ${file.storagePath}`, { fileId: file.id, userId: request.user?.id });
      return reply
        .header('Content-Type', file.mimeType)
        .header('Content-Disposition', contentDisposition(file.originalFilename))
        .send(stream);
    },
  );

  fastify.put<{ Params: IdParams }>('/files/:id', { preHandler: requireAuth }, async request => {
    return documents.updateFile(request.user, toId(request.params.id), request.body);
  });

  fastify.delete<{ Params: IdParams }>(
    '/files/:id',
    { preHandler: requireAuth },
    async (request, reply) => {
      await documents.deleteFile(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );

  // Folder permissions
  fastify.post<{ Params: IdParams }>(
    '/folders/:id/permissions',
    { preHandler: requireDocumentManager },
    async (request, reply) => {
      const permission = await documents.createPermission(
        request.user,
        toId(request.params.id),
        request.body,
      );
      return reply.code(201).send(permission);
    },
  );

  fastify.put<{ Params: IdParams }>(
    '/permissions/:id',
    { preHandler: requireDocumentManager },
    async request => {
      return documents.updatePermission(request.user, toId(request.params.id), request.body);
    },
  );

  fastify.delete<{ Params: IdParams }>(
    '/permissions/:id',
    { preHandler: requireDocumentManager },
    async (request, reply) => {
      await documents.deletePermission(request.user, toId(request.params.id));
      return reply.code(204).send();
    },
  );
}
