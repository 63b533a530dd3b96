/**
 * File Upload Middleware
 * =====================
 * Raw `application/octet-stream` uploads: the body is the file content and
 * the original filename travels in the `x-filename` header.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { Settings } from '../config/settings.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('file-upload-middleware');

export const FILENAME_HEADER = 'x-filename';
const MAX_FILENAME_LENGTH = 255;

export interface RawUpload {
  filename: string;
  data: Buffer;
}

/**
 * Accept octet-stream bodies as Buffers, up to the configured upload size
 */
export function registerUploadParser(fastify: FastifyInstance, bodyLimit = Settings.MAX_UPLOAD_BYTES) {
  fastify.addContentTypeParser(
    'application/octet-stream',
    { parseAs: 'buffer', bodyLimit },
    (_request, body, done) => {
      done(null, body);
    },
  );
}

function decodeFilename(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    logger.debug(`Using undecoded filename header "${raw}"`, error);
    return raw;
  }
}

/**
 * Filename and content of an upload request. Directory parts of the filename are dropped.
 */
export function readUpload(request: FastifyRequest): RawUpload {
  const header = request.headers[FILENAME_HEADER];
  const raw = Array.isArray(header) ? header[0] : header;
  const filename = decodeFilename(raw ?? '')
    .split(/[\\/]/)
    .pop()
    ?.trim();

  if (!filename) {
    throw ValidationError.forField('file', 'Filename header required');
  }
  if (filename.length > MAX_FILENAME_LENGTH) {
    throw ValidationError.forField(
      'file',
      `Ensure this filename has at most ${MAX_FILENAME_LENGTH} characters (it has ${filename.length}).`,
    );
  }

  const data = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
  return { filename, data };
}
