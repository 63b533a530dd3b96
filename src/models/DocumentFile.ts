/**
 * Document file helpers
 */

import path from 'path';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xls': 'application/vnd.ms-excel',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.ppt': 'application/vnd.ms-powerpoint',
  '.pptx': 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  '.txt': 'text/plain',
  '.csv': 'text/csv',
  '.md': 'text/markdown',
  '.html': 'text/html',
  '.json': 'application/json',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.zip': 'application/zip',
};

/**
 * Human-readable size with one decimal, e.g. `1.5 KB`
 */
export function formatFileSize(bytes: number | null | undefined): string {
  if (!bytes) {
    return 'Unknown';
  }
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024 || unit === 'TB') {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

export function getFileExtension(filename: string): string {
  return path.extname(filename).toLowerCase();
}

export function mimeTypeFor(filename: string): string {
  return MIME_TYPES[getFileExtension(filename)] ?? 'application/octet-stream';
}

/**
 * Strip directory components and characters that are unsafe in a stored filename
 */
export function safeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const cleaned = base.replace(/[<>:"|?*\u0000-\u001f]/g, '').trim();
  return cleaned && cleaned !== '.' && cleaned !== '..' ? cleaned : 'upload';
}
