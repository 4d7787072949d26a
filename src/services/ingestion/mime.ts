/**
 * MIME detection from file extension
 */

import { extname } from 'path';

const MIME_BY_EXTENSION: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.webp': 'image/webp',
  '.txt': 'text/plain',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export const UNKNOWN_MIME_TYPE = 'application/octet-stream';

export function mimeTypeFromFilename(filename: string): string {
  return MIME_BY_EXTENSION[extname(filename).toLowerCase()] ?? UNKNOWN_MIME_TYPE;
}
