import { lookup } from 'mime-types';
import { extname } from 'path';

export const DEFAULT_MIME_TYPE = 'application/pdf';

/**
 * Content types for the document and image formats Document AI accepts,
 * used when the extension registry has no answer.
 */
export const FALLBACK_MIME_TYPES: Readonly<Record<string, string>> = {
  '.pdf': 'application/pdf',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.tiff': 'image/tiff',
  '.tif': 'image/tiff',
  '.bmp': 'image/bmp',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.txt': 'text/plain',
  '.docx':
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.doc': 'application/msword',
  '.pptx':
    'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  '.ppt': 'application/vnd.ms-powerpoint',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.xls': 'application/vnd.ms-excel',
};

export type MimeLookup = (path: string) => string | false;

/**
 * Resolve the content type to declare for a local file.
 *
 * Registry first, then the fallback table by lower-cased extension, then
 * application/pdf. Never throws and never returns an empty string.
 */
export function resolveMimeType(
  filePath: string,
  registryLookup: MimeLookup = lookup,
): string {
  const guessed = registryLookup(filePath);
  if (guessed) {
    return guessed;
  }

  const extension = extname(filePath).toLowerCase();
  return FALLBACK_MIME_TYPES[extension] ?? DEFAULT_MIME_TYPE;
}
