/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/** Container extensions accepted as sources and dataset clips */
export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.mov', '.m4v'];

// OS metadata files that show up inside media folders
const EXCLUDED_NAMES = new Set(['.ds_store', 'thumbs.db', 'ehthumbs.db', 'desktop.ini']);

/**
 * Sanitize a name for use as a file or directory name.
 * Letters, digits, '-', '_' and '.' survive; anything else becomes '_'.
 */
export function sanitizeFilename(name: string, fallback: string = 'clip'): string {
  const safe = name
    .replace(/[^\p{L}\p{N}._-]/gu, '_')
    .replace(/^[._]+|[._]+$/g, '');
  return safe || fallback;
}

/**
 * Get file extension (lowercase, with the leading dot)
 */
export function getExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Normalize a user-supplied extension list ("mp4, .MOV") to ['.mp4', '.mov']
 */
export function normalizeExtensions(extensions: Iterable<string>): string[] {
  const result = new Set<string>();
  for (const raw of extensions) {
    const ext = raw.trim().toLowerCase();
    if (!ext) continue;
    result.add(ext.startsWith('.') ? ext : `.${ext}`);
  }
  return [...result];
}

/**
 * True for a normal user video file name: not a dotfile, not an
 * AppleDouble fork, not OS metadata, and with an accepted extension.
 */
export function isListableVideo(
  filename: string,
  extensions: readonly string[] = VIDEO_EXTENSIONS
): boolean {
  const lower = filename.toLowerCase();
  if (filename.startsWith('.') || EXCLUDED_NAMES.has(lower)) {
    return false;
  }
  return extensions.includes(getExtension(filename));
}
