import { AppError } from '../errors/app-error.js';
import { MAX_FOLDER_PATH_LENGTH, FOLDER_PATH_SEPARATOR } from '../config/constants.js';

/**
 * Result of sanitizing a folder path. A valid path is returned unchanged;
 * it is both the folder's identity within a project and its directory on disk.
 */
export type FolderPathResult =
  | { ok: true; path: string; segments: string[] }
  | { ok: false; reason: string };

const ALLOWED_CHARACTERS = /^[A-Za-z0-9_\-\/.]+$/;

/**
 * Validate a client-supplied folder path.
 *
 * Rejected: empty, longer than 500 characters, characters outside
 * `[A-Za-z0-9_-/.]`, a leading or trailing `/`, empty segments, `..`
 * segments and segments starting with a dot.
 */
export function sanitizeFolderPath(raw: string): FolderPathResult {
  if (raw.length === 0) {
    return { ok: false, reason: 'Folder path must not be empty' };
  }

  if (raw.length > MAX_FOLDER_PATH_LENGTH) {
    return { ok: false, reason: `Folder path must be at most ${MAX_FOLDER_PATH_LENGTH} characters` };
  }

  if (!ALLOWED_CHARACTERS.test(raw)) {
    return {
      ok: false,
      reason: 'Folder path may only contain letters, digits, "_", "-", "." and "/"',
    };
  }

  if (raw.startsWith(FOLDER_PATH_SEPARATOR) || raw.endsWith(FOLDER_PATH_SEPARATOR)) {
    return { ok: false, reason: 'Folder path must not start or end with "/"' };
  }

  const segments = raw.split(FOLDER_PATH_SEPARATOR);

  for (const segment of segments) {
    if (segment.length === 0) {
      return { ok: false, reason: 'Folder path must not contain empty segments' };
    }
    if (segment === '..') {
      return { ok: false, reason: 'Folder path must not contain ".." segments' };
    }
    if (segment.startsWith('.')) {
      return { ok: false, reason: 'Folder path segments must not start with "."' };
    }
  }

  return { ok: true, path: raw, segments };
}

/**
 * Sanitize or throw `invalid_path`
 */
export function assertFolderPath(raw: string): string {
  const result = sanitizeFolderPath(raw);
  if (!result.ok) {
    throw AppError.invalidPath(result.reason);
  }
  return result.path;
}
