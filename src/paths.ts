/**
 * Centralized Path Management
 *
 * Single source of truth for file locations, including the token cache
 * location policy.
 */

import { accessSync, constants, statSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root directory (parent of src/)
 */
export const REPO_ROOT = path.resolve(__dirname, '..');

/**
 * .env file path
 */
export const ENV_FILE = path.join(REPO_ROOT, '.env');

export const CACHE_FILENAME = 'xbl3_token_cache.json';

export interface CacheLocationCandidates {
  /** Explicit file path; wins without a writability check */
  override?: string;
  /** Per-session runtime directory (XDG_RUNTIME_DIR) */
  runtimeDir?: string;
  /** Directory the application is installed in */
  appDir?: string;
  /** System temp directory */
  tempDir?: string;
}

function isWritableDir(dir: string): boolean {
  try {
    if (!statSync(dir).isDirectory()) return false;
    accessSync(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve where the token cache lives.
 *
 * Order: explicit override, runtime dir, app dir, temp dir. The first
 * writable directory wins. Returns null when none is writable, meaning
 * the cache runs memory-only.
 */
export function resolveCacheLocation(candidates: CacheLocationCandidates): string | null {
  if (candidates.override) {
    return path.resolve(candidates.override);
  }

  for (const dir of [candidates.runtimeDir, candidates.appDir, candidates.tempDir]) {
    if (dir && isWritableDir(dir)) {
      return path.join(dir, CACHE_FILENAME);
    }
  }

  return null;
}
