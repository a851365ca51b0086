/**
 * Environment Configuration
 *
 * Loads environment variables from .env file.
 * Must be imported before any other modules that need env vars.
 */

import dotenv from 'dotenv';
import { ENV_FILE } from './paths.js';

dotenv.config({ path: ENV_FILE });

function isTruthy(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export const env = {
  /** Explicit token cache file; skips the location search */
  get XBL_CACHE_FILE(): string | undefined {
    return process.env.XBL_CACHE_FILE?.trim() || undefined;
  },
  get XDG_RUNTIME_DIR(): string | undefined {
    return process.env.XDG_RUNTIME_DIR?.trim() || undefined;
  },
  get XBL_NON_INTERACTIVE(): boolean {
    return isTruthy(process.env.XBL_NON_INTERACTIVE);
  },
  get RELAY_URL(): string | undefined {
    return process.env.RELAY_URL?.trim() || undefined;
  },
  get DEBUG(): boolean {
    return isTruthy(process.env.DEBUG);
  },
  get AUTH_VERBOSE(): boolean {
    return isTruthy(process.env.AUTH_VERBOSE);
  },
};
