/**
 * Safe JSON File Reading
 *
 * Distinguishes "file not found" (returns default) from "file corrupted" (throws).
 */

import { readFile } from 'fs/promises';
import { isNotFoundError, toErrorMessage } from './errors.js';

/**
 * Read and parse a JSON file safely.
 *
 * - If file doesn't exist: returns `defaultValue`
 * - If file exists but is empty or invalid JSON: throws Error
 * - If file exists and is valid JSON: returns parsed content
 */
export async function readJsonSafe(filepath: string, defaultValue: unknown = null): Promise<unknown> {
  let data: string;
  try {
    data = await readFile(filepath, 'utf-8');
  } catch (e) {
    if (isNotFoundError(e)) {
      return defaultValue;
    }
    throw e;
  }

  if (!data.trim()) {
    throw new Error(`Corrupted JSON file (empty): ${filepath}`);
  }

  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch (parseError) {
    throw new Error(`Corrupted JSON file: ${filepath} - ${toErrorMessage(parseError)}`);
  }
}
