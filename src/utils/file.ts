/**
 * File utilities
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { randomUUID } from 'crypto';
import { errorMessage } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Create a unique temporary directory
 */
export async function createTempDir(prefix = 'clipsense-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a directory tree; a missing directory is not an error
 */
export async function cleanupDir(dirPath: string): Promise<void> {
  try {
    await fs.rm(dirPath, { recursive: true, force: true });
  } catch (error) {
    logger.warn(`Failed to remove temp dir: ${dirPath}`, { reason: errorMessage(error) });
  }
}

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir(prefix);
  logger.debug(`Temp dir created: ${dir}`);
  try {
    return await fn(dir);
  } finally {
    await cleanupDir(dir);
    logger.debug(`Temp dir removed: ${dir}`);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Strip characters that are unsafe in file names
 */
export function sanitizeFilename(filename: string): string {
  const cleaned = filename
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, '')
    .replace(/\s+/g, '_')
    .substring(0, 200);
  return cleaned || randomUUID();
}

/**
 * File name without directory and extension
 */
export function baseNameWithoutExt(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Seconds -> HH:MM:SS (or MM:SS under an hour)
 */
export function formatTimestamp(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);

  if (h > 0) {
    return `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
  }
  return `${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
}
