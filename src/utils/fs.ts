import { existsSync, mkdirSync, copyFileSync, writeFileSync, statSync } from 'fs';
import { dirname } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Write file with automatic directory creation
 */
export function writeFileSafe(filePath: string, content: string): void {
  ensureDirSync(dirname(filePath));
  writeFileSync(filePath, content, 'utf-8');
}

/**
 * Copy an existing file to `<path>.bak` before it is overwritten.
 * Returns the backup path, or null when there was nothing to back up.
 */
export function backupFile(filePath: string): string | null {
  if (!existsSync(filePath)) return null;
  const backupPath = `${filePath}.bak`;
  copyFileSync(filePath, backupPath);
  return backupPath;
}

/**
 * Modification time in epoch milliseconds
 */
export function fileMtime(filePath: string): number {
  return Math.floor(statSync(filePath).mtimeMs);
}
