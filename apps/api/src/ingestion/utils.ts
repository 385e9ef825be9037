/**
 * File helpers for report discovery and run id derivation
 */

import { mkdir, readdir, stat } from 'fs/promises';
import { dirname, join, relative, sep } from 'path';

import { INGESTION_SETTINGS, toCompactTimestamp } from '@flakelens/shared';

export const hasSupportedExtension = (fileName: string): boolean =>
  fileName.toLowerCase().endsWith(INGESTION_SETTINGS.REPORT_EXTENSION);

/**
 * Safely create the parent directory of a file path
 */
export const ensureDirectoryExists = async (filePath: string): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
};

export const getFileStats = async (filePath: string): Promise<{ size: number; mtime: Date; isDirectory: boolean }> => {
  const stats = await stat(filePath);
  return {
    size: stats.size,
    mtime: stats.mtime,
    isDirectory: stats.isDirectory(),
  };
};

/**
 * Every report file below a directory, sorted by path
 */
export const findReportFiles = async (root: string): Promise<string[]> => {
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && hasSupportedExtension(entry.name)) {
        found.push(fullPath);
      }
    }
  };

  await walk(root);
  return found.sort();
};

/**
 * Run id for a report found in a batch directory: its relative path
 * without extension, with forward slashes
 */
export const deriveRunId = (root: string, filePath: string): string => {
  const withoutExtension = relative(root, filePath).replace(/\.[^./\\]+$/, '');
  return withoutExtension.split(sep).join('/');
};

export const generateRunId = (now: Date): string =>
  `${INGESTION_SETTINGS.RUN_ID_PREFIX}${toCompactTimestamp(now)}`;
