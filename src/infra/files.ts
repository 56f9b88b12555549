import { randomUUID } from 'crypto';
import { access, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { isNodeError } from '../errors.js';

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

/** True only for an existing regular file. */
export const isFile = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

/**
 * Write through a sibling temp file and rename, so readers see either the old
 * or the new content and never a partial file.
 */
export const writeFileAtomic = async (path: string, data: string | Uint8Array) => {
  const tmpPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
};

export const writeJsonAtomic = async (path: string, value: unknown) => {
  await writeFileAtomic(path, JSON.stringify(value, null, 2));
};

/** Parsed JSON content, or null when the file does not exist. */
export const readJsonFile = async (path: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  return JSON.parse(raw);
};
