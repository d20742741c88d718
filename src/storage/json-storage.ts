import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Root of all persisted documents. Read on every call so tests can point
 * DATA_DIR at a temporary directory.
 */
export function getDataDir(): string {
  return process.env.DATA_DIR || path.join(process.cwd(), 'data');
}

export function collectionDir(collection: string): string {
  return path.join(getDataDir(), collection);
}

export async function readJSON<T>(filePath: string): Promise<T> {
  try {
    const data = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(data);
  } catch (error) {
    logger.error(`Failed to read JSON file: ${filePath}`, { error: errorMessage(error) });
    throw error;
  }
}

// Written to a temp file first so readers never see a half-written document
export async function writeJSON<T>(filePath: string, data: T): Promise<void> {
  const tempPath = `${filePath}.${uuidv4()}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);

    logger.debug(`JSON file written successfully: ${filePath}`);
  } catch (error) {
    logger.error(`Failed to write JSON file: ${filePath}`, { error: errorMessage(error) });
    throw error;
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

export async function readJSONIfExists<T>(filePath: string): Promise<T | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  return readJSON<T>(filePath);
}

export async function listJSONFiles(dirPath: string): Promise<string[]> {
  if (!(await fileExists(dirPath))) {
    return [];
  }

  try {
    const files = await fs.readdir(dirPath);
    return files.filter(file => file.endsWith('.json'));
  } catch (error) {
    logger.error(`Failed to list files in directory: ${dirPath}`, { error: errorMessage(error) });
    throw error;
  }
}

// Tail of each file's update queue; these promises never reject
const pendingUpdates = new Map<string, Promise<void>>();

/**
 * Runs read-modify-write updates of one file one after another. Updates of
 * different files still run concurrently.
 */
export function serializeUpdate<T>(filePath: string, update: () => Promise<T>): Promise<T> {
  const previous = pendingUpdates.get(filePath) ?? Promise.resolve();
  const next = previous.then(update);
  const settled = next.then(
    () => undefined,
    () => undefined
  );
  pendingUpdates.set(filePath, settled);
  void settled.then(() => {
    if (pendingUpdates.get(filePath) === settled) {
      pendingUpdates.delete(filePath);
    }
  });
  return next;
}
