/**
 * File helpers shared by the daily CSV partition stores
 */

import * as fs from 'fs/promises';
import { isNotFound } from '../error-handling';

export async function sizeOf(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.size;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Header for a new partition; a newline when a torn write left the last row unterminated
 */
export async function appendPrefix(filePath: string, previousSize: number | null, headerLine: string): Promise<string> {
  if (previousSize === null || previousSize === 0) {
    return headerLine;
  }

  const handle = await fs.open(filePath, 'r');
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(1), 0, 1, previousSize - 1);
    return bytesRead === 1 && buffer[0] === 0x0a ? '' : '\n';
  } finally {
    await handle.close();
  }
}

/**
 * `YYYYMMDD` keys of the files in `dir` matching `pattern`, oldest first.
 * The pattern's first group must capture the key.
 */
export async function listPartitionKeys(dir: string, pattern: RegExp): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const keys: string[] = [];
  for (const entry of entries) {
    const match = pattern.exec(entry);
    if (match && match[1] !== undefined) {
      keys.push(match[1]);
    }
  }
  return keys.sort();
}

/**
 * Text of `filePath`, or null when it does not exist
 */
export async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}
