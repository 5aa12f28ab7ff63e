import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';

/**
 * Write `data` as 4-space indented JSON, creating parent directories.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 4), 'utf8');
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf8');
  return JSON.parse(content);
}
