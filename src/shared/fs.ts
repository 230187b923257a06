import fs from 'node:fs';
import path from 'node:path';

/**
 * Atomic JSON file writer
 * Writes to a temp file and then renames to avoid partial reads
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `${path.basename(filePath)}.tmp`);
  const json = JSON.stringify(data, null, 2);

  await fs.promises.mkdir(dir, { recursive: true });
  await fs.promises.writeFile(tmpPath, json, { encoding: 'utf8' });
  await fs.promises.rename(tmpPath, filePath);
}

/**
 * Parsed JSON content of a file, or undefined when the file does not exist.
 */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  return JSON.parse(raw);
}
