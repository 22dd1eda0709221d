import { promises as fs } from 'node:fs';
import path from 'node:path';
import { errnoCode } from '../../errors/src/index.js';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  /** Pretty-print indentation; 0 writes compact JSON. */
  indent?: number;
}

/**
 * Reads and parses a JSON file. Returns null when the file does not exist;
 * parse errors and other IO errors propagate.
 */
export async function readJsonMaybe(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }
  return JSON.parse(raw);
}

export function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Writes `data` next to `filePath` and renames it into place, so readers see
 * either the previous snapshot or the complete new one.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const encoding = options.encoding || 'utf8';
  const payload = JSON.stringify(data, null, options.indent ?? 2);
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = tempPathFor(filePath);
  try {
    const handle = await fs.open(tmpPath, 'w');
    try {
      await handle.writeFile(payload, encoding);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await renameOver(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

async function renameOver(tmpPath: string, filePath: string): Promise<void> {
  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    // Windows: rename refuses to replace an existing file
    const code = errnoCode(err);
    if (code === 'EEXIST' || code === 'EPERM') {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    throw err;
  }
}
