/**
 * Artifact Store
 * ==============
 * Filesystem side of promotion. The production path only ever changes by an
 * atomic rename, so readers see either the old artifact or the new one.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ArtifactMissingError } from '../../common/errors.js';

export interface CopyResult {
  source: string;
  destination: string;
  bytes: number;
}

export async function readArtifact(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
      throw new ArtifactMissingError(filePath, err);
    }
    throw err;
  }
}

/**
 * Copy `source` to `destination` via a temporary sibling and rename.
 * Creates the destination directory if needed.
 */
export async function copyArtifactAtomic(source: string, destination: string): Promise<CopyResult> {
  const bytes = await readArtifact(source);

  const dir = path.dirname(destination);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = path.join(dir, `.${path.basename(destination)}.${uuidv4()}.tmp`);
  try {
    const handle = await fs.open(tmpPath, 'wx');
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, destination);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }

  return { source, destination, bytes: bytes.length };
}
