import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileNotFoundError, IOError } from './errors';

/**
 * @description Expands a leading `~` to the current user's home directory.
 */
export function expandHomePath(filePath: string): string {
  if (filePath === '~' || filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(expandHomePath(filePath));
}

/**
 * @description Reads a local file, used to load private key material.
 * @throws FileNotFoundError when nothing exists at the path.
 * @throws IOError for any other read failure.
 */
export async function readFile(filePath: string): Promise<Buffer> {
  const resolved = expandHomePath(filePath);

  if (!fileExists(resolved)) {
    throw new FileNotFoundError(filePath);
  }

  try {
    return await fs.promises.readFile(resolved);
  } catch (error) {
    throw new IOError(filePath, error);
  }
}
