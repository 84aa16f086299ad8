import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { HeaderFileSystem } from '../pipeline.js';

/**
 * {@link HeaderFileSystem} backed by `node:fs/promises`. Bytes are passed through untouched.
 */
export const nodeFileSystem: HeaderFileSystem = {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  },
  async readBytes(path: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(path));
  },
  async writeBytes(path: string, bytes: Uint8Array): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);
  },
  async rename(from: string, to: string): Promise<void> {
    await rename(from, to);
  },
};
