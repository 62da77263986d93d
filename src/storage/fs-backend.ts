// Filesystem metadata backend.
//
// Stores documents under their SHA-256 hash. Pointers resolve to this
// service's own GET /metadata/:cid route.

import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { StorageBackend } from './types.js';

export class FsBackend implements StorageBackend {
  private readonly dataDir: string;
  private readonly publicUrl: string;
  private initialized = false;

  constructor(dataDir: string, publicUrl = 'http://localhost:3000') {
    this.dataDir = dataDir;
    this.publicUrl = publicUrl.replace(/\/+$/, '');
  }

  async put(data: Buffer): Promise<string> {
    await this.ensureDir();
    const hash = createHash('sha256').update(data).digest('hex');
    const filePath = join(this.dataDir, hash);
    await writeFile(filePath, data);
    return hash;
  }

  async get(cid: string): Promise<Buffer | null> {
    if (!isSha256Hex(cid)) {
      return null;
    }

    const filePath = join(this.dataDir, cid);
    try {
      return await readFile(filePath);
    } catch {
      return null;
    }
  }

  uriFor(cid: string): string {
    return `${this.publicUrl}/metadata/${cid}`;
  }

  async healthy(): Promise<boolean> {
    try {
      await this.ensureDir();
      return true;
    } catch {
      return false;
    }
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.dataDir, { recursive: true });
    this.initialized = true;
  }
}

// Lowercase hex only; also keeps path separators out of file names
function isSha256Hex(cid: string): boolean {
  return /^[a-f0-9]{64}$/.test(cid);
}
