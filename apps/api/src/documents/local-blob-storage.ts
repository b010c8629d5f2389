import { Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, normalize, sep } from 'path';
import type { BlobStorage } from './blob-storage.interface';

/** Writes blobs below a directory on local disk, served under `publicUrl`. */
export class LocalBlobStorage implements BlobStorage {
  private readonly logger = new Logger(LocalBlobStorage.name);

  constructor(
    private readonly rootDir: string,
    private readonly publicUrl: string,
  ) {}

  async put(key: string, body: Buffer, contentType: string): Promise<string> {
    const target = normalize(join(this.rootDir, key));
    if (!target.startsWith(normalize(this.rootDir) + sep)) {
      throw new Error(`Blob key escapes the storage root: ${key}`);
    }

    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, body);
    this.logger.debug({ key, contentType, bytes: body.length }, 'Blob stored');

    return `${this.publicUrl.replace(/\/+$/, '')}/${key}`;
  }
}
