import type { Provider } from '@nestjs/common';
import { resolve } from 'path';
import type { BlobStorage } from '../documents/blob-storage.interface';
import { LocalBlobStorage } from '../documents/local-blob-storage';

export const BLOB_STORAGE = Symbol('BLOB_STORAGE');

export const BlobStorageProvider: Provider<BlobStorage> = {
  provide: BLOB_STORAGE,
  useFactory: () => new LocalBlobStorage(
    resolve(process.env.UPLOAD_DIR || './uploads'),
    process.env.UPLOAD_PUBLIC_URL || 'http://localhost:3000/uploads',
  ),
};
