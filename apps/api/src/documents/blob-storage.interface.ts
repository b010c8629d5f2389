/** External store for uploaded document content. */
export interface BlobStorage {
  /** Stores `body` under `key` and returns the URL it is reachable at. */
  put(key: string, body: Buffer, contentType: string): Promise<string>;
}
