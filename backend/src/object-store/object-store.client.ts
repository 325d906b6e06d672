export const OBJECT_STORE_CLIENT = Symbol('OBJECT_STORE_CLIENT');

export interface ObjectUploadResult {
  /** Bytes stored, when the store reports it. */
  size?: number;
  /** Path of the stored object as reported by the store, when it reports one. */
  reportedPath?: string;
}

export interface ObjectStoreClient {
  put(localPath: string, destinationPath: string, contentType: string): Promise<ObjectUploadResult>;
  resolveURL(storagePath: string): Promise<string>;
}
