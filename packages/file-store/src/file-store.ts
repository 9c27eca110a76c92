/**
 * Byte-addressable storage for workbooks, documents and images.
 *
 * `upload` returns the handle the bytes can be fetched back with. Storing under
 * an existing handle replaces it.
 */
export interface FileStore {
  download(handle: string): Promise<Uint8Array>;
  upload(name: string, bytes: Uint8Array): Promise<string>;
  exists(handle: string): Promise<boolean>;
  list(): Promise<string[]>;
}
