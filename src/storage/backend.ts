/**
 * Abstract storage backend interface.
 *
 * Keys are `/`-separated paths relative to the backend's root.
 */
export interface StorageBackend {
  /** Write data to the given key, replacing any previous content. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** List all keys with the given prefix, sorted. */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;
}
