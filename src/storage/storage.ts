/**
 * Key-value document storage.
 *
 * The classroom store keeps its whole document under one key; tests swap in an
 * in-memory implementation.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /**
   * Save data under a key, replacing what was there.
   */
  save(key: string, data: unknown): Promise<void>;

  /**
   * @returns true if deleted, false if key didn't exist
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;
}
