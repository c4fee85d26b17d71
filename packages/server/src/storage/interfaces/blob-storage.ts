/**
 * Byte storage for uploaded files, addressed by a relative key such as
 * `<projectId>/<folder path>/<stored name>`
 */
export interface IBlobStorage {
  put(key: string, data: ArrayBuffer): Promise<void>;

  /**
   * Returns null if nothing is stored under `key`
   */
  get(key: string): Promise<ArrayBuffer | null>;

  /**
   * Remove one blob. Missing blobs are ignored.
   */
  delete(key: string): Promise<void>;

  /**
   * Remove every blob whose key starts with `prefix/`
   */
  deletePrefix(prefix: string): Promise<void>;
}
