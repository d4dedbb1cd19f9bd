/**
 * Expiring string storage shared by every request that touches a job.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;

  /**
   * Stores `value` under `key` for `ttlSeconds`.
   *
   * Throws StorageError when the value is larger than the store accepts.
   */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<void>;
}

/** How long an abandoned job stays readable. */
export const JOB_TTL_SECONDS = 15 * 60;

/**
 * Parses a stored value, yielding `undefined` for anything that is not JSON so
 * callers can treat it like a missing entry.
 */
export const parseStored = (raw: string | undefined): unknown => {
  if (raw === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};
