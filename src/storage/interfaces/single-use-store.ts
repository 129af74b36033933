/**
 * Record that can be looked up by the hash of its secret value
 */
export interface HashedRecord {
  id: string;
  tokenHash: string;
}

/**
 * Storage capability for credentials that must be consumed or revoked exactly once.
 *
 * `updateIf` is the only mutation the services use on these records. It must be
 * a single atomic compare-and-set at the storage boundary: the changes are
 * applied only if every field named in `expected` currently holds that value
 * (compared with `===`, `undefined` meaning "unset"). A backend implements it
 * as a conditional UPDATE, e.g. `... WHERE id = $1 AND consumed_at IS NULL`.
 */
export interface ISingleUseStore<T extends HashedRecord> {
  /**
   * Persist a new record
   */
  insert(record: T): Promise<void>;

  /**
   * Find a record by ID
   */
  findById(id: string): Promise<T | null>;

  /**
   * Find a record by the SHA-256 hash of its value
   */
  findByTokenHash(tokenHash: string): Promise<T | null>;

  /**
   * Apply `changes` if the record still matches `expected`.
   * Returns false when the record is missing or another writer got there first.
   */
  updateIf(id: string, expected: Partial<T>, changes: Partial<T>): Promise<boolean>;
}
