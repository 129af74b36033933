import type { HashedRecord, ISingleUseStore } from '../interfaces/single-use-store.js';

/**
 * In-memory single-use store.
 *
 * `updateIf` reads, compares and writes without an `await` in between, so
 * concurrent callers on the same event loop observe exactly one winner.
 */
export class MemorySingleUseStore<T extends HashedRecord> implements ISingleUseStore<T> {
  protected records = new Map<string, T>();
  private hashIndex = new Map<string, string>(); // tokenHash -> id

  async insert(record: T): Promise<void> {
    if (this.records.has(record.id) || this.hashIndex.has(record.tokenHash)) {
      throw new Error(`Duplicate record: ${record.id}`);
    }
    this.records.set(record.id, { ...record });
    this.hashIndex.set(record.tokenHash, record.id);
  }

  async findById(id: string): Promise<T | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async findByTokenHash(tokenHash: string): Promise<T | null> {
    const id = this.hashIndex.get(tokenHash);
    if (!id) return null;
    return this.findById(id);
  }

  async updateIf(id: string, expected: Partial<T>, changes: Partial<T>): Promise<boolean> {
    const current = this.records.get(id);
    if (!current) return false;

    for (const key in expected) {
      if (current[key] !== expected[key]) {
        return false;
      }
    }

    this.records.set(id, { ...current, ...changes });
    return true;
  }
}
