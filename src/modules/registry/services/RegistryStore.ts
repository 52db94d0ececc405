import type { DeleteResult, InsertResult, RegistrySnapshot, UserRecord } from '../types.js';

/**
 * Durable table of registered players.
 *
 * `insert` is the only uniqueness guard (username, exact match) and is a
 * plain check-then-write, so callers must not run two inserts at once.
 */
export interface RegistryStore {
  insert(record: UserRecord): Promise<InsertResult>;

  findByUsername(username: string): Promise<UserRecord | null>;

  findById(id: string): Promise<UserRecord | null>;

  /**
   * Removes every record carrying `id`
   */
  deleteById(id: string): Promise<DeleteResult>;

  /**
   * Clears the table and writes `records` in order, skipping the
   * username check. Used by restore.
   */
  replaceAll(records: RegistrySnapshot): Promise<void>;

  /**
   * Every record, in insertion order
   */
  all(): Promise<RegistrySnapshot>;
}
