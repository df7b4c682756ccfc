/**
 * Example data access interface.
 * The output sink for admitted examples and the source for resuming a run.
 */

import type { PersistedExample } from '../types/models.js';

export interface IExampleRepository {
  /**
   * Persist one example as a single write; either the whole record lands
   * or the call rejects with PersistenceError.
   */
  append(record: PersistedExample): Promise<void>;

  /**
   * Every stored record, oldest first, as raw JSON values.
   * Callers validate what they read; storage may predate current schemas.
   */
  loadAll(): Promise<unknown[]>;
}
