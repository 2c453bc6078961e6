/**
 * RunStateStore interface for pending turns
 *
 * A pending turn is an agent run suspended on a tool call that waits for the
 * customer's approval. Stores keep its serialized form per session until the
 * customer decides or the entry expires.
 */
export interface RunStateStore {
  /**
   * Initialize the persistence backend (create directories, connections, etc.)
   */
  init(): Promise<void>;

  /**
   * Save the serialized pending turn for a session, replacing any earlier one
   */
  saveState(sessionId: string, runState: string): Promise<void>;

  /**
   * @returns The serialized pending turn, or null if not found, expired or corrupted
   */
  loadState(sessionId: string): Promise<string | null>;

  /**
   * @returns true when this call removed the entry, false when there was none.
   * Concurrent callers for the same session see true at most once.
   */
  deleteState(sessionId: string): Promise<boolean>;

  /**
   * Remove entries older than `maxAgeMs` (the store's configured max age by default)
   *
   * @returns Number of entries that were deleted
   */
  cleanupOldStates(maxAgeMs?: number): Promise<number>;
}
