/**
 * @fileoverview Session store contract
 *
 * A key/value store of serialized JSON text. `set` must either durably
 * record the value or reject; it is never a silent no-op.
 */

export interface SessionStore {
  /** Stored value, or undefined when the key is absent */
  get(key: string): Promise<string | undefined>;
  /** Store a value, rejecting if it could not be recorded */
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  close(): Promise<void>;
}
