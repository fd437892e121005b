/**
 * The slice of a remote key/value service the distributed backend needs.
 * Every method may reject on a transport failure; the store degrades on
 * rejection instead of surfacing it.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  /** Write a value that expires after `ttlMs` */
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Reset the expiry of an existing key; false when the key does not exist */
  expire(key: string, ttlMs: number): Promise<boolean>;
  /** Remaining lifetime in milliseconds, or null for a missing key or one without expiry */
  ttl(key: string): Promise<number | null>;
  delete(key: string): Promise<void>;
}
