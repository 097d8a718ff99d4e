/**
 * Persistence medium for the quiz. Used as the injection token, so the
 * driver can be swapped without touching the services that read state.
 */
export abstract class KeyValueStore {
  abstract get(key: string): Promise<string | null>;

  /** Values come back in the order of `keys`, null for missing entries. */
  abstract getMany(keys: string[]): Promise<(string | null)[]>;

  /** Writes every entry or none of them. */
  abstract commit(entries: Record<string, string>): Promise<void>;

  abstract ping(): Promise<string>;
}
