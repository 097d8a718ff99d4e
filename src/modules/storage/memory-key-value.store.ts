import { Injectable } from '@nestjs/common';
import { KeyValueStore } from './key-value.store';

@Injectable()
export class MemoryKeyValueStore extends KeyValueStore {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async getMany(keys: string[]): Promise<(string | null)[]> {
    return keys.map((key) => this.entries.get(key) ?? null);
  }

  async commit(entries: Record<string, string>): Promise<void> {
    // No await between writes, so readers never see half a commit
    for (const [key, value] of Object.entries(entries)) {
      this.entries.set(key, value);
    }
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  /** Copy of the raw contents. */
  snapshot(): Map<string, string> {
    return new Map(this.entries);
  }
}
