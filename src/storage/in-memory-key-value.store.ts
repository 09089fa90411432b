import { KeyValueStore } from './key-value-store.interface';

/** Process-local store - test harness */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly values: Map<string, string> = new Map();

  async getItem(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}
