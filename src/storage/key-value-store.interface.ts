export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');

// String-valued key/value persistence. setItem replaces the whole value.
export interface KeyValueStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
}
