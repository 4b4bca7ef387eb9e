/** Async key/value settings source. Values are untyped until a schema parses them. */
export interface ConfigStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryConfigStore implements ConfigStore {
  private readonly m = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) this.m.set(key, value);
  }

  async get(key: string): Promise<unknown> {
    return this.m.get(key);
  }
  async set(key: string, value: unknown): Promise<void> {
    this.m.set(key, value);
  }
  async delete(key: string): Promise<void> {
    this.m.delete(key);
  }
}
