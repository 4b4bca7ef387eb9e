import type { CorpusRecord } from '../core/types.js';
import { InvalidCorpusError } from '../core/errors.js';

export interface CorpusStore {
  /** All records, in insertion order. */
  getAll(): readonly CorpusRecord[];
  get(id: string): CorpusRecord | undefined;
  readonly size: number;
}

/**
 * Read-only, insertion-ordered corpus held in memory.
 *
 * Records are validated and frozen on construction, so a single store can be shared by
 * any number of in-flight queries.
 */
export class InMemoryCorpusStore implements CorpusStore {
  private readonly records: readonly CorpusRecord[];
  private readonly byId = new Map<string, CorpusRecord>();

  constructor(entries: Iterable<CorpusRecord>) {
    const records: CorpusRecord[] = [];
    for (const entry of entries) {
      if (!entry.id) throw new InvalidCorpusError(`record #${records.length} has an empty id`);
      if (!entry.text.trim()) throw new InvalidCorpusError(`record "${entry.id}" has empty text`);
      if (this.byId.has(entry.id)) throw new InvalidCorpusError(`duplicate record id "${entry.id}"`);
      const record = Object.freeze({ id: entry.id, text: entry.text });
      this.byId.set(record.id, record);
      records.push(record);
    }
    this.records = Object.freeze(records);
  }

  static fromEntries(pairs: Iterable<readonly [string, string]>): InMemoryCorpusStore {
    const records: CorpusRecord[] = [];
    for (const [id, text] of pairs) records.push({ id, text });
    return new InMemoryCorpusStore(records);
  }

  getAll(): readonly CorpusRecord[] {
    return this.records;
  }

  get(id: string): CorpusRecord | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.records.length;
  }
}
