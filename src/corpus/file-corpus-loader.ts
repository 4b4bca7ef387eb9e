import fs from 'node:fs/promises';
import { z } from 'zod';
import type { CorpusRecord } from '../core/types.js';
import { CorpusUnavailableError, InvalidCorpusError } from '../core/errors.js';
import { InMemoryCorpusStore } from './corpus-store.js';

const recordSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
});

/**
 * `[{ id, text }, ...]`. An id -> text object is not accepted: integer-like keys would
 * enumerate ahead of the rest, and a repeated key would silently replace the earlier one.
 */
export const corpusFileSchema = z.array(recordSchema);

export function parseCorpus(data: unknown, source = 'corpus'): CorpusRecord[] {
  const parsed = corpusFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidCorpusError(`${source}: ${issues.join('; ')}`, parsed.error);
  }
  return parsed.data.map((r) => ({ id: r.id, text: r.text }));
}

export async function loadCorpusFile(filePath: string): Promise<InMemoryCorpusStore> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new CorpusUnavailableError(filePath, e);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new InvalidCorpusError(`${filePath} is not valid JSON`, e);
  }

  return new InMemoryCorpusStore(parseCorpus(data, filePath));
}
