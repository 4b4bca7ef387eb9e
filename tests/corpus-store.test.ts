import { describe, it, expect } from 'vitest';
import { InMemoryCorpusStore } from '../src/corpus/corpus-store.js';
import { InvalidCorpusError } from '../src/core/errors.js';

describe('InMemoryCorpusStore', () => {
	it('returns records in insertion order', () => {
		const store = InMemoryCorpusStore.fromEntries([
			['z', 'last id, first record'],
			['a', 'first id, second record'],
		]);
		expect(store.getAll().map((r) => r.id)).toEqual(['z', 'a']);
		expect(store.size).toBe(2);
	});

	it('looks records up by id', () => {
		const store = new InMemoryCorpusStore([{ id: 'sop1', text: 'Calibrate daily.' }]);
		expect(store.get('sop1')).toEqual({ id: 'sop1', text: 'Calibrate daily.' });
		expect(store.get('missing')).toBeUndefined();
	});

	it('rejects duplicate ids', () => {
		expect(
			() => new InMemoryCorpusStore([
				{ id: 'a', text: 'one' },
				{ id: 'a', text: 'two' },
			])
		).toThrow('Invalid corpus: duplicate record id "a"');
	});

	it('rejects an empty id', () => {
		expect(() => new InMemoryCorpusStore([{ id: '', text: 'orphan' }])).toThrow(InvalidCorpusError);
	});

	it('rejects whitespace-only text', () => {
		expect(() => new InMemoryCorpusStore([{ id: 'a', text: '  \n' }])).toThrow('Invalid corpus: record "a" has empty text');
	});

	it('freezes what it holds', () => {
		const record = { id: 'a', text: 'original' };
		const store = new InMemoryCorpusStore([record]);
		record.text = 'changed';
		expect(store.getAll()[0]?.text).toBe('original');
		expect(Object.isFrozen(store.getAll())).toBe(true);
		expect(Object.isFrozen(store.getAll()[0])).toBe(true);
	});

	it('allows an empty corpus', () => {
		expect(new InMemoryCorpusStore([]).getAll()).toEqual([]);
	});
});
