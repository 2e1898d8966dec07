/**
 * Attribute-based lookup over an immutable record collection.
 */

export interface DictionaryEntry {
  readonly word: string;
  readonly length: number; // character count of `word`
}

export type Dictionary = readonly DictionaryEntry[];

/**
 * Groups records by a key in a single pass; lookups are O(1) afterwards.
 * Group order follows first appearance, records keep their input order.
 */
export class FieldIndex<T, K> {
  private readonly groups = new Map<K, T[]>();

  constructor(records: Iterable<T>, keyOf: (record: T) => K) {
    for (const record of records) {
      const key = keyOf(record);
      const group = this.groups.get(key);
      if (group) {
        group.push(record);
      } else {
        this.groups.set(key, [record]);
      }
    }
  }

  get(key: K): readonly T[] {
    return this.groups.get(key) ?? [];
  }

  has(key: K): boolean {
    return this.groups.has(key);
  }

  keys(): K[] {
    return [...this.groups.keys()];
  }
}

export interface WordIndex {
  wordsOfLength(length: number): string[];
  uniqueLengthsInRange(min: number, max: number): number[];
}

class LengthIndex implements WordIndex {
  private readonly byLength: FieldIndex<DictionaryEntry, number>;

  constructor(dictionary: Dictionary) {
    this.byLength = new FieldIndex(dictionary, (entry) => entry.length);
  }

  wordsOfLength(length: number): string[] {
    return this.byLength.get(length).map((entry) => entry.word);
  }

  uniqueLengthsInRange(min: number, max: number): number[] {
    return this.byLength
      .keys()
      .filter((length) => length >= min && length <= max)
      .sort((a, b) => a - b);
  }
}

// Dictionaries are never mutated after load, so one index per instance is enough.
const indexes = new WeakMap<Dictionary, WordIndex>();

/**
 * Return the length index for `dictionary`, building it on first use.
 */
export function indexFor(dictionary: Dictionary): WordIndex {
  let index = indexes.get(dictionary);
  if (!index) {
    index = new LengthIndex(dictionary);
    indexes.set(dictionary, index);
  }
  return index;
}

/** Words whose length field equals `length`, in dictionary order. */
export function wordsOfLength(dictionary: Dictionary, length: number): string[] {
  return indexFor(dictionary).wordsOfLength(length);
}

/**
 * Distinct lengths present in `dictionary` within [min, max], ascending.
 * Empty when nothing matches; deciding whether that is fatal is up to the caller.
 */
export function uniqueLengthsInRange(dictionary: Dictionary, min: number, max: number): number[] {
  return indexFor(dictionary).uniqueLengthsInRange(min, max);
}
