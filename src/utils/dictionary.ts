/**
 * Dictionary: static tag → VR / keyword table
 *
 * Implicit VR streams carry no VR, so the reader asks a `VrLookup` for it.
 * The standard table ships as `dictionary.json`; callers may inject their own.
 */

import entries from './dictionary.json';
import { formatTag, parseTag, type TagInput } from './tagUtils';

export interface DictionaryEntry {
  vr: string;
  keyword: string;
}

/**
 * Lookup capability used by the reader for implicit VR streams
 */
export interface VrLookup {
  lookup(tag: number): DictionaryEntry | undefined;
}

interface RawEntry {
  tag: string;
  vr: string;
  keyword: string;
}

/**
 * Build a lookup from a list of raw entries (tag as 8 hex digits).
 */
export function createDictionary(raw: readonly RawEntry[]): VrLookup {
  const table = new Map<number, DictionaryEntry>();
  for (const entry of raw) {
    table.set(parseTag(entry.tag), { vr: entry.vr, keyword: entry.keyword });
  }
  return {
    lookup: (tag) => table.get(tag),
  };
}

export const dicomDictionary: VrLookup = createDictionary(entries);

/**
 * Keyword for a tag, or its `(GGGG,EEEE)` form when the dictionary has no entry
 */
export function getTagName(tag: TagInput, dictionary: VrLookup = dicomDictionary): string {
  const numeric = parseTag(tag);
  return dictionary.lookup(numeric)?.keyword ?? formatTag(numeric);
}
