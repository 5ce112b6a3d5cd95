/**
 * Attribute Store: immutable tag → element map
 */

import type { DataElement, DecodedValue } from './types';
import { parseNumericString } from '../utils/valueParsers';
import { parseTag, type TagInput } from '../utils/tagUtils';

/**
 * Read-only dataset produced by one parse. Nested sequence items are
 * stores of their own. The first element seen for a tag is kept.
 */
export class AttributeStore {
  private readonly elements: ReadonlyMap<number, DataElement>;

  constructor(elements: Iterable<DataElement> = []) {
    const map = new Map<number, DataElement>();
    for (const element of elements) {
      if (!map.has(element.tag)) {
        map.set(element.tag, element);
      }
    }
    this.elements = map;
    Object.freeze(this);
  }

  get size(): number {
    return this.elements.size;
  }

  has(tag: TagInput): boolean {
    return this.elements.has(parseTag(tag));
  }

  /** Tags in stream order */
  tags(): number[] {
    return [...this.elements.keys()];
  }

  *[Symbol.iterator](): IterableIterator<DataElement> {
    yield* this.elements.values();
  }

  getElement(tag: TagInput): DataElement | undefined {
    return this.elements.get(parseTag(tag));
  }

  get(tag: TagInput): DecodedValue | undefined {
    return this.getElement(tag)?.value;
  }

  getStrings(tag: TagInput): string[] | undefined {
    const value = this.get(tag);
    switch (value?.kind) {
      case 'string':
        return value.values;
      case 'number':
        return value.values.map(String);
      default:
        return undefined;
    }
  }

  getString(tag: TagInput, index = 0): string | undefined {
    return this.getStrings(tag)?.[index];
  }

  /**
   * Numeric values of a binary numeric element or a DS/IS string.
   * Undefined when absent or when any part is not a number.
   */
  getFloats(tag: TagInput): number[] | undefined {
    const value = this.get(tag);
    if (value?.kind === 'number') {
      return value.values;
    }
    if (value?.kind !== 'string') {
      return undefined;
    }
    const numbers: number[] = [];
    for (const part of value.values) {
      const parsed = parseNumericString(part);
      if (parsed === undefined) {
        return undefined;
      }
      numbers.push(parsed);
    }
    return numbers;
  }

  getFloat(tag: TagInput, index = 0): number | undefined {
    return this.getFloats(tag)?.[index];
  }

  getInt(tag: TagInput, index = 0): number | undefined {
    const value = this.getFloat(tag, index);
    return value === undefined ? undefined : Math.trunc(value);
  }

  getSequence(tag: TagInput): AttributeStore[] | undefined {
    const value = this.get(tag);
    return value?.kind === 'sequence' ? value.items : undefined;
  }

  getBytes(tag: TagInput): Uint8Array | undefined {
    const value = this.get(tag);
    return value?.kind === 'bytes' ? value.bytes : undefined;
  }
}
