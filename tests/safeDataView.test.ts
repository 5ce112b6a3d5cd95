import { describe, expect, it } from 'vitest';
import { isDicomError } from '../src/core/errors';
import { decodeString, SafeDataView } from '../src/utils/SafeDataView';

describe('SafeDataView', () => {
  it('reads little-endian integers and enforces bounds', () => {
    const bytes = new Uint8Array(6);
    const view = new DataView(bytes.buffer);
    view.setUint16(0, 0x1234, true); // little endian
    view.setUint16(2, 0xabcd, false); // big endian

    const safe = new SafeDataView(bytes);
    expect(safe.readUint16()).toBe(0x1234);

    safe.setEndianness(false); // switch to big endian for the next read
    expect(safe.readUint16()).toBe(0xabcd);
    expect(safe.getPosition()).toBe(4);

    expect(() => safe.readUint32()).toThrow('Read beyond buffer: need 4 bytes, have 2');
    expect(() => safe.setPosition(-1)).toThrow('out of bounds');
  });

  it('reports reads past the end as TruncatedStream with the offset', () => {
    const safe = new SafeDataView(new Uint8Array(3));
    safe.readUint16();

    let caught: unknown;
    try {
      safe.readUint16();
    } catch (error) {
      caught = error;
    }

    expect(isDicomError(caught, 'TruncatedStream')).toBe(true);
    expect(caught).toMatchObject({ offset: 2 });
    expect(safe.getPosition()).toBe(2);
  });

  it('respects the byte offset of a subarray', () => {
    const backing = new Uint8Array([0xff, 0xff, 0x01, 0x02, 0x03, 0x04]);
    const safe = new SafeDataView(backing.subarray(2));

    expect(safe.byteLength).toBe(4);
    expect(safe.peekUint16()).toBe(0x0201);
    expect(safe.getPosition()).toBe(0);
    expect(safe.readUint32()).toBe(0x04030201);
    expect(safe.getRemainingBytes()).toBe(0);
  });

  it('returns byte views without copying', () => {
    const backing = new Uint8Array([1, 2, 3, 4]);
    const safe = new SafeDataView(backing);
    safe.readUint8();
    const bytes = safe.readBytes(2);

    expect(Array.from(bytes)).toEqual([2, 3]);
    expect(bytes.buffer).toBe(backing.buffer);
  });

  it('trims null terminators and spaces when reading strings', () => {
    const text = new TextEncoder().encode('Test  \0\0');
    const safe = new SafeDataView(text);
    expect(safe.readString(text.length)).toBe('Test');
  });
});

describe('decodeString', () => {
  it('decodes Latin-1 for the default repertoire', () => {
    const bytes = new Uint8Array([0x4d, 0xfc, 0x6c, 0x6c, 0x65, 0x72]);
    expect(decodeString(bytes, 'ISO_IR 100')).toBe('Müller');
  });

  it('decodes UTF-8 for ISO_IR 192', () => {
    const bytes = new TextEncoder().encode('Müller ');
    expect(decodeString(bytes, 'ISO_IR 192')).toBe('Müller');
  });
});
