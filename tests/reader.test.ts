import { describe, expect, it } from 'vitest';
import { readElements, readFileMeta, type ElementToken, type ReaderOptions, type StreamEncoding } from '../src/core/reader';
import { createDictionary } from '../src/utils/dictionary';
import { SafeDataView } from '../src/utils/SafeDataView';
import { catchError } from './helpers/catchError';
import {
  concatChunks,
  encodeDataset,
  encodeElement,
  EXPLICIT_LE,
  IMPLICIT_LE,
  words,
  writeDicom,
  type ElementSpec,
} from './helpers/dicomWriter';

function tokens(bytes: Uint8Array, encoding: StreamEncoding = EXPLICIT_LE, options?: ReaderOptions): ElementToken[] {
  return Array.from(readElements(new SafeDataView(bytes), encoding, options));
}

function nested(depth: number): ElementSpec {
  const inner: ElementSpec[] = depth === 1 ? [{ tag: 0x00081150, vr: 'UI', value: '1.2' }] : [nested(depth - 1)];
  return { tag: 0x00081115, vr: 'SQ', items: [inner] };
}

describe('readElements', () => {
  it('yields flat elements with offsets and lengths', () => {
    const bytes = encodeDataset(
      [
        { tag: 0x00100010, vr: 'PN', value: 'Doe^Jane' },
        { tag: 0x00280010, vr: 'US', value: [2] },
      ],
      EXPLICIT_LE
    );

    const result = tokens(bytes);
    expect(result).toHaveLength(2);
    expect(result[0]).toMatchObject({ type: 'element', tag: 0x00100010, vr: 'PN', length: 8, offset: 0 });
    expect(result[1]).toMatchObject({ type: 'element', tag: 0x00280010, vr: 'US', length: 2, offset: 16 });
  });

  it('brackets defined-length sequences and items', () => {
    const bytes = encodeDataset([nested(1)], EXPLICIT_LE);
    expect(tokens(bytes).map((token) => token.type)).toEqual([
      'sequence-start',
      'item-start',
      'element',
      'item-end',
      'sequence-end',
    ]);
  });

  it('brackets undefined-length sequences and items', () => {
    const bytes = encodeDataset(
      [
        {
          tag: 0x00081115,
          vr: 'SQ',
          undefinedLength: true,
          items: [[{ tag: 0x00081150, vr: 'UI', value: '1.2' }], [{ tag: 0x00081150, vr: 'UI', value: '1.3' }]],
        },
        { tag: 0x00100010, vr: 'PN', value: 'Doe' },
      ],
      EXPLICIT_LE
    );

    const result = tokens(bytes);
    expect(result.map((token) => token.type)).toEqual([
      'sequence-start',
      'item-start',
      'element',
      'item-end',
      'item-start',
      'element',
      'item-end',
      'sequence-end',
      'element',
    ]);
    expect(result[0]).toMatchObject({ type: 'sequence-start', length: undefined });
  });

  it('rejects nesting deeper than the configured limit', () => {
    const bytes = encodeDataset([nested(3)], EXPLICIT_LE);

    expect(tokens(bytes, EXPLICIT_LE, { maxSequenceDepth: 3 })).toHaveLength(13);
    const error = catchError(() => tokens(bytes, EXPLICIT_LE, { maxSequenceDepth: 2 }));
    expect(error).toMatchObject({ kind: 'TruncatedStream' });
  });

  it('reports values running past the buffer as truncated', () => {
    const bytes = encodeElement({ tag: 0x00100010, vr: 'PN', value: 'AB', lengthOverride: 100 }, EXPLICIT_LE);
    const error = catchError(() => tokens(bytes));
    expect(error).toMatchObject({ kind: 'TruncatedStream', offset: 0, tag: '(0010,0010)' });
  });

  it('rejects odd value lengths', () => {
    const bytes = encodeElement({ tag: 0x00100020, vr: 'LO', value: 'ABC', lengthOverride: 3 }, EXPLICIT_LE);
    expect(catchError(() => tokens(bytes))).toMatchObject({ kind: 'UnrecognizedFormat' });
  });

  it('rejects trailing bytes too short for a header', () => {
    const bytes = concatChunks([
      encodeElement({ tag: 0x00280010, vr: 'US', value: [2] }, EXPLICIT_LE),
      new Uint8Array(4),
    ]);
    expect(catchError(() => tokens(bytes))).toMatchObject({ kind: 'TruncatedStream', offset: 10 });
  });

  it('rejects an item outside of any sequence', () => {
    const bytes = words([0xfffe, 0xe000, 0, 0]);
    expect(catchError(() => tokens(bytes))).toMatchObject({ kind: 'UnrecognizedFormat' });
  });

  it('resolves implicit VRs through the dictionary', () => {
    const bytes = encodeDataset([{ tag: 0x00280010, vr: 'US', value: [2] }], IMPLICIT_LE);

    expect(tokens(bytes, IMPLICIT_LE)[0]).toMatchObject({ vr: 'US', length: 2 });

    const dictionary = createDictionary([{ tag: '00280010', vr: 'SS', keyword: 'Rows' }]);
    expect(tokens(bytes, IMPLICIT_LE, { dictionary })[0]).toMatchObject({ vr: 'SS' });
  });

  it('collects encapsulated fragments', () => {
    const bytes = encodeDataset(
      [
        {
          tag: 0x7fe00010,
          vr: 'OB',
          fragments: { offsetTable: [0], fragments: [new Uint8Array([1, 2]), new Uint8Array([3, 4])] },
        },
      ],
      EXPLICIT_LE
    );

    const [token] = tokens(bytes);
    expect(token.type).toBe('fragments');
    if (token.type === 'fragments') {
      expect(token.offsetTable).toEqual([0]);
      expect(token.fragments.map((fragment) => Array.from(fragment))).toEqual([
        [1, 2],
        [3, 4],
      ]);
    }
  });

  it('drops pixel bytes when asked to skip them', () => {
    const bytes = encodeDataset([{ tag: 0x7fe00010, vr: 'OB', value: new Uint8Array([1, 2, 3, 4]) }], EXPLICIT_LE);
    const [token] = tokens(bytes, EXPLICIT_LE, { skipPixelData: true });
    expect(token).toMatchObject({ type: 'element', length: 4 });
    if (token.type === 'element') {
      expect(token.bytes.length).toBe(0);
    }
  });

  it('reads undefined-length UN as an implicit little endian sequence', () => {
    const bytes = concatChunks([
      encodeElement(
        { tag: 0x00091010, vr: 'UN', value: new Uint8Array(0), lengthOverride: 0xffffffff },
        EXPLICIT_LE
      ),
      words([0xfffe, 0xe000, 0xffff, 0xffff]),
      encodeDataset([{ tag: 0x00100020, vr: 'LO', value: 'ID1' }], IMPLICIT_LE),
      words([0xfffe, 0xe00d, 0, 0]),
      words([0xfffe, 0xe0dd, 0, 0]),
    ]);

    const result = tokens(bytes);
    expect(result.map((token) => token.type)).toEqual([
      'sequence-start',
      'item-start',
      'element',
      'item-end',
      'sequence-end',
    ]);
    expect(result[0]).toMatchObject({ tag: 0x00091010, vr: 'SQ' });
    expect(result[2]).toMatchObject({ tag: 0x00100020, vr: 'LO', length: 4 });
  });
});

describe('readFileMeta', () => {
  it('reads group 0002 and stops at the dataset', () => {
    const dataset: ElementSpec[] = [{ tag: 0x00100010, vr: 'PN', value: 'Doe' }];
    const bytes = writeDicom(dataset);
    const meta = readFileMeta(new SafeDataView(bytes));

    expect(meta.transferSyntaxUID).toBe('1.2.840.10008.1.2.1');
    expect(meta.elements.map((element) => element.tag)).toEqual([
      0x00020000, 0x00020001, 0x00020002, 0x00020003, 0x00020010,
    ]);
    expect(meta.dataOffset).toBe(bytes.length - encodeDataset(dataset, EXPLICIT_LE).length);
  });

  it('rejects odd value lengths in the meta information', () => {
    const magic = new Uint8Array(132);
    magic.set([0x44, 0x49, 0x43, 0x4d], 128);
    const bytes = concatChunks([
      magic,
      encodeElement({ tag: 0x00020010, vr: 'UI', value: '1.2.3', lengthOverride: 5 }, EXPLICIT_LE),
    ]);

    expect(catchError(() => readFileMeta(new SafeDataView(bytes)))).toMatchObject({
      kind: 'UnrecognizedFormat',
      tag: '(0002,0010)',
      offset: 132,
    });
  });

  it('leaves the transfer syntax unset when it is absent', () => {
    const meta = readFileMeta(new SafeDataView(writeDicom([], { omitTransferSyntax: true })));
    expect(meta.transferSyntaxUID).toBeUndefined();
    expect(meta.elements).toHaveLength(4);
  });
});
