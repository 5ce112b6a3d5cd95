/**
 * Tag Reader: sequential DICOM element stream
 *
 * Reads the file meta information and then yields the dataset as a lazy
 * sequence of tokens. Nested sequences are tracked on an explicit context
 * stack so crafted input cannot drive unbounded recursion.
 */

import { createDicomError } from './errors';
import { dicomDictionary, type VrLookup } from '../utils/dictionary';
import { readEncapsulatedFragments } from '../utils/pixelData';
import type { SafeDataView } from '../utils/SafeDataView';
import { decodeString } from '../utils/SafeDataView';
import { makeTag, TAGS } from '../utils/tagUtils';
import { detectVR, isValidVR, requiresExplicitLength } from '../utils/vrDetection';

export const UNDEFINED_LENGTH = 0xffffffff;
export const DEFAULT_MAX_SEQUENCE_DEPTH = 32;

const PREAMBLE_LENGTH = 128;

/**
 * Encoding of the element stream after the meta information
 */
export interface StreamEncoding {
  explicitVR: boolean;
  littleEndian: boolean;
}

export interface ReaderOptions {
  dictionary?: VrLookup;
  /** Deepest allowed sequence nesting */
  maxSequenceDepth?: number;
  /** Advance over pixel data without keeping its bytes */
  skipPixelData?: boolean;
}

export type ElementToken =
  | { type: 'element'; tag: number; vr: string; length: number; offset: number; bytes: Uint8Array }
  | { type: 'sequence-start'; tag: number; vr: string; length: number | undefined; offset: number }
  | { type: 'item-start'; length: number | undefined; offset: number }
  | { type: 'item-end' }
  | { type: 'sequence-end' }
  | {
      type: 'fragments';
      tag: number;
      vr: string;
      offset: number;
      offsetTable: number[];
      fragments: Uint8Array[];
    };

interface ReaderContext {
  kind: 'sequence' | 'item';
  tag: number;
  /** End offset for defined-length contexts */
  end: number | undefined;
  /** Nearest enclosing defined end; nothing may be read past it */
  limit: number;
  explicitVR: boolean;
}

interface ElementHeader {
  tag: number;
  vr: string;
  length: number;
  offset: number;
}

/**
 * Check for the 128-byte preamble followed by "DICM"
 */
export function hasPart10Magic(bytes: Uint8Array): boolean {
  return (
    bytes.length >= PREAMBLE_LENGTH + 4 &&
    bytes[128] === 0x44 && // D
    bytes[129] === 0x49 && // I
    bytes[130] === 0x43 && // C
    bytes[131] === 0x4d // M
  );
}

function readHeader(
  view: SafeDataView,
  explicitVR: boolean,
  dictionary: VrLookup
): ElementHeader {
  const offset = view.getPosition();
  const group = view.readUint16();
  const element = view.readUint16();
  const tag = makeTag(group, element);

  if (!explicitVR) {
    return { tag, vr: detectVR(tag, dictionary), length: view.readUint32(), offset };
  }

  const vrBytes = view.readBytes(2);
  const vr = String.fromCharCode(vrBytes[0], vrBytes[1]);
  if (!isValidVR(vr)) {
    throw createDicomError('UnrecognizedFormat', `Invalid VR "${vr}" in explicit VR stream`, {
      tag,
      offset,
    });
  }

  if (requiresExplicitLength(vr)) {
    view.readUint16(); // Skip reserved bytes
    return { tag, vr, length: view.readUint32(), offset };
  }
  return { tag, vr, length: view.readUint16(), offset };
}

/**
 * File meta information read from a Part 10 header
 */
export interface FileMetaInformation {
  elements: Extract<ElementToken, { type: 'element' }>[];
  transferSyntaxUID?: string;
  /** Offset of the first dataset element */
  dataOffset: number;
}

/**
 * Read the group 0002 block that follows the preamble.
 * Meta information is always Explicit VR Little Endian.
 */
export function readFileMeta(view: SafeDataView): FileMetaInformation {
  view.setEndianness(true);
  view.setPosition(PREAMBLE_LENGTH + 4);

  const elements: FileMetaInformation['elements'] = [];
  let transferSyntaxUID: string | undefined;

  while (view.getRemainingBytes() >= 8 && view.peekUint16() === 0x0002) {
    const header = readHeader(view, true, dicomDictionary);
    if (header.length === UNDEFINED_LENGTH) {
      throw createDicomError('UnrecognizedFormat', 'Undefined length in file meta information', {
        tag: header.tag,
        offset: header.offset,
      });
    }
    if (header.length % 2 !== 0) {
      throw createDicomError('UnrecognizedFormat', `Odd value length ${header.length}`, {
        tag: header.tag,
        offset: header.offset,
      });
    }
    if (header.length > view.getRemainingBytes()) {
      throw createDicomError(
        'TruncatedStream',
        `Value of ${header.length} bytes runs past the end of the buffer`,
        { tag: header.tag, offset: header.offset }
      );
    }
    const bytes = view.readBytes(header.length);
    if (header.tag === TAGS.TransferSyntaxUID) {
      transferSyntaxUID = decodeString(bytes).trim();
    }
    elements.push({ type: 'element', ...header, bytes });
  }

  return { elements, transferSyntaxUID, dataOffset: view.getPosition() };
}

/**
 * Yield the dataset starting at the current position of `view`.
 *
 * The generator reads forward only; iterating it again requires a new
 * generator over a view positioned at the dataset start.
 */
export function* readElements(
  view: SafeDataView,
  encoding: StreamEncoding,
  options: ReaderOptions = {}
): Generator<ElementToken, void, undefined> {
  const dictionary = options.dictionary ?? dicomDictionary;
  const maxDepth = options.maxSequenceDepth ?? DEFAULT_MAX_SEQUENCE_DEPTH;
  view.setEndianness(encoding.littleEndian);

  const stack: ReaderContext[] = [];
  let sequenceDepth = 0;

  while (true) {
    const top = stack.length > 0 ? stack[stack.length - 1] : undefined;
    const position = view.getPosition();

    // Close defined-length contexts that have been fully consumed
    if (top && top.end !== undefined && position >= top.end) {
      stack.pop();
      if (top.kind === 'sequence') {
        sequenceDepth--;
        yield { type: 'sequence-end' };
      } else {
        yield { type: 'item-end' };
      }
      continue;
    }

    if (view.getRemainingBytes() === 0) {
      if (top) {
        throw createDicomError('TruncatedStream', 'Unexpected end of data inside a sequence', {
          tag: top.tag,
          offset: position,
        });
      }
      return;
    }

    if (view.getRemainingBytes() < 8) {
      throw createDicomError(
        'TruncatedStream',
        `${view.getRemainingBytes()} trailing bytes cannot hold an element header`,
        { offset: position }
      );
    }

    const limit = top ? top.limit : view.byteLength;
    const explicitVR = top ? top.explicitVR : encoding.explicitVR;

    // Item and delimiter tags carry no VR in either encoding
    if (view.peekUint16() === 0xfffe) {
      const tag = makeTag(view.readUint16(), view.readUint16());
      const length = view.readUint32();

      if (tag === TAGS.Item) {
        if (!top || top.kind !== 'sequence') {
          throw createDicomError('UnrecognizedFormat', 'Item outside of a sequence', {
            tag,
            offset: position,
          });
        }
        const end = length === UNDEFINED_LENGTH ? undefined : view.getPosition() + length;
        if (end !== undefined && end > limit) {
          throw createDicomError(
            'TruncatedStream',
            `Item of ${length} bytes runs past its enclosing element`,
            { tag: top.tag, offset: position }
          );
        }
        stack.push({
          kind: 'item',
          tag: top.tag,
          end,
          limit: end ?? limit,
          explicitVR: top.explicitVR,
        });
        yield { type: 'item-start', length: end === undefined ? undefined : length, offset: position };
        continue;
      }

      if (tag === TAGS.ItemDelimitationItem) {
        if (!top || top.kind !== 'item' || top.end !== undefined) {
          throw createDicomError('UnrecognizedFormat', 'Unexpected item delimiter', {
            tag,
            offset: position,
          });
        }
        stack.pop();
        yield { type: 'item-end' };
        continue;
      }

      if (tag === TAGS.SequenceDelimitationItem) {
        if (!top || top.kind !== 'sequence' || top.end !== undefined) {
          throw createDicomError('UnrecognizedFormat', 'Unexpected sequence delimiter', {
            tag,
            offset: position,
          });
        }
        stack.pop();
        sequenceDepth--;
        yield { type: 'sequence-end' };
        continue;
      }

      throw createDicomError('UnrecognizedFormat', 'Unknown delimitation tag', {
        tag,
        offset: position,
      });
    }

    if (top && top.kind === 'sequence') {
      throw createDicomError('UnrecognizedFormat', 'Expected an item inside a sequence', {
        tag: top.tag,
        offset: position,
      });
    }

    const header = readHeader(view, explicitVR, dictionary);
    const undefinedLength = header.length === UNDEFINED_LENGTH;

    if (header.tag === TAGS.PixelData && undefinedLength) {
      const { offsetTable, fragments } = readEncapsulatedFragments(view, header.tag);
      yield {
        type: 'fragments',
        tag: header.tag,
        vr: header.vr,
        offset: header.offset,
        offsetTable,
        fragments: options.skipPixelData ? [] : fragments,
      };
      continue;
    }

    if (header.vr === 'SQ' || (undefinedLength && header.vr === 'UN')) {
      if (sequenceDepth >= maxDepth) {
        throw createDicomError(
          'TruncatedStream',
          `Sequence nesting exceeds the maximum depth of ${maxDepth}`,
          { tag: header.tag, offset: header.offset }
        );
      }
      const end = undefinedLength ? undefined : view.getPosition() + header.length;
      if (end !== undefined && end > limit) {
        throw createDicomError(
          'TruncatedStream',
          `Sequence of ${header.length} bytes runs past the end of its container`,
          { tag: header.tag, offset: header.offset }
        );
      }
      sequenceDepth++;
      stack.push({
        kind: 'sequence',
        tag: header.tag,
        end,
        limit: end ?? limit,
        // UN with undefined length is an implicit VR little endian sequence
        explicitVR: header.vr === 'UN' ? false : explicitVR,
      });
      yield {
        type: 'sequence-start',
        tag: header.tag,
        vr: 'SQ',
        length: undefinedLength ? undefined : header.length,
        offset: header.offset,
      };
      continue;
    }

    if (undefinedLength) {
      throw createDicomError('UnrecognizedFormat', `Undefined length on ${header.vr} element`, {
        tag: header.tag,
        offset: header.offset,
      });
    }

    if (header.length % 2 !== 0) {
      throw createDicomError('UnrecognizedFormat', `Odd value length ${header.length}`, {
        tag: header.tag,
        offset: header.offset,
      });
    }

    if (view.getPosition() + header.length > limit) {
      throw createDicomError(
        'TruncatedStream',
        `Value of ${header.length} bytes runs past the end of the ${top ? 'item' : 'buffer'}`,
        { tag: header.tag, offset: header.offset }
      );
    }

    const bytes = view.readBytes(header.length);
    yield {
      type: 'element',
      ...header,
      bytes: options.skipPixelData && header.tag === TAGS.PixelData ? bytes.subarray(0, 0) : bytes,
    };
  }
}
