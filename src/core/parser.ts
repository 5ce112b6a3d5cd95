/**
 * DICOM Parser: builds attribute stores from the tag reader's token stream
 *
 * Modular architecture:
 * - SafeDataView: Safe byte reading
 * - reader: file meta information and element tokens
 * - valueParsers: value decoding by VR
 * - dataset: immutable attribute store
 */

import { AttributeStore } from './dataset';
import { createDicomError, isDicomError } from './errors';
import {
  hasPart10Magic,
  readElements,
  readFileMeta,
  type ElementToken,
  type ReaderOptions,
} from './reader';
import type { DataElement, ParseResult } from './types';
import {
  getTransferSyntaxInfo,
  TRANSFER_SYNTAX,
  type TransferSyntaxInfo,
} from '../utils/extractTransferSyntax';
import { SafeDataView } from '../utils/SafeDataView';
import { formatTag, TAGS } from '../utils/tagUtils';
import { decodeValue } from '../utils/valueParsers';

export { extractTransferSyntax } from '../utils/extractTransferSyntax';

const DEFAULT_CHARACTER_SET = 'ISO_IR 6';

/**
 * Options for parsing
 */
export interface ParseOptions extends ReaderOptions {
  /**
   * Transfer syntax assumed when the `DICM` magic is missing or the meta
   * information has no (0002,0010). `null` rejects such input instead.
   * Defaults to Implicit VR Little Endian.
   */
  fallbackTransferSyntax?: string | null;
}

interface OpenSequence {
  kind: 'sequence';
  tag: number;
  vr: string;
  length: number | undefined;
  offset: number;
  items: AttributeStore[];
}

interface OpenList {
  kind: 'list';
  elements: DataElement[];
  seen: Set<number>;
}

type BuildFrame = OpenSequence | OpenList;

interface BuiltStore {
  store: AttributeStore;
  characterSet: string;
  warnings: string[];
}

/**
 * Consume a token stream once, building nested stores on an explicit stack
 */
export function buildStore(
  tokens: Iterable<ElementToken>,
  littleEndian: boolean,
  initialCharacterSet: string = DEFAULT_CHARACTER_SET
): BuiltStore {
  const warnings: string[] = [];
  const root: OpenList = { kind: 'list', elements: [], seen: new Set() };
  const stack: BuildFrame[] = [root];
  let characterSet = initialCharacterSet;

  const currentList = (): OpenList => {
    const top = stack[stack.length - 1];
    if (top.kind !== 'list') {
      throw createDicomError('UnrecognizedFormat', 'Element outside of a sequence item');
    }
    return top;
  };

  const currentSequence = (): OpenSequence => {
    const top = stack[stack.length - 1];
    if (top.kind !== 'sequence') {
      throw createDicomError('UnrecognizedFormat', 'Item outside of a sequence');
    }
    return top;
  };

  const add = (element: DataElement): void => {
    const list = currentList();
    if (list.seen.has(element.tag)) {
      warnings.push(`Duplicate tag ${formatTag(element.tag)} at offset ${element.offset} ignored`);
      return;
    }
    list.seen.add(element.tag);
    list.elements.push(element);
  };

  for (const token of tokens) {
    switch (token.type) {
      case 'element': {
        const value = decodeValue(token.vr, token.bytes, littleEndian, characterSet);
        if (token.tag === TAGS.SpecificCharacterSet && stack.length === 1 && value.kind === 'string') {
          characterSet = value.values.join('\\') || DEFAULT_CHARACTER_SET;
        }
        add({ tag: token.tag, vr: token.vr, length: token.length, offset: token.offset, value });
        break;
      }
      case 'fragments':
        add({
          tag: token.tag,
          vr: token.vr,
          length: undefined,
          offset: token.offset,
          value: { kind: 'fragments', offsetTable: token.offsetTable, fragments: token.fragments },
        });
        break;
      case 'sequence-start':
        currentList();
        stack.push({
          kind: 'sequence',
          tag: token.tag,
          vr: token.vr,
          length: token.length,
          offset: token.offset,
          items: [],
        });
        break;
      case 'item-start':
        currentSequence();
        stack.push({ kind: 'list', elements: [], seen: new Set() });
        break;
      case 'item-end': {
        const item = currentList();
        stack.pop();
        currentSequence().items.push(new AttributeStore(item.elements));
        break;
      }
      case 'sequence-end': {
        const sequence = currentSequence();
        stack.pop();
        add({
          tag: sequence.tag,
          vr: sequence.vr,
          length: sequence.length,
          offset: sequence.offset,
          value: { kind: 'sequence', items: sequence.items },
        });
        break;
      }
    }
  }

  if (stack.length !== 1) {
    throw createDicomError('TruncatedStream', 'Token stream ended inside a sequence');
  }

  return { store: new AttributeStore(root.elements), characterSet, warnings };
}

function toBytes(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

function resolveSyntax(uid: string): TransferSyntaxInfo {
  const info = getTransferSyntaxInfo(uid);
  if (!info) {
    throw createDicomError('UnsupportedTransferSyntax', `Transfer syntax ${uid} is not supported`, {
      tag: TAGS.TransferSyntaxUID,
    });
  }
  return info;
}

/**
 * Parse a complete DICOM stream held in memory
 *
 * @param input - The DICOM file as a Uint8Array or ArrayBuffer
 * @param options - Parse options
 * @returns Dataset, meta information and the transfer syntax in effect
 */
export function parse(input: Uint8Array | ArrayBuffer, options: ParseOptions = {}): ParseResult {
  const bytes = toBytes(input);
  if (bytes.length < 8) {
    throw createDicomError('UnrecognizedFormat', 'File too small to be a valid DICOM file', {
      offset: 0,
    });
  }

  const fallback =
    options.fallbackTransferSyntax === undefined
      ? TRANSFER_SYNTAX.IMPLICIT_VR_LITTLE_ENDIAN
      : options.fallbackTransferSyntax;
  const view = new SafeDataView(bytes);
  const warnings: string[] = [];
  const part10 = hasPart10Magic(bytes);

  let meta = new AttributeStore();
  let uid: string;
  let dataOffset = 0;

  if (part10) {
    const fileMeta = readFileMeta(view);
    const builtMeta = buildStore(fileMeta.elements, true);
    meta = builtMeta.store;
    dataOffset = fileMeta.dataOffset;

    if (fileMeta.transferSyntaxUID) {
      uid = fileMeta.transferSyntaxUID;
    } else if (fallback === null) {
      throw createDicomError('UnrecognizedFormat', 'File meta information has no transfer syntax', {
        tag: TAGS.TransferSyntaxUID,
      });
    } else {
      uid = fallback;
      warnings.push(`File meta information has no transfer syntax; assuming ${fallback}`);
    }
  } else {
    if (fallback === null) {
      throw createDicomError('UnrecognizedFormat', 'Missing DICM magic after the preamble', {
        offset: 128,
      });
    }
    // A bare dataset cannot start with group 0000 or with meta information
    const firstGroup = bytes[0] | (bytes[1] << 8);
    if (firstGroup === 0x0000 || firstGroup === 0x0002) {
      throw createDicomError('UnrecognizedFormat', 'Not a DICOM stream', { offset: 0 });
    }
    uid = fallback;
    warnings.push(`No DICM magic; parsing as ${fallback}`);
  }

  const transferSyntax = resolveSyntax(uid);
  view.setPosition(dataOffset);

  let built: BuiltStore;
  try {
    built = buildStore(readElements(view, transferSyntax, options), transferSyntax.littleEndian);
  } catch (error) {
    if (!part10 && isDicomError(error)) {
      throw createDicomError('UnrecognizedFormat', `Not a DICOM stream: ${error.message}`, {
        offset: error.offset,
        cause: error,
      });
    }
    throw error;
  }

  if (!part10 && built.store.size === 0) {
    throw createDicomError('UnrecognizedFormat', 'Not a DICOM stream: no elements found', {
      offset: 0,
    });
  }

  return {
    dataset: built.store,
    meta,
    transferSyntax,
    characterSet: built.characterSet,
    warnings: [...warnings, ...built.warnings],
  };
}

/**
 * Check if byte array appears to be a valid DICOM file
 *
 * @param byteArray - The file data as a Uint8Array
 * @returns True if file appears to be valid DICOM
 */
export function canParse(byteArray: Uint8Array): boolean {
  if (byteArray.length < 8) {
    return false;
  }

  // Check for DICM magic string (Part 10 file)
  if (hasPart10Magic(byteArray)) {
    return true;
  }

  // Check if starts with a plausible dataset tag (group should be reasonable)
  const group = byteArray[0] | (byteArray[1] << 8);
  return group !== 0x0000 && group !== 0x0002 && group <= 0x7fe0;
}
