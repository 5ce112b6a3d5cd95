/**
 * Value Parsers: decoding of raw element bytes by VR
 *
 * Text VRs split on backslash, binary numeric VRs read fixed-width values
 * in the stream's byte order, and the remaining binary VRs keep their bytes.
 */

import type { DecodedValue } from '../core/types';
import { decodeString } from './SafeDataView';
import { BINARY_VR, NUMERIC_VR } from './vrDetection';

/** Text VRs holding one value that may itself contain backslashes */
const SINGLE_VALUE_TEXT_VR = new Set(['LT', 'ST', 'UT', 'UR']);

const NUMERIC_WIDTH: Record<string, number> = {
  US: 2,
  SS: 2,
  AT: 4,
  UL: 4,
  SL: 4,
  FL: 4,
  FD: 8,
  SV: 8,
  UV: 8,
};

function readNumber(view: DataView, vr: string, offset: number, littleEndian: boolean): number {
  switch (vr) {
    case 'US':
      return view.getUint16(offset, littleEndian);
    case 'SS':
      return view.getInt16(offset, littleEndian);
    case 'UL':
      return view.getUint32(offset, littleEndian);
    case 'SL':
      return view.getInt32(offset, littleEndian);
    case 'FL':
      return view.getFloat32(offset, littleEndian);
    case 'FD':
      return view.getFloat64(offset, littleEndian);
    case 'SV':
      return Number(view.getBigInt64(offset, littleEndian));
    case 'UV':
      return Number(view.getBigUint64(offset, littleEndian));
    case 'AT': {
      // Attribute tag: group then element, each in stream byte order
      const group = view.getUint16(offset, littleEndian);
      const element = view.getUint16(offset + 2, littleEndian);
      return ((group << 16) | element) >>> 0;
    }
    default:
      throw new TypeError(`Not a numeric VR: ${vr}`);
  }
}

/**
 * Parse fixed-width binary numbers. Trailing bytes that do not fill a
 * whole value are ignored.
 */
export function parseNumbers(bytes: Uint8Array, vr: string, littleEndian: boolean): number[] {
  const width = NUMERIC_WIDTH[vr];
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values: number[] = [];
  for (let offset = 0; offset + width <= bytes.length; offset += width) {
    values.push(readNumber(view, vr, offset, littleEndian));
  }
  return values;
}

/**
 * Split a text value into its backslash-separated parts
 */
export function parseStrings(bytes: Uint8Array, vr: string, characterSet: string): string[] {
  const text = decodeString(bytes, characterSet);
  if (text === '') {
    return [];
  }
  if (SINGLE_VALUE_TEXT_VR.has(vr)) {
    return [text];
  }
  return text.split('\\').map((part) => part.trim());
}

/**
 * Decode the value of a non-sequence element
 */
export function decodeValue(
  vr: string,
  bytes: Uint8Array,
  littleEndian: boolean,
  characterSet: string
): DecodedValue {
  if (BINARY_VR.has(vr)) {
    return { kind: 'bytes', bytes: new Uint8Array(bytes) };
  }
  if (NUMERIC_VR.has(vr)) {
    return { kind: 'number', values: parseNumbers(bytes, vr, littleEndian) };
  }
  return { kind: 'string', values: parseStrings(bytes, vr, characterSet) };
}

/**
 * Parse a decimal string (DS) or integer string (IS) value
 */
export function parseNumericString(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
