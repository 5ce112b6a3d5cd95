/**
 * DICOM Transfer Syntax Utilities
 *
 * Provides constants, the table of transfer syntaxes the reader understands,
 * and a fast scan for the transfer syntax UID of a Part 10 file.
 */

/**
 * DICOM Transfer Syntax UIDs
 * Reference: DICOM PS3.5 Table 10.1
 */
export const TRANSFER_SYNTAX = {
  // Uncompressed
  IMPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2',
  EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1',
  EXPLICIT_VR_BIG_ENDIAN: '1.2.840.10008.1.2.2',
  DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1.99',

  // JPEG
  JPEG_BASELINE: '1.2.840.10008.1.2.4.50',
  JPEG_EXTENDED: '1.2.840.10008.1.2.4.51',
  JPEG_LOSSLESS: '1.2.840.10008.1.2.4.57',
  JPEG_LOSSLESS_SV1: '1.2.840.10008.1.2.4.70',

  // JPEG-LS
  JPEG_LS_LOSSLESS: '1.2.840.10008.1.2.4.80',
  JPEG_LS: '1.2.840.10008.1.2.4.81',

  // JPEG 2000
  JPEG_2000_LOSSLESS: '1.2.840.10008.1.2.4.90',
  JPEG_2000: '1.2.840.10008.1.2.4.91',

  // RLE
  RLE_LOSSLESS: '1.2.840.10008.1.2.5',
} as const;

export type TransferSyntaxUID = (typeof TRANSFER_SYNTAX)[keyof typeof TRANSFER_SYNTAX];

/**
 * Encoding rules fixed by a transfer syntax
 */
export interface TransferSyntaxInfo {
  uid: string;
  name: string;
  explicitVR: boolean;
  littleEndian: boolean;
  /** Pixel data is a sequence of compressed fragments */
  encapsulated: boolean;
}

const KNOWN_SYNTAXES: TransferSyntaxInfo[] = [
  { uid: TRANSFER_SYNTAX.IMPLICIT_VR_LITTLE_ENDIAN, name: 'Implicit VR Little Endian', explicitVR: false, littleEndian: true, encapsulated: false },
  { uid: TRANSFER_SYNTAX.EXPLICIT_VR_LITTLE_ENDIAN, name: 'Explicit VR Little Endian', explicitVR: true, littleEndian: true, encapsulated: false },
  { uid: TRANSFER_SYNTAX.EXPLICIT_VR_BIG_ENDIAN, name: 'Explicit VR Big Endian', explicitVR: true, littleEndian: false, encapsulated: false },
  { uid: TRANSFER_SYNTAX.JPEG_BASELINE, name: 'JPEG Baseline (Process 1)', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_EXTENDED, name: 'JPEG Extended (Process 2 & 4)', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_LOSSLESS, name: 'JPEG Lossless (Process 14)', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_LOSSLESS_SV1, name: 'JPEG Lossless SV1', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_LS_LOSSLESS, name: 'JPEG-LS Lossless', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_LS, name: 'JPEG-LS Near-Lossless', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_2000_LOSSLESS, name: 'JPEG 2000 Lossless', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.JPEG_2000, name: 'JPEG 2000', explicitVR: true, littleEndian: true, encapsulated: true },
  { uid: TRANSFER_SYNTAX.RLE_LOSSLESS, name: 'RLE Lossless', explicitVR: true, littleEndian: true, encapsulated: true },
];

const SYNTAX_BY_UID = new Map(KNOWN_SYNTAXES.map((info) => [info.uid, info]));

/**
 * Encoding rules for a UID, or undefined when the reader cannot handle it
 */
export function getTransferSyntaxInfo(uid: string): TransferSyntaxInfo | undefined {
  return SYNTAX_BY_UID.get(uid);
}

/**
 * Check if transfer syntax indicates compression
 */
export function isCompressedTransferSyntax(uid?: string): boolean {
  if (!uid) {
    return false;
  }
  return getTransferSyntaxInfo(uid)?.encapsulated ?? false;
}

// 'OB', 'OD', ... packed as (first char << 8 | second char)
const LONG_VR_CODES = new Set(
  ['OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'SQ', 'SV', 'UC', 'UN', 'UR', 'UT', 'UV'].map(
    (vr) => (vr.charCodeAt(0) << 8) | vr.charCodeAt(1)
  )
);

/**
 * Safely read a string/UID from the byte array with trimming
 */
function readUIDInPlace(byteArray: Uint8Array, offset: number, length: number): string | null {
  if (length <= 0 || offset + length > byteArray.length) {
    return null;
  }

  let end = offset + length;
  while (end > offset && (byteArray[end - 1] === 0 || byteArray[end - 1] === 32)) {
    end--;
  }

  let uid = '';
  for (let k = offset; k < end; k++) {
    uid += String.fromCharCode(byteArray[k]);
  }
  return uid;
}

/**
 * Extract transfer syntax UID from a Part 10 file without parsing the dataset.
 * Returns null when there is no `DICM` magic or no (0002,0010) element.
 */
export function extractTransferSyntax(byteArray: Uint8Array): string | null {
  if (
    byteArray.length < 132 ||
    byteArray[128] !== 68 || // D
    byteArray[129] !== 73 || // I
    byteArray[130] !== 67 || // C
    byteArray[131] !== 77 // M
  ) {
    return null;
  }

  // File Meta Information is always Explicit VR Little Endian
  let offset = 132;
  const limit = byteArray.length;

  while (offset + 8 <= limit) {
    const group = byteArray[offset] | (byteArray[offset + 1] << 8);
    if (group !== 0x0002) {
      break;
    }

    const element = byteArray[offset + 2] | (byteArray[offset + 3] << 8);
    const vrCode = (byteArray[offset + 4] << 8) | byteArray[offset + 5];

    let length: number;
    let valueOffset: number;
    if (LONG_VR_CODES.has(vrCode)) {
      if (offset + 12 > limit) break;
      length =
        (byteArray[offset + 8] |
          (byteArray[offset + 9] << 8) |
          (byteArray[offset + 10] << 16) |
          (byteArray[offset + 11] << 24)) >>>
        0;
      valueOffset = offset + 12;
    } else {
      length = byteArray[offset + 6] | (byteArray[offset + 7] << 8);
      valueOffset = offset + 8;
    }

    if (element === 0x0010) {
      return readUIDInPlace(byteArray, valueOffset, length);
    }

    offset = valueOffset + length;
  }

  return null;
}
