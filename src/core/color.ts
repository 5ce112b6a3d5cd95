/**
 * Color: YBR to RGB conversion and palette color lookup tables
 */

import type { AttributeStore } from './dataset';
import { createDicomError } from './errors';
import { getTagName } from '../utils/dictionary';
import { TAGS } from '../utils/tagUtils';

export type Rgb = [red: number, green: number, blue: number];

/**
 * Converts one 8-bit pixel of the given photometric interpretation to RGB
 */
export type ColorConverter = (photometric: string, a: number, b: number, c: number) => Rgb;

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

/**
 * Full-range YCbCr (ITU-R BT.601) to RGB
 */
export function ybrFullToRgb(y: number, cb: number, cr: number): Rgb {
  return [
    clampByte(y + 1.402 * (cr - 128)),
    clampByte(y - 0.344136 * (cb - 128) - 0.714136 * (cr - 128)),
    clampByte(y + 1.772 * (cb - 128)),
  ];
}

/**
 * Photometric interpretations converted by `defaultColorConverter`.
 * YBR_ICT and YBR_RCT leave the JPEG 2000 decoder as RGB already.
 */
export const YBR_INTERPRETATIONS = new Set(['YBR_FULL', 'YBR_FULL_422']);

export const defaultColorConverter: ColorConverter = (photometric, a, b, c) =>
  YBR_INTERPRETATIONS.has(photometric) ? ybrFullToRgb(a, b, c) : [a, b, c];

/**
 * Palette color lookup table reduced to 8-bit entries
 */
export interface PaletteLut {
  /** First stored value mapped by the table */
  firstMapped: number;
  red: Uint8Array;
  green: Uint8Array;
  blue: Uint8Array;
}

/**
 * Look up an index; values outside the table take the first or last entry
 */
export function lookupPalette(palette: PaletteLut, value: number): Rgb {
  const last = palette.red.length - 1;
  const index = Math.max(0, Math.min(last, value - palette.firstMapped));
  return [palette.red[index], palette.green[index], palette.blue[index]];
}

function readChannel(
  dataset: AttributeStore,
  descriptorTag: number,
  dataTag: number,
  littleEndian: boolean
): { firstMapped: number; entries: Uint8Array } {
  const descriptor = dataset.getFloats(descriptorTag);
  const data = dataset.getBytes(dataTag);
  if (!descriptor || descriptor.length < 3) {
    const attribute = getTagName(descriptorTag);
    throw createDicomError('MissingRequiredAttribute', `${attribute} is missing`, {
      tag: descriptorTag,
      attribute,
    });
  }
  if (!data) {
    const attribute = getTagName(dataTag);
    throw createDicomError('MissingRequiredAttribute', `${attribute} is missing`, {
      tag: dataTag,
      attribute,
    });
  }

  // Descriptor: number of entries (0 means 65536), first mapped value, bits per entry
  const count = descriptor[0] === 0 ? 65536 : descriptor[0];
  const firstMapped = descriptor[1];
  const bits = descriptor[2];
  const entries = new Uint8Array(count);

  if (bits <= 8 && data.length === count) {
    // Packed 8-bit entries
    entries.set(data.subarray(0, count));
  } else {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const available = Math.min(count, Math.floor(data.length / 2));
    if (available < count) {
      throw createDicomError(
        'PixelDataLengthMismatch',
        `Palette table has ${available} entries, descriptor declares ${count}`,
        { tag: dataTag }
      );
    }
    for (let i = 0; i < count; i++) {
      const word = view.getUint16(i * 2, littleEndian);
      entries[i] = bits <= 8 ? word & 0xff : word >> 8;
    }
  }

  return { firstMapped, entries };
}

/**
 * Read the red, green and blue palette tables (0028,1101-1103 / 0028,1201-1203)
 */
export function readPaletteLut(dataset: AttributeStore, littleEndian = true): PaletteLut {
  const red = readChannel(
    dataset,
    TAGS.RedPaletteColorLookupTableDescriptor,
    TAGS.RedPaletteColorLookupTableData,
    littleEndian
  );
  const green = readChannel(
    dataset,
    TAGS.GreenPaletteColorLookupTableDescriptor,
    TAGS.GreenPaletteColorLookupTableData,
    littleEndian
  );
  const blue = readChannel(
    dataset,
    TAGS.BluePaletteColorLookupTableDescriptor,
    TAGS.BluePaletteColorLookupTableData,
    littleEndian
  );

  const length = Math.min(red.entries.length, green.entries.length, blue.entries.length);
  return {
    firstMapped: red.firstMapped,
    red: red.entries.subarray(0, length),
    green: green.entries.subarray(0, length),
    blue: blue.entries.subarray(0, length),
  };
}
