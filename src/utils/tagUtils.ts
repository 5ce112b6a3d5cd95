/**
 * Tag Utilities: Tag format normalization and conversion
 */

/**
 * Anything accepted where a tag is expected: a numeric tag
 * `(group << 16 | element) >>> 0` or a text form such as
 * `x00280010`, `00280010`, `0028,0010` or `(0028,0010)`.
 */
export type TagInput = number | string;

export function makeTag(group: number, element: number): number {
  return ((group << 16) | element) >>> 0;
}

export function tagGroup(tag: number): number {
  return tag >>> 16;
}

export function tagElement(tag: number): number {
  return tag & 0xffff;
}

function cleanTag(tag: string): string {
  return tag.replace(/^x/i, '').replace(/,/g, '').replace(/[()\s]/g, '');
}

/**
 * Convert any tag form to its numeric value
 */
export function parseTag(tag: TagInput): number {
  if (typeof tag === 'number') {
    return tag >>> 0;
  }
  const clean = cleanTag(tag);
  if (!/^[0-9a-f]{8}$/i.test(clean)) {
    throw new TypeError(`Invalid tag: ${tag}`);
  }
  return parseInt(clean, 16) >>> 0;
}

/**
 * Normalize tag format to x-prefixed format (e.g., "x00100010")
 */
export function normalizeTag(tag: TagInput): string {
  return `x${parseTag(tag).toString(16).padStart(8, '0')}`;
}

/**
 * Format tag with comma (e.g., "0010,0010")
 */
export function formatTagWithComma(tag: TagInput): string {
  const hex = parseTag(tag).toString(16).padStart(8, '0').toUpperCase();
  return `${hex.slice(0, 4)},${hex.slice(4, 8)}`;
}

/**
 * Format tag for messages (e.g., "(0028,0010)")
 */
export function formatTag(tag: TagInput): string {
  return `(${formatTagWithComma(tag)})`;
}

/** Private tags live in odd groups */
export function isPrivateTag(tag: TagInput): boolean {
  return (tagGroup(parseTag(tag)) & 1) === 1;
}

/**
 * Well-known tags used by the decoding and rendering pipeline
 */
export const TAGS = {
  FileMetaInformationGroupLength: 0x00020000,
  TransferSyntaxUID: 0x00020010,
  SpecificCharacterSet: 0x00080005,
  Modality: 0x00080060,
  PatientName: 0x00100010,
  SamplesPerPixel: 0x00280002,
  PhotometricInterpretation: 0x00280004,
  PlanarConfiguration: 0x00280006,
  NumberOfFrames: 0x00280008,
  Rows: 0x00280010,
  Columns: 0x00280011,
  BitsAllocated: 0x00280100,
  BitsStored: 0x00280101,
  HighBit: 0x00280102,
  PixelRepresentation: 0x00280103,
  WindowCenter: 0x00281050,
  WindowWidth: 0x00281051,
  RescaleIntercept: 0x00281052,
  RescaleSlope: 0x00281053,
  WindowCenterWidthExplanation: 0x00281055,
  VOILUTFunction: 0x00281056,
  RedPaletteColorLookupTableDescriptor: 0x00281101,
  GreenPaletteColorLookupTableDescriptor: 0x00281102,
  BluePaletteColorLookupTableDescriptor: 0x00281103,
  RedPaletteColorLookupTableData: 0x00281201,
  GreenPaletteColorLookupTableData: 0x00281202,
  BluePaletteColorLookupTableData: 0x00281203,
  PixelData: 0x7fe00010,
  Item: 0xfffee000,
  ItemDelimitationItem: 0xfffee00d,
  SequenceDelimitationItem: 0xfffee0dd,
} as const;
