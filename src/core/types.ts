/**
 * Type definitions for the decoding and rendering pipeline
 */

import type { AttributeStore } from './dataset';
import type { TransferSyntaxInfo } from '../utils/extractTransferSyntax';

/**
 * Decoded value of a data element. The variant follows the VR:
 * text VRs give `string`, binary numeric VRs give `number`,
 * OB/OW/UN-like VRs give `bytes`, SQ gives `sequence`, and
 * undefined-length pixel data gives `fragments`.
 */
export type DecodedValue =
  | { kind: 'string'; values: string[] }
  | { kind: 'number'; values: number[] }
  | { kind: 'bytes'; bytes: Uint8Array }
  | { kind: 'sequence'; items: AttributeStore[] }
  | { kind: 'fragments'; offsetTable: number[]; fragments: Uint8Array[] };

/**
 * DICOM Element structure
 */
export interface DataElement {
  tag: number;
  vr: string;
  /** Byte length on the wire, undefined for undefined-length elements */
  length: number | undefined;
  /** Offset of the element header in the input */
  offset: number;
  value: DecodedValue;
}

/**
 * Result of parsing one file
 */
export interface ParseResult {
  dataset: AttributeStore;
  /** Group 0002 elements; empty when the file had no meta information */
  meta: AttributeStore;
  transferSyntax: TransferSyntaxInfo;
  characterSet: string;
  /** Format anomalies that did not abort the parse (e.g. duplicate tags) */
  warnings: string[];
}

export interface WindowSetting {
  center: number;
  width: number;
  explanation?: string;
}

export type VoiLutFunction = 'LINEAR' | 'LINEAR_EXACT' | 'SIGMOID';

/**
 * Read-only view of the image pixel module
 */
export interface ImageDescriptor {
  rows: number;
  columns: number;
  numberOfFrames: number;
  bitsAllocated: number;
  bitsStored: number;
  highBit: number;
  /** 0 = unsigned, 1 = two's complement */
  pixelRepresentation: number;
  samplesPerPixel: number;
  photometricInterpretation: string;
  planarConfiguration: number;
  rescaleSlope: number;
  rescaleIntercept: number;
  windows: WindowSetting[];
  voiLutFunction: string;
}

export type SampleFormat = 'uint8' | 'int8' | 'uint16' | 'int16';

interface GridOf<F extends SampleFormat, A> {
  format: F;
  rows: number;
  columns: number;
  samplesPerPixel: number;
  /** Row-major, pixel-interleaved samples */
  data: A;
}

/**
 * Samples of one frame
 */
export type SampleGrid =
  | GridOf<'uint8', Uint8Array>
  | GridOf<'int8', Int8Array>
  | GridOf<'uint16', Uint16Array>
  | GridOf<'int16', Int16Array>;

export interface RenderParameters {
  center: number;
  width: number;
}

/**
 * RGBA output handed to the painter
 */
export interface RenderedFrame {
  width: number;
  height: number;
  /** width × height × 4 bytes */
  data: Uint8ClampedArray;
}
