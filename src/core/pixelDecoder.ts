/**
 * Pixel Decoder: turns the pixel data element into one sample grid per frame
 */

import { getImageDescriptor } from './descriptor';
import { createDicomError } from './errors';
import type { ImageDescriptor, ParseResult, SampleFormat, SampleGrid } from './types';
import { registry as defaultRegistry, type CodecRegistry, type FrameInfo } from '../plugins/codecs';
import { isCompressedTransferSyntax } from '../utils/extractTransferSyntax';
import { groupFragmentsByFrame, sliceNativeFrame } from '../utils/pixelData';
import { TAGS } from '../utils/tagUtils';

export interface DecodeOptions {
  /** Decompression capability for encapsulated syntaxes */
  codecs?: CodecRegistry;
}

/**
 * Reject layouts the decoder cannot represent
 */
export function validateLayout(descriptor: ImageDescriptor): void {
  const { rows, columns, bitsAllocated, bitsStored, highBit, samplesPerPixel } = descriptor;

  if (rows < 1 || columns < 1) {
    throw createDicomError('UnrecognizedFormat', `Invalid image size ${columns}x${rows}`);
  }
  if (samplesPerPixel !== 1 && samplesPerPixel !== 3) {
    throw createDicomError('UnrecognizedFormat', `Unsupported samples per pixel: ${samplesPerPixel}`, {
      attribute: 'SamplesPerPixel',
    });
  }
  if (bitsAllocated !== 8 && bitsAllocated !== 16) {
    throw createDicomError('UnsupportedBitDepth', `Bits allocated must be 8 or 16, got ${bitsAllocated}`, {
      attribute: 'BitsAllocated',
    });
  }
  if (bitsStored < 1 || bitsStored > bitsAllocated) {
    throw createDicomError(
      'UnsupportedBitDepth',
      `Bits stored ${bitsStored} does not fit in ${bitsAllocated} allocated bits`,
      { attribute: 'BitsStored' }
    );
  }
  if (highBit < bitsStored - 1 || highBit >= bitsAllocated) {
    throw createDicomError('UnsupportedBitDepth', `High bit ${highBit} out of range`, {
      attribute: 'HighBit',
    });
  }
}

export function sampleFormatOf(descriptor: ImageDescriptor): SampleFormat {
  const signed = descriptor.pixelRepresentation === 1;
  if (descriptor.bitsStored <= 8) {
    return signed ? 'int8' : 'uint8';
  }
  return signed ? 'int16' : 'uint16';
}

function createGrid(format: SampleFormat, descriptor: ImageDescriptor, length: number): SampleGrid {
  const { rows, columns, samplesPerPixel } = descriptor;
  switch (format) {
    case 'uint8':
      return { format, rows, columns, samplesPerPixel, data: new Uint8Array(length) };
    case 'int8':
      return { format, rows, columns, samplesPerPixel, data: new Int8Array(length) };
    case 'uint16':
      return { format, rows, columns, samplesPerPixel, data: new Uint16Array(length) };
    case 'int16':
      return { format, rows, columns, samplesPerPixel, data: new Int16Array(length) };
  }
}

/**
 * Unpack the bytes of one frame into samples.
 * Values are shifted down to bit 0, masked to bits stored and sign-extended
 * when the pixel representation is signed.
 */
export function unpackFrame(
  bytes: Uint8Array,
  descriptor: ImageDescriptor,
  littleEndian: boolean,
  planar: boolean
): SampleGrid {
  const { rows, columns, samplesPerPixel, bitsAllocated, bitsStored, highBit } = descriptor;
  const pixelCount = rows * columns;
  const length = pixelCount * samplesPerPixel;
  const bytesPerSample = bitsAllocated / 8;
  const shift = highBit + 1 - bitsStored;
  const mask = 2 ** bitsStored - 1;
  const signBit = 2 ** (bitsStored - 1);
  const signed = descriptor.pixelRepresentation === 1;

  const grid = createGrid(sampleFormatOf(descriptor), descriptor, length);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    for (let sample = 0; sample < samplesPerPixel; sample++) {
      const target = pixel * samplesPerPixel + sample;
      // Planar data stores all of sample 0, then all of sample 1, ...
      const source = planar ? sample * pixelCount + pixel : target;
      const raw =
        bytesPerSample === 1
          ? view.getUint8(source)
          : view.getUint16(source * 2, littleEndian);

      let value = (raw >>> shift) & mask;
      if (signed && value >= signBit) {
        value -= 2 ** bitsStored;
      }
      grid.data[target] = value;
    }
  }

  return grid;
}

function frameInfo(descriptor: ImageDescriptor, transferSyntax: string): FrameInfo {
  return {
    transferSyntax,
    rows: descriptor.rows,
    columns: descriptor.columns,
    samplesPerPixel: descriptor.samplesPerPixel,
    bitsAllocated: descriptor.bitsAllocated,
    bitsStored: descriptor.bitsStored,
    pixelRepresentation: descriptor.pixelRepresentation,
    photometricInterpretation: descriptor.photometricInterpretation,
    planarConfiguration: descriptor.planarConfiguration,
  };
}

/**
 * Decode every frame of a parsed image
 *
 * @returns One sample grid per frame, in frame order
 */
export async function decodePixelData(
  result: ParseResult,
  options: DecodeOptions = {}
): Promise<SampleGrid[]> {
  const descriptor = getImageDescriptor(result.dataset);
  validateLayout(descriptor);

  const value = result.dataset.get(TAGS.PixelData);
  if (!value) {
    throw createDicomError('MissingRequiredAttribute', 'PixelData is missing', {
      tag: TAGS.PixelData,
      attribute: 'PixelData',
    });
  }

  const { rows, columns, samplesPerPixel, bitsAllocated, numberOfFrames } = descriptor;
  const frameLength = rows * columns * samplesPerPixel * (bitsAllocated / 8);
  const frames: SampleGrid[] = [];

  const uid = result.transferSyntax.uid;
  if (isCompressedTransferSyntax(uid)) {
    if (value.kind !== 'fragments') {
      throw createDicomError(
        'UnsupportedTransferSyntax',
        `${result.transferSyntax.name} pixel data must be encapsulated, found a ${value.kind} value`,
        { tag: TAGS.PixelData }
      );
    }
    const codecs = options.codecs ?? defaultRegistry;
    const info = frameInfo(descriptor, uid);
    const grouped = groupFragmentsByFrame(value, numberOfFrames);

    for (let index = 0; index < grouped.length; index++) {
      const decoded = await codecs.decompress(uid, grouped[index], info);
      if (decoded.length !== frameLength) {
        throw createDicomError(
          'PixelDataLengthMismatch',
          `Frame ${index} decoded to ${decoded.length} bytes, expected ${frameLength}`,
          { tag: TAGS.PixelData }
        );
      }
      // Codec output is always little endian and pixel-interleaved
      frames.push(unpackFrame(decoded, descriptor, true, false));
    }
    return frames;
  }

  if (value.kind === 'fragments') {
    throw createDicomError(
      'UnrecognizedFormat',
      `Encapsulated pixel data under native transfer syntax ${result.transferSyntax.name}`,
      { tag: TAGS.PixelData }
    );
  }

  if (value.kind !== 'bytes') {
    throw createDicomError('PixelDataLengthMismatch', `Pixel data holds a ${value.kind} value`, {
      tag: TAGS.PixelData,
    });
  }

  const expected = frameLength * numberOfFrames;
  if (value.bytes.length < expected) {
    throw createDicomError(
      'PixelDataLengthMismatch',
      `Pixel data has ${value.bytes.length} bytes, expected ${expected}`,
      { tag: TAGS.PixelData }
    );
  }

  const planar = samplesPerPixel > 1 && descriptor.planarConfiguration === 1;
  for (let index = 0; index < numberOfFrames; index++) {
    const bytes = sliceNativeFrame(value.bytes, index, frameLength);
    frames.push(unpackFrame(bytes, descriptor, result.transferSyntax.littleEndian, planar));
  }
  return frames;
}

/**
 * Encode samples back to bytes, interleaved, two bytes per sample for
 * 16-bit formats
 */
export function encodeSamples(grid: SampleGrid, littleEndian: boolean): Uint8Array {
  const wide = grid.format === 'uint16' || grid.format === 'int16';
  const bytes = new Uint8Array(grid.data.length * (wide ? 2 : 1));
  const view = new DataView(bytes.buffer);

  for (let i = 0; i < grid.data.length; i++) {
    const value = grid.data[i];
    if (wide) {
      view.setUint16(i * 2, value & 0xffff, littleEndian);
    } else {
      view.setUint8(i, value & 0xff);
    }
  }
  return bytes;
}
