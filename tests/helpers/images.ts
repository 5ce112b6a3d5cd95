import type { ImageDescriptor, SampleGrid } from '../../src/core/types';

export function descriptorOf(overrides: Partial<ImageDescriptor> = {}): ImageDescriptor {
  return {
    rows: 1,
    columns: 1,
    numberOfFrames: 1,
    bitsAllocated: 8,
    bitsStored: 8,
    highBit: 7,
    pixelRepresentation: 0,
    samplesPerPixel: 1,
    photometricInterpretation: 'MONOCHROME2',
    planarConfiguration: 0,
    rescaleSlope: 1,
    rescaleIntercept: 0,
    windows: [],
    voiLutFunction: 'LINEAR',
    ...overrides,
  };
}

export function uint8Grid(values: number[], rows = 1, samplesPerPixel = 1): SampleGrid {
  return {
    format: 'uint8',
    rows,
    columns: values.length / rows / samplesPerPixel,
    samplesPerPixel,
    data: Uint8Array.from(values),
  };
}

export function uint16Grid(values: number[], rows = 1, samplesPerPixel = 1): SampleGrid {
  return {
    format: 'uint16',
    rows,
    columns: values.length / rows / samplesPerPixel,
    samplesPerPixel,
    data: Uint16Array.from(values),
  };
}

export function int16Grid(values: number[], rows = 1): SampleGrid {
  return { format: 'int16', rows, columns: values.length / rows, samplesPerPixel: 1, data: Int16Array.from(values) };
}

/** Red channel of an RGBA frame */
export function reds(data: Uint8ClampedArray): number[] {
  return Array.from(data.filter((_, i) => i % 4 === 0));
}
