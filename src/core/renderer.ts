/**
 * Renderer: sample grid → 8-bit RGBA frame
 */

import {
  defaultColorConverter,
  lookupPalette,
  type ColorConverter,
  type PaletteLut,
} from './color';
import { createDicomError } from './errors';
import type { ImageDescriptor, RenderedFrame, RenderParameters, SampleGrid } from './types';
import { assertRenderParameters, buildWindowLut, resolveVoiLutFunction } from './windowing';

export interface RenderOptions {
  /** VOI LUT function overriding the one the dataset declares */
  voiLutFunction?: string;
  /** Required for PALETTE COLOR images */
  palette?: PaletteLut;
  colorConverter?: ColorConverter;
  /** Receives non-fatal anomalies; defaults to console.warn */
  warn?: (message: string) => void;
}

function expectSamples(grid: SampleGrid, samplesPerPixel: number, photometric: string): void {
  if (grid.samplesPerPixel !== samplesPerPixel) {
    throw createDicomError(
      'UnrecognizedFormat',
      `${photometric} needs ${samplesPerPixel} samples per pixel, got ${grid.samplesPerPixel}`,
      { attribute: 'SamplesPerPixel' }
    );
  }
}

function renderMonochrome(
  grid: SampleGrid,
  descriptor: ImageDescriptor,
  params: RenderParameters,
  options: RenderOptions,
  out: Uint8ClampedArray
): void {
  expectSamples(grid, 1, descriptor.photometricInterpretation);
  const fn = resolveVoiLutFunction(options.voiLutFunction ?? descriptor.voiLutFunction, options.warn);
  const { firstValue, table } = buildWindowLut(descriptor, params, fn);
  const invert = descriptor.photometricInterpretation === 'MONOCHROME1';
  const last = table.length - 1;

  for (let i = 0; i < grid.data.length; i++) {
    const index = Math.max(0, Math.min(last, grid.data[i] - firstValue));
    const y = invert ? 255 - table[index] : table[index];
    const o = i * 4;
    out[o] = y;
    out[o + 1] = y;
    out[o + 2] = y;
    out[o + 3] = 255;
  }
}

function renderPalette(
  grid: SampleGrid,
  descriptor: ImageDescriptor,
  options: RenderOptions,
  out: Uint8ClampedArray
): void {
  expectSamples(grid, 1, descriptor.photometricInterpretation);
  if (!options.palette) {
    throw createDicomError('MissingRequiredAttribute', 'PALETTE COLOR image has no palette', {
      attribute: 'RedPaletteColorLookupTableDescriptor',
    });
  }

  for (let i = 0; i < grid.data.length; i++) {
    const [r, g, b] = lookupPalette(options.palette, grid.data[i]);
    const o = i * 4;
    out[o] = r;
    out[o + 1] = g;
    out[o + 2] = b;
    out[o + 3] = 255;
  }
}

function renderColor(
  grid: SampleGrid,
  descriptor: ImageDescriptor,
  options: RenderOptions,
  out: Uint8ClampedArray
): void {
  expectSamples(grid, 3, descriptor.photometricInterpretation);
  const convert = options.colorConverter ?? defaultColorConverter;
  const scale = descriptor.bitsStored > 8 ? 255 / (2 ** descriptor.bitsStored - 1) : 1;
  const toByte = (value: number): number =>
    value <= 0 ? 0 : Math.min(255, Math.round(value * scale));

  const pixelCount = grid.rows * grid.columns;
  for (let p = 0; p < pixelCount; p++) {
    const s = p * 3;
    const [r, g, b] = convert(
      descriptor.photometricInterpretation,
      toByte(grid.data[s]),
      toByte(grid.data[s + 1]),
      toByte(grid.data[s + 2])
    );
    const o = p * 4;
    out[o] = r;
    out[o + 1] = g;
    out[o + 2] = b;
    out[o + 3] = 255;
  }
}

/**
 * Render one frame. Monochrome images go through rescale and the VOI
 * function; color images bypass windowing.
 */
export function renderFrame(
  grid: SampleGrid,
  descriptor: ImageDescriptor,
  params: RenderParameters,
  options: RenderOptions = {}
): RenderedFrame {
  assertRenderParameters(params);

  const width = grid.columns;
  const height = grid.rows;
  const data = new Uint8ClampedArray(width * height * 4);

  switch (descriptor.photometricInterpretation) {
    case 'MONOCHROME1':
    case 'MONOCHROME2':
      renderMonochrome(grid, descriptor, params, options, data);
      break;
    case 'PALETTE COLOR':
      renderPalette(grid, descriptor, options, data);
      break;
    default:
      renderColor(grid, descriptor, options, data);
  }

  return { width, height, data };
}
