/**
 * Windowing: VOI curves, per-render lookup tables and default parameters
 */

import { createDicomError } from './errors';
import type {
  ImageDescriptor,
  RenderParameters,
  SampleGrid,
  VoiLutFunction,
} from './types';

const VOI_FUNCTIONS: readonly VoiLutFunction[] = ['LINEAR', 'LINEAR_EXACT', 'SIGMOID'];

/**
 * Closed-open linear bins: the window [c - w/2, c + w/2) is cut into 256
 * equal bins, values at or below the lower edge give 0 and values at or
 * above the upper edge give 255.
 */
export function windowLinear(value: number, center: number, width: number): number {
  const lower = center - width / 2;
  const y = Math.floor(((value - lower) * 256) / width);
  return Math.min(255, Math.max(0, y));
}

export function windowLinearExact(value: number, center: number, width: number): number {
  if (value <= center - width / 2) {
    return 0;
  }
  if (value > center + width / 2) {
    return 255;
  }
  return Math.min(255, Math.trunc(((value - center) / width + 0.5) * 255));
}

export function windowSigmoid(value: number, center: number, width: number): number {
  return Math.min(255, Math.trunc(255 / (1 + Math.exp((-4 * (value - center)) / width))));
}

export function isVoiLutFunction(name: string): name is VoiLutFunction {
  return VOI_FUNCTIONS.some((known) => known === name);
}

/**
 * Resolve a VOI LUT function name. Unknown names fall back to LINEAR and
 * are reported through `warn`.
 */
export function resolveVoiLutFunction(
  name: string | undefined,
  warn: (message: string) => void = console.warn
): VoiLutFunction {
  const normalized = (name ?? 'LINEAR').trim().toUpperCase();
  if (isVoiLutFunction(normalized)) {
    return normalized;
  }
  warn(`Unsupported VOI LUT function ${normalized}, using LINEAR`);
  return 'LINEAR';
}

export function assertRenderParameters(params: RenderParameters): void {
  if (!Number.isFinite(params.width) || params.width <= 0) {
    throw createDicomError('InvalidWindowWidth', `Window width must be positive, got ${params.width}`);
  }
  if (!Number.isFinite(params.center)) {
    throw createDicomError('InvalidWindowWidth', `Window center must be finite, got ${params.center}`);
  }
}

export function applyWindow(value: number, params: RenderParameters, fn: VoiLutFunction): number {
  switch (fn) {
    case 'LINEAR':
      return windowLinear(value, params.center, params.width);
    case 'LINEAR_EXACT':
      return windowLinearExact(value, params.center, params.width);
    case 'SIGMOID':
      return windowSigmoid(value, params.center, params.width);
  }
}

/**
 * Lookup table from stored value to display value. Index with
 * `table[sample - firstValue]`.
 */
export interface WindowLut {
  firstValue: number;
  table: Uint8Array;
}

/**
 * Build a table covering every value the stored bits can hold
 */
export function buildWindowLut(
  descriptor: Pick<
    ImageDescriptor,
    'bitsStored' | 'pixelRepresentation' | 'rescaleSlope' | 'rescaleIntercept'
  >,
  params: RenderParameters,
  fn: VoiLutFunction
): WindowLut {
  assertRenderParameters(params);

  const size = 2 ** descriptor.bitsStored;
  const firstValue = descriptor.pixelRepresentation === 1 ? -(size / 2) : 0;
  const table = new Uint8Array(size);

  for (let i = 0; i < size; i++) {
    const stored = firstValue + i;
    const rescaled = stored * descriptor.rescaleSlope + descriptor.rescaleIntercept;
    table[i] = applyWindow(rescaled, params, fn);
  }

  return { firstValue, table };
}

/**
 * Minimum and maximum rescaled sample of a grid
 */
export function rescaledRange(
  grid: SampleGrid,
  descriptor: Pick<ImageDescriptor, 'rescaleSlope' | 'rescaleIntercept'>
): { min: number; max: number } {
  let low = Infinity;
  let high = -Infinity;
  for (let i = 0; i < grid.data.length; i++) {
    const value = grid.data[i];
    if (value < low) low = value;
    if (value > high) high = value;
  }
  if (grid.data.length === 0) {
    low = 0;
    high = 0;
  }

  const a = low * descriptor.rescaleSlope + descriptor.rescaleIntercept;
  const b = high * descriptor.rescaleSlope + descriptor.rescaleIntercept;
  // A negative slope swaps the ends
  return { min: Math.min(a, b), max: Math.max(a, b) };
}

/**
 * Window spanning the full observed range, never narrower than 1
 */
export function fullRangeWindow(
  grid: SampleGrid,
  descriptor: Pick<ImageDescriptor, 'rescaleSlope' | 'rescaleIntercept'>
): RenderParameters {
  const { min, max } = rescaledRange(grid, descriptor);
  return { center: (max + min) / 2, width: Math.max(max - min, 1) };
}

/**
 * Declared window when one has a positive width, else the full range
 */
export function defaultWindow(grid: SampleGrid, descriptor: ImageDescriptor): RenderParameters {
  const declared = descriptor.windows.find(
    (window) => Number.isFinite(window.center) && Number.isFinite(window.width) && window.width > 0
  );
  if (declared) {
    return { center: declared.center, width: declared.width };
  }
  return fullRangeWindow(grid, descriptor);
}
