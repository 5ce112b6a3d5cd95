/**
 * Image Descriptor: typed view of the image pixel module
 */

import type { AttributeStore } from './dataset';
import { createDicomError } from './errors';
import type { ImageDescriptor, WindowSetting } from './types';
import { getTagName } from '../utils/dictionary';
import { TAGS } from '../utils/tagUtils';

function requireInt(dataset: AttributeStore, tag: number): number {
  const value = dataset.getInt(tag);
  if (value === undefined) {
    const attribute = getTagName(tag);
    throw createDicomError('MissingRequiredAttribute', `${attribute} is missing or not a number`, {
      tag,
      attribute,
    });
  }
  return value;
}

function requireString(dataset: AttributeStore, tag: number): string {
  const value = dataset.getString(tag);
  if (value === undefined || value === '') {
    const attribute = getTagName(tag);
    throw createDicomError('MissingRequiredAttribute', `${attribute} is missing`, {
      tag,
      attribute,
    });
  }
  return value;
}

/**
 * Pair (0028,1050) centers with (0028,1051) widths. Unpaired or
 * unparsable entries are dropped.
 */
export function readWindows(dataset: AttributeStore): WindowSetting[] {
  const centers = dataset.getFloats(TAGS.WindowCenter) ?? [];
  const widths = dataset.getFloats(TAGS.WindowWidth) ?? [];
  const explanations = dataset.getStrings(TAGS.WindowCenterWidthExplanation) ?? [];

  const windows: WindowSetting[] = [];
  for (let i = 0; i < Math.min(centers.length, widths.length); i++) {
    const explanation = explanations[i];
    windows.push(
      explanation
        ? { center: centers[i], width: widths[i], explanation }
        : { center: centers[i], width: widths[i] }
    );
  }
  return windows;
}

/**
 * Read the image pixel module of a dataset.
 *
 * Rows, columns, bits allocated, bits stored, pixel representation,
 * samples per pixel and photometric interpretation are required.
 */
export function getImageDescriptor(dataset: AttributeStore): ImageDescriptor {
  const rows = requireInt(dataset, TAGS.Rows);
  const columns = requireInt(dataset, TAGS.Columns);
  const bitsAllocated = requireInt(dataset, TAGS.BitsAllocated);
  const bitsStored = requireInt(dataset, TAGS.BitsStored);
  const pixelRepresentation = requireInt(dataset, TAGS.PixelRepresentation);
  const samplesPerPixel = requireInt(dataset, TAGS.SamplesPerPixel);
  const photometricInterpretation = requireString(dataset, TAGS.PhotometricInterpretation);

  return {
    rows,
    columns,
    numberOfFrames: Math.max(1, dataset.getInt(TAGS.NumberOfFrames) ?? 1),
    bitsAllocated,
    bitsStored,
    highBit: dataset.getInt(TAGS.HighBit) ?? bitsStored - 1,
    pixelRepresentation,
    samplesPerPixel,
    photometricInterpretation: photometricInterpretation.toUpperCase(),
    planarConfiguration: dataset.getInt(TAGS.PlanarConfiguration) ?? 0,
    rescaleSlope: dataset.getFloat(TAGS.RescaleSlope) ?? 1,
    rescaleIntercept: dataset.getFloat(TAGS.RescaleIntercept) ?? 0,
    windows: readWindows(dataset),
    voiLutFunction: (dataset.getString(TAGS.VOILUTFunction) ?? 'LINEAR').toUpperCase(),
  };
}
