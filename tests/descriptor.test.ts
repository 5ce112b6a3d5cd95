import { describe, expect, it } from 'vitest';
import { getImageDescriptor, readWindows } from '../src/core/descriptor';
import { parse } from '../src/core/parser';
import { catchError } from './helpers/catchError';
import { imageElements, words, writeDicom, type ElementSpec, type ImageSpec } from './helpers/dicomWriter';

function datasetOf(spec: ImageSpec, drop: number[] = []) {
  const elements = imageElements(spec).filter((e) => !drop.includes(e.tag));
  return parse(writeDicom(elements)).dataset;
}

describe('getImageDescriptor', () => {
  it('reads the image pixel module', () => {
    const descriptor = getImageDescriptor(
      datasetOf({
        rows: 2,
        columns: 3,
        bitsAllocated: 16,
        bitsStored: 12,
        pixelRepresentation: 1,
        frames: 4,
        window: { center: 40, width: 400 },
        rescale: { slope: 2, intercept: -1024 },
        voiLutFunction: 'sigmoid',
        pixelData: words([0, 0, 0, 0, 0, 0]),
      })
    );

    expect(descriptor).toEqual({
      rows: 2,
      columns: 3,
      numberOfFrames: 4,
      bitsAllocated: 16,
      bitsStored: 12,
      highBit: 11,
      pixelRepresentation: 1,
      samplesPerPixel: 1,
      photometricInterpretation: 'MONOCHROME2',
      planarConfiguration: 0,
      rescaleSlope: 2,
      rescaleIntercept: -1024,
      windows: [{ center: 40, width: 400 }],
      voiLutFunction: 'SIGMOID',
    });
  });

  it('fills in optional attributes', () => {
    const descriptor = getImageDescriptor(
      datasetOf({ rows: 1, columns: 1, bitsStored: 6, photometric: 'monochrome1' }, [0x00280102])
    );

    expect(descriptor.numberOfFrames).toBe(1);
    expect(descriptor.highBit).toBe(5);
    expect(descriptor.rescaleSlope).toBe(1);
    expect(descriptor.rescaleIntercept).toBe(0);
    expect(descriptor.windows).toEqual([]);
    expect(descriptor.voiLutFunction).toBe('LINEAR');
    expect(descriptor.photometricInterpretation).toBe('MONOCHROME1');
  });

  it('treats a zero frame count as one frame', () => {
    expect(getImageDescriptor(datasetOf({ rows: 1, columns: 1, frames: 0 })).numberOfFrames).toBe(1);
  });

  it('names the missing attribute', () => {
    const error = catchError(() => getImageDescriptor(datasetOf({ rows: 1, columns: 1 }, [0x00280010])));
    expect(error).toMatchObject({ kind: 'MissingRequiredAttribute', attribute: 'Rows', tag: '(0028,0010)' });

    const photometric = catchError(() => getImageDescriptor(datasetOf({ rows: 1, columns: 1 }, [0x00280004])));
    expect(photometric).toMatchObject({ kind: 'MissingRequiredAttribute', attribute: 'PhotometricInterpretation' });
  });
});

describe('readWindows', () => {
  it('pairs centers with widths and explanations', () => {
    const extra: ElementSpec[] = [
      { tag: 0x00281050, vr: 'DS', value: ['40', '400'] },
      { tag: 0x00281051, vr: 'DS', value: ['400', '2000'] },
      { tag: 0x00281055, vr: 'LO', value: ['SOFT', 'BONE'] },
    ];
    expect(readWindows(datasetOf({ rows: 1, columns: 1, extra }))).toEqual([
      { center: 40, width: 400, explanation: 'SOFT' },
      { center: 400, width: 2000, explanation: 'BONE' },
    ]);
  });

  it('drops unpaired centers', () => {
    const extra: ElementSpec[] = [
      { tag: 0x00281050, vr: 'DS', value: ['40', '50'] },
      { tag: 0x00281051, vr: 'DS', value: '400' },
    ];
    expect(readWindows(datasetOf({ rows: 1, columns: 1, extra }))).toEqual([{ center: 40, width: 400 }]);
  });
});
