import { afterEach, describe, expect, it, vi } from 'vitest';
import { parse } from '../src/core/parser';
import { decodePixelData } from '../src/core/pixelDecoder';
import { CodecRegistry, type FrameInfo } from '../src/plugins/codecs';
import { ExternalCodec } from '../src/plugins/external';
import { RleCodec } from '../src/plugins/rle';
import { TRANSFER_SYNTAX } from '../src/utils/extractTransferSyntax';
import { groupFragmentsByFrame } from '../src/utils/pixelData';
import { catchError } from './helpers/catchError';
import { concatChunks, imageElements, writeDicom, type ImageSpec } from './helpers/dicomWriter';

function frameInfo(overrides: Partial<FrameInfo> = {}): FrameInfo {
  return {
    transferSyntax: TRANSFER_SYNTAX.RLE_LOSSLESS,
    rows: 2,
    columns: 2,
    samplesPerPixel: 1,
    bitsAllocated: 8,
    bitsStored: 8,
    pixelRepresentation: 0,
    photometricInterpretation: 'MONOCHROME2',
    planarConfiguration: 0,
    ...overrides,
  };
}

/** RLE frame: 64-byte header followed by the given segments */
function rleFrame(segments: number[][]): Uint8Array {
  const header = new Uint8Array(64);
  const view = new DataView(header.buffer);
  view.setUint32(0, segments.length, true);
  let offset = 64;
  segments.forEach((segment, i) => {
    view.setUint32(4 + i * 4, offset, true);
    offset += segment.length;
  });
  return concatChunks([header, ...segments.map((segment) => new Uint8Array(segment))]);
}

const invert = (frame: Uint8Array) => frame.map((byte) => byte ^ 0xff);

describe('RleCodec', () => {
  const codec = new RleCodec();

  it('decodes a literal run', async () => {
    const decoded = await codec.decode([rleFrame([[3, 0, 128, 255, 64]])], frameInfo());
    expect(Array.from(decoded)).toEqual([0, 128, 255, 64]);
  });

  it('decodes a repeat run', async () => {
    const decoded = await codec.decode([rleFrame([[0xfd, 7]])], frameInfo());
    expect(Array.from(decoded)).toEqual([7, 7, 7, 7]);
  });

  it('joins high and low byte segments into little endian samples', async () => {
    const frame = rleFrame([
      [1, 1, 3],
      [1, 2, 4],
    ]);
    const decoded = await codec.decode([frame], frameInfo({ rows: 1, bitsAllocated: 16, bitsStored: 16 }));
    expect(Array.from(decoded)).toEqual([2, 1, 4, 3]);
  });

  it('accepts a frame split over several fragments', async () => {
    const frame = rleFrame([[3, 0, 128, 255, 64]]);
    const decoded = await codec.decode([frame.subarray(0, 10), frame.subarray(10)], frameInfo());
    expect(Array.from(decoded)).toEqual([0, 128, 255, 64]);
  });

  it('rejects malformed frames', async () => {
    await expect(codec.decode([new Uint8Array(10)], frameInfo())).rejects.toMatchObject({
      kind: 'PixelDataLengthMismatch',
    });
    await expect(codec.decode([rleFrame([[0, 1], [0, 2]])], frameInfo())).rejects.toMatchObject({
      kind: 'PixelDataLengthMismatch',
    });
    await expect(codec.decode([rleFrame([[0, 5]])], frameInfo())).rejects.toMatchObject({
      kind: 'PixelDataLengthMismatch',
      message: 'RLE segment 0 decoded to 1 bytes, expected 4',
    });
  });
});

describe('CodecRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports syntaxes without a codec as unsupported', async () => {
    const registry = new CodecRegistry();
    await expect(
      registry.decompress(TRANSFER_SYNTAX.JPEG_BASELINE, [], frameInfo())
    ).rejects.toMatchObject({ kind: 'UnsupportedTransferSyntax' });
  });

  it('prefers the codec with the higher priority', async () => {
    const registry = new CodecRegistry();
    registry.register(new RleCodec());
    registry.register(new ExternalCodec('inverter', [TRANSFER_SYNTAX.RLE_LOSSLESS], invert));

    expect((await registry.getDecoder(TRANSFER_SYNTAX.RLE_LOSSLESS))?.name).toBe('inverter');
    expect(registry.getCodecs().map((codec) => codec.name)).toEqual(['inverter', 'rle-typescript']);
  });

  it('loads dynamic codecs once', async () => {
    const registry = new CodecRegistry();
    const loader = vi.fn(async () => new RleCodec());
    registry.registerDynamic(TRANSFER_SYNTAX.RLE_LOSSLESS, loader);

    const [first, second] = await Promise.all([
      registry.getDecoder(TRANSFER_SYNTAX.RLE_LOSSLESS),
      registry.getDecoder(TRANSFER_SYNTAX.RLE_LOSSLESS),
    ]);
    expect(first).toBe(second);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(registry.getCodecs()).toHaveLength(1);
  });

  it('logs and skips a loader that fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const registry = new CodecRegistry();
    registry.registerDynamic(TRANSFER_SYNTAX.JPEG_2000, () => Promise.reject(new Error('module not found')));

    expect(await registry.getDecoder(TRANSFER_SYNTAX.JPEG_2000)).toBeNull();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe('groupFragmentsByFrame', () => {
  const a = new Uint8Array(4);
  const b = new Uint8Array(2);
  const c = new Uint8Array(4);

  it('gives a single frame every fragment', () => {
    expect(groupFragmentsByFrame({ offsetTable: [], fragments: [a, b, c] }, 1)).toEqual([[a, b, c]]);
  });

  it('follows the basic offset table', () => {
    // Item starts: a at 0, b at 12, c at 22
    const frames = groupFragmentsByFrame({ offsetTable: [0, 22], fragments: [a, b, c] }, 2);
    expect(frames[0]).toHaveLength(2);
    expect(frames[0][0]).toBe(a);
    expect(frames[0][1]).toBe(b);
    expect(frames[1]).toHaveLength(1);
    expect(frames[1][0]).toBe(c);
  });

  it('maps fragments one to one without a table', () => {
    const frames = groupFragmentsByFrame({ offsetTable: [], fragments: [a, c] }, 2);
    expect(frames).toHaveLength(2);
    expect(frames[1][0]).toBe(c);
  });

  it('rejects layouts it cannot assign', () => {
    for (const data of [
      { offsetTable: [], fragments: [a, b, c] },
      { offsetTable: [0], fragments: [a, c] },
      { offsetTable: [0, 5], fragments: [a, c] },
    ]) {
      expect(catchError(() => groupFragmentsByFrame(data, 2))).toMatchObject({ kind: 'PixelDataLengthMismatch' });
    }
  });
});

describe('encapsulated pixel data', () => {
  function encapsulated(spec: ImageSpec, transferSyntax: string) {
    return parse(writeDicom(imageElements(spec), { transferSyntax }));
  }

  it('decodes RLE through the default registry', async () => {
    const result = encapsulated(
      { rows: 2, columns: 2, fragments: { fragments: [rleFrame([[3, 0, 128, 255, 64, 0x80]])] } },
      TRANSFER_SYNTAX.RLE_LOSSLESS
    );
    const [grid] = await decodePixelData(result);
    expect(Array.from(grid.data)).toEqual([0, 128, 255, 64]);
  });

  it('passes the concatenated fragments of a frame to an external decoder', async () => {
    const codecs = new CodecRegistry();
    const decoder = vi.fn((frame: Uint8Array, _info: FrameInfo) => invert(frame));
    codecs.register(new ExternalCodec('inverter', [TRANSFER_SYNTAX.JPEG_BASELINE], decoder));

    const result = encapsulated(
      {
        rows: 2,
        columns: 2,
        fragments: { fragments: [new Uint8Array([0xff, 0x7f]), new Uint8Array([0x00, 0xbf])] },
      },
      TRANSFER_SYNTAX.JPEG_BASELINE
    );
    const [grid] = await decodePixelData(result, { codecs });

    expect(Array.from(grid.data)).toEqual([0, 128, 255, 64]);
    expect(decoder).toHaveBeenCalledTimes(1);
    expect(decoder.mock.calls[0][1]).toMatchObject({ rows: 2, columns: 2, bitsAllocated: 8 });
  });

  it('splits frames by the basic offset table', async () => {
    const codecs = new CodecRegistry();
    codecs.register(new ExternalCodec('identity', [TRANSFER_SYNTAX.JPEG_BASELINE], (frame) => frame));

    const result = encapsulated(
      {
        rows: 1,
        columns: 4,
        frames: 2,
        fragments: {
          offsetTable: [0, 12],
          fragments: [new Uint8Array([1, 2, 3, 4]), new Uint8Array([5, 6, 7, 8])],
        },
      },
      TRANSFER_SYNTAX.JPEG_BASELINE
    );
    const grids = await decodePixelData(result, { codecs });
    expect(grids.map((grid) => Array.from(grid.data))).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
    ]);
  });

  it('rejects frames that decode to the wrong size', async () => {
    const codecs = new CodecRegistry();
    codecs.register(new ExternalCodec('short', [TRANSFER_SYNTAX.JPEG_BASELINE], () => new Uint8Array(3)));

    const result = encapsulated(
      { rows: 2, columns: 2, fragments: { fragments: [new Uint8Array(2)] } },
      TRANSFER_SYNTAX.JPEG_BASELINE
    );
    await expect(decodePixelData(result, { codecs })).rejects.toMatchObject({
      kind: 'PixelDataLengthMismatch',
      message: 'Frame 0 decoded to 3 bytes, expected 4 (tag: (7FE0,0010))',
    });
  });
});
