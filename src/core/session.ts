/**
 * Viewer Session: load → decode → render state machine
 *
 * A session holds at most one image. Each stage of `load` yields to the
 * event loop, and a newer `load` supersedes any load still in flight.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import { readPaletteLut, type PaletteLut } from './color';
import type { AttributeStore } from './dataset';
import { getImageDescriptor } from './descriptor';
import { createDicomError } from './errors';
import { parse, type ParseOptions } from './parser';
import { decodePixelData, type DecodeOptions } from './pixelDecoder';
import { renderFrame, type RenderOptions } from './renderer';
import type { ImageDescriptor, RenderedFrame, RenderParameters, SampleGrid } from './types';
import { defaultWindow, fullRangeWindow } from './windowing';

export type SessionState = 'empty' | 'loaded' | 'rendering';

export type SessionLogger = Pick<Console, 'debug' | 'warn' | 'error'>;

/**
 * Receives every frame the session renders. A sink that throws is logged
 * through `logger.error`; the frame stays committed.
 */
export type FrameSink = (frame: RenderedFrame) => void;

export interface SessionOptions {
  parse?: ParseOptions;
  decode?: DecodeOptions;
  render?: Pick<RenderOptions, 'voiLutFunction' | 'colorConverter'>;
  logger?: SessionLogger;
  sink?: FrameSink;
}

export type LoadOutcome =
  | { status: 'loaded'; frame: RenderedFrame }
  | { status: 'superseded' };

interface LoadedImage {
  dataset: AttributeStore;
  descriptor: ImageDescriptor;
  grids: SampleGrid[];
  palette?: PaletteLut;
  defaults: RenderParameters;
}

export class ViewerSession {
  private readonly logger: SessionLogger;
  private generation = 0;
  private image: LoadedImage | undefined;
  private frameIndexValue = 0;
  private params: RenderParameters | undefined;
  private current: RenderedFrame | undefined;
  private rendering = false;

  constructor(private readonly options: SessionOptions = {}) {
    this.logger = options.logger ?? console;
  }

  get state(): SessionState {
    if (this.rendering) {
      return 'rendering';
    }
    return this.image ? 'loaded' : 'empty';
  }

  get frameIndex(): number {
    return this.frameIndexValue;
  }

  get frameCount(): number {
    return this.image?.grids.length ?? 0;
  }

  get renderParameters(): RenderParameters | undefined {
    return this.params;
  }

  get descriptor(): ImageDescriptor | undefined {
    return this.image?.descriptor;
  }

  get dataset(): AttributeStore | undefined {
    return this.image?.dataset;
  }

  get currentFrame(): RenderedFrame | undefined {
    return this.current;
  }

  /**
   * Parse, decode and render the first frame of `input`.
   *
   * Resolves `superseded` without touching the session when another load
   * started meanwhile. Any other failure empties the session and rejects.
   */
  async load(input: Uint8Array | ArrayBuffer): Promise<LoadOutcome> {
    const generation = ++this.generation;
    const superseded = (): boolean => generation !== this.generation;

    try {
      const result = parse(input, this.options.parse);
      await yieldToEventLoop();
      if (superseded()) {
        return { status: 'superseded' };
      }

      const grids = await decodePixelData(result, this.options.decode);
      await yieldToEventLoop();
      if (superseded()) {
        return { status: 'superseded' };
      }

      for (const warning of result.warnings) {
        this.logger.warn(warning);
      }

      const descriptor = getImageDescriptor(result.dataset);
      const palette =
        descriptor.photometricInterpretation === 'PALETTE COLOR'
          ? readPaletteLut(result.dataset, result.transferSyntax.littleEndian)
          : undefined;
      const defaults = defaultWindow(grids[0], descriptor);

      const image: LoadedImage = { dataset: result.dataset, descriptor, grids, palette, defaults };
      const frame = this.present(image, 0, defaults);
      return { status: 'loaded', frame };
    } catch (error) {
      if (superseded()) {
        return { status: 'superseded' };
      }
      this.clear();
      this.logger.error('Failed to load image:', error);
      throw error;
    }
  }

  /**
   * Show frame `index`, keeping the current window
   */
  setFrame(index: number): RenderedFrame {
    const image = this.requireImage();
    if (!Number.isInteger(index) || index < 0 || index >= image.grids.length) {
      throw createDicomError(
        'FrameIndexOutOfRange',
        `Frame ${index} out of range (frames: ${image.grids.length})`
      );
    }
    return this.present(image, index, this.params ?? image.defaults);
  }

  /**
   * Set absolute window parameters. A non-positive width falls back to the
   * full range of the current frame.
   */
  setWindow(center: number, width: number): RenderedFrame {
    const image = this.requireImage();
    let params: RenderParameters = { center, width };
    if (!Number.isFinite(width) || width <= 0 || !Number.isFinite(center)) {
      params = fullRangeWindow(image.grids[this.frameIndexValue], image.descriptor);
      this.logger.warn(
        `Invalid window (center ${center}, width ${width}); using full range ` +
          `(center ${params.center}, width ${params.width})`
      );
    }
    return this.present(image, this.frameIndexValue, params);
  }

  /**
   * Shift the window by relative amounts, as a drag gesture does.
   * Width never drops below 1.
   */
  adjustWindow(deltaWidth: number, deltaCenter: number): RenderedFrame {
    const image = this.requireImage();
    const base = this.params ?? image.defaults;
    const params = {
      center: base.center + deltaCenter,
      width: Math.max(base.width + deltaWidth, 1),
    };
    this.logger.debug('[WL] updated to', params);
    return this.present(image, this.frameIndexValue, params);
  }

  /** Back to the default window of the loaded image */
  resetWindow(): RenderedFrame {
    const image = this.requireImage();
    return this.present(image, this.frameIndexValue, image.defaults);
  }

  private requireImage(): LoadedImage {
    if (!this.image) {
      throw createDicomError('NoImageLoaded', 'No image is loaded');
    }
    return this.image;
  }

  private clear(): void {
    this.image = undefined;
    this.frameIndexValue = 0;
    this.params = undefined;
    this.current = undefined;
  }

  // The frame is already committed; a failing sink is logged and does not undo it
  private notifySink(frame: RenderedFrame): void {
    try {
      this.options.sink?.(frame);
    } catch (error) {
      this.logger.error('Frame sink failed:', error);
    }
  }

  private present(image: LoadedImage, index: number, params: RenderParameters): RenderedFrame {
    if (this.rendering) {
      throw createDicomError('RenderInProgress', 'A render is already in progress');
    }

    this.rendering = true;
    try {
      const frame = renderFrame(image.grids[index], image.descriptor, params, {
        ...this.options.render,
        palette: image.palette,
        warn: (message) => this.logger.warn(message),
      });
      this.image = image;
      this.frameIndexValue = index;
      this.params = params;
      this.current = frame;
      this.notifySink(frame);
      return frame;
    } finally {
      this.rendering = false;
    }
  }
}
