/**
 * dicom-raster: DICOM decoding and window/level rendering
 *
 * Parses a DICOM file held in memory, decodes its pixel data into sample
 * grids and renders frames to 8-bit RGBA.
 *
 * @module dicom-raster
 */

/** Errors */
export { DicomError, createDicomError, isDicomError, type DicomErrorKind } from './core/errors';
/** Dictionary and tag utilities */
export { createDictionary, dicomDictionary, getTagName, type VrLookup } from './utils/dictionary';
export {
  formatTag,
  formatTagWithComma,
  isPrivateTag,
  makeTag,
  normalizeTag,
  parseTag,
  TAGS,
  type TagInput,
} from './utils/tagUtils';
/** Core parser entry points */
export { buildStore, canParse, extractTransferSyntax, parse, type ParseOptions } from './core/parser';
export {
  DEFAULT_MAX_SEQUENCE_DEPTH,
  hasPart10Magic,
  readElements,
  readFileMeta,
  type ElementToken,
  type ReaderOptions,
  type StreamEncoding,
} from './core/reader';
export { AttributeStore } from './core/dataset';
export { getImageDescriptor } from './core/descriptor';
export {
  getTransferSyntaxInfo,
  isCompressedTransferSyntax,
  TRANSFER_SYNTAX,
  type TransferSyntaxInfo,
} from './utils/extractTransferSyntax';
/** Safe byte reader */
export { SafeDataView } from './utils/SafeDataView';
export { detectVR, requiresExplicitLength } from './utils/vrDetection';
/** Pixel decoding and codecs */
export { decodePixelData, encodeSamples, type DecodeOptions } from './core/pixelDecoder';
export {
  CodecRegistry,
  createDefaultRegistry,
  registry,
  type FrameInfo,
  type PixelDataCodec,
} from './plugins/codecs';
export { RleCodec } from './plugins/rle';
export { ExternalCodec, type ExternalDecodeFunction } from './plugins/external';
export { encodePng, PngEncoder } from './plugins/png';
/** Rendering */
export {
  applyWindow,
  buildWindowLut,
  defaultWindow,
  fullRangeWindow,
  resolveVoiLutFunction,
} from './core/windowing';
export {
  defaultColorConverter,
  readPaletteLut,
  ybrFullToRgb,
  type ColorConverter,
  type PaletteLut,
} from './core/color';
export { renderFrame, type RenderOptions } from './core/renderer';
export {
  ViewerSession,
  type FrameSink,
  type LoadOutcome,
  type SessionLogger,
  type SessionOptions,
  type SessionState,
} from './core/session';
export type {
  DataElement,
  DecodedValue,
  ImageDescriptor,
  ParseResult,
  RenderedFrame,
  RenderParameters,
  SampleFormat,
  SampleGrid,
  VoiLutFunction,
  WindowSetting,
} from './core/types';
