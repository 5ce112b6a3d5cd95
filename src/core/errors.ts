/**
 * Error Handling: Custom error types for better error reporting
 */

import { formatTag } from '../utils/tagUtils';

/**
 * Every failure the library reports carries one of these kinds.
 */
export type DicomErrorKind =
  | 'UnrecognizedFormat'
  | 'TruncatedStream'
  | 'UnsupportedTransferSyntax'
  | 'MissingRequiredAttribute'
  | 'UnsupportedBitDepth'
  | 'PixelDataLengthMismatch'
  | 'InvalidWindowWidth'
  | 'FrameIndexOutOfRange'
  | 'NoImageLoaded'
  | 'RenderInProgress';

export interface DicomErrorContext {
  /** Numeric tag of the element being read */
  tag?: number;
  /** Byte offset in the input buffer */
  offset?: number;
  /** Attribute keyword, e.g. `Rows` */
  attribute?: string;
  cause?: unknown;
}

/**
 * Custom error for DICOM parsing, decoding and rendering failures
 */
export class DicomError extends Error {
  readonly kind: DicomErrorKind;
  readonly tag?: string;
  readonly offset?: number;
  readonly attribute?: string;

  constructor(kind: DicomErrorKind, message: string, context: DicomErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'DicomError';
    this.kind = kind;
    this.tag = context.tag === undefined ? undefined : formatTag(context.tag);
    this.offset = context.offset;
    this.attribute = context.attribute;
  }
}

/**
 * Create an error with context appended to the message
 */
export function createDicomError(
  kind: DicomErrorKind,
  message: string,
  context: DicomErrorContext = {}
): DicomError {
  let fullMessage = message;
  if (context.attribute) {
    fullMessage += ` (attribute: ${context.attribute})`;
  }
  if (context.tag !== undefined) {
    fullMessage += ` (tag: ${formatTag(context.tag)})`;
  }
  if (context.offset !== undefined) {
    fullMessage += ` (offset: ${context.offset})`;
  }
  return new DicomError(kind, fullMessage, context);
}

export function isDicomError(error: unknown, kind?: DicomErrorKind): error is DicomError {
  return error instanceof DicomError && (kind === undefined || error.kind === kind);
}
