/**
 * SafeDataView: Safe byte reading wrapper
 *
 * Provides bounds-checked byte reading operations for DICOM parsing.
 * Every read past the end of the buffer fails with `TruncatedStream`.
 */

import { createDicomError } from '../core/errors';

/**
 * DataView wrapper for safe byte reading
 */
export class SafeDataView {
  private view: DataView;
  private offset: number;
  private littleEndian: boolean;

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = 0;
    this.littleEndian = true; // Default to little endian
  }

  get byteLength(): number {
    return this.view.byteLength;
  }

  isLittleEndian(): boolean {
    return this.littleEndian;
  }

  setEndianness(littleEndian: boolean): void {
    this.littleEndian = littleEndian;
  }

  getPosition(): number {
    return this.offset;
  }

  setPosition(position: number): void {
    if (position < 0 || position > this.view.byteLength) {
      throw createDicomError(
        'TruncatedStream',
        `Position ${position} out of bounds (max: ${this.view.byteLength})`,
        { offset: this.offset }
      );
    }
    this.offset = position;
  }

  getRemainingBytes(): number {
    return this.view.byteLength - this.offset;
  }

  private ensure(length: number): void {
    if (this.offset + length > this.view.byteLength) {
      throw createDicomError(
        'TruncatedStream',
        `Read beyond buffer: need ${length} bytes, have ${this.getRemainingBytes()}`,
        { offset: this.offset }
      );
    }
  }

  readUint8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.offset, this.littleEndian);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset, this.littleEndian);
    this.offset += 4;
    return value;
  }

  readInt16(): number {
    this.ensure(2);
    const value = this.view.getInt16(this.offset, this.littleEndian);
    this.offset += 2;
    return value;
  }

  readInt32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.offset, this.littleEndian);
    this.offset += 4;
    return value;
  }

  readFloat32(): number {
    this.ensure(4);
    const value = this.view.getFloat32(this.offset, this.littleEndian);
    this.offset += 4;
    return value;
  }

  readFloat64(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.offset, this.littleEndian);
    this.offset += 8;
    return value;
  }

  /**
   * Returns a view into the underlying buffer (no copy).
   */
  readBytes(length: number): Uint8Array {
    this.ensure(length);
    const bytes = new Uint8Array(
      this.view.buffer,
      this.view.byteOffset + this.offset,
      length
    );
    this.offset += length;
    return bytes;
  }

  readString(length: number, characterSet: string = 'ISO_IR 192'): string {
    return decodeString(this.readBytes(length), characterSet);
  }

  peekUint16(): number {
    this.ensure(2);
    return this.view.getUint16(this.offset, this.littleEndian);
  }

  peekUint32(): number {
    this.ensure(4);
    return this.view.getUint32(this.offset, this.littleEndian);
  }
}

/**
 * Decode string based on DICOM character set.
 * Trailing NUL and space padding is removed.
 */
export function decodeString(bytes: Uint8Array, characterSet: string = 'ISO_IR 192'): string {
  let end = bytes.length;
  while (end > 0 && (bytes[end - 1] === 0 || bytes[end - 1] === 32)) {
    end--;
  }
  const trimmed = bytes.subarray(0, end);

  if (characterSet.includes('ISO_IR 192') || characterSet.includes('UTF-8')) {
    return new TextDecoder('utf-8').decode(trimmed);
  }

  // Default repertoire and ISO_IR 100 both decode as Latin-1
  return new TextDecoder('latin1').decode(trimmed);
}
