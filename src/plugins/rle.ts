/**
 * RLE Codec Plugin
 * Supports RLE Lossless (1.2.840.10008.1.2.5) decoding.
 */
import type { FrameInfo, PixelDataCodec } from "./codecs";
import { createDicomError } from "../core/errors";
import { concatFragments } from "../utils/pixelData";

const RLE_HEADER_LENGTH = 64;
const MAX_SEGMENTS = 15;

export class RleCodec implements PixelDataCodec {
    name = "rle-typescript";
    priority = 10; // Fallback

    isSupported(): boolean {
        return true;
    }

    canDecode(ts: string): boolean {
        return ts === "1.2.840.10008.1.2.5";
    }

    async decode(fragments: Uint8Array[], info: FrameInfo): Promise<Uint8Array> {
        // A frame may be split over several fragments
        const frame = fragments.length === 1 ? fragments[0] : concatFragments(fragments);
        return this.processFrame(frame, info);
    }

    private processFrame(buffer: Uint8Array, info: FrameInfo): Uint8Array {
        if (buffer.byteLength < RLE_HEADER_LENGTH) {
            throw createDicomError(
                "PixelDataLengthMismatch",
                `RLE frame of ${buffer.byteLength} bytes has no segment header`,
            );
        }

        const view = new DataView(
            buffer.buffer,
            buffer.byteOffset,
            buffer.byteLength,
        );

        const bytesPerSample = Math.ceil(info.bitsAllocated / 8);
        const expectedSegments = info.samplesPerPixel * bytesPerSample;
        const numSegments = view.getUint32(0, true);
        if (numSegments !== expectedSegments || numSegments > MAX_SEGMENTS) {
            throw createDicomError(
                "PixelDataLengthMismatch",
                `RLE frame has ${numSegments} segments, expected ${expectedSegments}`,
            );
        }

        const offsets: number[] = [];
        for (let i = 0; i < numSegments; i++) {
            offsets.push(view.getUint32(4 + i * 4, true));
        }

        const pixelCount = info.rows * info.columns;
        const decodedSegments = offsets.map((start, i) => {
            const end = i < numSegments - 1 ? offsets[i + 1] : buffer.byteLength;
            if (start < RLE_HEADER_LENGTH || end > buffer.byteLength || end < start) {
                throw createDicomError(
                    "PixelDataLengthMismatch",
                    `RLE segment ${i} has invalid bounds ${start}-${end}`,
                );
            }
            return this.decompressRle(buffer.subarray(start, end), pixelCount, i);
        });

        // DICOM Standard PS3.5 Annex G: per sample, the most significant
        // byte comes first. Output is little endian and pixel-interleaved.
        const samples = info.samplesPerPixel;
        const result = new Uint8Array(pixelCount * samples * bytesPerSample);
        for (let s = 0; s < samples; s++) {
            for (let b = 0; b < bytesPerSample; b++) {
                const segment = decodedSegments[s * bytesPerSample + (bytesPerSample - 1 - b)];
                for (let p = 0; p < pixelCount; p++) {
                    result[(p * samples + s) * bytesPerSample + b] = segment[p];
                }
            }
        }

        return result;
    }

    private decompressRle(src: Uint8Array, length: number, index: number): Uint8Array {
        // PackBits decompression into a segment of fixed size
        const out = new Uint8Array(length);
        let written = 0;
        let i = 0;

        while (i < src.length && written < length) {
            const n = src[i++];
            if (n <= 127) {
                // Literal run
                const count = Math.min(n + 1, src.length - i, length - written);
                out.set(src.subarray(i, i + count), written);
                written += count;
                i += n + 1;
            } else if (n >= 129) {
                // Repeat run (-1 to -127)
                if (i >= src.length) break;
                const byte = src[i++];
                const count = Math.min(257 - n, length - written);
                out.fill(byte, written, written + count);
                written += count;
            }
            // n == 128 is No-op
        }

        if (written < length) {
            throw createDicomError(
                "PixelDataLengthMismatch",
                `RLE segment ${index} decoded to ${written} bytes, expected ${length}`,
            );
        }
        return out;
    }
}
