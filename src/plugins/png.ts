/**
 * PNG Encoder Plugin (Node.js Native)
 * Uses Node's 'zlib' module for DEFLATE compression.
 * Writes rendered frames as 8-bit RGBA.
 */
import { deflateSync } from "zlib";

import type { RenderedFrame } from "../core/types";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const COLOR_TYPE_RGBA = 6;

export class PngEncoder {
    private crcTable: Int32Array | null = null;

    encode(frame: RenderedFrame): Uint8Array {
        const { width, height, data } = frame;

        // 1. Prepare Scanlines (Filter 0: None)
        const rowSize = width * 4;
        const rawBuffer = new Uint8Array(height * (rowSize + 1));

        for (let y = 0; y < height; y++) {
            const destOffset = y * (rowSize + 1);
            rawBuffer[destOffset] = 0; // Filter Type 0 (None)
            const srcOffset = y * rowSize;
            rawBuffer.set(
                data.subarray(srcOffset, srcOffset + rowSize),
                destOffset + 1,
            );
        }

        // 2. Compress (Deflate)
        const compressed = new Uint8Array(deflateSync(rawBuffer));

        // 3. Construct PNG
        const chunks: Uint8Array[] = [new Uint8Array(PNG_SIGNATURE)];

        // IHDR
        const ihdr = new Uint8Array(13);
        const view = new DataView(ihdr.buffer);
        view.setUint32(0, width);
        view.setUint32(4, height);
        view.setUint8(8, 8); // Bit depth
        view.setUint8(9, COLOR_TYPE_RGBA);
        view.setUint8(10, 0); // Compression
        view.setUint8(11, 0); // Filter
        view.setUint8(12, 0); // Interlace
        chunks.push(this.createChunk("IHDR", ihdr));

        // IDAT
        chunks.push(this.createChunk("IDAT", compressed));

        // IEND
        chunks.push(this.createChunk("IEND", new Uint8Array(0)));

        // Concat
        const totalLen = chunks.reduce((a, b) => a + b.length, 0);
        const result = new Uint8Array(totalLen);
        let pos = 0;
        for (const c of chunks) {
            result.set(c, pos);
            pos += c.length;
        }

        return result;
    }

    private createChunk(type: string, data: Uint8Array): Uint8Array {
        const len = data.length;
        const chunk = new Uint8Array(4 + 4 + len + 4);
        const view = new DataView(chunk.buffer);

        view.setUint32(0, len);
        // Type
        for (let i = 0; i < 4; i++) chunk[4 + i] = type.charCodeAt(i);
        // Data
        chunk.set(data, 8);

        // CRC (Type + Data)
        const crcInput = chunk.subarray(4, 8 + len);
        view.setUint32(8 + len, this.crc32(crcInput));

        return chunk;
    }

    crc32(buf: Uint8Array): number {
        const table = this.getCrcTable();
        let crc = 0 ^ -1;
        for (let i = 0; i < buf.length; i++) {
            crc = (crc >>> 8) ^ table[(crc ^ buf[i]) & 0xff];
        }
        return (crc ^ -1) >>> 0;
    }

    private getCrcTable(): Int32Array {
        if (this.crcTable) return this.crcTable;
        const table = new Int32Array(256);
        for (let n = 0; n < 256; n++) {
            let c = n;
            for (let k = 0; k < 8; k++) {
                c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
            }
            table[n] = c;
        }
        this.crcTable = table;
        return table;
    }
}

export function encodePng(frame: RenderedFrame): Uint8Array {
    return new PngEncoder().encode(frame);
}
