/**
 * Pixel Data Parser: Handles DICOM pixel data extraction
 *
 * Supports both native and encapsulated pixel data formats.
 */

import { createDicomError } from "../core/errors";
import type { SafeDataView } from "./SafeDataView";
import { TAGS } from "./tagUtils";

const ITEM_HEADER_LENGTH = 8;

/**
 * Encapsulated pixel data: basic offset table plus compressed fragments
 */
export interface EncapsulatedPixelData {
    /** Byte offsets of each frame's first fragment item; may be empty */
    offsetTable: number[];
    fragments: Uint8Array[];
}

/**
 * Read encapsulated pixel data following an undefined-length (7FE0,0010) header.
 * Format: Sequence of fragments with item tags (FFFE,E000) and lengths,
 * terminated by a sequence delimiter (FFFE,E0DD).
 */
export function readEncapsulatedFragments(
    view: SafeDataView,
    tag: number = TAGS.PixelData,
): EncapsulatedPixelData {
    const offsetTable: number[] = [];
    const fragments: Uint8Array[] = [];
    let first = true;

    while (true) {
        const position = view.getPosition();
        if (view.getRemainingBytes() < ITEM_HEADER_LENGTH) {
            throw createDicomError(
                "TruncatedStream",
                "Encapsulated pixel data ends without a sequence delimiter",
                { tag, offset: position },
            );
        }

        const group = view.readUint16();
        const element = view.readUint16();
        const length = view.readUint32();

        if (group === 0xfffe && element === 0xe0dd) {
            // Sequence delimiter - end of pixel data
            break;
        }

        if (group !== 0xfffe || element !== 0xe000) {
            throw createDicomError(
                "UnrecognizedFormat",
                "Expected a fragment item in encapsulated pixel data",
                { tag, offset: position },
            );
        }

        if (length === 0xffffffff) {
            throw createDicomError(
                "UnrecognizedFormat",
                "Fragment items must have a defined length",
                { tag, offset: position },
            );
        }

        if (length > view.getRemainingBytes()) {
            throw createDicomError(
                "TruncatedStream",
                `Fragment of ${length} bytes runs past the end of the buffer`,
                { tag, offset: position },
            );
        }

        const data = view.readBytes(length);

        // The first item is always the basic offset table
        if (first) {
            first = false;
            const table = new DataView(data.buffer, data.byteOffset, data.byteLength);
            for (let i = 0; i + 4 <= length; i += 4) {
                offsetTable.push(table.getUint32(i, true));
            }
            continue;
        }

        fragments.push(new Uint8Array(data));
    }

    return { offsetTable, fragments };
}

/**
 * Concatenate multiple Uint8Array fragments into a single Uint8Array.
 * @param fragments - An array of Uint8Array fragments.
 * @returns A single Uint8Array containing all the data from the fragments.
 */
export function concatFragments(fragments: Uint8Array[]): Uint8Array {
    const totalLength = fragments.reduce((acc, curr) => acc + curr.length, 0);
    const combined = new Uint8Array(totalLength);
    let offset = 0;
    for (const arr of fragments) {
        combined.set(arr, offset);
        offset += arr.length;
    }
    return combined;
}

/**
 * Group fragments into frames.
 *
 * One frame takes every fragment. Otherwise a non-empty offset table
 * decides where each frame starts; without one, fragments map to frames
 * one to one.
 */
export function groupFragmentsByFrame(
    data: EncapsulatedPixelData,
    numberOfFrames: number,
): Uint8Array[][] {
    const { offsetTable, fragments } = data;

    if (numberOfFrames === 1) {
        return [fragments];
    }

    if (offsetTable.length > 0) {
        if (offsetTable.length !== numberOfFrames) {
            throw createDicomError(
                "PixelDataLengthMismatch",
                `Offset table lists ${offsetTable.length} frames, expected ${numberOfFrames}`,
                { tag: TAGS.PixelData },
            );
        }

        // Item offsets are measured from the first fragment's item header
        const starts: number[] = [];
        let position = 0;
        for (const fragment of fragments) {
            starts.push(position);
            position += ITEM_HEADER_LENGTH + fragment.length;
        }

        return offsetTable.map((frameStart, index) => {
            const frameEnd = index + 1 < offsetTable.length ? offsetTable[index + 1] : position;
            const first = starts.indexOf(frameStart);
            if (first === -1 || frameEnd < frameStart) {
                throw createDicomError(
                    "PixelDataLengthMismatch",
                    `Offset table entry ${frameStart} does not start a fragment`,
                    { tag: TAGS.PixelData },
                );
            }
            return fragments.filter((_, i) => starts[i] >= frameStart && starts[i] < frameEnd);
        });
    }

    if (fragments.length === numberOfFrames) {
        return fragments.map((fragment) => [fragment]);
    }

    throw createDicomError(
        "PixelDataLengthMismatch",
        `Cannot assign ${fragments.length} fragments to ${numberOfFrames} frames without an offset table`,
        { tag: TAGS.PixelData },
    );
}

/**
 * Slice one frame out of native pixel data
 */
export function sliceNativeFrame(
    pixelData: Uint8Array,
    frameIndex: number,
    frameLength: number,
): Uint8Array {
    const start = frameIndex * frameLength;
    return pixelData.subarray(start, start + frameLength);
}
