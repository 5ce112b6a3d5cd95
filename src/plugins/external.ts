/**
 * External Decoder Plugin (Adapter)
 * Wraps a caller-supplied decode function, e.g. a JPEG or JPEG 2000
 * library, for a list of transfer syntaxes.
 */

import type { FrameInfo, PixelDataCodec } from "./codecs";
import { concatFragments } from "../utils/pixelData";

export type ExternalDecodeFunction = (
    frame: Uint8Array,
    info: FrameInfo,
) => Promise<Uint8Array> | Uint8Array;

export class ExternalCodec implements PixelDataCodec {
    priority = 20;

    constructor(
        public readonly name: string,
        private readonly transferSyntaxes: readonly string[],
        private readonly externalDecoder: ExternalDecodeFunction,
    ) {}

    isSupported(): boolean {
        return true;
    }

    canDecode(transferSyntax: string): boolean {
        return this.transferSyntaxes.includes(transferSyntax);
    }

    async decode(fragments: Uint8Array[], info: FrameInfo): Promise<Uint8Array> {
        const combined = concatFragments(fragments);
        return this.externalDecoder(combined, info);
    }
}
