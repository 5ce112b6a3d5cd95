import { createDicomError } from "../core/errors";

/**
 * Layout of one frame, handed to a codec with its fragments
 */
export interface FrameInfo {
    transferSyntax: string;
    rows: number;
    columns: number;
    samplesPerPixel: number;
    bitsAllocated: number;
    bitsStored: number;
    pixelRepresentation: number;
    photometricInterpretation: string;
    planarConfiguration: number;
}

/**
 * Decompression capability for one or more transfer syntaxes.
 *
 * `decode` receives the fragments of a single frame and must return
 * little-endian, pixel-interleaved samples of exactly one frame.
 */
export interface PixelDataCodec {
    name: string;
    priority: number;
    isSupported(): Promise<boolean> | boolean;
    canDecode(transferSyntax: string): boolean;
    decode(fragments: Uint8Array[], info: FrameInfo): Promise<Uint8Array>;
}

// Type for a function that dynamically imports a codec module
type DynamicCodecLoader = () => Promise<PixelDataCodec>;

export class CodecRegistry {
    private codecs: PixelDataCodec[] = [];
    private dynamicCodecs: Map<string, DynamicCodecLoader> = new Map();
    private loadingCodecs: Map<string, Promise<PixelDataCodec | null>> =
        new Map();

    register(codec: PixelDataCodec): void {
        // Avoid duplicates
        if (!this.codecs.some((c) => c.name === codec.name)) {
            this.codecs.push(codec);
            this.codecs.sort((a, b) => b.priority - a.priority);
        }
    }

    registerDynamic(transferSyntax: string, loader: DynamicCodecLoader): void {
        this.dynamicCodecs.set(transferSyntax, loader);
    }

    async getDecoder(transferSyntax: string): Promise<PixelDataCodec | null> {
        // 1. Check statically registered codecs first
        for (const codec of this.codecs) {
            if (
                codec.canDecode(transferSyntax) &&
                (await codec.isSupported())
            ) {
                return codec;
            }
        }

        // 2. Check if a dynamic loader is available
        const loader = this.dynamicCodecs.get(transferSyntax);
        if (!loader) {
            return null;
        }

        // 3. Handle concurrent loading
        const pending = this.loadingCodecs.get(transferSyntax);
        if (pending) {
            return pending;
        }

        // 4. Load, instantiate, and register the codec
        const loadPromise = (async () => {
            try {
                const codecInstance = await loader();
                if (
                    codecInstance.canDecode(transferSyntax) &&
                    (await codecInstance.isSupported())
                ) {
                    this.register(codecInstance); // Add to static list for next time
                    return codecInstance;
                }
                return null;
            } catch (e) {
                console.error(
                    `Error dynamically loading codec for ${transferSyntax}:`,
                    e,
                );
                return null;
            } finally {
                this.loadingCodecs.delete(transferSyntax);
            }
        })();

        this.loadingCodecs.set(transferSyntax, loadPromise);
        return loadPromise;
    }

    /**
     * Decode the fragments of one frame with the best codec for the syntax
     */
    async decompress(
        transferSyntax: string,
        fragments: Uint8Array[],
        info: FrameInfo,
    ): Promise<Uint8Array> {
        const decoder = await this.getDecoder(transferSyntax);
        if (!decoder) {
            throw createDicomError(
                "UnsupportedTransferSyntax",
                `No codec available for transfer syntax ${transferSyntax}`,
            );
        }
        return decoder.decode(fragments, info);
    }

    getCodecs(): PixelDataCodec[] {
        return this.codecs;
    }
}

/**
 * Registry with the built-in codecs: RLE Lossless, loaded on first use
 */
export function createDefaultRegistry(): CodecRegistry {
    const defaults = new CodecRegistry();
    defaults.registerDynamic("1.2.840.10008.1.2.5", () =>
        import("./rle").then((module) => new module.RleCodec()),
    );
    return defaults;
}

export const registry = createDefaultRegistry();
