import * as fs from "fs";
import { fileURLToPath } from "url";

import {
    encodePng,
    formatTagWithComma,
    getTagName,
    parse,
    ViewerSession,
    type DecodedValue,
} from "./index";

const MAX_PREVIEW_LENGTH = 50;

/**
 * One-line preview of a decoded value
 */
export function formatValue(value: DecodedValue): string {
    let display = "";
    switch (value.kind) {
        case "string":
        case "number":
            display = value.values.join("\\");
            break;
        case "bytes":
            display = `[Binary Data: ${value.bytes.length} bytes]`;
            break;
        case "sequence":
            display = `[Sequence: ${value.items.length} items]`;
            break;
        case "fragments":
            display = `[Fragments: ${value.fragments.length}]`;
            break;
    }

    // Truncate long values
    if (display.length > MAX_PREVIEW_LENGTH) {
        display = display.substring(0, MAX_PREVIEW_LENGTH - 3) + "...";
    }
    return display;
}

/**
 * Options accepted by `render`
 */
export interface RenderCommandOptions {
    frame?: number;
    center?: number;
    width?: number;
}

export function parseRenderFlags(flags: string[]): RenderCommandOptions {
    const options: RenderCommandOptions = {};
    for (let i = 0; i < flags.length; i += 2) {
        const name = flags[i];
        const value = Number(flags[i + 1]);
        if (flags[i + 1] === undefined || !Number.isFinite(value)) {
            throw new Error(`Missing or invalid value for ${name}`);
        }
        switch (name) {
            case "--frame":
                options.frame = value;
                break;
            case "--center":
                options.center = value;
                break;
            case "--width":
                options.width = value;
                break;
            default:
                throw new Error(`Unknown option: ${name}`);
        }
    }
    return options;
}

function printHelp() {
    console.log(`
dicom-raster CLI

Commands:
  dump <file>                  Parse and print the top-level tags of a DICOM file.
  render <file> <out.png>      Render one frame to a PNG file.
    [--frame n]                Frame index (default 0).
    [--center c --width w]     Window center and width (default: from the file).
    `);
}

function dumpFile(filePath: string) {
    const result = parse(new Uint8Array(fs.readFileSync(filePath)));

    console.log(`\nParsed ${filePath}:`);
    console.log(`Transfer Syntax: ${result.transferSyntax.name}`);
    console.log(`Total Tags: ${result.meta.size + result.dataset.size}`);
    console.log("-".repeat(MAX_PREVIEW_LENGTH));

    for (const store of [result.meta, result.dataset]) {
        for (const element of store) {
            console.log(
                `${formatTagWithComma(element.tag)} ${getTagName(element.tag)} [${element.vr}] : ${formatValue(element.value)}`,
            );
        }
    }
    console.log("-".repeat(MAX_PREVIEW_LENGTH));

    for (const warning of result.warnings) {
        console.warn(`Warning: ${warning}`);
    }
}

async function renderFile(inputPath: string, outputPath: string, flags: string[]) {
    const options = parseRenderFlags(flags);
    const session = new ViewerSession();

    const outcome = await session.load(new Uint8Array(fs.readFileSync(inputPath)));
    if (outcome.status !== "loaded") {
        throw new Error("Load was superseded");
    }

    let frame = outcome.frame;
    if (options.frame !== undefined) {
        frame = session.setFrame(options.frame);
    }
    if (options.center !== undefined || options.width !== undefined) {
        const current = session.renderParameters;
        frame = session.setWindow(
            options.center ?? current?.center ?? 0,
            options.width ?? current?.width ?? 0,
        );
    }

    fs.writeFileSync(outputPath, encodePng(frame));
    console.log(`Wrote ${frame.width}x${frame.height} frame ${session.frameIndex} to ${outputPath}`);
}

export async function run(args: string[] = process.argv.slice(2)): Promise<number> {
    const command = args[0];

    try {
        switch (command) {
            case "dump":
                if (!args[1]) {
                    console.error("Usage: dicom-raster dump <file>");
                    return 1;
                }
                dumpFile(args[1]);
                return 0;

            case "render":
                if (!args[1] || !args[2]) {
                    console.error("Usage: dicom-raster render <file> <out.png> [--frame n] [--center c] [--width w]");
                    return 1;
                }
                await renderFile(args[1], args[2], args.slice(3));
                return 0;

            case "help":
            case "--help":
            case "-h":
                printHelp();
                return 0;

            default:
                if (command) {
                    console.error(`Unknown command: ${command}`);
                }
                printHelp();
                return 1;
        }
    } catch (e) {
        console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
        return 1;
    }
}

// Run if main
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    run().then(
        (code) => {
            process.exitCode = code;
        },
        (err: unknown) => {
            console.error(err);
            process.exitCode = 1;
        },
    );
}
