import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { PersistDecodeError } from "./Persist.js";
import { Stream, makeTag, readChunkHeader, tagToString } from "./Stream.js";

const RIFF_TAG = makeTag('RIFF');
const PAL_TAG = makeTag('PAL ');
const PPAL_TAG = makeTag('PPAL');
const PL98_TAG = makeTag('PL98');
const HEAD_TAG = makeTag('head');
const INFO_TAG = makeTag('info');
const DATA_TAG = makeTag('data');

export const PALETTE_SIZE = 0x100;

export const enum PaletteType {
    NoRemap             = 0,
    ShadeHaze           = 1,
    Translucent         = 2,
    ColorQuant          = 3,
    AlphaQuant          = 4,
    AdditiveQuant       = 5,
    Additive            = 6,
    SubtractiveQuant    = 7,
    Subtractive         = 8,
}

export interface PaletteData {
    // Matched against a bitmap's palette index; -1 matches nothing.
    index: number;
    type: PaletteType;
    // 0xAABBGGRR.
    colors: Uint32Array;
}

export function getPaletteColorRGBA(data: PaletteData, colorIndex: number): [number, number, number, number] {
    const color = data.colors[colorIndex];
    return [color & 0xFF, (color >>> 8) & 0xFF, (color >>> 16) & 0xFF, (color >>> 24) & 0xFF];
}

function readColors(stream: Stream, count: number): Uint32Array {
    const colors = new Uint32Array(PALETTE_SIZE);
    const numToRead = Math.min(count, PALETTE_SIZE);
    colors.set(stream.readUint32Array(numToRead));
    stream.skip((count - numToRead) * 4);
    return colors;
}

/**
 * A Microsoft RIFF palette: "RIFF", size, "PAL ", then a "data" chunk holding a version, a
 * colour count and the colours.
 */
export function readMicrosoftPalette(stream: Stream): PaletteData {
    const riff = readChunkHeader(stream);
    if (riff.tag !== RIFF_TAG)
        throw new PersistDecodeError(`Expected RIFF palette, got ${tagToString(riff.tag)}`);
    const formType = stream.readUint32();
    if (formType !== PAL_TAG)
        throw new PersistDecodeError(`RIFF file is ${tagToString(formType)}, not a palette`);

    const data = readChunkHeader(stream);
    if (data.tag !== DATA_TAG)
        throw new PersistDecodeError(`Expected palette data, got ${tagToString(data.tag)}`);
    stream.readUint16(); // version
    const numColors = stream.readUint16();
    const colors = readColors(stream, numColors);

    riff.seekToEnd(stream);
    return { index: -1, type: PaletteType.NoRemap, colors };
}

/**
 * A set of 256-colour palettes. Darkstar "PPAL" and "PL98" files go on to carry the shade, haze
 * and translucency lookup tables the software renderer used; those are not read.
 */
export class Palette {
    public shadeShift = 0;
    public shadeLevels = 1;
    public hazeLevels = 0;
    public hazeColor = 0;
    public palettes: PaletteData[] = [];

    public static read(buffer: ArrayBufferSlice): Palette {
        const palette = new Palette();
        const stream = new Stream(buffer);
        const header = readChunkHeader(stream);

        if (header.tag === RIFF_TAG) {
            stream.seek(header.headerOffset);
            palette.palettes.push(readMicrosoftPalette(stream));
        } else if (header.tag === PPAL_TAG) {
            palette.readPPAL(stream);
        } else if (header.tag === PL98_TAG) {
            // The size field of a PL98 header counts palettes, not bytes.
            palette.readPL98(stream, header.getRawSize());
        } else {
            throw new PersistDecodeError(`Unknown palette format ${tagToString(header.tag)}`);
        }

        return palette;
    }

    private readPPAL(stream: Stream): void {
        const head = readChunkHeader(stream);
        if (head.tag !== HEAD_TAG)
            throw new PersistDecodeError(`Expected PPAL head, got ${tagToString(head.tag)}`);

        const version = stream.readUint8();
        if (version !== 3 && version !== 7)
            throw new PersistDecodeError(`Unsupported PPAL version ${version}`);
        stream.readUint16();
        this.shadeShift = stream.readUint8();
        this.shadeLevels = 1 << this.shadeShift;
        this.hazeLevels = 0;

        let chunk = readChunkHeader(stream);
        if (chunk.tag === INFO_TAG) {
            chunk.seekToEnd(stream);
            chunk = readChunkHeader(stream);
        }

        if (chunk.tag !== DATA_TAG)
            throw new PersistDecodeError(`Expected PPAL data, got ${tagToString(chunk.tag)}`);

        this.palettes = [{ index: -1, type: PaletteType.NoRemap, colors: readColors(stream, PALETTE_SIZE) }];
    }

    private readPL98(stream: Stream, numPalettes: number): void {
        this.shadeShift = stream.readInt32();
        this.shadeLevels = 1 << this.shadeShift;
        this.hazeLevels = stream.readInt32();
        this.hazeColor = stream.readInt32();
        stream.skip(0x20); // allowed matches

        stream.checkCount(numPalettes, PALETTE_SIZE * 4 + 0x08);
        this.palettes = [];
        for (let i = 0; i < numPalettes; i++) {
            const colors = readColors(stream, PALETTE_SIZE);
            const index = stream.readInt32();
            const type = stream.readUint32();
            this.palettes.push({ index, type, colors });
        }
    }

    // Falls back to the first palette when nothing matches.
    public getPaletteByIndex(index: number): PaletteData | null {
        for (let i = 0; i < this.palettes.length; i++)
            if (this.palettes[i].index === index)
                return this.palettes[i];
        return this.palettes.length > 0 ? this.palettes[0] : null;
    }
}
