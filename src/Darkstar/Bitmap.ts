import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { Palette, PaletteData, PaletteType, getPaletteColorRGBA, readMicrosoftPalette } from "./Palette.js";
import { PersistDecodeError } from "./Persist.js";
import { Stream, makeTag, readChunkHeader, tagToString } from "./Stream.js";

const PBMP_TAG = makeTag('PBMP');
const HEAD_TAG = makeTag('head');
const DETL_TAG = makeTag('DETL');
const PIDX_TAG = makeTag('piDX');
const DATA_TAG = makeTag('data');
const RIFF_TAG = makeTag('RIFF');
// "BM", the first two bytes of a Windows bitmap.
const BM_MAGIC = 0x4D42;
// Reserved-field marker a Windows bitmap uses to carry a palette index.
const BM_PALETTE_INDEX_MARKER = 0xF5F7;

const MAX_MIPS = 9;

export const enum BitmapFlags {
    Normal          = 0x00,
    Transparent     = 0x01,
    Fuzzy           = 0x02,
    Translucent     = 0x04,
    Additive        = 0x10,
    Subtractive     = 0x20,
    Alpha8          = 0x40,
}

export const enum ModelBlendMode {
    Opaque,
    Translucent,
    Additive,
    Subtractive,
}

export interface MaterialBlend {
    mode: ModelBlendMode;
    // Scales the texture's alpha.
    alphaScale: number;
}

// How a shape surface textured with a bitmap of these flags is blended.
export function getMaterialBlendMode(flags: BitmapFlags): MaterialBlend {
    if (flags & BitmapFlags.Transparent)
        return { mode: ModelBlendMode.Translucent, alphaScale: 0.65 };
    else if (flags & BitmapFlags.Additive)
        return { mode: ModelBlendMode.Additive, alphaScale: 1.0 };
    else if (flags & BitmapFlags.Subtractive)
        return { mode: ModelBlendMode.Subtractive, alphaScale: 1.0 };
    else if (flags & BitmapFlags.Translucent)
        return { mode: ModelBlendMode.Translucent, alphaScale: 1.0 };
    else
        return { mode: ModelBlendMode.Opaque, alphaScale: 1.0 };
}

export class Bitmap {
    public width = 0;
    public height = 0;
    public bitDepth = 0;
    public flags: BitmapFlags = BitmapFlags.Normal;
    public mipLevels = 1;
    public paletteIndex = -1;
    // Windows bitmaps store blue first.
    public bgr = false;
    public data = new Uint8Array(0);
    public mips: Uint8Array[] = [];
    public palette: Palette | null = null;

    // Row pitch in bytes; rows are padded to four bytes.
    public get stride(): number {
        return 4 * Math.floor((this.width * this.bitDepth + 31) / 32);
    }

    /**
     * Read a Darkstar "PBMP" bitmap or a Windows ".bmp". Throws {@link PersistDecodeError} for
     * anything else.
     */
    public static read(buffer: ArrayBufferSlice): Bitmap {
        const bitmap = new Bitmap();
        const stream = new Stream(buffer);

        if (buffer.byteLength >= 2 && buffer.createDataView().getUint16(0x00, true) === BM_MAGIC)
            bitmap.readWindowsBitmap(stream);
        else
            bitmap.readPBMP(stream);

        bitmap.setupMips();
        return bitmap;
    }

    private readPBMP(stream: Stream): void {
        const header = readChunkHeader(stream);
        if (header.tag !== PBMP_TAG)
            throw new PersistDecodeError(`Not a bitmap: ${tagToString(header.tag)}`);

        // The head chunk says how many chunks follow it.
        let chunksLeft = Infinity;
        while (!stream.isAtEnd() && chunksLeft > 0) {
            const chunk = readChunkHeader(stream);
            chunksLeft--;

            if (chunk.tag === HEAD_TAG) {
                const version = stream.readUint32();
                this.width = stream.readUint32();
                this.height = stream.readUint32();
                this.bitDepth = stream.readUint32();
                this.flags = stream.readUint32();
                if ((version >>> 24) !== 0)
                    throw new PersistDecodeError(`Unsupported PBMP version ${version >>> 24}`);
                chunksLeft = version & 0xFFFFFF;
            } else if (chunk.tag === DETL_TAG) {
                this.mipLevels = stream.readUint32();
            } else if (chunk.tag === PIDX_TAG) {
                this.paletteIndex = stream.readInt32();
            } else if (chunk.tag === DATA_TAG) {
                this.data = stream.readUint8Array(Math.min(chunk.getSize(), stream.remaining())).slice();
            } else if (chunk.tag === RIFF_TAG) {
                stream.seek(chunk.headerOffset);
                const palette = new Palette();
                palette.palettes.push(readMicrosoftPalette(stream));
                this.palette = palette;
            }

            chunk.seekToEnd(stream);
        }
    }

    private readWindowsBitmap(stream: Stream): void {
        this.bgr = true;

        // BITMAPFILEHEADER
        stream.readUint16(); // magic
        stream.readUint32(); // file size
        const reserved1 = stream.readUint16();
        const reserved2 = stream.readUint16();
        const dataOffset = stream.readUint32();

        // BITMAPINFOHEADER
        const infoSize = stream.readUint32();
        const width = stream.readInt32();
        const height = stream.readInt32();
        stream.readUint16(); // planes
        const bitDepth = stream.readUint16();
        const compression = stream.readUint32();
        stream.skip(0x0C); // image size, pixels per meter
        const colorsUsed = stream.readUint32();
        stream.readUint32(); // important colours
        stream.skip(Math.max(infoSize - 0x28, 0));

        if (compression !== 0)
            throw new PersistDecodeError(`Compressed Windows bitmaps are not supported`);
        if (bitDepth !== 8 && bitDepth !== 24)
            throw new PersistDecodeError(`Unsupported Windows bitmap depth ${bitDepth}`);

        this.width = Math.abs(width);
        this.height = Math.abs(height);
        this.bitDepth = bitDepth;
        this.flags = BitmapFlags.Normal;
        this.mipLevels = 1;
        this.paletteIndex = (reserved1 === BM_PALETTE_INDEX_MARKER && reserved2 !== 0xFFFF) ? reserved2 : -1;

        if (bitDepth === 8) {
            const numColors = colorsUsed !== 0 ? colorsUsed : 0x100;
            const colors = new Uint32Array(0x100);
            const numToRead = Math.min(numColors, 0x100);
            colors.set(stream.readUint32Array(numToRead));
            stream.skip((numColors - numToRead) * 4);
            const palette = new Palette();
            palette.palettes.push({ index: -1, type: PaletteType.NoRemap, colors });
            this.palette = palette;
        }

        if (dataOffset !== 0)
            stream.seek(dataOffset);

        // Rows are stored bottom-up unless the height is negative.
        const stride = this.stride;
        stream.checkCount(this.height, stride);
        this.data = new Uint8Array(stride * this.height);
        for (let i = 0; i < this.height; i++) {
            const row = height > 0 ? this.height - i - 1 : i;
            this.data.set(stream.readUint8Array(stride), row * stride);
        }
    }

    private setupMips(): void {
        this.mips = [];
        let offs = 0;
        let mipSize = this.stride * this.height;
        for (let i = 0; i < Math.min(this.mipLevels, MAX_MIPS); i++) {
            if (offs + mipSize > this.data.byteLength)
                break;
            this.mips.push(this.data.subarray(offs, offs + mipSize));
            offs += mipSize;
            mipSize = Math.floor(mipSize / 4);
        }
    }
}

export interface DecodedTexture {
    width: number;
    height: number;
    // RGBA, top row first, tightly packed.
    pixels: Uint8Array;
}

export interface TextureDecodeOptions {
    // Used for 8-bit bitmaps that carry no palette of their own.
    palette: Palette | null;
}

function getAlphaScale(flags: BitmapFlags): number {
    if (flags & BitmapFlags.Transparent)
        return 255;
    else if (flags & BitmapFlags.Translucent)
        return 1;
    else
        return 0;
}

/**
 * Expand the top mip of {@param bitmap} to RGBA. Transparent bitmaps turn any palette alpha into
 * fully opaque or fully clear, translucent bitmaps keep it, and everything else is opaque.
 * Returns null when an 8-bit bitmap has no palette to use or the bitmap has no pixel data.
 */
export function decodeBitmapToRGBA(bitmap: Bitmap, options: TextureDecodeOptions): DecodedTexture | null {
    const { width, height } = bitmap;
    const src = bitmap.mips[0];
    if (src === undefined)
        return null;

    const stride = bitmap.stride;
    const pixels = new Uint8Array(width * height * 4);

    if (bitmap.bitDepth === 8) {
        const palette = bitmap.palette ?? options.palette;
        const paletteData: PaletteData | null = palette !== null ? palette.getPaletteByIndex(bitmap.paletteIndex) : null;
        if (paletteData === null)
            return null;

        const alphaScale = getAlphaScale(bitmap.flags);
        for (let y = 0; y < height; y++) {
            for (let x = 0; x < width; x++) {
                const [c0, g, c2, a] = getPaletteColorRGBA(paletteData, src[y * stride + x]);
                const dst = (y * width + x) * 4;
                pixels[dst + 0] = bitmap.bgr ? c2 : c0;
                pixels[dst + 1] = g;
                pixels[dst + 2] = bitmap.bgr ? c0 : c2;
                pixels[dst + 3] = alphaScale !== 0 ? Math.min(a * alphaScale, 255) : 255;
            }
        }
    } else if (bitmap.bitDepth === 24) {
        for (let y = 0; y < height; y++) {
            for (let x = 0; x < width; x++) {
                const srcOffs = y * stride + x * 3;
                const dst = (y * width + x) * 4;
                pixels[dst + 0] = src[srcOffs + (bitmap.bgr ? 2 : 0)];
                pixels[dst + 1] = src[srcOffs + 1];
                pixels[dst + 2] = src[srcOffs + (bitmap.bgr ? 0 : 2)];
                pixels[dst + 3] = 255;
            }
        }
    } else {
        console.warn(`Can't decode ${bitmap.bitDepth}-bit bitmap`);
        return null;
    }

    return { width, height, pixels };
}
