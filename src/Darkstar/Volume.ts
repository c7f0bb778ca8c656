import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { readString } from "../util.js";
import { PersistDecodeError } from "./Persist.js";
import type { ResourceProvider } from "./ResourceManager.js";
import { CHUNK_HEADER_SIZE, Stream, makeTag, readChunkHeader, tagToString } from "./Stream.js";

const PVOL_TAG = makeTag('PVOL');
const VOLS_TAG = makeTag('vols');
const VOLI_TAG = makeTag('voli');

const VOLUME_ENTRY_SIZE = 0x11;

export const enum VolumeCompression {
    None = 0,
    RLE  = 1,
    LZSS = 2,
    LZH  = 3,
}

export interface VolumeEntry {
    id: number;
    filename: string;
    // Offset of the entry's VBLK chunk header.
    offset: number;
    size: number;
    compression: VolumeCompression;
}

/**
 * A Darkstar "PVOL" archive held in memory. The header's size field is the absolute offset of
 * the "vols" string table, which is followed by the "voli" file list.
 */
export class Volume implements ResourceProvider {
    public entries: VolumeEntry[] = [];
    private entriesByName = new Map<string, VolumeEntry>();

    constructor(public readonly name: string, private buffer: ArrayBufferSlice) {
        const stream = new Stream(buffer);
        const header = readChunkHeader(stream);
        if (header.tag !== PVOL_TAG)
            throw new PersistDecodeError(`${name} is not a volume: ${tagToString(header.tag)}`);

        stream.seek(header.getRawSize());
        const vols = readChunkHeader(stream);
        if (vols.tag !== VOLS_TAG)
            throw new PersistDecodeError(`${name}: expected string table, got ${tagToString(vols.tag)}`);
        const strings = stream.readBytes(vols.getSize());

        const voli = readChunkHeader(stream);
        if (voli.tag !== VOLI_TAG)
            throw new PersistDecodeError(`${name}: expected file list, got ${tagToString(voli.tag)}`);

        const numEntries = Math.floor(voli.getSize() / VOLUME_ENTRY_SIZE);
        stream.checkCount(numEntries, VOLUME_ENTRY_SIZE);
        for (let i = 0; i < numEntries; i++) {
            const id = stream.readUint32();
            const filenameOffset = stream.readInt32();
            const offset = stream.readInt32();
            const size = stream.readUint32();
            const compression = stream.readUint8();

            const filename = (filenameOffset >= 0 && filenameOffset < strings.byteLength) ? readString(strings, filenameOffset) : '';
            const entry: VolumeEntry = { id, filename, offset, size, compression };
            this.entries.push(entry);

            // First entry wins when a name repeats.
            const key = filename.toLowerCase();
            if (!this.entriesByName.has(key))
                this.entriesByName.set(key, entry);
        }
    }

    public findEntry(filename: string): VolumeEntry | null {
        return this.entriesByName.get(filename.toLowerCase()) ?? null;
    }

    public openFile(filename: string): ArrayBufferSlice | null {
        const entry = this.findEntry(filename);
        if (entry === null)
            return null;

        if (entry.compression !== VolumeCompression.None) {
            console.warn(`${this.name}: ${entry.filename} is compressed (${entry.compression}), which is not supported`);
            return null;
        }

        const dataOffset = entry.offset + CHUNK_HEADER_SIZE;
        if (entry.offset < 0 || dataOffset + entry.size > this.buffer.byteLength) {
            console.warn(`${this.name}: ${entry.filename} lies outside the volume`);
            return null;
        }

        return this.buffer.subarray(dataOffset, entry.size);
    }

    public listFiles(): string[] {
        return this.entries.map((entry) => entry.filename);
    }
}
