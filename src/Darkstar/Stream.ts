import { vec2, vec3 } from "gl-matrix";
import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { hexzero0x, readString } from "../util.js";

export class StreamReadError extends Error {
    constructor(public readonly offset: number, public readonly size: number, public readonly streamLength: number) {
        super(`Read of ${size} bytes at ${hexzero0x(offset)} runs past the end of the stream (${streamLength} bytes)`);
        this.name = 'StreamReadError';
    }
}

/**
 * Little-endian cursor over an {@link ArrayBufferSlice}.
 *
 * Every read checks that it fits in the buffer before touching it. A read that doesn't fit
 * throws {@link StreamReadError} and leaves the position where it was.
 */
export class Stream {
    private offset: number = 0;
    private view: DataView;

    constructor(public readonly buffer: ArrayBufferSlice) {
        this.view = buffer.createDataView();
    }

    public get byteLength(): number {
        return this.buffer.byteLength;
    }

    public tell(): number {
        return this.offset;
    }

    // Seeking past the end is ignored.
    public seek(pos: number): void {
        if (pos < 0 || pos > this.buffer.byteLength)
            return;
        this.offset = pos;
    }

    public skip(n: number): void {
        this.claim(n);
        this.offset += n;
    }

    public remaining(): number {
        return this.buffer.byteLength - this.offset;
    }

    public isAtEnd(): boolean {
        return this.offset >= this.buffer.byteLength;
    }

    private claim(size: number): number {
        const offs = this.offset;
        if (size < 0 || offs + size > this.buffer.byteLength)
            throw new StreamReadError(offs, size, this.buffer.byteLength);
        return offs;
    }

    /**
     * Make sure {@param count} records of {@param elementSize} bytes can still be read before
     * anything is allocated for them.
     */
    public checkCount(count: number, elementSize: number): void {
        if (count < 0 || !Number.isSafeInteger(count))
            throw new StreamReadError(this.offset, count, this.buffer.byteLength);
        this.claim(count * elementSize);
    }

    public readUint8(): number {
        const offs = this.claim(1);
        this.offset += 1;
        return this.view.getUint8(offs);
    }

    public readUint16(): number {
        const offs = this.claim(2);
        this.offset += 2;
        return this.view.getUint16(offs, true);
    }

    public readInt16(): number {
        const offs = this.claim(2);
        this.offset += 2;
        return this.view.getInt16(offs, true);
    }

    public readUint32(): number {
        const offs = this.claim(4);
        this.offset += 4;
        return this.view.getUint32(offs, true);
    }

    public readInt32(): number {
        const offs = this.claim(4);
        this.offset += 4;
        return this.view.getInt32(offs, true);
    }

    public readFloat32(): number {
        const offs = this.claim(4);
        this.offset += 4;
        return this.view.getFloat32(offs, true);
    }

    public readVec2(dst: vec2 = vec2.create()): vec2 {
        const offs = this.claim(8);
        this.offset += 8;
        return vec2.set(dst, this.view.getFloat32(offs + 0x00, true), this.view.getFloat32(offs + 0x04, true));
    }

    public readVec3(dst: vec3 = vec3.create()): vec3 {
        const offs = this.claim(12);
        this.offset += 12;
        return vec3.set(dst, this.view.getFloat32(offs + 0x00, true), this.view.getFloat32(offs + 0x04, true), this.view.getFloat32(offs + 0x08, true));
    }

    public readBytes(n: number): ArrayBufferSlice {
        const offs = this.claim(n);
        this.offset += n;
        return this.buffer.subarray(offs, n);
    }

    public readUint8Array(n: number): Uint8Array {
        const offs = this.claim(n);
        this.offset += n;
        return this.buffer.createTypedArray(Uint8Array, offs, n);
    }

    public readUint32Array(n: number): Uint32Array {
        const offs = this.claim(n * 4);
        this.offset += n * 4;
        return this.buffer.createTypedArray(Uint32Array, offs, n);
    }

    /**
     * A u16 length followed by the characters, padded out to an even byte count. The padding
     * is not guaranteed to hold a NUL; the string ends at the first NUL or at the length.
     */
    public readSString(): string {
        const offs = this.claim(2);
        const size = this.view.getUint16(offs, true);
        const paddedSize = (size + 1) & ~1;
        this.claim(2 + paddedSize);
        this.offset += 2 + paddedSize;
        return readString(this.buffer, offs + 2, size, true);
    }

    // A u32 length followed by exactly that many characters.
    public readSString32(): string {
        const offs = this.claim(4);
        const size = this.view.getUint32(offs, true);
        this.claim(4 + size);
        this.offset += 4 + size;
        return readString(this.buffer, offs + 4, size, true);
    }

    // A NUL-padded string stored in a fixed-width field.
    public readFixedString(n: number): string {
        const offs = this.claim(n);
        this.offset += n;
        return readString(this.buffer, offs, n, true);
    }
}

export function readVec2Array(stream: Stream, count: number): vec2[] {
    stream.checkCount(count, 8);
    const L: vec2[] = [];
    for (let i = 0; i < count; i++)
        L.push(stream.readVec2());
    return L;
}

// Chunk tags are four ASCII characters read as a little-endian u32, so "PERS" is 0x53524550.
export function makeTag(S: string): number {
    return (S.charCodeAt(0) | (S.charCodeAt(1) << 8) | (S.charCodeAt(2) << 16) | (S.charCodeAt(3) << 24)) >>> 0;
}

export function tagToString(tag: number): string {
    let S = '';
    for (let i = 0; i < 4; i++) {
        const ch = (tag >>> (i * 8)) & 0xFF;
        S += (ch >= 0x20 && ch < 0x7F) ? String.fromCharCode(ch) : '?';
    }
    return S;
}

export const enum ChunkSizeFlags {
    AlignDword = 0x80000000,
}

export const CHUNK_HEADER_SIZE = 0x08;

/**
 * The 8-byte header in front of every chunk: a tag and a size. Bit 31 of the size asks for
 * the payload to be padded out to 4 bytes; otherwise it is padded to 2.
 */
export class ChunkHeader {
    constructor(
        public readonly tag: number,
        private readonly size: number,
        // Offset of the header itself.
        public readonly headerOffset: number,
        private readonly streamLength: number,
    ) {
    }

    public get dataOffset(): number {
        return this.headerOffset + CHUNK_HEADER_SIZE;
    }

    public getRawSize(): number {
        return this.size;
    }

    public getSize(): number {
        if ((this.size & ChunkSizeFlags.AlignDword) !== 0)
            return ((((this.size & ~ChunkSizeFlags.AlignDword) >>> 0) + 3) & ~3) >>> 0;
        else
            return ((this.size + 1) & ~1) >>> 0;
    }

    // Never past the end of the stream.
    public getEndOffset(): number {
        return Math.min(this.dataOffset + this.getSize(), this.streamLength);
    }

    public seekToEnd(stream: Stream): void {
        stream.seek(this.getEndOffset());
    }

    public toString(): string {
        return `${tagToString(this.tag)} @ ${hexzero0x(this.headerOffset)} (${this.getSize()} bytes)`;
    }
}

export function readChunkHeader(stream: Stream): ChunkHeader {
    const headerOffset = stream.tell();
    stream.checkCount(1, CHUNK_HEADER_SIZE);
    const tag = stream.readUint32();
    const size = stream.readUint32();
    return new ChunkHeader(tag, size, headerOffset, stream.byteLength);
}
