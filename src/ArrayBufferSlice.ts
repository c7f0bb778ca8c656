// A read-only window onto an ArrayBuffer.
//
// ArrayBuffer.prototype.slice copies, and typed arrays and DataViews each have their own
// way of describing a sub-range. Everything that parses a file in this project passes
// ArrayBufferSlices around instead, so that carving out an embedded chunk or a file inside
// a volume never copies the underlying bytes.
//
// Nothing stops a caller from writing through a typed array made from a slice. Don't.

import { assert } from "./util.js";

interface _TypedArrayConstructor<T extends ArrayBufferView> {
    readonly BYTES_PER_ELEMENT: number;
    new(buffer: ArrayBuffer, byteOffset?: number, length?: number): T;
}

function isAligned(n: number, m: number) {
    return (n & (m - 1)) === 0;
}

export default class ArrayBufferSlice {
    constructor(
        // Named arrayBuffer rather than buffer so that a slice is never mistaken for a
        // Uint8Array or DataView by APIs that duck-type on .buffer.
        public readonly arrayBuffer: ArrayBuffer,
        public readonly byteOffset: number = 0,
        public readonly byteLength: number = arrayBuffer.byteLength - byteOffset
    ) {
        assert(byteOffset >= 0 && byteLength >= 0 && (byteOffset + byteLength) <= this.arrayBuffer.byteLength);
    }

    /**
     * Wrap the bytes visible through {@param view}, e.g. a Node Buffer returned by fs.readFile,
     * without copying them.
     */
    public static fromView(view: ArrayBufferView): ArrayBufferSlice {
        const buffer = view.buffer;
        if (!(buffer instanceof ArrayBuffer)) {
            // SharedArrayBuffer-backed views are copied out once.
            const copy = new ArrayBuffer(view.byteLength);
            new Uint8Array(copy).set(new Uint8Array(buffer, view.byteOffset, view.byteLength));
            return new ArrayBufferSlice(copy);
        }
        return new ArrayBufferSlice(buffer, view.byteOffset, view.byteLength);
    }

    /**
     * Return a sub-section of the buffer from byte offset {@param begin} up to byte offset
     * {@param end}. An end of 0 means the end of this slice. No bytes are copied.
     */
    public slice(begin: number, end: number = 0): ArrayBufferSlice {
        const absBegin = this.byteOffset + begin;
        const absEnd = this.byteOffset + (end !== 0 ? end : this.byteLength);
        const byteLength = absEnd - absBegin;
        assert(begin >= 0 && byteLength >= 0 && begin + byteLength <= this.byteLength);
        return new ArrayBufferSlice(this.arrayBuffer, absBegin, byteLength);
    }

    /**
     * Return a sub-section of the buffer starting at byte offset {@param begin}, {@param byteLength}
     * bytes long (by default, the rest of this slice). No bytes are copied.
     */
    public subarray(begin: number, byteLength?: number): ArrayBufferSlice {
        if (byteLength === undefined)
            byteLength = this.byteLength - begin;
        assert(begin >= 0 && byteLength >= 0 && begin + byteLength <= this.byteLength);
        return new ArrayBufferSlice(this.arrayBuffer, this.byteOffset + begin, byteLength);
    }

    /**
     * Copy a sub-section of this slice into a fresh ArrayBuffer. A {@param byteLength} of 0 copies
     * to the end of the slice. Use sparingly.
     */
    public copyToBuffer(begin: number = 0, byteLength: number = 0): ArrayBuffer {
        const start = this.byteOffset + begin;
        const end = byteLength !== 0 ? start + byteLength : this.byteOffset + this.byteLength;
        const dst = new ArrayBuffer(end - start);
        new Uint8Array(dst).set(new Uint8Array(this.arrayBuffer, start, end - start));
        return dst;
    }

    public createDataView(offs: number = 0, length?: number): DataView {
        if (offs === 0 && length === undefined) {
            return new DataView(this.arrayBuffer, this.byteOffset, this.byteLength);
        } else {
            return this.subarray(offs, length).createDataView();
        }
    }

    // Darkstar data is little-endian throughout, as is every host we run on, so there is no
    // byte swapping here; only alignment needs care.
    public createTypedArray<T extends ArrayBufferView>(clazz: _TypedArrayConstructor<T>, offs: number = 0, count?: number): T {
        const begin = this.byteOffset + offs;

        let byteLength;
        if (count !== undefined) {
            byteLength = clazz.BYTES_PER_ELEMENT * count;
        } else {
            byteLength = this.byteLength - offs;
            count = byteLength / clazz.BYTES_PER_ELEMENT;
            assert((count | 0) === count);
        }
        assert(offs >= 0 && offs + byteLength <= this.byteLength);

        if (isAligned(begin, clazz.BYTES_PER_ELEMENT))
            return new clazz(this.arrayBuffer, begin, count);
        else
            return new clazz(this.copyToBuffer(offs, byteLength), 0, count);
    }
}
