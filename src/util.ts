import type ArrayBufferSlice from "./ArrayBufferSlice.js";

export function assert(b: boolean, message: string = ""): asserts b {
    if (!b)
        throw new Error(`Assert fail: ${message}`);
}

export function assertExists<T>(v: T | null | undefined, name: string = ''): T {
    if (v !== undefined && v !== null)
        return v;
    else
        throw new Error(`Missing object ${name}`);
}

/**
 * Read a byte string of at most {@param length} bytes (the rest of the buffer by default),
 * stopping early at a NUL when {@param nulTerminated} is set. Bytes map one-to-one onto
 * code points; Darkstar names are plain ASCII.
 */
export function readString(buffer: ArrayBufferSlice, offs: number, length: number = -1, nulTerminated: boolean = true): string {
    const buf = buffer.createTypedArray(Uint8Array, offs);
    if (length < 0 || length > buf.byteLength)
        length = buf.byteLength;

    let S = '';
    for (let i = 0; i < length; i++) {
        if (nulTerminated && buf[i] === 0)
            break;
        S += String.fromCharCode(buf[i]);
    }
    return S;
}

export function nArray<T>(n: number, c: (i: number) => T): T[] {
    const d: T[] = new Array(n);
    for (let i = 0; i < n; i++)
        d[i] = c(i);
    return d;
}

export function leftPad(S: string, spaces: number, ch: string = '0'): string {
    return S.padStart(spaces, ch);
}

export function hexzero(n: number, spaces: number): string {
    const S = (n >>> 0).toString(16);
    return leftPad(S, spaces);
}

export function hexzero0x(n: number, spaces: number = 8): string {
    if (n < 0)
        return `-0x${hexzero(-n, spaces)}`;
    else
        return `0x${hexzero(n, spaces)}`;
}
