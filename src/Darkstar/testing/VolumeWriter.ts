import ArrayBufferSlice from "../../ArrayBufferSlice.js";
import { StreamWriter } from "./StreamWriter.js";

export interface VolumeFileFixture {
    filename: string;
    data: ArrayLike<number>;
    compression?: number;
}

// A PVOL with one VBLK per file, then the "vols" string table and the "voli" file list.
export function encodeVolume(files: VolumeFileFixture[]): ArrayBufferSlice {
    const w = new StreamWriter();
    w.tag('PVOL').u32(0);

    const blockOffsets: number[] = [];
    for (const file of files) {
        const vblk = w.beginChunk('VBLK');
        w.raw(file.data);
        w.endChunk(vblk, true);
        blockOffsets.push(vblk);
    }

    w.patchU32(4, w.offset);
    const nameOffsets: number[] = [];
    const vols = w.beginChunk('vols');
    const stringsStart = w.offset;
    for (const file of files) {
        nameOffsets.push(w.offset - stringsStart);
        w.fixedString(file.filename, file.filename.length + 1);
    }
    w.endChunk(vols);

    const voli = w.beginChunk('voli');
    files.forEach((file, i) => {
        w.u32(i).i32(nameOffsets[i]).i32(blockOffsets[i]).u32(file.data.length).u8(file.compression ?? 0);
    });
    w.endChunk(voli);

    return w.finish();
}
