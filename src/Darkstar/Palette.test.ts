import { describe, expect, it } from "vitest";
import { PALETTE_SIZE, Palette, PaletteType, getPaletteColorRGBA } from "./Palette.js";
import { PersistDecodeError } from "./Persist.js";
import { encodeRiffPalette } from "./testing/BitmapWriter.js";
import { StreamWriter } from "./testing/StreamWriter.js";

function fullPalette(fill: (i: number) => number): number[] {
    return Array.from({ length: PALETTE_SIZE }, (_, i) => fill(i));
}

describe("Palette", () => {
    it("reads a Microsoft RIFF palette", () => {
        const palette = Palette.read(encodeRiffPalette([0xFF0000FF, 0x8000FF00, 0x01FF0000]));

        expect(palette.palettes.length).toBe(1);
        const data = palette.palettes[0];
        expect(data.index).toBe(-1);
        expect(data.colors.length).toBe(PALETTE_SIZE);
        expect(getPaletteColorRGBA(data, 0)).toEqual([0xFF, 0x00, 0x00, 0xFF]);
        expect(getPaletteColorRGBA(data, 1)).toEqual([0x00, 0xFF, 0x00, 0x80]);
        expect(getPaletteColorRGBA(data, 2)).toEqual([0x00, 0x00, 0xFF, 0x01]);
        expect(getPaletteColorRGBA(data, 3)).toEqual([0, 0, 0, 0]);
    });

    it("reads a PPAL palette and skips its info chunk", () => {
        const w = new StreamWriter();
        const ppal = w.beginChunk('PPAL');
        const head = w.beginChunk('head');
        w.u8(3).u16(0).u8(2);
        w.endChunk(head);
        const info = w.beginChunk('info');
        w.u32(0xDEADBEEF).u32(1);
        w.endChunk(info);
        const data = w.beginChunk('data');
        for (const c of fullPalette((i) => i))
            w.u32(c);
        w.endChunk(data);
        w.endChunk(ppal);

        const palette = Palette.read(w.finish());
        expect(palette.shadeShift).toBe(2);
        expect(palette.shadeLevels).toBe(4);
        expect(palette.palettes.length).toBe(1);
        expect(palette.palettes[0].colors[200]).toBe(200);
    });

    it("rejects PPAL versions it doesn't know", () => {
        const w = new StreamWriter();
        const ppal = w.beginChunk('PPAL');
        const head = w.beginChunk('head');
        w.u8(5).u16(0).u8(0);
        w.endChunk(head);
        w.endChunk(ppal);
        expect(() => Palette.read(w.finish())).toThrow('PPAL version 5');
    });

    it("reads every palette of a PL98 file", () => {
        const w = new StreamWriter();
        // The header's size is the palette count.
        w.tag('PL98').u32(2);
        w.i32(3).i32(8).i32(0x00FF00FF).zeros(0x20);
        for (const c of fullPalette(() => 0x11111111))
            w.u32(c);
        w.i32(0).u32(PaletteType.ShadeHaze);
        for (const c of fullPalette(() => 0x22222222))
            w.u32(c);
        w.i32(9).u32(PaletteType.Translucent);

        const palette = Palette.read(w.finish());
        expect(palette.shadeShift).toBe(3);
        expect(palette.shadeLevels).toBe(8);
        expect(palette.hazeLevels).toBe(8);
        expect(palette.hazeColor).toBe(0x00FF00FF);
        expect(palette.palettes.map((p) => [p.index, p.type])).toEqual([[0, PaletteType.ShadeHaze], [9, PaletteType.Translucent]]);
        expect(palette.palettes[1].colors[0]).toBe(0x22222222);
    });

    it("picks palettes by index, falling back to the first", () => {
        const palette = new Palette();
        expect(palette.getPaletteByIndex(0)).toBeNull();

        const a = { index: 4, type: PaletteType.NoRemap, colors: new Uint32Array(PALETTE_SIZE) };
        const b = { index: 7, type: PaletteType.NoRemap, colors: new Uint32Array(PALETTE_SIZE) };
        palette.palettes.push(a, b);
        expect(palette.getPaletteByIndex(7)).toBe(b);
        expect(palette.getPaletteByIndex(-1)).toBe(a);
    });

    it("rejects other files", () => {
        const w = new StreamWriter();
        w.tag('PBMP').u32(0);
        expect(() => Palette.read(w.finish())).toThrow(PersistDecodeError);

        const riff = new StreamWriter();
        const chunk = riff.beginChunk('RIFF');
        riff.tag('WAVE');
        riff.endChunk(chunk);
        expect(() => Palette.read(riff.finish())).toThrow('not a palette');
    });
});
