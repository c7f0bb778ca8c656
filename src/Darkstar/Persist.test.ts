import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDefaultRegistry } from "./DefaultRegistry.js";
import { MaterialList } from "./MaterialList.js";
import { PersistDecodeError, PersistObject, PersistRegistry } from "./Persist.js";
import { Shape } from "./Shape.js";
import { Stream, makeTag } from "./Stream.js";
import { StreamWriter } from "./testing/StreamWriter.js";
import { writeMaterialList } from "./testing/ShapeWriter.js";

class Counter implements PersistObject {
    public readonly className = 'Test::Counter';
    public version = -1;
    public value = 0;

    public decode(stream: Stream, version: number): void {
        this.version = version;
        this.value = stream.readUint32();
        if (this.value === 0)
            throw new PersistDecodeError('zero');
    }
}

describe("PersistRegistry", () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("decodes a named class with its version", () => {
        const registry = new PersistRegistry();
        registry.registerClass('Test::Counter', () => new Counter());

        const w = new StreamWriter();
        const chunk = w.beginPersist('Test::Counter', 4);
        w.u32(42);
        w.endChunk(chunk);

        const obj = registry.createFromStreamAs(new Stream(w.finish()), Counter);
        expect(obj).not.toBeNull();
        expect(obj?.version).toBe(4);
        expect(obj?.value).toBe(42);
    });

    it("decodes a tagged chunk at version 0", () => {
        const registry = new PersistRegistry();
        registry.registerTag(makeTag('CNTR'), () => new Counter());

        const w = new StreamWriter();
        const chunk = w.beginChunk('CNTR');
        w.u32(9);
        w.endChunk(chunk);

        const obj = registry.createFromStreamAs(new Stream(w.finish()), Counter);
        expect(obj?.version).toBe(0);
        expect(obj?.value).toBe(9);
    });

    it("skips unknown classes and leaves the stream after them", () => {
        const registry = new PersistRegistry();
        const w = new StreamWriter();
        const chunk = w.beginPersist('Test::Unknown', 1);
        w.u32(1).u32(2).u8(3);
        w.endChunk(chunk);
        w.u32(0x12345678);

        const stream = new Stream(w.finish());
        expect(registry.createFromStream(stream)).toBeNull();
        expect(stream.readUint32()).toBe(0x12345678);
        expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it("returns null for a failed decode and seeks to the chunk end", () => {
        const registry = new PersistRegistry();
        registry.registerClass('Test::Counter', () => new Counter());

        const w = new StreamWriter();
        const first = w.beginPersist('Test::Counter', 1);
        w.u32(0).u32(0xAAAA);
        w.endChunk(first);
        const second = w.beginPersist('Test::Counter', 1);
        w.u32(5);
        w.endChunk(second);

        const stream = new Stream(w.finish());
        expect(registry.createFromStream(stream)).toBeNull();
        const next = registry.createFromStreamAs(stream, Counter);
        expect(next?.value).toBe(5);
    });

    it("stops at the end of the stream when a chunk claims more than is there", () => {
        const registry = new PersistRegistry();
        const w = new StreamWriter();
        const chunk = w.beginPersist('Test::Unknown', 1);
        w.u32(1);
        w.endChunk(chunk);
        w.u32(0x12345678);
        w.patchU32(chunk + 4, 0xFFFFFFFF);

        const stream = new Stream(w.finish());
        expect(registry.createFromStream(stream)).toBeNull();
        expect(stream.isAtEnd()).toBe(true);
    });

    it("returns null when a chunk runs out of data", () => {
        const registry = new PersistRegistry();
        registry.registerClass('Test::Counter', () => new Counter());

        const w = new StreamWriter();
        const chunk = w.beginPersist('Test::Counter', 1);
        w.u8(1);
        w.endChunk(chunk);

        const stream = new Stream(w.finish());
        expect(registry.createFromStream(stream)).toBeNull();
        expect(stream.isAtEnd()).toBe(true);
    });

    it("returns null with no header to read", () => {
        const registry = new PersistRegistry();
        const w = new StreamWriter();
        w.u16(0);
        expect(registry.createFromStream(new Stream(w.finish()))).toBeNull();
    });

    it("rejects an object of the wrong class", () => {
        const registry = createDefaultRegistry();
        const w = new StreamWriter();
        writeMaterialList(w, []);
        expect(registry.createFromStreamAs(new Stream(w.finish()), Shape)).toBeNull();
    });

    it("registers the shape classes by default", () => {
        const registry = createDefaultRegistry();
        expect(registry.hasClass('TS::Shape')).toBe(true);
        expect(registry.hasClass('TS::CelAnimMesh')).toBe(true);
        expect(registry.hasClass('TS::MaterialList')).toBe(true);
        expect(registry.createByName('TS::MaterialList')).toBeInstanceOf(MaterialList);
        expect(registry.createByName('TS::Nothing')).toBeNull();
    });
});
