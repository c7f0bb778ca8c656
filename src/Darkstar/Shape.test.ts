import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDefaultRegistry } from "./DefaultRegistry.js";
import { PersistDecodeError } from "./Persist.js";
import { Shape, unpackKeyframeV2, unpackKeyframeV3, unpackKeyframeV8 } from "./Shape.js";
import { Stream, readChunkHeader } from "./Stream.js";
import { IDENTITY_TRANSFORM, ShapeFixture, decodeShape, encodeShape, makeQuadMesh } from "./testing/ShapeWriter.js";

function sampleShape(): ShapeFixture {
    return {
        radius: 2,
        center: [0, 1, 0],
        nodes: [
            { name: 0, parent: -1, numSubSequences: 1, firstSubSequence: 0, defaultTransform: 0 },
            { name: 1, parent: 0, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 1 },
        ],
        sequences: [{ name: 3, cyclic: true, duration: 2, priority: 1 }],
        subSequences: [
            { sequenceIndex: 0, numKeyframes: 2, firstKeyframe: 0 },
            { sequenceIndex: 0, numKeyframes: 1, firstKeyframe: 2 },
        ],
        keyframes: [
            { position: 0, key: 0, mat: 0 },
            { position: 0.5, key: 1, mat: 0 },
            { position: 0, key: 0, mat: 0 },
        ],
        transforms: [
            IDENTITY_TRANSFORM,
            { rotation: [0, 0, 0.6, 0.8], translation: [1, 2, 3] },
        ],
        names: ['root', 'Turret', 'hull', 'Fire'],
        objects: [
            { name: 2, flags: 1, meshIndex: 0, nodeIndex: 1, offset: [0, 0, 1], numSubSequences: 1, firstSubSequence: 1 },
        ],
        details: [{ rootNode: 0, size: 0 }],
        transitions: [
            { startSequence: 0, endSequence: 0, startPosition: 0.25, endPosition: 0.75, duration: 0.5, transform: IDENTITY_TRANSFORM },
        ],
        frameTriggers: [{ position: 0.5, value: 7 }],
        defaultMaterials: 2,
        alwaysNode: 1,
        meshes: [makeQuadMesh(1)],
        materials: [{ flags: 3, fileName: 'hull.bmp' }],
    };
}

// Decode without the registry, so errors come straight out.
function decodeDirect(fixture: ShapeFixture, version: number = 8): Shape {
    const stream = new Stream(encodeShape(fixture, version));
    readChunkHeader(stream);
    stream.readSString();
    stream.readUint32();
    const shape = new Shape();
    shape.decode(stream, version, createDefaultRegistry());
    return shape;
}

describe("Shape keyframes", () => {
    it("unpacks version 2 keyframes", () => {
        expect(unpackKeyframeV2(0.25, 0x40000005)).toEqual({
            position: 0.25, key: 5, matIndex: 0, frameMatters: true, matMatters: false, visMatters: false, visible: false,
        });
        expect(unpackKeyframeV2(0, 0x80000003)).toMatchObject({ key: 3, visMatters: true, visible: true });
        expect(unpackKeyframeV2(0, 0x00000007)).toMatchObject({ key: 7, visMatters: true, visible: false });
        expect(unpackKeyframeV2(0, 0xC0000001)).toMatchObject({ key: 1, visMatters: false, visible: true });
        expect(unpackKeyframeV2(0, 0x7FFFFFFF).key).toBe(0xFFFF);
    });

    it("unpacks version 3 to 7 keyframes", () => {
        expect(unpackKeyframeV3(0.5, 12, 0x10000ABC)).toEqual({
            position: 0.5, key: 12, matIndex: 0xABC, frameMatters: true, matMatters: false, visMatters: false, visible: false,
        });
        expect(unpackKeyframeV3(0, 0, 0x2000F123)).toMatchObject({ matIndex: 0x123, frameMatters: false, matMatters: true });
        expect(unpackKeyframeV3(0, 0, 0x40000000)).toMatchObject({ visMatters: true, visible: false });
        expect(unpackKeyframeV3(0, 0, 0x80000000)).toMatchObject({ visMatters: false, visible: true });
        expect(unpackKeyframeV3(0, 0, 0xF0000000)).toMatchObject({ frameMatters: true, matMatters: true, visMatters: true, visible: true, matIndex: 0 });
        expect(unpackKeyframeV3(0, 0x00012345, 0).key).toBe(0x2345);
    });

    it("unpacks version 8 keyframes", () => {
        expect(unpackKeyframeV8(1, 300, 0x1FFF)).toEqual({
            position: 1, key: 300, matIndex: 0xFFF, frameMatters: true, matMatters: false, visMatters: false, visible: false,
        });
        expect(unpackKeyframeV8(0, 0, 0x2001)).toMatchObject({ matIndex: 1, matMatters: true });
        expect(unpackKeyframeV8(0, 0, 0x4000)).toMatchObject({ visMatters: true, visible: false });
        expect(unpackKeyframeV8(0, 0, 0x8000)).toMatchObject({ visMatters: false, visible: true });
    });
});

describe("Shape", () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("reads a version 8 shape", () => {
        const shape = decodeShape(sampleShape(), 8);
        expect(shape.radius).toBe(2);
        expect(Array.from(shape.center)).toEqual([0, 1, 0]);
        expect(Array.from(shape.minBounds)).toEqual([-2, -1, -2]);
        expect(Array.from(shape.maxBounds)).toEqual([2, 3, 2]);
        expect(shape.nodes[1]).toEqual({ name: 1, parent: 0, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 1 });
        expect(shape.sequences[0]).toMatchObject({ name: 3, cyclic: true, duration: 2, priority: 1 });
        expect(shape.subSequences[1]).toEqual({ sequenceIndex: 0, numKeyframes: 1, firstKeyframe: 2 });
        expect(shape.keyframes[1]).toMatchObject({ position: 0.5, key: 1 });
        expect(shape.names).toEqual(['root', 'Turret', 'hull', 'Fire']);
        expect(shape.objects[0]).toMatchObject({ name: 2, flags: 1, meshIndex: 0, nodeIndex: 1, numSubSequences: 1, firstSubSequence: 1 });
        expect(Array.from(shape.objects[0].offset)).toEqual([0, 0, 1]);
        expect(shape.details).toEqual([{ rootNode: 0, size: 0 }]);
        expect(shape.transitions[0]).toMatchObject({ startPosition: 0.25, endPosition: 0.75, duration: 0.5 });
        expect(shape.frameTriggers).toEqual([{ position: 0.5, value: 7 }]);
        expect(shape.defaultMaterials).toBe(2);
        expect(shape.alwaysNode).toBe(1);
        expect(shape.meshes.length).toBe(1);
        expect(shape.meshes[0]?.numVerts).toBe(4);
        expect(shape.materials?.materials[0].fileName).toBe('hull.bmp');

        const rotation = shape.transforms[1].rotation;
        expect(rotation[2]).toBeCloseTo(0.6, 4);
        expect(rotation[3]).toBeCloseTo(0.8, 4);
        expect(Array.from(shape.transforms[1].translation)).toEqual([1, 2, 3]);
    });

    it("reads a version 7 shape", () => {
        const shape = decodeShape(sampleShape(), 7);
        expect(Array.from(shape.minBounds)).toEqual([-2, -1, -2]);
        expect(shape.nodes[1].defaultTransform).toBe(1);
        expect(shape.subSequences[0]).toEqual({ sequenceIndex: 0, numKeyframes: 2, firstKeyframe: 0 });
        expect(shape.transforms[1].rotation[2]).toBeCloseTo(0.6, 4);
        expect(Array.from(shape.transforms[1].translation)).toEqual([1, 2, 3]);
        expect(Array.from(shape.objects[0].offset)).toEqual([0, 0, 1]);
        expect(shape.frameTriggers.length).toBe(1);
        expect(shape.alwaysNode).toBe(1);
        expect(shape.materials?.materials.length).toBe(1);
    });

    it("reads full-precision rotations before version 7", () => {
        const fixture = sampleShape();
        fixture.transforms = [IDENTITY_TRANSFORM, { rotation: [0, 0.5, 0.5, 0.5], translation: [4, 5, 6] }];
        const shape = decodeShape(fixture, 6);
        expect(Array.from(shape.transforms[1].rotation)).toEqual([0, 0.5, 0.5, 0.5]);
        expect(Array.from(shape.transforms[1].translation)).toEqual([4, 5, 6]);
        expect(shape.transitions.length).toBe(1);
        expect(shape.alwaysNode).toBe(1);
    });

    it("defaults the fields old versions lack", () => {
        const shape = decodeShape(sampleShape(), 4);
        expect(shape.defaultMaterials).toBe(0);
        expect(shape.alwaysNode).toBe(-1);
        expect(shape.frameTriggers.length).toBe(1);
        expect(shape.sequences[0]).toMatchObject({ numIFLSubSequences: 0, firstIFLSubSequence: 0 });
    });

    it("reads a version 2 shape with packed keyframes", () => {
        const fixture = sampleShape();
        fixture.keyframes = [
            { position: 0, key: 0x40000000 },
            { position: 0.5, key: 0x40000001 },
            { position: 0, key: 0x80000000 },
        ];
        const shape = decodeShape(fixture, 2);
        expect(shape.frameTriggers.length).toBe(0);
        expect(shape.transitions.length).toBe(1);
        expect(shape.keyframes[1]).toMatchObject({ position: 0.5, key: 1, frameMatters: true, visMatters: false });
        expect(shape.keyframes[2]).toMatchObject({ key: 0, visMatters: true, visible: true });
        expect(shape.objects[0].meshIndex).toBe(0);
    });

    it("reads a version 1 shape without transitions", () => {
        const fixture = sampleShape();
        fixture.keyframes = [{ position: 0, key: 0x40000000 }, { position: 0.5, key: 0x40000001 }, { position: 0, key: 0x40000000 }];
        fixture.transitions = [];
        const shape = decodeShape(fixture, 1);
        expect(shape.transitions.length).toBe(0);
        expect(shape.names.length).toBe(4);
    });

    it("groups children by parent", () => {
        const shape = decodeShape({
            nodes: [
                { name: 0, parent: -1, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
                { name: 0, parent: 0, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
                { name: 0, parent: 0, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
                { name: 0, parent: 1, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
                { name: 0, parent: -1, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
            ],
        });

        expect(shape.nodeChildIds).toEqual([0, 4, 1, 2, 3]);
        expect(shape.nodeChildren[0]).toEqual({ firstChild: 0, numChildren: 2 });
        expect(shape.nodeChildren[1]).toEqual({ firstChild: 2, numChildren: 2 });
        expect(shape.nodeChildren[2]).toEqual({ firstChild: 4, numChildren: 1 });
        expect(shape.nodeChildren[3]).toEqual({ firstChild: -1, numChildren: 0 });

        expect(shape.getNodeChildren(-1)).toEqual([0, 4]);
        expect(shape.getNodeChildren(0)).toEqual([1, 2]);
        expect(shape.getNodeChildren(1)).toEqual([3]);
        expect(shape.getNodeChildren(2)).toEqual([]);
        expect(shape.getNodeChildren(10)).toEqual([]);

        // Every node appears exactly once across all runs.
        const seen = shape.nodeChildren.flatMap((range) => range.numChildren > 0 ? shape.nodeChildIds.slice(range.firstChild, range.firstChild + range.numChildren) : []);
        expect(seen.sort()).toEqual([0, 1, 2, 3, 4]);
    });

    it("rejects a node that is its own parent", () => {
        const fixture = sampleShape();
        fixture.nodes[1].parent = 1;
        expect(() => decodeDirect(fixture)).toThrow(PersistDecodeError);
    });

    it("rejects a parent out of range", () => {
        const fixture = sampleShape();
        fixture.nodes[1].parent = 2;
        expect(() => decodeDirect(fixture)).toThrow('bad parent 2');
    });

    it("rejects a parent cycle", () => {
        const fixture = sampleShape();
        fixture.nodes.push(
            { name: 0, parent: 3, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
            { name: 0, parent: 2, numSubSequences: 0, firstSubSequence: 0, defaultTransform: 0 },
        );
        expect(() => decodeDirect(fixture)).toThrow('cycle');
    });

    it("rejects subsequence and keyframe ranges past the end", () => {
        const badNode = sampleShape();
        badNode.nodes[0].numSubSequences = 3;
        expect(() => decodeDirect(badNode)).toThrow(PersistDecodeError);

        const badSubSeq = sampleShape();
        badSubSeq.subSequences = [
            { sequenceIndex: 0, numKeyframes: 2, firstKeyframe: 2 },
            { sequenceIndex: 0, numKeyframes: 1, firstKeyframe: 2 },
        ];
        expect(() => decodeDirect(badSubSeq)).toThrow('Subsequence 0 keyframe');
    });

    it("rejects a detail rooted outside the nodes", () => {
        const fixture = sampleShape();
        fixture.details = [{ rootNode: 2, size: 0 }];
        expect(() => decodeDirect(fixture)).toThrow('bad root node 2');
    });

    it("returns null through the registry when the shape is bad", () => {
        const fixture = sampleShape();
        fixture.nodes[1].parent = 1;
        const stream = new Stream(encodeShape(fixture));
        expect(createDefaultRegistry().createFromStreamAs(stream, Shape)).toBeNull();
        expect(stream.isAtEnd()).toBe(true);
    });

    it("keeps going when a mesh fails to decode", () => {
        const fixture = sampleShape();
        const mesh = makeQuadMesh(1);
        mesh.vertsPerFrame = -1;
        fixture.meshes = [mesh];
        const shape = decodeShape(fixture);
        expect(shape.meshes).toEqual([null]);
        expect(shape.materials?.materials.length).toBe(1);
    });

    it("looks names up without regard to case", () => {
        const shape = decodeShape(sampleShape());
        expect(shape.findName('TURRET')).toBe(1);
        expect(shape.findName('missing')).toBe(-1);
        expect(shape.getName(2)).toBe('hull');
        expect(shape.getName(-1)).toBeNull();
        expect(shape.findSequence('fire')).toBe(0);
        expect(shape.findSequence('root')).toBe(-1);
    });

    it("gives the identity for a missing transform", () => {
        const shape = decodeShape(sampleShape());
        const t = shape.getTransform(99);
        expect(Array.from(t.rotation)).toEqual([0, 0, 0, 1]);
        expect(Array.from(t.translation)).toEqual([0, 0, 0]);
    });
});
