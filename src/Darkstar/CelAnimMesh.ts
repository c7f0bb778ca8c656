import { vec2, vec3 } from "gl-matrix";
import { PersistDecodeError, PersistObject, PersistRegistry } from "./Persist.js";
import { Stream, readVec2Array } from "./Stream.js";

// x, y, z quantized to a byte each, then an index into the encoded normal table.
export const PACKED_VERTEX_SIZE = 0x04;
const FACE_SIZE = 0x1C;
const FRAME_SIZE = 0x1C;

export interface MeshFace {
    // Vertex slot and texture-vertex slot for each corner.
    vi: [number, number, number];
    ti: [number, number, number];
    material: number;
}

export interface MeshFrame {
    // Offset of this frame's vertices into the packed vertex array. Frames that share an
    // offset share geometry.
    firstVert: number;
    scale: vec3;
    origin: vec3;
}

// A run of triangles that share one material.
export interface MeshPrim {
    startVerts: number;
    startInds: number;
    numVerts: number;
    numInds: number;
    material: number;
}

export interface UnpackedMeshStructure {
    // For every output vertex, the vertex slot and texture-vertex slot it came from.
    vertMap: number[];
    texVertMap: number[];
    indices: number[];
    prims: MeshPrim[];
}

export const MAX_MESH_VERTICES = 0xFFFF;

export class CelAnimMesh implements PersistObject {
    public readonly className = 'TS::CelAnimMesh';

    public vertsPerFrame = 0;
    public textureVertsPerFrame = 0;
    public radius = 0;

    public packedVerts = new Uint8Array(0);
    public texVerts: vec2[] = [];
    public faces: MeshFace[] = [];
    public frames: MeshFrame[] = [];

    public get numVerts(): number {
        return this.packedVerts.byteLength / PACKED_VERTEX_SIZE;
    }

    public decode(stream: Stream, version: number, registry: PersistRegistry): void {
        const numVerts = stream.readInt32();
        this.vertsPerFrame = stream.readInt32();
        const numTexVerts = stream.readInt32();
        const numFaces = stream.readInt32();
        const numFrames = stream.readInt32();

        if (version >= 2)
            this.textureVertsPerFrame = stream.readInt32();
        else
            this.textureVertsPerFrame = numTexVerts;

        // Before v3 every frame shares a single scale and origin.
        let sharedScale: vec3 | null = null, sharedOrigin: vec3 | null = null;
        if (version < 3) {
            sharedScale = stream.readVec3();
            sharedOrigin = stream.readVec3();
        }

        this.radius = stream.readFloat32();

        stream.checkCount(numVerts, PACKED_VERTEX_SIZE);
        this.packedVerts = stream.readUint8Array(numVerts * PACKED_VERTEX_SIZE).slice();

        this.texVerts = readVec2Array(stream, numTexVerts);

        stream.checkCount(numFaces, FACE_SIZE);
        this.faces = [];
        for (let i = 0; i < numFaces; i++) {
            const vi0 = stream.readInt32(), ti0 = stream.readInt32();
            const vi1 = stream.readInt32(), ti1 = stream.readInt32();
            const vi2 = stream.readInt32(), ti2 = stream.readInt32();
            const material = stream.readInt32();
            if (vi0 < 0 || vi1 < 0 || vi2 < 0 || ti0 < 0 || ti1 < 0 || ti2 < 0)
                throw new PersistDecodeError(`Face ${i} has a negative vertex index`);
            this.faces.push({ vi: [vi0, vi1, vi2], ti: [ti0, ti1, ti2], material });
        }

        this.frames = [];
        if (sharedScale !== null && sharedOrigin !== null) {
            if (numFrames === 0) {
                this.frames.push({ firstVert: 0, scale: sharedScale, origin: sharedOrigin });
            } else {
                stream.checkCount(numFrames, 0x04);
                for (let i = 0; i < numFrames; i++) {
                    const firstVert = stream.readInt32();
                    this.frames.push({ firstVert, scale: vec3.clone(sharedScale), origin: vec3.clone(sharedOrigin) });
                }
            }
        } else {
            stream.checkCount(numFrames, FRAME_SIZE);
            for (let i = 0; i < numFrames; i++) {
                const firstVert = stream.readInt32();
                const scale = stream.readVec3();
                const origin = stream.readVec3();
                this.frames.push({ firstVert, scale, origin });
            }
        }

        if (this.vertsPerFrame < 0 || this.textureVertsPerFrame < 0)
            throw new PersistDecodeError(`Bad per-frame vertex counts ${this.vertsPerFrame}/${this.textureVertsPerFrame}`);
    }

    /**
     * Work out the vertices the renderer needs. Every distinct (vertex slot, texture slot) pair
     * within a run of same-material faces becomes one output vertex; a new prim starts whenever
     * the material changes. Indices address the mesh-wide output vertex list.
     */
    public unpackVertStructure(): UnpackedMeshStructure {
        const vertMap: number[] = [];
        const texVertMap: number[] = [];
        const indices: number[] = [];
        const prims: MeshPrim[] = [];

        const pairToVert = new Map<string, number>();
        let currentPrim: MeshPrim | null = null;

        for (let i = 0; i < this.faces.length; i++) {
            const face = this.faces[i];

            if (currentPrim !== null && currentPrim.material !== face.material) {
                prims.push(currentPrim);
                currentPrim = null;
            }

            if (currentPrim === null) {
                currentPrim = { startVerts: 0, startInds: indices.length, numVerts: 0, numInds: 0, material: face.material };
                pairToVert.clear();
            }

            for (let j = 0; j < 3; j++) {
                const key = `${face.vi[j]}:${face.ti[j]}`;
                let idx = pairToVert.get(key);
                if (idx === undefined) {
                    idx = vertMap.length;
                    if (idx >= MAX_MESH_VERTICES)
                        throw new PersistDecodeError(`Mesh needs more than ${MAX_MESH_VERTICES} vertices`);
                    pairToVert.set(key, idx);
                    vertMap.push(face.vi[j]);
                    texVertMap.push(face.ti[j]);
                    currentPrim.numVerts++;
                }
                indices.push(idx);
            }

            currentPrim.numInds += 3;
        }

        if (currentPrim !== null)
            prims.push(currentPrim);

        return { vertMap, texVertMap, indices, prims };
    }
}
