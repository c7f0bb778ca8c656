import { ReadonlyVec3, vec3 } from "gl-matrix";
import { CelAnimMesh, MeshPrim, PACKED_VERTEX_SIZE } from "./CelAnimMesh.js";
import { assert } from "../util.js";
import { PersistDecodeError } from "./Persist.js";
import { Shape } from "./Shape.js";

export const ENCODED_NORMAL_COUNT = 0x100;

/**
 * A unit vector for every byte value a packed vertex can use as its normal. The engine ships its
 * own table inside the executable; this one spreads the directions evenly over the sphere. Pass
 * the real table through {@link ShapeBuildOptions} if you have it.
 */
export function createEncodedNormalTable(): vec3[] {
    const goldenAngle = Math.PI * (3 - Math.sqrt(5));
    const table: vec3[] = [];
    for (let i = 0; i < ENCODED_NORMAL_COUNT; i++) {
        const y = 1 - ((i + 0.5) * 2) / ENCODED_NORMAL_COUNT;
        const r = Math.sqrt(1 - y * y);
        const phi = i * goldenAngle;
        table.push(vec3.fromValues(Math.cos(phi) * r, y, Math.sin(phi) * r));
    }
    return table;
}

export interface ShapeBuildOptions {
    normalTable?: ReadonlyArray<ReadonlyVec3>;
}

export interface MeshGeometry {
    // Index ranges are absolute into ShapeGeometry.indexData; the indices themselves are relative
    // to whichever frame's vertex block is bound.
    prims: MeshPrim[];
    // First vertex of each mesh frame in ShapeGeometry.vertexData.
    frameOffsets: number[];
    // First texture coordinate of texture frame 0 in ShapeGeometry.texCoordData.
    texVertexBase: number;
    vertsPerFrame: number;
    texVertsPerFrame: number;
    numTexFrames: number;
}

// Position and normal.
export const VERTEX_STRIDE = 6;
export const TEXCOORD_STRIDE = 2;

export interface ShapeGeometry {
    vertexData: Float32Array;
    texCoordData: Float32Array;
    indexData: Uint16Array;
    // Parallel to Shape.meshes; null for a mesh that failed to load or has nothing to draw.
    meshes: (MeshGeometry | null)[];
}

class GeometryBuilder {
    public vertexData: number[] = [];
    public texCoordData: number[] = [];
    public indexData: number[] = [];

    constructor(private normalTable: ReadonlyArray<ReadonlyVec3>) {
    }

    public get vertexCount(): number {
        return this.vertexData.length / VERTEX_STRIDE;
    }

    public get texVertexCount(): number {
        return this.texCoordData.length / TEXCOORD_STRIDE;
    }

    // Drop everything added since the given counts, after a mesh fails part way through.
    public truncate(numVertexFloats: number, numTexCoordFloats: number, numIndices: number): void {
        this.vertexData.length = numVertexFloats;
        this.texCoordData.length = numTexCoordFloats;
        this.indexData.length = numIndices;
    }

    public addMesh(mesh: CelAnimMesh, meshIndex: number): MeshGeometry | null {
        if (mesh.faces.length === 0 || mesh.frames.length === 0)
            return null;

        const { vertMap, texVertMap, indices, prims } = mesh.unpackVertStructure();

        const baseIndexOffset = this.indexData.length;
        for (let i = 0; i < prims.length; i++) {
            prims[i].startInds += baseIndexOffset;
            prims[i].numVerts = vertMap.length;
        }

        const numPackedVerts = mesh.numVerts;
        const frameOffsets: number[] = [];
        let prevFirstVert = -1;
        for (let i = 0; i < mesh.frames.length; i++) {
            const frame = mesh.frames[i];
            if (frame.firstVert < 0 || frame.firstVert < prevFirstVert)
                throw new PersistDecodeError(`Mesh ${meshIndex} frame ${i} has bad first vertex ${frame.firstVert}`);

            // Delta frames: an unchanged first vertex means unchanged geometry.
            if (frame.firstVert === prevFirstVert) {
                frameOffsets.push(frameOffsets[i - 1]);
                continue;
            }

            frameOffsets.push(this.vertexCount);
            prevFirstVert = frame.firstVert;

            for (let j = 0; j < vertMap.length; j++) {
                const packedIndex = vertMap[j] + frame.firstVert;
                if (packedIndex < 0 || packedIndex >= numPackedVerts)
                    throw new PersistDecodeError(`Mesh ${meshIndex} frame ${i} reads vertex ${packedIndex} of ${numPackedVerts}`);

                const offs = packedIndex * PACKED_VERTEX_SIZE;
                const normal = this.normalTable[mesh.packedVerts[offs + 0x03]];
                this.vertexData.push(
                    mesh.packedVerts[offs + 0x00] * frame.scale[0] + frame.origin[0],
                    mesh.packedVerts[offs + 0x01] * frame.scale[1] + frame.origin[1],
                    mesh.packedVerts[offs + 0x02] * frame.scale[2] + frame.origin[2],
                    normal[0], normal[1], normal[2],
                );
            }
        }

        const texVertexBase = this.texVertexCount;
        const numTexFrames = mesh.textureVertsPerFrame > 0 ? Math.floor(mesh.texVerts.length / mesh.textureVertsPerFrame) : 1;
        for (let i = 0; i < numTexFrames; i++) {
            const offs = i * mesh.textureVertsPerFrame;
            for (let j = 0; j < texVertMap.length; j++) {
                // Untextured meshes still name texture vertex 0.
                const texVert = mesh.texVerts[texVertMap[j] + offs];
                if (texVert !== undefined)
                    this.texCoordData.push(texVert[0], texVert[1]);
                else
                    this.texCoordData.push(0, 0);
            }
        }

        for (let i = 0; i < indices.length; i++)
            this.indexData.push(indices[i]);

        return {
            prims, frameOffsets, texVertexBase, numTexFrames,
            vertsPerFrame: vertMap.length,
            texVertsPerFrame: texVertMap.length,
        };
    }
}

/**
 * Unpack every mesh of {@param shape} into one set of vertex, texture coordinate and index
 * buffers, ready to be uploaded once. A mesh whose frames or faces point outside its own data
 * is left out with a warning.
 */
export function buildShapeGeometry(shape: Shape, options: ShapeBuildOptions = {}): ShapeGeometry {
    const normalTable = options.normalTable ?? createEncodedNormalTable();
    assert(normalTable.length >= ENCODED_NORMAL_COUNT, `Encoded normal table has ${normalTable.length} entries`);

    const builder = new GeometryBuilder(normalTable);
    const meshes: (MeshGeometry | null)[] = [];
    for (let i = 0; i < shape.meshes.length; i++) {
        const mesh = shape.meshes[i];
        if (mesh === null) {
            meshes.push(null);
            continue;
        }

        const numVertexFloats = builder.vertexData.length, numTexCoordFloats = builder.texCoordData.length, numIndices = builder.indexData.length;
        try {
            meshes.push(builder.addMesh(mesh, i));
        } catch (e) {
            if (!(e instanceof PersistDecodeError))
                throw e;
            console.warn(`Skipping mesh ${i}: ${e.message}`);
            builder.truncate(numVertexFloats, numTexCoordFloats, numIndices);
            meshes.push(null);
        }
    }

    return {
        vertexData: new Float32Array(builder.vertexData),
        texCoordData: new Float32Array(builder.texCoordData),
        indexData: new Uint16Array(builder.indexData),
        meshes,
    };
}
