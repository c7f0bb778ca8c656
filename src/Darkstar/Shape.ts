import { quat, vec3 } from "gl-matrix";
import { CelAnimMesh } from "./CelAnimMesh.js";
import { MaterialList } from "./MaterialList.js";
import { PersistDecodeError, PersistObject, PersistRegistry } from "./Persist.js";
import { Stream } from "./Stream.js";

export interface ShapeTransform {
    rotation: quat;
    translation: vec3;
}

/**
 * A keyframe in the layout-independent form every shape version decodes to. {@link key} is a
 * transform index for node tracks and a mesh frame for object tracks; {@link matIndex} is the
 * texture frame an object track switches to.
 */
export interface ShapeKeyframe {
    position: number;
    key: number;
    matIndex: number;
    frameMatters: boolean;
    matMatters: boolean;
    visMatters: boolean;
    visible: boolean;
}

export interface ShapeSequence {
    name: number;
    cyclic: boolean;
    // Seconds.
    duration: number;
    priority: number;
    firstTriggerFrame: number;
    numTriggerFrames: number;
    numIFLSubSequences: number;
    firstIFLSubSequence: number;
}

export interface ShapeSubSequence {
    sequenceIndex: number;
    numKeyframes: number;
    firstKeyframe: number;
}

export interface ShapeTransition {
    startSequence: number;
    endSequence: number;
    startPosition: number;
    endPosition: number;
    duration: number;
    transform: ShapeTransform;
}

export interface ShapeNode {
    name: number;
    // -1 for a root.
    parent: number;
    numSubSequences: number;
    firstSubSequence: number;
    defaultTransform: number;
}

export const enum ShapeObjectFlags {
    InvisibleDefault = 0x01,
}

export interface ShapeObject {
    name: number;
    flags: ShapeObjectFlags;
    // -1 when the object has no mesh.
    meshIndex: number;
    nodeIndex: number;
    // Relative to the node.
    offset: vec3;
    numSubSequences: number;
    firstSubSequence: number;
}

export interface ShapeDetail {
    rootNode: number;
    // Smallest apparent size, in pixels, this level is used at.
    size: number;
}

export interface ShapeFrameTrigger {
    position: number;
    value: number;
}

export interface NodeChildRange {
    // Offset into Shape.nodeChildIds, or -1 for a node without children.
    firstChild: number;
    numChildren: number;
}

const enum KeyframeBitsV2 {
    KeyMask         = 0x3FFFFFFF,
    Valid           = 0x40000000,
    Visible         = 0x80000000,
}

// Keys index the transform or mesh frame tables, which never outgrow 16 bits.
const KEYFRAME_KEY_MASK = 0xFFFF;

const enum KeyframeBitsV3 {
    MatMask         = 0x00000FFF,
    FrameMatters    = 0x10000000,
    MatMatters      = 0x20000000,
    VisMatters      = 0x40000000,
    Visible         = 0x80000000,
}

const enum KeyframeBitsV8 {
    MatMask         = 0x0FFF,
    FrameMatters    = 0x1000,
    MatMatters      = 0x2000,
    VisMatters      = 0x4000,
    Visible         = 0x8000,
}

// Before v3, every keyframe sets the frame, and a keyframe that isn't marked valid carries
// visibility instead.
export function unpackKeyframeV2(position: number, packed: number): ShapeKeyframe {
    return {
        position,
        key: (packed & KeyframeBitsV2.KeyMask) & KEYFRAME_KEY_MASK,
        matIndex: 0,
        frameMatters: true,
        matMatters: false,
        visMatters: (packed & KeyframeBitsV2.Valid) === 0,
        visible: (packed & KeyframeBitsV2.Visible) !== 0,
    };
}

export function unpackKeyframeV3(position: number, key: number, mat: number): ShapeKeyframe {
    return {
        position,
        key: key & KEYFRAME_KEY_MASK,
        matIndex: mat & KeyframeBitsV3.MatMask,
        frameMatters: (mat & KeyframeBitsV3.FrameMatters) !== 0,
        matMatters: (mat & KeyframeBitsV3.MatMatters) !== 0,
        visMatters: (mat & KeyframeBitsV3.VisMatters) !== 0,
        visible: (mat & KeyframeBitsV3.Visible) !== 0,
    };
}

export function unpackKeyframeV8(position: number, key: number, mat: number): ShapeKeyframe {
    return {
        position,
        key,
        matIndex: mat & KeyframeBitsV8.MatMask,
        frameMatters: (mat & KeyframeBitsV8.FrameMatters) !== 0,
        matMatters: (mat & KeyframeBitsV8.MatMatters) !== 0,
        visMatters: (mat & KeyframeBitsV8.VisMatters) !== 0,
        visible: (mat & KeyframeBitsV8.Visible) !== 0,
    };
}

const QUAT16_MAX = 0x7FFF;
const NAME_LENGTH = 0x18;

function readQuat16(stream: Stream): quat {
    const x = stream.readInt16() / QUAT16_MAX;
    const y = stream.readInt16() / QUAT16_MAX;
    const z = stream.readInt16() / QUAT16_MAX;
    const w = stream.readInt16() / QUAT16_MAX;
    return quat.fromValues(x, y, z, w);
}

// Full-precision quaternion, translation, and a scale nothing uses.
function readTransformV6(stream: Stream): ShapeTransform {
    const rotation = quat.fromValues(stream.readFloat32(), stream.readFloat32(), stream.readFloat32(), stream.readFloat32());
    const translation = stream.readVec3();
    stream.skip(0x0C);
    return { rotation, translation };
}

function readTransformV7(stream: Stream): ShapeTransform {
    const rotation = readQuat16(stream);
    const translation = stream.readVec3();
    stream.skip(0x0C);
    return { rotation, translation };
}

function readTransformV8(stream: Stream): ShapeTransform {
    const rotation = readQuat16(stream);
    const translation = stream.readVec3();
    return { rotation, translation };
}

function getTransformReader(version: number): [(stream: Stream) => ShapeTransform, number] {
    if (version < 7)
        return [readTransformV6, 0x28];
    else if (version === 7)
        return [readTransformV7, 0x20];
    else
        return [readTransformV8, 0x14];
}

function checkRange(what: string, first: number, count: number, limit: number): void {
    if (count === 0)
        return;
    if (count < 0 || first < 0 || first + count > limit)
        throw new PersistDecodeError(`${what} range ${first}+${count} is outside 0..${limit}`);
}

const identityTransform: ShapeTransform = { rotation: quat.create(), translation: vec3.create() };

export class Shape implements PersistObject {
    public readonly className = 'TS::Shape';

    public radius = 0;
    public center = vec3.create();
    public minBounds = vec3.create();
    public maxBounds = vec3.create();

    public nodes: ShapeNode[] = [];
    public sequences: ShapeSequence[] = [];
    public subSequences: ShapeSubSequence[] = [];
    public keyframes: ShapeKeyframe[] = [];
    public transforms: ShapeTransform[] = [];
    public names: string[] = [];
    public objects: ShapeObject[] = [];
    public details: ShapeDetail[] = [];
    public transitions: ShapeTransition[] = [];
    public frameTriggers: ShapeFrameTrigger[] = [];
    public meshes: (CelAnimMesh | null)[] = [];
    public materials: MaterialList | null = null;

    public defaultMaterials = 0;
    // Node whose subtree is animated and drawn at every detail level; -1 for none.
    public alwaysNode = -1;

    // Indexed by parent + 1, so that slot 0 holds the roots.
    public nodeChildren: NodeChildRange[] = [];
    public nodeChildIds: number[] = [];

    public decode(stream: Stream, version: number, registry: PersistRegistry): void {
        const numNodes = stream.readUint32();
        const numSequences = stream.readUint32();
        const numSubSequences = stream.readUint32();
        const numKeyframes = stream.readUint32();
        const numTransforms = stream.readUint32();
        const numNames = stream.readUint32();
        const numObjects = stream.readUint32();
        const numDetails = stream.readUint32();
        const numMeshes = stream.readUint32();
        const numTransitions = version >= 2 ? stream.readUint32() : 0;
        const numFrameTriggers = version >= 4 ? stream.readUint32() : 0;

        this.radius = stream.readFloat32();
        this.center = stream.readVec3();

        if (version > 7) {
            this.minBounds = stream.readVec3();
            this.maxBounds = stream.readVec3();
        } else {
            this.minBounds = vec3.fromValues(this.center[0] - this.radius, this.center[1] - this.radius, this.center[2] - this.radius);
            this.maxBounds = vec3.fromValues(this.center[0] + this.radius, this.center[1] + this.radius, this.center[2] + this.radius);
        }

        this.nodes = [];
        if (version <= 7) {
            stream.checkCount(numNodes, 0x14);
            for (let i = 0; i < numNodes; i++) {
                const name = stream.readInt32();
                const parent = stream.readInt32();
                const numSubSequences = stream.readInt32();
                const firstSubSequence = stream.readInt32();
                const defaultTransform = stream.readInt32();
                this.nodes.push({ name, parent, numSubSequences, firstSubSequence, defaultTransform });
            }
        } else {
            stream.checkCount(numNodes, 0x0A);
            for (let i = 0; i < numNodes; i++) {
                const name = stream.readInt16();
                const parent = stream.readInt16();
                const numSubSequences = stream.readInt16();
                const firstSubSequence = stream.readInt16();
                const defaultTransform = stream.readInt16();
                this.nodes.push({ name, parent, numSubSequences, firstSubSequence, defaultTransform });
            }
        }

        this.sequences = [];
        const sequenceSize = version >= 5 ? 0x20 : version === 4 ? 0x18 : 0x10;
        stream.checkCount(numSequences, sequenceSize);
        for (let i = 0; i < numSequences; i++) {
            const name = stream.readInt32();
            const cyclic = stream.readInt32() !== 0;
            const duration = stream.readFloat32();
            const priority = stream.readInt32();
            let firstTriggerFrame = 0, numTriggerFrames = 0, numIFLSubSequences = 0, firstIFLSubSequence = 0;
            if (version >= 4) {
                firstTriggerFrame = stream.readInt32();
                numTriggerFrames = stream.readInt32();
            }
            if (version >= 5) {
                numIFLSubSequences = stream.readInt32();
                firstIFLSubSequence = stream.readInt32();
            }
            this.sequences.push({ name, cyclic, duration, priority, firstTriggerFrame, numTriggerFrames, numIFLSubSequences, firstIFLSubSequence });
        }

        this.subSequences = [];
        stream.checkCount(numSubSequences, version <= 7 ? 0x0C : 0x06);
        for (let i = 0; i < numSubSequences; i++) {
            const sequenceIndex = version <= 7 ? stream.readInt32() : stream.readInt16();
            const numKeyframes = version <= 7 ? stream.readInt32() : stream.readInt16();
            const firstKeyframe = version <= 7 ? stream.readInt32() : stream.readInt16();
            this.subSequences.push({ sequenceIndex, numKeyframes, firstKeyframe });
        }

        this.keyframes = [];
        if (version < 3) {
            stream.checkCount(numKeyframes, 0x08);
            for (let i = 0; i < numKeyframes; i++) {
                const position = stream.readFloat32();
                this.keyframes.push(unpackKeyframeV2(position, stream.readUint32()));
            }
        } else if (version <= 7) {
            stream.checkCount(numKeyframes, 0x0C);
            for (let i = 0; i < numKeyframes; i++) {
                const position = stream.readFloat32();
                const key = stream.readUint32();
                this.keyframes.push(unpackKeyframeV3(position, key, stream.readUint32()));
            }
        } else {
            stream.checkCount(numKeyframes, 0x08);
            for (let i = 0; i < numKeyframes; i++) {
                const position = stream.readFloat32();
                const key = stream.readUint16();
                this.keyframes.push(unpackKeyframeV8(position, key, stream.readUint16()));
            }
        }

        const [readTransform, transformSize] = getTransformReader(version);
        this.transforms = [];
        stream.checkCount(numTransforms, transformSize);
        for (let i = 0; i < numTransforms; i++)
            this.transforms.push(readTransform(stream));

        this.names = [];
        stream.checkCount(numNames, NAME_LENGTH);
        for (let i = 0; i < numNames; i++)
            this.names.push(stream.readFixedString(NAME_LENGTH));

        this.objects = [];
        if (version <= 7) {
            stream.checkCount(numObjects, 0x48);
            for (let i = 0; i < numObjects; i++) {
                const name = stream.readInt16();
                const flags = stream.readUint16();
                const meshIndex = stream.readInt32();
                const nodeIndex = stream.readInt32();
                // Old objects carry their own flags word and a rotation matrix that is never used.
                stream.skip(0x28);
                const offset = stream.readVec3();
                const numSubSequences = stream.readInt32();
                const firstSubSequence = stream.readInt32();
                this.objects.push({ name, flags, meshIndex, nodeIndex, offset, numSubSequences, firstSubSequence });
            }
        } else {
            stream.checkCount(numObjects, 0x1C);
            for (let i = 0; i < numObjects; i++) {
                const name = stream.readInt16();
                const flags = stream.readUint16();
                const meshIndex = stream.readInt32();
                const nodeIndex = stream.readInt16();
                stream.skip(0x02);
                const offset = stream.readVec3();
                const numSubSequences = stream.readInt16();
                const firstSubSequence = stream.readInt16();
                this.objects.push({ name, flags, meshIndex, nodeIndex, offset, numSubSequences, firstSubSequence });
            }
        }

        this.details = [];
        stream.checkCount(numDetails, 0x08);
        for (let i = 0; i < numDetails; i++) {
            const rootNode = stream.readInt32();
            const size = stream.readFloat32();
            this.details.push({ rootNode, size });
        }

        this.transitions = [];
        stream.checkCount(numTransitions, 0x14 + transformSize);
        for (let i = 0; i < numTransitions; i++) {
            const startSequence = stream.readInt32();
            const endSequence = stream.readInt32();
            const startPosition = stream.readFloat32();
            const endPosition = stream.readFloat32();
            const duration = stream.readFloat32();
            const transform = readTransform(stream);
            this.transitions.push({ startSequence, endSequence, startPosition, endPosition, duration, transform });
        }

        this.frameTriggers = [];
        stream.checkCount(numFrameTriggers, 0x08);
        for (let i = 0; i < numFrameTriggers; i++) {
            const position = stream.readFloat32();
            const value = stream.readInt32();
            this.frameTriggers.push({ position, value });
        }

        this.defaultMaterials = version >= 5 ? stream.readInt32() : 0;
        this.alwaysNode = version >= 6 ? stream.readInt32() : -1;

        // Every embedded asset is at least a chunk header.
        stream.checkCount(numMeshes, 0x08);
        this.meshes = [];
        for (let i = 0; i < numMeshes; i++)
            this.meshes.push(registry.createFromStreamAs(stream, CelAnimMesh));

        const hasMaterials = stream.readUint32();
        this.materials = hasMaterials !== 0 ? registry.createFromStreamAs(stream, MaterialList) : null;

        this.validate();
        this.setupNodeList();
    }

    private validate(): void {
        const numNodes = this.nodes.length;
        for (let i = 0; i < numNodes; i++) {
            const node = this.nodes[i];
            if (node.parent < -1 || node.parent >= numNodes || node.parent === i)
                throw new PersistDecodeError(`Node ${i} has bad parent ${node.parent}`);
            checkRange(`Node ${i} subsequence`, node.firstSubSequence, node.numSubSequences, this.subSequences.length);
        }

        for (let i = 0; i < this.objects.length; i++) {
            const obj = this.objects[i];
            checkRange(`Object ${i} subsequence`, obj.firstSubSequence, obj.numSubSequences, this.subSequences.length);
        }

        for (let i = 0; i < this.subSequences.length; i++) {
            const subSeq = this.subSequences[i];
            checkRange(`Subsequence ${i} keyframe`, subSeq.firstKeyframe, subSeq.numKeyframes, this.keyframes.length);
        }

        for (let i = 0; i < this.details.length; i++) {
            const detail = this.details[i];
            if (detail.rootNode < -1 || detail.rootNode >= numNodes)
                throw new PersistDecodeError(`Detail ${i} has bad root node ${detail.rootNode}`);
        }
    }

    /**
     * Group node indices by parent so that the children of any node are one contiguous run of
     * {@link nodeChildIds}. Throws if the parent links don't form a forest.
     */
    private setupNodeList(): void {
        const numNodes = this.nodes.length;

        const sorted: number[] = [];
        for (let i = 0; i < numNodes; i++)
            sorted.push(i);
        sorted.sort((a, b) => {
            const parentA = this.nodes[a].parent, parentB = this.nodes[b].parent;
            return parentA !== parentB ? parentA - parentB : a - b;
        });

        this.nodeChildren = [];
        for (let i = 0; i < numNodes + 1; i++)
            this.nodeChildren.push({ firstChild: -1, numChildren: 0 });
        this.nodeChildIds = sorted;

        for (let i = 0; i < numNodes; i++) {
            const range = this.nodeChildren[this.nodes[sorted[i]].parent + 1];
            if (range.firstChild < 0)
                range.firstChild = i;
            range.numChildren++;
        }

        // With every parent in range, a node unreachable from the roots must sit on a cycle.
        let numReached = 0;
        const stack = [-1];
        while (stack.length > 0) {
            const nodeIndex = stack.pop();
            if (nodeIndex === undefined)
                break;
            const range = this.nodeChildren[nodeIndex + 1];
            for (let i = 0; i < range.numChildren; i++) {
                stack.push(this.nodeChildIds[range.firstChild + i]);
                numReached++;
            }
        }

        if (numReached !== numNodes)
            throw new PersistDecodeError(`Node hierarchy has a cycle (${numNodes - numReached} nodes unreachable)`);
    }

    public findName(name: string): number {
        const lower = name.toLowerCase();
        return this.names.findIndex((n) => n.toLowerCase() === lower);
    }

    public getName(index: number): string | null {
        return index >= 0 && index < this.names.length ? this.names[index] : null;
    }

    public findSequence(name: string): number {
        const nameIndex = this.findName(name);
        if (nameIndex < 0)
            return -1;
        return this.sequences.findIndex((seq) => seq.name === nameIndex);
    }

    // Pass -1 for the roots.
    public getNodeChildren(nodeIndex: number): number[] {
        const range = this.nodeChildren[nodeIndex + 1];
        if (range === undefined || range.numChildren === 0)
            return [];
        return this.nodeChildIds.slice(range.firstChild, range.firstChild + range.numChildren);
    }

    // Out-of-range indices give the identity.
    public getTransform(index: number): ShapeTransform {
        return this.transforms[index] ?? identityTransform;
    }
}
