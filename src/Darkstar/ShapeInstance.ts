import { mat4, quat, ReadonlyQuat, ReadonlyVec3, vec3 } from "gl-matrix";
import { MathConstants, clamp, isNearZero, quatSlerpShortest, setMatrixTranslation } from "../MathHelpers.js";
import { assert, nArray } from "../util.js";
import { MeshPrim } from "./CelAnimMesh.js";
import { Shape, ShapeKeyframe, ShapeObjectFlags, ShapeTransform } from "./Shape.js";
import { ShapeGeometry } from "./ShapeGeometry.js";

export const enum ShapeThreadState {
    Stopped,
    Playing,
    // Declared by the format's runtime but never given behavior. A thread waiting on a
    // transition plays on as normal; a transitioning thread holds still.
    PlayingTransitionWait,
    Transitioning,
}

/**
 * One playback cursor over the shape's sequences. Threads are evaluated in the order they were
 * added; where two threads animate the same node, the later one wins.
 */
export interface ShapeThread {
    sequenceIndex: number;
    transitionIndex: number;
    // Normalized, 0 to 1.
    position: number;
    state: ShapeThreadState;
    enabled: boolean;
    // Subsequence each node, then each object, plays for the current sequence; -1 for none.
    subSequences: Int32Array;
    // Last keyframe the object scan stopped at, per object; -1 to rescan from the start.
    objectKeyframeCache: Int32Array;
}

export interface ShapeObjectState {
    draw: boolean;
    frame: number;
    texFrame: number;
    // Set when the object should fall back to its defaults before the next keyframe scan.
    needsReset: boolean;
}

export interface KeyframeBracket {
    prevIndex: number;
    nextIndex: number;
    prev: ShapeKeyframe;
    next: ShapeKeyframe;
    // 0 at prev, 1 at next.
    interpolation: number;
}

// Fields an object keyframe scan settled on; null where no keyframe up to the position said.
export interface ObjectKeyframeValues {
    keyframeIndex: number;
    frame: number | null;
    texFrame: number | null;
    visible: boolean | null;
}

export interface ShapeDrawCall {
    objectIndex: number;
    meshIndex: number;
    // Base vertex of the object's current mesh frame.
    frameVertexOffset: number;
    // Base texture coordinate of the object's current texture frame.
    texVertexOffset: number;
    prims: MeshPrim[];
    // Node world matrix with the object's offset applied.
    worldMatrix: mat4;
}

const enum NodeVisibility {
    Visible         = 0x01,
    ForceInvisible  = 0x02,
}

const KEYFRAME_EPSILON = 0.001;

/**
 * Local node matrix from a shape transform. Darkstar stores rotations the opposite way round
 * from gl-matrix, so the matrix is built from the conjugate. A rotation without an axis is
 * treated as the identity.
 */
export function computeNodeMatrix(dst: mat4, rotation: ReadonlyQuat, translation: ReadonlyVec3): mat4 {
    if (isNearZero(rotation[0] * rotation[0] + rotation[1] * rotation[1] + rotation[2] * rotation[2], 1e-19)) {
        mat4.identity(dst);
    } else {
        quat.conjugate(scratchQuat, rotation);
        mat4.fromQuat(dst, scratchQuat);
    }
    setMatrixTranslation(dst, translation);
    return dst;
}

export function interpolateTransform(dst: mat4, a: ShapeTransform, b: ShapeTransform, t: number): mat4 {
    quatSlerpShortest(scratchQuatb, a.rotation, b.rotation, t);
    vec3.lerp(scratchVec3, a.translation, b.translation, t);
    return computeNodeMatrix(dst, scratchQuatb, scratchVec3);
}

const scratchQuat = quat.create();
const scratchQuatb = quat.create();
const scratchVec3 = vec3.create();
const scratchMatrix = mat4.create();

/**
 * The animated state of one {@link Shape}: threads, node matrices, object frames and the
 * selected detail level. Many instances may share one shape; none of them writes to it.
 */
export class ShapeInstance {
    public threads: ShapeThread[] = [];
    public nodeMatrices: mat4[];
    public nodeVisibility: Uint8Array;
    public objectStates: ShapeObjectState[];
    public alwaysNode: number;
    public currentDetail: number;

    // Objects under the always node in slot 0, then the objects of each detail level.
    private detailObjects: number[][] = [];

    constructor(public readonly shape: Shape, public readonly geometry: ShapeGeometry) {
        const numNodes = shape.nodes.length;
        this.nodeMatrices = nArray(numNodes, () => mat4.create());
        this.nodeVisibility = new Uint8Array(numNodes);
        this.objectStates = nArray(shape.objects.length, () => ({ draw: true, frame: 0, texFrame: 0, needsReset: true }));

        this.alwaysNode = (shape.alwaysNode >= 0 && shape.alwaysNode < numNodes) ? shape.alwaysNode : -1;
        this.currentDetail = shape.details.length > 0 ? 0 : -1;

        this.setupDetailObjects();
        this.animate();
    }

    private get numNodes(): number {
        return this.shape.nodes.length;
    }

    private markObjectsUnder(rootNode: number): number[] {
        if (rootNode < 0)
            return [];

        const inSubtree = new Uint8Array(this.numNodes);
        const stack = [rootNode];
        while (stack.length > 0) {
            const nodeIndex = stack.pop();
            if (nodeIndex === undefined)
                break;
            inSubtree[nodeIndex] = 1;
            const range = this.shape.nodeChildren[nodeIndex + 1];
            for (let i = 0; i < range.numChildren; i++)
                stack.push(this.shape.nodeChildIds[range.firstChild + i]);
        }

        const objects: number[] = [];
        for (let i = 0; i < this.shape.objects.length; i++) {
            const nodeIndex = this.shape.objects[i].nodeIndex;
            if (nodeIndex >= 0 && nodeIndex < this.numNodes && inSubtree[nodeIndex])
                objects.push(i);
        }
        return objects;
    }

    private setupDetailObjects(): void {
        this.detailObjects = [this.markObjectsUnder(this.alwaysNode)];
        for (let i = 0; i < this.shape.details.length; i++)
            this.detailObjects.push(this.markObjectsUnder(this.shape.details[i].rootNode));
    }

    public getDetailObjects(detailSlot: number): readonly number[] {
        return this.detailObjects[detailSlot] ?? [];
    }

    // Threads

    public addThread(): number {
        const thread: ShapeThread = {
            sequenceIndex: -1,
            transitionIndex: -1,
            position: 0,
            state: ShapeThreadState.Stopped,
            enabled: true,
            subSequences: new Int32Array(this.numNodes + this.shape.objects.length).fill(-1),
            objectKeyframeCache: new Int32Array(this.shape.objects.length).fill(-1),
        };
        this.threads.push(thread);
        return this.threads.length - 1;
    }

    public removeThread(index: number): void {
        assert(index >= 0 && index < this.threads.length);
        this.threads.splice(index, 1);
    }

    private findSubSequence(first: number, count: number, sequenceIndex: number): number {
        for (let i = first; i < first + count; i++)
            if (this.shape.subSequences[i].sequenceIndex === sequenceIndex)
                return i;
        return -1;
    }

    /**
     * Start {@param sequenceIndex} from the beginning on a thread, or stop the thread when it
     * is negative.
     */
    public setThreadSequence(index: number, sequenceIndex: number): void {
        const thread = this.threads[index];
        assert(thread !== undefined, `No thread ${index}`);

        if (sequenceIndex >= this.shape.sequences.length) {
            console.warn(`Sequence ${sequenceIndex} out of range (shape has ${this.shape.sequences.length})`);
            sequenceIndex = -1;
        }

        thread.sequenceIndex = sequenceIndex;
        thread.transitionIndex = -1;
        thread.position = 0;
        thread.state = sequenceIndex < 0 ? ShapeThreadState.Stopped : ShapeThreadState.Playing;

        const numNodes = this.numNodes;
        for (let i = 0; i < numNodes; i++) {
            const node = this.shape.nodes[i];
            thread.subSequences[i] = sequenceIndex < 0 ? -1 : this.findSubSequence(node.firstSubSequence, node.numSubSequences, sequenceIndex);
        }
        for (let i = 0; i < this.shape.objects.length; i++) {
            const obj = this.shape.objects[i];
            thread.subSequences[numNodes + i] = sequenceIndex < 0 ? -1 : this.findSubSequence(obj.firstSubSequence, obj.numSubSequences, sequenceIndex);
        }

        this.resetObjectCaches();
    }

    public setThreadEnabled(index: number, enabled: boolean): void {
        const thread = this.threads[index];
        assert(thread !== undefined, `No thread ${index}`);
        thread.enabled = enabled;
    }

    public setThreadPosition(index: number, position: number): void {
        const thread = this.threads[index];
        assert(thread !== undefined, `No thread ${index}`);
        thread.position = clamp(position, 0, 1);
        this.resetObjectCaches();
    }

    private resetObjectCaches(): void {
        for (let i = 0; i < this.objectStates.length; i++)
            this.objectStates[i].needsReset = true;
        for (let i = 0; i < this.threads.length; i++)
            this.threads[i].objectKeyframeCache.fill(-1);
    }

    private hasValidSequence(thread: ShapeThread): boolean {
        return thread.sequenceIndex >= 0 && thread.sequenceIndex < this.shape.sequences.length;
    }

    // Advance every playing thread by {@param dt} seconds.
    public advanceThreads(dt: number): void {
        for (let i = 0; i < this.threads.length; i++) {
            const thread = this.threads[i];
            if (!this.hasValidSequence(thread))
                continue;

            if (thread.state !== ShapeThreadState.Playing && thread.state !== ShapeThreadState.PlayingTransitionWait)
                continue;

            const sequence = this.shape.sequences[thread.sequenceIndex];
            if (sequence.duration <= 0)
                continue;

            thread.position += dt / sequence.duration;
            if (thread.position > 1.0) {
                if (sequence.cyclic) {
                    thread.position -= Math.floor(thread.position);
                    this.resetObjectCaches();
                } else {
                    thread.position = 1.0;
                    thread.state = ShapeThreadState.Stopped;
                }
            }
        }
    }

    // Keyframe lookup

    /**
     * Find the keyframes either side of {@param position} in a subsequence, and how far between
     * them it lies. Keyframes within 0.001 of the position count as at it. Returns null for an
     * empty subsequence.
     */
    public getSubsequenceKeyframes(sequenceIndex: number, subSequenceIndex: number, position: number): KeyframeBracket | null {
        const sequence = this.shape.sequences[sequenceIndex];
        const subSeq = this.shape.subSequences[subSequenceIndex];
        if (sequence === undefined || subSeq === undefined || subSeq.numKeyframes <= 0)
            return null;

        const keyframes = this.shape.keyframes;
        const first = subSeq.firstKeyframe, last = first + subSeq.numKeyframes - 1;

        let prevIndex = -1, nextIndex = -1;
        for (let i = first; i <= last; i++) {
            const kf = keyframes[i];
            if (kf.position <= position + KEYFRAME_EPSILON) {
                prevIndex = i;
            } else if (kf.position >= position - KEYFRAME_EPSILON) {
                nextIndex = i;
                break;
            }
        }

        let prevPosition: number, nextPosition: number;
        let interpolation: number;

        if (sequence.cyclic) {
            // Missing neighbours come from the previous or next cycle.
            if (prevIndex < 0) {
                prevIndex = last;
                prevPosition = keyframes[prevIndex].position - 1.0;
            } else {
                prevPosition = keyframes[prevIndex].position;
            }

            if (nextIndex < 0) {
                nextIndex = first;
                nextPosition = keyframes[nextIndex].position + 1.0;
            } else {
                nextPosition = keyframes[nextIndex].position;
            }

            if (prevIndex === nextIndex)
                interpolation = 0.0;
            else
                interpolation = this.bracketFraction(prevPosition, nextPosition, position);
        } else {
            if (prevIndex < 0) {
                prevIndex = first;
                interpolation = 0.0;
                if (nextIndex < 0)
                    nextIndex = first;
            } else if (nextIndex < 0) {
                nextIndex = last;
                interpolation = 1.0;
            } else {
                prevPosition = keyframes[prevIndex].position;
                nextPosition = keyframes[nextIndex].position;
                interpolation = this.bracketFraction(prevPosition, nextPosition, position);
            }

            if (prevIndex === nextIndex)
                interpolation = 0.0;
        }

        return { prevIndex, nextIndex, prev: keyframes[prevIndex], next: keyframes[nextIndex], interpolation };
    }

    private bracketFraction(prevPosition: number, nextPosition: number, position: number): number {
        const diff = nextPosition - prevPosition;
        if (diff === 0)
            return position === prevPosition ? 0.0 : 1.0;
        if (diff < 0)
            return 0.0;
        return clamp((position - prevPosition) / diff, 0.0, 1.0);
    }

    /**
     * Scan an object subsequence for the last value of each field that a keyframe at or before
     * {@param position} sets. Resumes from {@param cachedKeyframe} unless the position has moved
     * back past it.
     */
    public getNearestSubsequenceKeyframe(subSequenceIndex: number, cachedKeyframe: number, position: number): ObjectKeyframeValues {
        const values: ObjectKeyframeValues = { keyframeIndex: -1, frame: null, texFrame: null, visible: null };
        const subSeq = this.shape.subSequences[subSequenceIndex];
        if (subSeq === undefined || subSeq.numKeyframes <= 0)
            return values;

        const keyframes = this.shape.keyframes;
        const first = subSeq.firstKeyframe, end = first + subSeq.numKeyframes;

        let start = first;
        if (cachedKeyframe >= first && cachedKeyframe < end && position >= keyframes[cachedKeyframe].position)
            start = cachedKeyframe;

        for (let i = start; i < end; i++) {
            const kf = keyframes[i];
            if (kf.position <= position + KEYFRAME_EPSILON) {
                values.keyframeIndex = i;
                if (kf.visMatters)
                    values.visible = kf.visible;
                if (kf.frameMatters)
                    values.frame = kf.key;
                if (kf.matMatters)
                    values.texFrame = kf.matIndex;
            } else if (kf.position >= position - KEYFRAME_EPSILON) {
                break;
            }
        }

        return values;
    }

    // Evaluation

    private animateNode(nodeIndex: number): void {
        const node = this.shape.nodes[nodeIndex];
        const local = scratchMatrix;

        this.nodeVisibility[nodeIndex] &= ~NodeVisibility.ForceInvisible;

        const defaultTransform = this.shape.getTransform(node.defaultTransform);
        computeNodeMatrix(local, defaultTransform.rotation, defaultTransform.translation);

        for (let i = 0; i < this.threads.length; i++) {
            const thread = this.threads[i];
            if (!thread.enabled || !this.hasValidSequence(thread))
                continue;

            const subSequenceIndex = thread.subSequences[nodeIndex];
            if (subSequenceIndex < 0)
                continue;

            const bracket = this.getSubsequenceKeyframes(thread.sequenceIndex, subSequenceIndex, thread.position);
            if (bracket === null)
                continue;

            if (bracket.prev.visMatters) {
                if (bracket.prev.visible)
                    this.nodeVisibility[nodeIndex] &= ~NodeVisibility.ForceInvisible;
                else
                    this.nodeVisibility[nodeIndex] |= NodeVisibility.ForceInvisible;
            }

            if (bracket.prev.key === bracket.next.key) {
                const transform = this.shape.getTransform(bracket.prev.key);
                computeNodeMatrix(local, transform.rotation, transform.translation);
            } else {
                interpolateTransform(local, this.shape.getTransform(bracket.prev.key), this.shape.getTransform(bracket.next.key), bracket.interpolation);
            }
        }

        // Both matrices are affine, so the product rotates the local translation into the
        // parent's frame and adds the parent's translation.
        const dst = this.nodeMatrices[nodeIndex];
        if (node.parent >= 0)
            mat4.multiply(dst, this.nodeMatrices[node.parent], local);
        else
            mat4.copy(dst, local);
    }

    // Parents before children.
    private animateSubtree(rootNode: number): void {
        if (rootNode < 0 || rootNode >= this.numNodes)
            return;

        const stack = [rootNode];
        while (stack.length > 0) {
            const nodeIndex = stack.pop();
            if (nodeIndex === undefined)
                break;
            this.animateNode(nodeIndex);
            const range = this.shape.nodeChildren[nodeIndex + 1];
            for (let i = range.numChildren - 1; i >= 0; i--)
                stack.push(this.shape.nodeChildIds[range.firstChild + i]);
        }
    }

    private animateObjects(objectIndices: readonly number[]): void {
        const numNodes = this.numNodes;
        for (let k = 0; k < objectIndices.length; k++) {
            const objectIndex = objectIndices[k];
            const obj = this.shape.objects[objectIndex];
            const state = this.objectStates[objectIndex];

            if (state.needsReset) {
                state.draw = (obj.flags & ShapeObjectFlags.InvisibleDefault) === 0;
                state.frame = 0;
                state.texFrame = 0;
                state.needsReset = false;
            }

            for (let i = 0; i < this.threads.length; i++) {
                const thread = this.threads[i];
                if (!thread.enabled || !this.hasValidSequence(thread))
                    continue;

                const subSequenceIndex = thread.subSequences[numNodes + objectIndex];
                if (subSequenceIndex < 0)
                    continue;

                const values = this.getNearestSubsequenceKeyframe(subSequenceIndex, thread.objectKeyframeCache[objectIndex], thread.position);
                thread.objectKeyframeCache[objectIndex] = values.keyframeIndex;

                if (values.visible !== null)
                    state.draw = values.visible;
                if (values.frame !== null)
                    state.frame = values.frame;
                if (values.texFrame !== null)
                    state.texFrame = values.texFrame;
            }
        }
    }

    /**
     * Pose every node under the always node and the current detail level, and update the
     * frames and visibility of their objects.
     */
    public animate(): void {
        if (this.alwaysNode >= 0) {
            this.animateSubtree(this.alwaysNode);
            this.animateObjects(this.getDetailObjects(0));
        }

        if (this.currentDetail >= 0) {
            this.animateSubtree(this.shape.details[this.currentDetail].rootNode);
            this.animateObjects(this.getDetailObjects(this.currentDetail + 1));
        }
    }

    private updateNodeVisibility(rootNode: number): void {
        if (rootNode < 0 || rootNode >= this.numNodes)
            return;

        const stack: [number, boolean][] = [[rootNode, true]];
        while (stack.length > 0) {
            const entry = stack.pop();
            if (entry === undefined)
                break;
            const nodeIndex = entry[0];
            let visible = entry[1];

            if (visible && (this.nodeVisibility[nodeIndex] & NodeVisibility.ForceInvisible) !== 0)
                visible = false;
            if (visible)
                this.nodeVisibility[nodeIndex] |= NodeVisibility.Visible;

            const range = this.shape.nodeChildren[nodeIndex + 1];
            for (let i = 0; i < range.numChildren; i++)
                stack.push([this.shape.nodeChildIds[range.firstChild + i], visible]);
        }
    }

    /**
     * Mark the nodes that are drawn this tick: everything reachable from the always node or the
     * current detail's root without passing through a node a keyframe has hidden. The always node
     * itself is never hidden.
     */
    public determineNodeVisibility(): void {
        for (let i = 0; i < this.nodeVisibility.length; i++)
            this.nodeVisibility[i] &= NodeVisibility.ForceInvisible;

        if (this.alwaysNode >= 0) {
            this.nodeVisibility[this.alwaysNode] = NodeVisibility.Visible;
            this.updateNodeVisibility(this.alwaysNode);
        }

        if (this.currentDetail >= 0)
            this.updateNodeVisibility(this.shape.details[this.currentDetail].rootNode);
    }

    public isNodeVisible(nodeIndex: number): boolean {
        return (this.nodeVisibility[nodeIndex] & NodeVisibility.Visible) !== 0;
    }

    // Detail levels

    /**
     * Size in pixels the shape's bounding sphere covers at {@param distance} on a viewport of
     * {@param width} by {@param height}. Infinite at or inside the viewer.
     */
    public getApparentSize(distance: number, width: number, height: number): number {
        if (distance <= 0)
            return Infinity;
        return Math.atan(this.shape.radius / distance) * Math.max(width, height) / (MathConstants.TAU / 4);
    }

    /**
     * Pick the last detail level whose size is at or below the apparent size, falling back to
     * the first.
     */
    public selectDetail(distance: number, width: number, height: number): number {
        const size = this.getApparentSize(distance, width, height);
        const details = this.shape.details;
        if (details.length === 0) {
            this.currentDetail = -1;
            return -1;
        }

        let selected = 0;
        for (let i = 0; i < details.length; i++)
            if (details[i].size <= size)
                selected = i;

        this.currentDetail = selected;
        return selected;
    }

    // Drawing

    private collectDrawCalls(dst: ShapeDrawCall[], objectIndices: readonly number[]): void {
        for (let k = 0; k < objectIndices.length; k++) {
            const objectIndex = objectIndices[k];
            const obj = this.shape.objects[objectIndex];
            if (obj.meshIndex < 0)
                continue;

            const meshGeometry = this.geometry.meshes[obj.meshIndex];
            if (meshGeometry === null || meshGeometry === undefined)
                continue;

            const state = this.objectStates[objectIndex];
            if (!state.draw)
                continue;

            if (obj.nodeIndex < 0 || obj.nodeIndex >= this.numNodes || !this.isNodeVisible(obj.nodeIndex))
                continue;

            if (state.frame < 0 || state.frame >= meshGeometry.frameOffsets.length) {
                console.warn(`Object ${objectIndex} wants mesh frame ${state.frame} of ${meshGeometry.frameOffsets.length}, using 0`);
                state.frame = 0;
            }

            if (state.texFrame < 0 || state.texFrame >= meshGeometry.numTexFrames) {
                console.warn(`Object ${objectIndex} wants texture frame ${state.texFrame} of ${meshGeometry.numTexFrames}, using 0`);
                state.texFrame = 0;
            }

            const worldMatrix = mat4.create();
            mat4.translate(worldMatrix, this.nodeMatrices[obj.nodeIndex], obj.offset);

            dst.push({
                objectIndex,
                meshIndex: obj.meshIndex,
                frameVertexOffset: meshGeometry.frameOffsets[state.frame],
                texVertexOffset: meshGeometry.texVertexBase + meshGeometry.texVertsPerFrame * state.texFrame,
                prims: meshGeometry.prims,
                worldMatrix,
            });
        }
    }

    /**
     * Everything the renderer needs to draw the shape as last animated: one entry per visible
     * object that has a mesh, always-node objects first.
     */
    public prepareDrawCalls(): ShapeDrawCall[] {
        this.determineNodeVisibility();

        const drawCalls: ShapeDrawCall[] = [];
        if (this.alwaysNode >= 0)
            this.collectDrawCalls(drawCalls, this.getDetailObjects(0));
        if (this.currentDetail >= 0)
            this.collectDrawCalls(drawCalls, this.getDetailObjects(this.currentDetail + 1));
        return drawCalls;
    }
}
