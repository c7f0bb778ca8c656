// Darkstar "persistent objects": every asset in a shape file (and the shape file itself) is a
// chunk that either names its class ("PERS" chunks) or is identified by its chunk tag alone.

import { ChunkHeader, Stream, StreamReadError, makeTag, readChunkHeader, tagToString } from "./Stream.js";

export const PERS_TAG = makeTag('PERS');

export class PersistDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PersistDecodeError';
    }
}

export interface PersistObject {
    readonly className: string;
    /**
     * Fill this object from {@param stream}, which is positioned just past the class header.
     * Throws {@link StreamReadError} or {@link PersistDecodeError} if the data is unusable.
     */
    decode(stream: Stream, version: number, registry: PersistRegistry): void;
}

export type PersistFactory = () => PersistObject;

export interface PersistRegistryOptions {
    debug?: boolean;
}

/**
 * Maps class names and chunk tags onto factories. A registry is built once by whoever owns the
 * load (see {@link createDefaultRegistry}) and handed to every decode, including the nested
 * decodes an object performs for its children.
 */
export class PersistRegistry {
    private namedFactories = new Map<string, PersistFactory>();
    private tagFactories = new Map<number, PersistFactory>();
    public debug: boolean;

    constructor(options: PersistRegistryOptions = {}) {
        this.debug = options.debug ?? false;
    }

    public registerClass(className: string, factory: PersistFactory): void {
        this.namedFactories.set(className, factory);
    }

    public registerTag(tag: number, factory: PersistFactory): void {
        this.tagFactories.set(tag, factory);
    }

    public hasClass(className: string): boolean {
        return this.namedFactories.has(className);
    }

    public createByName(className: string): PersistObject | null {
        const factory = this.namedFactories.get(className);
        return factory !== undefined ? factory() : null;
    }

    public createByTag(tag: number): PersistObject | null {
        const factory = this.tagFactories.get(tag);
        return factory !== undefined ? factory() : null;
    }

    /**
     * Decode the chunk at the current position. Returns null if the class is unknown or its data
     * doesn't decode; either way the stream is left at the end of the chunk so that whatever
     * follows can still be read.
     */
    public createFromStream(stream: Stream): PersistObject | null {
        let header: ChunkHeader;
        try {
            header = readChunkHeader(stream);
        } catch (e) {
            if (e instanceof StreamReadError) {
                console.warn(`No chunk header at ${stream.tell()}: ${e.message}`);
                return null;
            }
            throw e;
        }

        try {
            let obj: PersistObject | null;
            let version = 0;
            let description: string;

            if (header.tag === PERS_TAG) {
                const className = stream.readSString();
                version = stream.readUint32();
                obj = this.createByName(className);
                description = `${className} v${version}`;
            } else {
                obj = this.createByTag(header.tag);
                description = `chunk ${tagToString(header.tag)}`;
            }

            if (obj === null) {
                console.warn(`Unknown persistent object: ${description} (${header})`);
                return null;
            }

            if (this.debug)
                console.log(`Reading ${description} (${header})`);

            obj.decode(stream, version, this);
            return obj;
        } catch (e) {
            if (e instanceof StreamReadError || e instanceof PersistDecodeError) {
                console.warn(`Failed to decode ${header}: ${e.message}`);
                return null;
            }
            throw e;
        } finally {
            header.seekToEnd(stream);
        }
    }

    /**
     * As {@link createFromStream}, but also null when the decoded object isn't a {@param clazz}.
     */
    public createFromStreamAs<T extends PersistObject>(stream: Stream, clazz: new () => T): T | null {
        const obj = this.createFromStream(stream);
        if (obj === null)
            return null;
        if (!(obj instanceof clazz)) {
            console.warn(`Expected ${clazz.name}, got ${obj.className}`);
            return null;
        }
        return obj;
    }
}
