import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { PersistObject, PersistRegistry } from "./Persist.js";
import { Shape } from "./Shape.js";
import { Stream } from "./Stream.js";
import { Volume } from "./Volume.js";

/**
 * Anything files can be opened from by name.
 */
export interface ResourceProvider {
    readonly name: string;
    openFile(filename: string): ArrayBufferSlice | null;
    listFiles(): string[];
}

// Lower-case, with the dot; empty when there is none.
export function getFileExtension(filename: string): string {
    const slash = Math.max(filename.lastIndexOf('/'), filename.lastIndexOf('\\'));
    const dot = filename.lastIndexOf('.');
    return dot > slash ? filename.slice(dot).toLowerCase() : '';
}

// Files handed over directly, e.g. dropped in by a user or built by a test.
export class MemoryResourceProvider implements ResourceProvider {
    private files = new Map<string, { filename: string, buffer: ArrayBufferSlice }>();

    constructor(public readonly name: string = 'memory') {
    }

    public addFile(filename: string, buffer: ArrayBufferSlice): void {
        this.files.set(filename.toLowerCase(), { filename, buffer });
    }

    public openFile(filename: string): ArrayBufferSlice | null {
        const file = this.files.get(filename.toLowerCase());
        return file !== undefined ? file.buffer : null;
    }

    public listFiles(): string[] {
        return [...this.files.values()].map((file) => file.filename);
    }
}

export interface ResourceManagerOptions {
    debug?: boolean;
}

export interface ResourceListEntry {
    filename: string;
    provider: string;
}

/**
 * Searches an ordered list of providers for files, then decodes them through a registry.
 * Providers added first are searched first.
 */
export class ResourceManager {
    public providers: ResourceProvider[] = [];
    public debug: boolean;

    constructor(public registry: PersistRegistry, options: ResourceManagerOptions = {}) {
        this.debug = options.debug ?? false;
    }

    public addProvider(provider: ResourceProvider): void {
        this.providers.push(provider);
    }

    public addVolume(name: string, buffer: ArrayBufferSlice): Volume {
        const volume = new Volume(name, buffer);
        this.addProvider(volume);
        return volume;
    }

    public openFile(filename: string): ArrayBufferSlice | null {
        for (let i = 0; i < this.providers.length; i++) {
            const provider = this.providers[i];
            const buffer = provider.openFile(filename);
            if (buffer !== null) {
                if (this.debug)
                    console.log(`Loaded ${filename} from ${provider.name}`);
                return buffer;
            }
        }

        return null;
    }

    public openObject(filename: string): PersistObject | null {
        const buffer = this.openFile(filename);
        if (buffer === null)
            return null;
        return this.registry.createFromStream(new Stream(buffer));
    }

    public openShape(filename: string): Shape | null {
        const buffer = this.openFile(filename);
        if (buffer === null)
            return null;
        return this.registry.createFromStreamAs(new Stream(buffer), Shape);
    }

    /**
     * Every file in every provider, in search order. {@param extension} is matched without
     * regard to case, and includes the dot (".dts").
     */
    public listFiles(extension: string | null = null): ResourceListEntry[] {
        const ext = extension !== null ? extension.toLowerCase() : null;
        const L: ResourceListEntry[] = [];
        for (let i = 0; i < this.providers.length; i++) {
            const provider = this.providers[i];
            for (const filename of provider.listFiles()) {
                if (ext !== null && getFileExtension(filename) !== ext)
                    continue;
                L.push({ filename, provider: provider.name });
            }
        }
        return L;
    }
}
