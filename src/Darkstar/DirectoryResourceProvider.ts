import { readFileSync, readdirSync } from "node:fs";
import * as path from "node:path";
import ArrayBufferSlice from "../ArrayBufferSlice.js";
import type { ResourceProvider } from "./ResourceManager.js";

/**
 * Loose files in one directory on disk (not its subdirectories). Names are matched without
 * regard to case, as the game's own file system did. The listing is taken once, when the
 * provider is created.
 */
export class DirectoryResourceProvider implements ResourceProvider {
    private filesByName = new Map<string, string>();

    constructor(public readonly name: string) {
        for (const entry of readdirSync(name, { withFileTypes: true })) {
            if (!entry.isFile())
                continue;
            const key = entry.name.toLowerCase();
            if (!this.filesByName.has(key))
                this.filesByName.set(key, entry.name);
        }
    }

    public openFile(filename: string): ArrayBufferSlice | null {
        const actualName = this.filesByName.get(filename.toLowerCase());
        if (actualName === undefined)
            return null;
        return ArrayBufferSlice.fromView(readFileSync(path.join(this.name, actualName)));
    }

    public listFiles(): string[] {
        return [...this.filesByName.values()];
    }
}
