import { Bitmap, BitmapFlags, DecodedTexture, decodeBitmapToRGBA } from "./Bitmap.js";
import { createDefaultRegistry } from "./DefaultRegistry.js";
import { Material, MaterialFlags, getMaterialType } from "./MaterialList.js";
import { Palette } from "./Palette.js";
import { PersistDecodeError } from "./Persist.js";
import { ResourceManager } from "./ResourceManager.js";
import { Shape } from "./Shape.js";
import { ShapeBuildOptions, ShapeGeometry, buildShapeGeometry } from "./ShapeGeometry.js";
import { ShapeInstance } from "./ShapeInstance.js";
import { StreamReadError } from "./Stream.js";

export interface ShapeTexture extends DecodedTexture {
    filename: string;
    flags: BitmapFlags;
}

export interface LoadedShape {
    name: string;
    shape: Shape;
    geometry: ShapeGeometry;
    // Parallel to the shape's materials; null for untextured materials and missing bitmaps.
    textures: (ShapeTexture | null)[];
}

export interface ShapeLoaderOptions extends ShapeBuildOptions {
    debug?: boolean;
}

/**
 * Ties the pieces together: finds a shape file through the resource manager, decodes it,
 * unpacks its geometry and decodes the bitmaps its materials name.
 */
export class ShapeLoader {
    public resources: ResourceManager;
    public palette: Palette | null = null;
    private textureCache = new Map<string, ShapeTexture | null>();

    constructor(private options: ShapeLoaderOptions = {}) {
        const debug = options.debug ?? false;
        this.resources = new ResourceManager(createDefaultRegistry({ debug }), { debug });
    }

    /**
     * Make {@param filename} the palette for bitmaps that carry none. Returns false, keeping the
     * current palette, if it can't be found or read.
     */
    public setPalette(filename: string): boolean {
        const buffer = this.resources.openFile(filename);
        if (buffer === null) {
            console.warn(`Palette ${filename} not found`);
            return false;
        }

        try {
            this.palette = Palette.read(buffer);
        } catch (e) {
            if (e instanceof StreamReadError || e instanceof PersistDecodeError) {
                console.warn(`Palette ${filename}: ${e.message}`);
                return false;
            }
            throw e;
        }

        // Already decoded textures used the old palette.
        this.textureCache.clear();
        return true;
    }

    public loadTexture(filename: string): ShapeTexture | null {
        const key = filename.toLowerCase();
        const cached = this.textureCache.get(key);
        if (cached !== undefined)
            return cached;

        const texture = this.decodeTexture(filename);
        this.textureCache.set(key, texture);
        return texture;
    }

    private decodeTexture(filename: string): ShapeTexture | null {
        const buffer = this.resources.openFile(filename);
        if (buffer === null) {
            console.warn(`Bitmap ${filename} not found`);
            return null;
        }

        let bitmap: Bitmap;
        try {
            bitmap = Bitmap.read(buffer);
        } catch (e) {
            if (e instanceof StreamReadError || e instanceof PersistDecodeError) {
                console.warn(`Bitmap ${filename}: ${e.message}`);
                return null;
            }
            throw e;
        }

        const decoded = decodeBitmapToRGBA(bitmap, { palette: this.palette });
        if (decoded === null) {
            console.warn(`Bitmap ${filename} could not be decoded`);
            return null;
        }

        return { ...decoded, filename, flags: bitmap.flags };
    }

    private loadMaterialTexture(material: Material): ShapeTexture | null {
        if (getMaterialType(material) !== MaterialFlags.TypeTexture || material.fileName.length === 0)
            return null;
        return this.loadTexture(material.fileName);
    }

    public loadShape(filename: string): LoadedShape | null {
        const shape = this.resources.openShape(filename);
        if (shape === null)
            return null;

        const geometry = buildShapeGeometry(shape, this.options);
        const materials = shape.materials !== null ? shape.materials.materials : [];
        const textures = materials.map((material) => this.loadMaterialTexture(material));
        return { name: filename, shape, geometry, textures };
    }

    public createInstance(loaded: LoadedShape): ShapeInstance {
        return new ShapeInstance(loaded.shape, loaded.geometry);
    }
}
