import { PersistObject, PersistRegistry } from "./Persist.js";
import { Stream } from "./Stream.js";

export const enum MaterialFlags {
    TypeMask            = 0x000F,
    TypeNull            = 0x0000,
    TypePalette         = 0x0001,
    TypeRGB             = 0x0002,
    TypeTexture         = 0x0003,

    ShadingMask         = 0x0F00,
    ShadingNone         = 0x0100,
    ShadingFlat         = 0x0200,
    ShadingSmooth       = 0x0300,

    TextureMask         = 0xF000,
    TextureTransparent  = 0x1000,
}

export interface Material {
    flags: number;
    alpha: number;
    // Palette index, for palette-coloured materials.
    index: number;
    rgb: [number, number, number];
    fileName: string;
    // Surface type as used by the game scripts.
    type: number;
    elasticity: number;
    friction: number;
    useDefaultProps: boolean;
}

export function getMaterialType(material: Material): MaterialFlags {
    return material.flags & MaterialFlags.TypeMask;
}

export function getMaterialShading(material: Material): MaterialFlags {
    return material.flags & MaterialFlags.ShadingMask;
}

export function getMaterialRecordSize(version: number): number {
    let size = 0x10 + (version < 2 ? 0x10 : 0x20);
    if (version === 1 || version > 2)
        size += 0x0C;
    if (version !== 2 && version !== 3)
        size += 0x04;
    return size;
}

function readMaterial(stream: Stream, version: number): Material {
    const flags = stream.readUint32();
    const alpha = stream.readFloat32();
    const index = stream.readUint32();
    const r = stream.readUint8(), g = stream.readUint8(), b = stream.readUint8();
    stream.skip(0x01);
    const fileName = stream.readFixedString(version < 2 ? 0x10 : 0x20);

    // v2 dropped the surface properties, v3 brought them back, v4 added useDefaultProps.
    let type = 0, elasticity = 0, friction = 0;
    if (version === 1 || version > 2) {
        type = stream.readUint32();
        elasticity = stream.readFloat32();
        friction = stream.readFloat32();
    }

    let useDefaultProps = true;
    if (version !== 2 && version !== 3)
        useDefaultProps = stream.readUint32() !== 0;

    return { flags, alpha, index, rgb: [r, g, b], fileName, type, elasticity, friction, useDefaultProps };
}

export class MaterialList implements PersistObject {
    public readonly className = 'TS::MaterialList';

    public numDetails = 0;
    // numDetails runs of the same number of materials, one run per detail level.
    public materials: Material[] = [];

    public get materialsPerDetail(): number {
        return this.numDetails > 0 ? this.materials.length / this.numDetails : 0;
    }

    public decode(stream: Stream, version: number, registry: PersistRegistry): void {
        this.numDetails = stream.readUint32();
        const numMaterials = stream.readUint32();
        const count = this.numDetails * numMaterials;

        stream.checkCount(count, getMaterialRecordSize(version));
        this.materials = [];
        for (let i = 0; i < count; i++)
            this.materials.push(readMaterial(stream, version));
    }
}
