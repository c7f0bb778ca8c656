import { CelAnimMesh } from "./CelAnimMesh.js";
import { MaterialList } from "./MaterialList.js";
import { PersistRegistry, PersistRegistryOptions } from "./Persist.js";
import { Shape } from "./Shape.js";

/**
 * A registry that knows every class a shape file can contain: the shape itself, then its
 * meshes, then its material list.
 */
export function createDefaultRegistry(options: PersistRegistryOptions = {}): PersistRegistry {
    const registry = new PersistRegistry(options);
    registry.registerClass('TS::Shape', () => new Shape());
    registry.registerClass('TS::CelAnimMesh', () => new CelAnimMesh());
    registry.registerClass('TS::MaterialList', () => new MaterialList());
    return registry;
}
