export { default as ArrayBufferSlice } from "./ArrayBufferSlice.js";

export { Stream, StreamReadError, ChunkHeader, CHUNK_HEADER_SIZE, readChunkHeader, makeTag, tagToString } from "./Darkstar/Stream.js";
export { PersistRegistry, PersistDecodeError, PERS_TAG } from "./Darkstar/Persist.js";
export type { PersistObject, PersistFactory, PersistRegistryOptions } from "./Darkstar/Persist.js";
export { createDefaultRegistry } from "./Darkstar/DefaultRegistry.js";

export { MaterialList, MaterialFlags, getMaterialType, getMaterialShading } from "./Darkstar/MaterialList.js";
export type { Material } from "./Darkstar/MaterialList.js";
export { CelAnimMesh } from "./Darkstar/CelAnimMesh.js";
export type { MeshFace, MeshFrame, MeshPrim, UnpackedMeshStructure } from "./Darkstar/CelAnimMesh.js";
export { Shape, ShapeObjectFlags } from "./Darkstar/Shape.js";
export type {
    ShapeTransform, ShapeKeyframe, ShapeSequence, ShapeSubSequence, ShapeTransition, ShapeNode,
    ShapeObject, ShapeDetail, ShapeFrameTrigger, NodeChildRange,
} from "./Darkstar/Shape.js";

export { buildShapeGeometry, createEncodedNormalTable, VERTEX_STRIDE, TEXCOORD_STRIDE } from "./Darkstar/ShapeGeometry.js";
export type { ShapeGeometry, MeshGeometry, ShapeBuildOptions } from "./Darkstar/ShapeGeometry.js";
export { ShapeInstance, ShapeThreadState } from "./Darkstar/ShapeInstance.js";
export type { ShapeThread, ShapeObjectState, KeyframeBracket, ObjectKeyframeValues, ShapeDrawCall } from "./Darkstar/ShapeInstance.js";

export { Palette, PaletteType } from "./Darkstar/Palette.js";
export type { PaletteData } from "./Darkstar/Palette.js";
export { Bitmap, BitmapFlags, ModelBlendMode, decodeBitmapToRGBA, getMaterialBlendMode } from "./Darkstar/Bitmap.js";
export type { DecodedTexture, MaterialBlend, TextureDecodeOptions } from "./Darkstar/Bitmap.js";

export { Volume, VolumeCompression } from "./Darkstar/Volume.js";
export type { VolumeEntry } from "./Darkstar/Volume.js";
export { ResourceManager, MemoryResourceProvider, getFileExtension } from "./Darkstar/ResourceManager.js";
export type { ResourceProvider, ResourceManagerOptions, ResourceListEntry } from "./Darkstar/ResourceManager.js";
export { DirectoryResourceProvider } from "./Darkstar/DirectoryResourceProvider.js";
export { ShapeLoader } from "./Darkstar/ShapeLoader.js";
export type { LoadedShape, ShapeLoaderOptions, ShapeTexture } from "./Darkstar/ShapeLoader.js";
