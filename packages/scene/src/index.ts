export * from "./types.js";
export * from "./rotation.js";
export * from "./vertexData.js";
export * from "./sceneSchema.js";
export * from "./loadScene.js";
