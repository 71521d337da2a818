export function createSampleSceneDocument(): Record<string, unknown> {
  return {
    format: "m3g-scene",
    version: 1,
    upAxis: "z",
    root: "world",
    objects: [
      { id: "world", kind: "world", children: ["camera", "pivot"], activeCamera: "camera" },
      {
        id: "camera",
        kind: "camera",
        name: "Camera",
        transform: { translation: [0, -5, 1] },
        projection: { type: "perspective", fovy: 60, aspectRatio: 1.5, near: 0.1, far: 100 },
      },
      { id: "pivot", kind: "group", children: ["cube"] },
      {
        id: "cube",
        kind: "mesh",
        vertexBuffer: "cube_vb",
        submeshes: [{ indexBuffer: "cube_tris", appearance: "cube_look" }],
      },
      {
        id: "cube_positions",
        kind: "vertexArray",
        componentCount: 3,
        componentSize: 1,
        floats: [0, 0, 0, 254, 0, 0, 0, 254, 0],
      },
      { id: "cube_vb", kind: "vertexBuffer", positions: { array: "cube_positions" } },
      { id: "cube_tris", kind: "triangleStripArray", primitives: { type: "triangles", indices: [0, 1, 2] } },
      { id: "cube_look", kind: "appearance", material: "red" },
      { id: "red", kind: "material", diffuseColor: 0xffff0000 },
    ],
  };
}

export function createSampleSceneJson(): string {
  return JSON.stringify(createSampleSceneDocument());
}
