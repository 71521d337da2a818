import type { Appearance, Camera, Material, Mesh, VertexBuffer, World } from "@m3gkit/scene";

export function createEmptyWorld(): World {
  return { kind: "world", children: [] };
}

export function createMaterial(): Material {
  return { kind: "material", name: "Red", diffuseColor: 0xffff0000 };
}

export function createTriangleBuffer(): VertexBuffer {
  return {
    kind: "vertexBuffer",
    positions: {
      array: { kind: "vertexArray", componentCount: 3, componentSize: 2, values: [0, 0, 0, 100, 0, 0, 0, 100, 0] },
      scale: 0.01,
    },
  };
}

export function createTriangleMesh(appearance?: Appearance, name = "Triangle"): Mesh {
  return {
    kind: "mesh",
    name,
    vertexBuffer: createTriangleBuffer(),
    submeshes: [
      {
        indexBuffer: { kind: "triangleStripArray", primitives: { type: "triangles", indices: [0, 1, 2] } },
        appearance,
      },
    ],
  };
}

/** World > camera, mesh; the mesh has an appearance with a material. */
export function createSimpleWorld(): World {
  const camera: Camera = {
    kind: "camera",
    name: "Camera",
    projection: { type: "perspective", fovy: 60, aspectRatio: 1, near: 0.1, far: 100 },
  };
  const appearance: Appearance = { kind: "appearance", material: createMaterial() };
  return { kind: "world", children: [camera, createTriangleMesh(appearance)], activeCamera: camera };
}
