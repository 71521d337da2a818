import type { Camera, Group, Light, Mesh, SceneNode, SkinnedMesh, World } from "@m3gkit/scene";
import { LIGHT_MODE, PROJECTION } from "../constants.js";
import { bufferVertexCount, maxIndexOf } from "./geometry.js";
import { writeNode } from "./object3d.js";
import type { ObjectWriter } from "./objectWriter.js";

export function writeGroup(w: ObjectWriter, group: Group | World): void {
  writeNode(w, group);
  w.uint32("children.length", group.children.length);
  group.children.forEach((child, i) => w.ref(`children[${i}]`, child));
}

export function writeWorld(w: ObjectWriter, world: World): void {
  writeGroup(w, world);
  w.ref("activeCamera", world.activeCamera);
  w.ref("background", world.background);
}

export function writeCamera(w: ObjectWriter, camera: Camera): void {
  writeNode(w, camera);
  const { projection } = camera;
  if (projection.type === "generic") {
    w.byte("projection", PROJECTION.generic);
    w.matrix("projection.matrix", projection.matrix);
    return;
  }
  w.byte("projection", PROJECTION[projection.type]);
  w.float32("projection.fovy", projection.fovy);
  w.float32("projection.aspectRatio", projection.aspectRatio);
  w.float32("projection.near", projection.near);
  w.float32("projection.far", projection.far);
}

export function writeLight(w: ObjectWriter, light: Light): void {
  writeNode(w, light);
  const attenuation = light.attenuation ?? { constant: 1, linear: 0, quadratic: 0 };
  w.float32("attenuation.constant", attenuation.constant);
  w.float32("attenuation.linear", attenuation.linear);
  w.float32("attenuation.quadratic", attenuation.quadratic);
  w.colorRGB("color", light.color ?? 0xffffff);
  w.byte("mode", LIGHT_MODE[light.mode]);
  w.float32("intensity", light.intensity ?? 1);
  w.float32("spotAngle", light.spotAngle ?? 45);
  w.float32("spotExponent", light.spotExponent ?? 0);
}

export function writeMesh(w: ObjectWriter, mesh: Mesh | SkinnedMesh): void {
  writeNode(w, mesh);
  if (mesh.submeshes.length === 0) {
    throw w.invalid("mesh has no submeshes", "submeshes");
  }
  const vertexCount = bufferVertexCount(mesh.vertexBuffer);
  w.ref("vertexBuffer", mesh.vertexBuffer);
  w.uint32("submeshes.length", mesh.submeshes.length);
  mesh.submeshes.forEach((submesh, i) => {
    const highest = maxIndexOf(submesh.indexBuffer.primitives);
    if (highest >= vertexCount) {
      throw w.invalid(
        `index ${highest} is outside the ${vertexCount} vertices of the vertex buffer`,
        `submeshes[${i}].indexBuffer`,
      );
    }
    w.ref(`submeshes[${i}].indexBuffer`, submesh.indexBuffer);
    w.ref(`submeshes[${i}].appearance`, submesh.appearance);
  });
}

export function writeSkinnedMesh(w: ObjectWriter, mesh: SkinnedMesh): void {
  writeMesh(w, mesh);
  const vertexCount = bufferVertexCount(mesh.vertexBuffer);
  w.ref("skeleton", mesh.skeleton);
  w.uint32("bones.length", mesh.bones.length);
  mesh.bones.forEach((bone, i) => {
    const field = `bones[${i}]`;
    if (!isInside(w, bone.node, mesh.skeleton)) {
      throw w.invalid("bone is not part of the skeleton", `${field}.node`);
    }
    if (bone.firstVertex + bone.vertexCount > vertexCount) {
      throw w.invalid(
        `vertices ${bone.firstVertex}..${bone.firstVertex + bone.vertexCount - 1} exceed the ${vertexCount} vertices`,
        `${field}.vertexCount`,
      );
    }
    w.ref(`${field}.node`, bone.node);
    w.uint32(`${field}.firstVertex`, bone.firstVertex);
    w.uint32(`${field}.vertexCount`, bone.vertexCount);
    w.int32(`${field}.weight`, bone.weight);
  });
}

function isInside(w: ObjectWriter, node: SceneNode, root: Group): boolean {
  let current: SceneNode | undefined = node;
  while (current !== undefined) {
    if (current === root) return true;
    current = w.encode.table.parent(current);
  }
  return false;
}
