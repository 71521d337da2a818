import { isSceneNode, type ExternalReference, type SceneNode, type SceneObject, type World } from "@m3gkit/scene";
import { FIRST_OBJECT_INDEX } from "./constants.js";
import { CyclicReferenceError, InputValidationError, type EncodeErrorContext } from "./errors.js";
import { referencesOf } from "./references.js";

/**
 * Assigns every reachable object exactly one index.
 *
 * External references take the indices right after the header. Every other object is
 * registered only after everything it references, so each reference points to a smaller
 * index and the World comes last.
 */
export class ObjectTable {
  private readonly indices = new Map<SceneObject, number>();
  private readonly order: SceneObject[] = [];
  private readonly inProgress = new Set<SceneObject>();
  private readonly parentOf = new Map<SceneNode, SceneNode>();
  private readonly root: World;

  private constructor(root: World, externalReferences: readonly ExternalReference[]) {
    this.root = root;
    for (const reference of externalReferences) this.append(reference);
  }

  static build(world: World): ObjectTable {
    const table = new ObjectTable(world, collectExternalReferences(world));
    table.register(world);
    return table;
  }

  /** Registers `object` and everything it references; returns its index. Idempotent. */
  register(object: SceneObject): number {
    const existing = this.indices.get(object);
    if (existing !== undefined) return existing;
    if (this.inProgress.has(object)) {
      throw new CyclicReferenceError("object references itself through its own fields", describe(object));
    }
    if (object.kind === "world" && object !== this.root) {
      throw new InputValidationError("only the root may be a World", describe(object));
    }

    this.inProgress.add(object);
    for (const slot of referencesOf(object)) {
      if (slot.parent) this.attach(slot.target, slot.parent, slot.field);
      this.register(slot.target);
    }
    this.inProgress.delete(object);
    return this.append(object);
  }

  indexOf(object: SceneObject): number {
    const index = this.indices.get(object);
    if (index === undefined) {
      throw new Error(`${object.kind} was never registered`);
    }
    return index;
  }

  has(object: SceneObject): boolean {
    return this.indices.has(object);
  }

  /** Objects in index order; position 0 holds index 2. */
  get objects(): readonly SceneObject[] {
    return this.order;
  }

  get size(): number {
    return this.order.length;
  }

  get world(): World {
    return this.root;
  }

  parent(node: SceneNode): SceneNode | undefined {
    return this.parentOf.get(node);
  }

  contextOf(object: SceneObject): EncodeErrorContext {
    return { ...describe(object), index: this.indices.get(object) };
  }

  private append(object: SceneObject): number {
    const index = FIRST_OBJECT_INDEX + this.order.length;
    this.indices.set(object, index);
    this.order.push(object);
    return index;
  }

  private attach(child: SceneObject, parent: SceneNode, field: string): void {
    if (!isSceneNode(child)) return;
    if (this.inProgress.has(child)) return;
    const current = this.parentOf.get(child);
    if (current !== undefined && current !== parent) {
      throw new InputValidationError(`node is attached to more than one parent`, { ...describe(child), field });
    }
    if (current === parent && this.indices.has(child)) {
      throw new InputValidationError(`node is listed twice under the same parent`, { ...describe(child), field });
    }
    this.parentOf.set(child, parent);
  }
}

function describe(object: SceneObject): EncodeErrorContext {
  return object.name === undefined ? { kind: object.kind } : { kind: object.kind, name: object.name };
}

function collectExternalReferences(world: World): ExternalReference[] {
  const seen = new Set<SceneObject>();
  const found: ExternalReference[] = [];
  const stack: SceneObject[] = [world];
  while (stack.length > 0) {
    const object = stack.pop();
    if (object === undefined || seen.has(object)) continue;
    seen.add(object);
    if (object.kind === "externalReference") found.push(object);
    const targets = referencesOf(object).map((slot) => slot.target);
    for (let i = targets.length - 1; i >= 0; i -= 1) {
      const target = targets[i];
      if (target !== undefined) stack.push(target);
    }
  }
  return found;
}
