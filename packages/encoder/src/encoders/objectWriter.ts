import type { SceneObject } from "@m3gkit/scene";
import { BlockWriter } from "../codec/blockWriter.js";
import { InputValidationError, type EncodeErrorContext } from "../errors.js";
import type { ObjectTable } from "../objectTable.js";
import type { TransformPlan } from "../transform.js";
import type { FormatVersion } from "../versionPolicy.js";

/** Shared, read-only state of one encode call. */
export interface EncodeContext {
  table: ObjectTable;
  version: FormatVersion;
  transforms: TransformPlan;
}

/**
 * BlockWriter that also resolves object references to table indices and remembers them.
 */
export class ObjectWriter extends BlockWriter {
  readonly references: number[] = [];

  constructor(readonly encode: EncodeContext, context: EncodeErrorContext) {
    super(context);
  }

  ref(field: string, target: SceneObject | undefined): void {
    if (target === undefined) {
      this.objectIndex(field, 0);
      return;
    }
    const index = this.encode.table.indexOf(target);
    this.references.push(index);
    this.objectIndex(field, index);
  }

  invalid(message: string, field?: string): InputValidationError {
    return new InputValidationError(message, field === undefined ? this.context : { ...this.context, field });
  }
}
