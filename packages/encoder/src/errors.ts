import type { ObjectKind } from "@m3gkit/scene";

export const ENCODE_ERROR_CODES = {
  cyclicReference: "M3G_ERR_CYCLIC_REFERENCE",
  orphanedObject: "M3G_ERR_ORPHANED_OBJECT",
  fieldOverflow: "M3G_ERR_FIELD_OVERFLOW",
  sectionTooLarge: "M3G_ERR_SECTION_TOO_LARGE",
  incompatibleFeature: "M3G_ERR_INCOMPATIBLE_FEATURE",
  unsupportedInVersion: "M3G_ERR_UNSUPPORTED_IN_VERSION",
  invalidInput: "M3G_ERR_INVALID_INPUT",
  internal: "M3G_ERR_INTERNAL",
} as const;

export type EncodeErrorCode = (typeof ENCODE_ERROR_CODES)[keyof typeof ENCODE_ERROR_CODES];

/** Where in the scene an error was found. */
export interface EncodeErrorContext {
  kind?: ObjectKind;
  index?: number;
  name?: string;
  field?: string;
}

export class EncodeError extends Error {
  readonly code: EncodeErrorCode;
  readonly context: EncodeErrorContext;

  constructor(code: EncodeErrorCode, message: string, context: EncodeErrorContext = {}) {
    super(`${message}${describeContext(context)}`);
    this.name = "EncodeError";
    this.code = code;
    this.context = context;
  }
}

export class CyclicReferenceError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.cyclicReference, message, context);
    this.name = "CyclicReferenceError";
  }
}

export class OrphanedObjectError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.orphanedObject, message, context);
    this.name = "OrphanedObjectError";
  }
}

export class FieldOverflowError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.fieldOverflow, message, context);
    this.name = "FieldOverflowError";
  }
}

export class SectionTooLargeError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.sectionTooLarge, message, context);
    this.name = "SectionTooLargeError";
  }
}

export class IncompatibleFeatureError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.incompatibleFeature, message, context);
    this.name = "IncompatibleFeatureError";
  }
}

export class UnsupportedInVersionError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.unsupportedInVersion, message, context);
    this.name = "UnsupportedInVersionError";
  }
}

export class InputValidationError extends EncodeError {
  constructor(message: string, context?: EncodeErrorContext) {
    super(ENCODE_ERROR_CODES.invalidInput, message, context);
    this.name = "InputValidationError";
  }
}

export function isEncodeError(error: unknown): error is EncodeError {
  return error instanceof EncodeError;
}

/** Errors the encoder did not raise itself are faults of the encoder, not of the scene. */
export function asEncodeError(error: unknown, fallbackMessage = "encoding failed"): EncodeError {
  if (isEncodeError(error)) {
    return error;
  }
  return new EncodeError(ENCODE_ERROR_CODES.internal, error instanceof Error ? error.message : fallbackMessage);
}

function describeContext(context: EncodeErrorContext): string {
  const parts: string[] = [];
  if (context.kind !== undefined) parts.push(`kind=${context.kind}`);
  if (context.index !== undefined) parts.push(`index=${context.index}`);
  if (context.name !== undefined) parts.push(`name=${JSON.stringify(context.name)}`);
  if (context.field !== undefined) parts.push(`field=${context.field}`);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}
