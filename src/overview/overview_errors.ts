import type { KnownBlockKind } from "../blocks/block_types";

export type OverviewErrorCode =
  | "missing_required_field"
  | "invalid_required_field"
  | "duplicate_block";

export interface StructuralInputErrorDetails {
  code: Extract<OverviewErrorCode, "missing_required_field" | "invalid_required_field">;
  message: string;
  blockKind: KnownBlockKind;
  field: string;
  // Bounded: first 50 chars of the offending value
  received?: string;
}

/**
 * A block is present but lacks a field every other metric is keyed against.
 * Aborts report assembly.
 */
export class StructuralInputError extends Error {
  public readonly code: StructuralInputErrorDetails["code"];
  public readonly details: StructuralInputErrorDetails;

  constructor(details: StructuralInputErrorDetails) {
    super(details.message);
    this.name = "StructuralInputError";
    this.code = details.code;
    this.details = details;
  }

  get field(): string {
    return this.details.field;
  }

  toJSON() {
    return {
      error: "incomplete_log",
      code: this.code,
      field: this.details.field,
      message: this.message,
      details: {
        ...this.details,
        received: this.details.received?.substring(0, 50),
      },
    };
  }
}

export interface DuplicateBlockErrorDetails {
  code: "duplicate_block";
  message: string;
  blockKind: KnownBlockKind;
  count: number;
}

/** Raised only under the "error" duplicate policy. */
export class DuplicateBlockError extends Error {
  public readonly code = "duplicate_block" as const;
  public readonly details: DuplicateBlockErrorDetails;

  constructor(details: DuplicateBlockErrorDetails) {
    super(details.message);
    this.name = "DuplicateBlockError";
    this.details = details;
  }

  get field(): string {
    return this.details.blockKind;
  }

  toJSON() {
    return {
      error: "incomplete_log",
      code: this.code,
      field: this.details.blockKind,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Thrown by block accessors when a present field does not have the expected
 * shape. Never escapes report assembly.
 */
export class MalformedFieldError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "MalformedFieldError";
    this.field = field;
  }
}

export type OverviewHardError = StructuralInputError | DuplicateBlockError;

export function isOverviewHardError(err: unknown): err is OverviewHardError {
  return err instanceof StructuralInputError || err instanceof DuplicateBlockError;
}
