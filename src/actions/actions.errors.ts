import type { FieldErrors } from "./actions.types.js";

export type ActionStoreErrorKind = "validation" | "not_found" | "storage";

export abstract class ActionStoreError extends Error {
  abstract readonly kind: ActionStoreErrorKind;
}

export class ValidationError extends ActionStoreError {
  readonly kind = "validation";

  constructor(readonly fields: FieldErrors) {
    super(`Invalid fields: ${Object.keys(fields).join(", ")}`);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ActionStoreError {
  readonly kind = "not_found";

  constructor(readonly id: number) {
    super(`Action ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class StorageError extends ActionStoreError {
  readonly kind = "storage";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}
