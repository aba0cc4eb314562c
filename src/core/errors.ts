/**
 * Commerce Error Kinds
 *
 * Every failure a checkout or order operation can report is one of these
 * classes. The API facade maps `code` and `httpStatus` onto the response;
 * callers and tests match on the class, never on the message text.
 */

export type CommerceErrorCode =
  | "not_found"
  | "validation_error"
  | "fulfillment_required"
  | "payment_failure"
  | "idempotency_conflict"
  | "invalid_state"
  | "forbidden"
  | "queue_full";

export abstract class CommerceError extends Error {
  abstract readonly code: CommerceErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends CommerceError {
  readonly code = "not_found" as const;
  readonly httpStatus = 404;

  constructor(
    public readonly resource: "checkout" | "order" | "line_item" | "product",
    public readonly id: string
  ) {
    super(`${resource.replace("_", " ")} ${id} not found`);
  }
}

export class ValidationError extends CommerceError {
  readonly code = "validation_error" as const;
  readonly httpStatus = 400;

  /** JSON path of the offending field, e.g. "$.line_items[0].quantity" */
  constructor(message: string, public readonly path?: string) {
    super(message);
  }
}

export class FulfillmentRequiredError extends CommerceError {
  readonly code = "fulfillment_required" as const;
  readonly httpStatus = 400;
}

export class PaymentFailureError extends CommerceError {
  readonly code = "payment_failure" as const;
  readonly httpStatus = 402;

  constructor(public readonly instrumentId: string) {
    super(`Payment failed for instrument ${instrumentId}`);
  }
}

export class IdempotencyConflictError extends CommerceError {
  readonly code = "idempotency_conflict" as const;
  readonly httpStatus = 409;

  constructor(public readonly key: string) {
    super(`Idempotency key ${key} was already used with a different request body`);
  }
}

export class InvalidStateError extends CommerceError {
  readonly code = "invalid_state" as const;
  readonly httpStatus = 409;

  constructor(
    public readonly entity: "checkout" | "order",
    public readonly status: string,
    operation: string
  ) {
    super(`Cannot ${operation} ${entity} in status ${status}`);
  }
}

export class ForbiddenError extends CommerceError {
  readonly code = "forbidden" as const;
  readonly httpStatus = 403;
}

/** Thrown when too many callers are already waiting on one lock key. */
export class QueueFullError extends CommerceError {
  readonly code = "queue_full" as const;
  readonly httpStatus = 503;

  constructor(
    public readonly key: string,
    public readonly maxQueueDepth: number
  ) {
    super(`Lock queue for ${key} is full (max ${maxQueueDepth} waiting)`);
  }
}

export function isCommerceError(err: unknown): err is CommerceError {
  return err instanceof CommerceError;
}
