// src/core/errors.ts

/** Base class for every failure the seeding run reports by kind. */
export class SeedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Store unreachable or schema could not be provisioned. Aborts the run. */
export class SetupFailure extends SeedError {}

/** A record was rejected by the store's required, choice, unique or reference rules. */
export class ValidationError extends SeedError {
  constructor(
    readonly collection: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${collection}: ${message}`, options);
  }
}

/** A business identifier has no storage identifier in the resolved map. */
export class ResolutionError extends SeedError {
  constructor(
    readonly kind: string,
    readonly businessId: string,
  ) {
    super(`No persisted ${kind} with business identifier ${businessId}`);
  }
}

/** A round-robin source collection is empty, so dependents cannot be linked. */
export class EmptySourceError extends SeedError {
  constructor(
    readonly dependent: string,
    readonly source: string,
  ) {
    super(`Cannot synthesize ${dependent} records: no persisted ${source} records to reference`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
