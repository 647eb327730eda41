export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class PredictorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends PredictorError {}

export class InvalidPredictorGroupError extends InvalidRequestError {
  constructor(readonly identifier: string, allowed: readonly string[]) {
    super(`Unknown predictor group '${identifier}'; expected one of ${allowed.join(", ")}`);
  }
}

/** The request is well-formed but lacks something a requested group needs. */
export class ConfigurationError extends PredictorError {}

export class ColumnCollisionError extends PredictorError {
  constructor(readonly column: string, readonly existingOwner: string, readonly incomingOwner: string) {
    super(`Column '${column}' from ${incomingOwner} collides with the same column from ${existingOwner}`);
  }
}

/** A backing store or provider answered with something other than data. */
export class CollaboratorError extends PredictorError {
  constructor(readonly collaborator: string, message: string) {
    super(`${collaborator}: ${message}`);
  }
}
