/** Raised when the Datastore server cannot be reached or times out. */
export class StoreConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreConnectionError';
  }
}

/** Raised when the Datastore server rejects the credentials (401/403). */
export class StoreAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreAuthError';
  }
}

/** Raised for any other non-2xx Datastore response. */
export class StoreRequestError extends Error {
  readonly status: number;
  constructor(operation: string, status: number, body: string) {
    super(`${operation} failed (${status}): ${body}`);
    this.name = 'StoreRequestError';
    this.status = status;
  }
}

/** Raised when an entity the operation depends on does not exist. */
export class EntityNotFoundError extends Error {
  readonly kind: string;
  readonly key: string;
  constructor(kind: string, key: string) {
    super(`${kind} not found: ${key}`);
    this.name = 'EntityNotFoundError';
    this.kind = kind;
    this.key = key;
  }
}

/** Raised when a stored property does not have the shape its record needs. */
export class MalformedEntityError extends Error {
  readonly kind: string;
  readonly property: string;
  constructor(kind: string, property: string, detail: string) {
    super(`Malformed ${kind}.${property}: ${detail}`);
    this.name = 'MalformedEntityError';
    this.kind = kind;
    this.property = property;
  }
}

/** Raised when environment configuration fails validation. */
export class ConfigValidationError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
