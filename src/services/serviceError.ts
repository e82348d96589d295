import type { FieldErrors } from "../types/crud";

export class ServiceError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "ServiceError";
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends ServiceError {
  constructor(public readonly errors: FieldErrors, message = "Submitted data is invalid.") {
    super(400, message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends ServiceError {
  constructor(message = "Record not found.") {
    super(404, message);
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class PermissionDeniedError extends ServiceError {
  constructor(message = "Forbidden.") {
    super(403, message);
    this.name = "PermissionDeniedError";
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

export class ConfigurationError extends ServiceError {
  constructor(message: string) {
    super(500, message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class UnknownFrameworkError extends ServiceError {
  constructor(public readonly framework: string) {
    super(500, `Unknown CSS framework "${framework}".`);
    this.name = "UnknownFrameworkError";
    Object.setPrototypeOf(this, UnknownFrameworkError.prototype);
  }
}
