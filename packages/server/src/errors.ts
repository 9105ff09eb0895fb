/**
 * Typed failures surfaced to callers. Every route maps a `ServiceError` to
 * `{ error: code, message }` with its status code.
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string, code = "not_found") {
    super(message, code, 404);
  }
}

export class DeviceNotFoundError extends NotFoundError {
  constructor(deviceId: string) {
    super(`Device not found: ${deviceId}`, "device_not_found");
  }
}

export class UnitNotFoundError extends NotFoundError {
  constructor(unitId: string) {
    super(`Model not found: ${unitId}`, "unit_not_found");
  }
}

export class JobNotFoundError extends NotFoundError {
  constructor(jobId: string) {
    super(`Training job not found: ${jobId}`, "job_not_found");
  }
}

export class BuilderNotFoundError extends NotFoundError {
  constructor(builderId: string) {
    super(`Plugin not found: ${builderId}`, "plugin_not_found");
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super(message, "validation_error", 400);
  }
}

export class UnsupportedTypeError extends ServiceError {
  constructor(type: string) {
    super(`Unsupported model type: ${type}`, "unsupported_type", 400);
  }
}

export class UnsupportedFormatError extends ServiceError {
  constructor(format: string) {
    super(`Unsupported export format: ${format}`, "unsupported_format", 400);
  }
}

export class PreferenceUnsatisfiableError extends ServiceError {
  constructor(preference: string) {
    super(
      `No device satisfies preference: ${preference}`,
      "preference_unsatisfiable",
      409,
    );
  }
}

export class InvalidStateError extends ServiceError {
  constructor(message: string) {
    super(message, "invalid_state", 409);
  }
}

export class UnitBusyError extends ServiceError {
  constructor(message: string) {
    super(message, "unit_busy", 409);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
