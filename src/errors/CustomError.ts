export interface ErrorDetail {
  field: string;
  message: string;
}

export class CustomError extends Error {
  public code: string;
  public details?: ErrorDetail[];

  constructor(message: string, code: string, details?: ErrorDetail[]) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

/** The external statistics tool is missing or could not be spawned. */
export class SourceUnavailableError extends CustomError {
  public command: string;

  constructor(command: string, message: string = 'Telemetry source unavailable') {
    super(`${message}: ${command}`, 'SOURCE_UNAVAILABLE');
    this.command = command;
  }
}

export class CollectorStateError extends CustomError {
  constructor(message: string = 'Invalid collector state') {
    super(message, 'COLLECTOR_STATE');
  }
}

export class ValidationError extends CustomError {
  constructor(message: string = 'Validation error', details?: ErrorDetail[]) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

export class ConfigError extends CustomError {
  constructor(message: string = 'Configuration error') {
    super(message, 'CONFIG_ERROR');
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
