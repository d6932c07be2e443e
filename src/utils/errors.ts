export class SleepTrackerError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SleepTrackerError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends SleepTrackerError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class SleepStoreError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('SLEEP_STORE', message, options);
    this.name = 'SleepStoreError';
  }
}

/** Thrown into a job whose work scope was cancelled while it was suspended. */
export class JobCancelledError extends SleepTrackerError {
  constructor(scope: string, options?: ErrorOptions) {
    super(`Work scope "${scope}" was cancelled`, 'JOB_CANCELLED', options);
    this.name = 'JobCancelledError';
  }
}

export class ValidationError extends SleepTrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends SleepTrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
