/**
 * APPLICATION ERRORS
 *
 * Anything thrown out of a route handler as an AppError is rendered by the
 * global error handler as `{ ok: false, error: code, message }` with the
 * error's status code.
 */

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * No refresh cycle has published yet. Distinct from a SKIP verdict.
 */
export class CacheUnpopulatedError extends AppError {
  constructor() {
    super(503, 'CACHE_UNPOPULATED', 'Data not yet available. Please wait for the first refresh.');
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

/**
 * Invalid configuration at boot. Never raised once the service is running.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
