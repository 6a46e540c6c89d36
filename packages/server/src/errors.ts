/**
 * Cluster properties errors
 */

/**
 * Base error class for cluster properties failures
 */
export class ClusterPropertiesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClusterPropertiesError';
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown before any store access when a single-key update names a
 * property outside the known set
 */
export class PropertyValidationError extends ClusterPropertiesError {
  public readonly propertyName: string;

  constructor(propertyName: string) {
    super(`Not a known cluster property ${propertyName}`);
    this.name = 'PropertyValidationError';
    this.propertyName = propertyName;
  }
}

/**
 * Thrown at construction when a cron expression cannot be parsed
 */
export class ScheduleValidationError extends ClusterPropertiesError {
  public readonly expression: string;

  constructor(expression: string, reason: string) {
    super(`Invalid cron expression "${expression}": ${reason}`);
    this.name = 'ScheduleValidationError';
    this.expression = expression;
  }
}

/**
 * Wraps a transport failure of the coordination store (session loss,
 * protocol error, interruption). The original error is kept as `cause`.
 */
export class ClusterPropertiesIOError extends ClusterPropertiesError {
  public readonly path: string;

  constructor(message: string, path: string, cause: unknown) {
    super(message, { cause });
    this.name = 'ClusterPropertiesIOError';
    this.path = path;
  }
}

/**
 * Thrown when an update loop with a configured attempt bound lost every
 * compare-and-swap race
 */
export class RetriesExhaustedError extends ClusterPropertiesError {
  public readonly path: string;
  public readonly attempts: number;

  constructor(path: string, attempts: number) {
    super(`Gave up updating ${path} after ${attempts} conflicting attempts`);
    this.name = 'RetriesExhaustedError';
    this.path = path;
    this.attempts = attempts;
  }
}

/**
 * Thrown when an update loop with a configured deadline runs past it
 */
export class DeadlineExceededError extends ClusterPropertiesError {
  public readonly path: string;
  public readonly deadlineMs: number;

  constructor(path: string, deadlineMs: number) {
    super(`Updating ${path} did not complete within ${deadlineMs}ms`);
    this.name = 'DeadlineExceededError';
    this.path = path;
    this.deadlineMs = deadlineMs;
  }
}
