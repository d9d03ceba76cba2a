export class JobClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JobClientError';
  }
}

export class ConfigurationError extends JobClientError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends JobClientError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], options?: { cause?: unknown }) {
    super(
      issues.length > 0 ? `${message}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}` : message,
      options
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * The request never produced an HTTP response (DNS, refused connection, timeout).
 */
export class TransportError extends JobClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The scheduler answered with a non-2xx status, or with a body that is not the expected JSON.
 */
export class SchedulerError extends JobClientError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, message?: string) {
    super(message ?? (body || `scheduler responded with HTTP ${status}`));
    this.name = 'SchedulerError';
    this.status = status;
    this.body = body;
  }
}

export class WaitTimeoutError extends JobClientError {
  readonly pending: string[];

  constructor(timeoutMs: number, pending: string[]) {
    super(`timed out after ${timeoutMs}ms waiting for ${pending.length} job(s)`);
    this.name = 'WaitTimeoutError';
    this.pending = pending;
  }
}
