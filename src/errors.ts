/**
 * Error taxonomy
 *
 * Configuration errors are fatal at startup. Service and backend errors are local
 * to one action: the dispatcher records them and the batch carries on.
 */

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid simulation config:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class ServiceError extends Error {
  readonly status: number;
  readonly endpoint: string;

  constructor(endpoint: string, status: number, body: string) {
    super(`Content service error (${status}) on ${endpoint}: ${body.slice(0, 200)}`);
    this.name = 'ServiceError';
    this.status = status;
    this.endpoint = endpoint;
  }
}

export class LanguageBackendError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'LanguageBackendError';
    this.status = status;
  }
}

export class FeedError extends Error {
  readonly feedUrl: string;
  readonly status?: number;

  constructor(feedUrl: string, message: string, status?: number) {
    super(`Feed ${feedUrl}: ${message}`);
    this.name = 'FeedError';
    this.feedUrl = feedUrl;
    this.status = status;
  }
}

export class ActionTimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`Timeout: ${label} exceeded ${ms}ms`);
    this.name = 'ActionTimeoutError';
  }
}

const TRANSIENT_STATUS = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Whether a failure is worth retrying for an idempotent light action.
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof ServiceError) {
    return TRANSIENT_STATUS.has(error.status);
  }
  if (error instanceof ActionTimeoutError) return false;
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return (
      msg.includes('econnrefused') ||
      msg.includes('econnreset') ||
      msg.includes('fetch failed') ||
      msg.includes('network')
    );
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
