export interface ValidationError {
  field: string;
  message: string;
}

export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Network, HTTP 5xx, timeout or malformed response. Retried next cycle.
export class TransportError extends MonitorError {}

export class RateLimitError extends MonitorError {
  readonly resetAt?: Date;

  constructor(message: string, options?: { cause?: unknown; resetAt?: Date }) {
    super(message, options);
    this.resetAt = options?.resetAt;
  }
}

export class PermissionError extends MonitorError {}

export class NotFoundError extends MonitorError {}

export class ConfigError extends MonitorError {
  readonly issues: ValidationError[];

  constructor(issues: ValidationError[]) {
    super(
      issues.length === 1
        ? `Invalid configuration: ${issues[0].field}: ${issues[0].message}`
        : `Invalid configuration (${issues.length} issues)`
    );
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : String(err);
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function responseHeader(err: unknown, name: string): string | undefined {
  if (typeof err !== "object" || err === null || !("response" in err)) return undefined;
  const response = err.response;
  if (typeof response !== "object" || response === null || !("headers" in response)) return undefined;
  const headers = response.headers;
  if (typeof headers !== "object" || headers === null) return undefined;
  const value: unknown = Object.entries(headers).find(([key]) => key.toLowerCase() === name)?.[1];
  return typeof value === "string" || typeof value === "number" ? String(value) : undefined;
}

// GraphQL errors carry a `type` such as NOT_FOUND, RATE_LIMITED or FORBIDDEN.
function graphqlErrorTypes(err: unknown): string[] {
  if (typeof err !== "object" || err === null || !("errors" in err) || !Array.isArray(err.errors)) {
    return [];
  }
  const types: string[] = [];
  for (const item of err.errors) {
    if (typeof item === "object" && item !== null && "type" in item && typeof item.type === "string") {
      types.push(item.type);
    }
  }
  return types;
}

function rateLimitReset(err: unknown): Date | undefined {
  const reset = Number(responseHeader(err, "x-ratelimit-reset") ?? 0);
  if (reset > 0) return new Date(reset * 1000);
  const retryAfter = Number(responseHeader(err, "retry-after") ?? 0);
  if (retryAfter > 0) return new Date(Date.now() + retryAfter * 1000);
  return undefined;
}

/**
 * Maps an Octokit (REST or GraphQL) failure onto the monitor's error taxonomy.
 * `context` is prefixed to the message, e.g. "approve run 42 in acme/app".
 */
export function toMonitorError(err: unknown, context: string): MonitorError {
  if (err instanceof MonitorError) return err;

  const message = `${context}: ${errorMessage(err)}`;
  const status = httpStatus(err);
  const gqlTypes = graphqlErrorTypes(err);
  const mentionsRateLimit = /rate limit/i.test(errorMessage(err));

  if (status === 404 || gqlTypes.includes("NOT_FOUND")) {
    return new NotFoundError(message, { cause: err });
  }

  if (
    status === 429 ||
    gqlTypes.includes("RATE_LIMITED") ||
    (status === 403 && (responseHeader(err, "x-ratelimit-remaining") === "0" || mentionsRateLimit))
  ) {
    return new RateLimitError(message, { cause: err, resetAt: rateLimitReset(err) });
  }

  if (status === 401 || status === 403 || gqlTypes.includes("FORBIDDEN")) {
    return new PermissionError(message, { cause: err });
  }

  return new TransportError(message, { cause: err });
}
