/**
 * Error types and message helpers
 */

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Caller broke a structural contract (duplicate id, second parent, cycle).
 * Never caught inside the engine.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly problems: string[] = [],
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class DocumentError extends Error {
  constructor(
    message: string,
    readonly problems: string[] = [],
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'DocumentError';
  }
}

// Raised through the abort signal when a stream produces no chunk in time
export class StreamStalledError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`No response from model for ${timeoutMs}ms`);
    this.name = 'StreamStalledError';
  }
}

export class BackendError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`LLM API error: ${status} ${body}`);
    this.name = 'BackendError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function messageFromPayload(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  const inner = payload.error;
  if (isRecord(inner) && typeof inner.message === 'string' && inner.message) {
    return inner.message;
  }
  if (typeof inner === 'string' && inner) {
    return inner;
  }
  if (typeof payload.message === 'string' && payload.message) {
    return payload.message;
  }
  return undefined;
}

/**
 * Best-effort extraction of a readable message from a backend failure.
 * Servers often embed a JSON body like {"error":{"message":"..."}} after a status prefix.
 */
export function extractErrorMessage(error: unknown): string {
  const raw = error instanceof BackendError ? error.body : getErrorMessage(error);
  const start = raw.indexOf('{');
  if (start >= 0) {
    try {
      const found = messageFromPayload(JSON.parse(raw.slice(start)));
      if (found) return found;
    } catch {
      // not JSON, fall through to the raw text
    }
  }
  return getErrorMessage(error);
}
