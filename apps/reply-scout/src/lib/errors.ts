/** Base class for every error a pipeline run raises on purpose. */
export class ScoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigValidationError extends ScoutError {
  constructor(message: string) {
    super(`Config validation error: ${message}`);
  }
}

export class FetchError extends ScoutError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Fetch failed for ${source}: ${message}`, options);
    this.source = source;
  }
}

export class FilterConfigError extends ScoutError {
  constructor(message: string) {
    super(`Invalid filter rules: ${message}`);
  }
}

export class ScoreParseError extends ScoutError {
  readonly itemId: string;
  readonly response: string;

  constructor(itemId: string, message: string, response: string) {
    super(`Unusable scorer response for ${itemId}: ${message}`);
    this.itemId = itemId;
    this.response = response;
  }
}

export class ScoreQuotaError extends ScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ScorerCallError extends ScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ScorerUnavailableError extends ScoutError {
  constructor(message: string) {
    super(message);
  }
}

export class DeliveryError extends ScoutError {
  readonly deliveredChunks: number;
  readonly totalChunks: number;

  constructor(
    message: string,
    deliveredChunks: number,
    totalChunks: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.deliveredChunks = deliveredChunks;
    this.totalChunks = totalChunks;
  }
}

export class StoreCorruptionError extends ScoutError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Record store at ${path} is unreadable: ${message}`, options);
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a numeric HTTP-ish status from SDK errors (OpenAI, snoowrap, fetch wrappers).
 */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
