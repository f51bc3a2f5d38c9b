export const EMBEDDINGS_ERROR_CODES = [
  "invalid_request",
  "upstream_error",
  "upstream_timeout",
  "internal",
] as const;

export type EmbeddingsErrorCode = (typeof EMBEDDINGS_ERROR_CODES)[number];

export interface ErrorEnvelope {
  error: {
    code: EmbeddingsErrorCode;
    message: string;
  };
}

const STATUS_BY_CODE: Record<EmbeddingsErrorCode, number> = {
  invalid_request: 400,
  upstream_error: 503,
  upstream_timeout: 504,
  internal: 500,
};

const FIXED_MESSAGES: Record<Exclude<EmbeddingsErrorCode, "invalid_request">, string> = {
  upstream_error: "Embedding backend is unavailable.",
  upstream_timeout: "Embedding backend timed out.",
  internal: "Embedding generation failed.",
};

/**
 * Pipeline failure with a canonical code. `message` is for logs; only
 * `invalid_request` messages reach the client, and those describe the
 * caller's own input.
 */
export class EmbeddingsError extends Error {
  readonly code: EmbeddingsErrorCode;

  constructor(code: EmbeddingsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingsError";
    this.code = code;
  }
}

export function invalidRequest(message: string): EmbeddingsError {
  return new EmbeddingsError("invalid_request", message);
}

export function isEmbeddingsError(error: unknown): error is EmbeddingsError {
  return error instanceof EmbeddingsError;
}

export function statusForCode(code: EmbeddingsErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function publicMessageFor(error: EmbeddingsError): string {
  if (error.code === "invalid_request") { return error.message; }
  return FIXED_MESSAGES[error.code];
}

/** Maps any failure to its HTTP status and client-safe envelope. */
export function toErrorResponse(error: unknown): { status: number; body: ErrorEnvelope } {
  const known = isEmbeddingsError(error)
    ? error
    : new EmbeddingsError("internal", "Unexpected pipeline failure", { cause: error });

  return {
    status: statusForCode(known.code),
    body: { error: { code: known.code, message: publicMessageFor(known) } },
  };
}
