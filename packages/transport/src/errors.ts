export type TransportErrorCode =
  | "CONNECTION_FAILURE"
  | "CONNECTION_CLOSED"
  | "INCOMPLETE_MESSAGE"
  | "MALFORMED_RESPONSE"
  | "INVALID_COMMAND";

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.code = code;
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function asTransportError(
  error: unknown,
  fallbackCode: TransportErrorCode,
  fallbackMessage: string,
): TransportError {
  if (isTransportError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new TransportError(fallbackCode, `${fallbackMessage}: ${error.message}`, { cause: error });
  }
  return new TransportError(fallbackCode, fallbackMessage, { cause: error });
}

/**
 * Transport failures leave the channel in an unknown state. Callers release
 * the cached connection whenever one of these escapes an exchange.
 */
export function invalidatesConnection(error: TransportError): boolean {
  return error.code !== "INVALID_COMMAND";
}
