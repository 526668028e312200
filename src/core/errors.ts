export class ProxyError extends Error {
  constructor(message: string, public statusCode: number = 500) {
    super(message);
    this.name = "ProxyError";
  }
}

export type ParseErrorKind =
  | "InvalidFaultCode"
  | "InvalidPercentage"
  | "EmptyServiceName"
  | "UnrecognizedPrefix"
  | "InvalidEncoding";

export class ParseError extends ProxyError {
  constructor(public readonly kind: ParseErrorKind, message: string) {
    super(message, 400);
    this.name = "ParseError";
  }
}

export class UpstreamError extends ProxyError {
  constructor(public readonly target: string, originalError: Error) {
    super(`Upstream ${target} failed: ${originalError.message}`, 502);
    this.name = "UpstreamError";
  }
}

export class EncodingError extends ProxyError {
  constructor(originalError: Error) {
    super(`Response error: ${originalError.message}`, 500);
    this.name = "EncodingError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
