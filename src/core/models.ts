import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";
import type { Logger } from "pino";

export type HttpScheme = "http" | "https";

export interface TerminalDirective {
  kind: "terminal";
  remainingPath: "/";
}

export interface FaultDirective {
  kind: "fault";
  statusCode: number;
  percentage: number;
  remainingPath: string;
}

export interface ForwardDirective {
  kind: "forward";
  nextHop: string;
  scheme: HttpScheme;
  remainingPath: string;
}

export type Directive = TerminalDirective | FaultDirective | ForwardDirective;

/** Flat view of a directive, as it appears in logs. */
export interface DirectiveSummary {
  nextHop: string;
  remainingPath: string;
  isTerminal: boolean;
  isFault: boolean;
  faultStatusCode?: number;
  faultPercentage?: number;
}

export interface ResponseEnvelope {
  status: number;
  service: string;
  message: string;
}

export interface ExecutionRequest {
  requestId: string;
  method: string;
  headers: IncomingHttpHeaders;
  body: Readable;
}

export interface ExecutionContext {
  serviceName: string;
  signal: AbortSignal;
  logger: Logger;
}

export interface UpstreamResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: Readable;
}

export interface LocalResult {
  kind: "local";
  status: number;
  envelope: ResponseEnvelope;
}

export interface RelayResult {
  kind: "relay";
  upstream: UpstreamResponse;
}

export interface ErrorResult {
  kind: "error";
  status: number;
  message: string;
}

export type ExecutionResult = LocalResult | RelayResult | ErrorResult;

export interface TlsCredentials {
  cert: Buffer;
  key: Buffer;
}
