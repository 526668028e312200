import type { ServerResponse } from "node:http";
import type { Logger } from "pino";
import type {
  Directive,
  ExecutionContext,
  ExecutionRequest,
  ExecutionResult,
  UpstreamResponse,
} from "./models";

export interface IPathInterpreter {
  parse(path: string): Directive;
}

export interface IRequestExecutor {
  execute(
    request: ExecutionRequest,
    directive: Directive,
    context: ExecutionContext
  ): Promise<ExecutionResult>;
}

export interface IResponseWriter {
  write(res: ServerResponse, result: ExecutionResult, logger: Logger): Promise<void>;
}

export interface IProxyClient {
  forward(target: string, request: ExecutionRequest, signal: AbortSignal): Promise<UpstreamResponse>;
  destroy(): void;
}

/** Uniform integers in [0, n). */
export interface IRandomSource {
  intn(n: number): number;
}

export interface IHttpServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}
