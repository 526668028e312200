import type { ServerResponse } from "node:http";
import { pipeline } from "node:stream/promises";
import type { Logger } from "pino";
import { EncodingError, toError } from "../core/errors";
import type { IResponseWriter } from "../core/interfaces";
import type { ErrorResult, ExecutionResult, LocalResult, RelayResult, ResponseEnvelope } from "../core/models";

export const JSON_CONTENT_TYPE = "application/json";
export const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

// Connection-scoped headers are never relayed.
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
]);

export type EnvelopeEncoder = (envelope: ResponseEnvelope) => string;

export const encodeEnvelope: EnvelopeEncoder = (envelope) => `${JSON.stringify(envelope)}\n`;

export class ResponseWriter implements IResponseWriter {
  constructor(private encode: EnvelopeEncoder = encodeEnvelope) { }

  async write(res: ServerResponse, result: ExecutionResult, logger: Logger): Promise<void> {
    switch (result.kind) {
      case "local":
        return this.writeLocal(res, result, logger);
      case "error":
        return this.writeError(res, result);
      case "relay":
        return this.writeRelay(res, result, logger);
    }
  }

  private writeError(res: ServerResponse, result: ErrorResult): void {
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.statusCode = result.status;
    res.setHeader("Content-Type", TEXT_CONTENT_TYPE);
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.end(`${result.message}\n`);
  }

  private writeLocal(res: ServerResponse, result: LocalResult, logger: Logger): void {
    let body: string;
    try {
      body = this.encodeOrThrow(result.envelope);
    } catch (err) {
      if (!(err instanceof EncodingError)) throw err;
      logger.error({ error: err.message }, "Failed to encode JSON response");
      this.writeError(res, { kind: "error", status: err.statusCode, message: err.message });
      return;
    }

    res.statusCode = result.status;
    res.setHeader("Content-Type", JSON_CONTENT_TYPE);
    res.end(body);
  }

  private async writeRelay(res: ServerResponse, result: RelayResult, logger: Logger): Promise<void> {
    const { upstream } = result;

    let copied = 0;
    for (const [name, value] of Object.entries(upstream.headers)) {
      if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) continue;
      res.setHeader(name, value);
      copied++;
    }
    res.statusCode = upstream.statusCode;

    try {
      await pipeline(upstream.body, res);
      logger.debug({ headers_copied: copied }, "Response forwarded successfully");
    } catch (err) {
      // pipeline has already destroyed both streams; the caller sees a cut connection
      logger.error({ error: toError(err).message, upstream_status: upstream.statusCode }, "Failed to copy response body");
    }
  }

  private encodeOrThrow(envelope: ResponseEnvelope): string {
    try {
      return this.encode(envelope);
    } catch (err) {
      throw new EncodingError(toError(err));
    }
  }
}
