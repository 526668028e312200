import http from "node:http";
import https from "node:https";
import { toError, UpstreamError } from "../core/errors";
import type { IProxyClient } from "../core/interfaces";
import type { ExecutionRequest, UpstreamResponse } from "../core/models";
import { firstHeaderValue } from "../core/utils";

// Body-describing headers travel with the forwarded body.
const FORWARDED_HEADERS = ["content-type", "content-length"];

export interface HttpProxyClientOptions {
  timeoutMs: number;
  upstreamTlsInsecure: boolean;
}

export class HttpProxyClient implements IProxyClient {
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;

  constructor(private options: HttpProxyClientOptions) {
    this.httpAgent = new http.Agent({
      keepAlive: true,
      keepAliveMsecs: 30000,
      maxSockets: 50,
      maxFreeSockets: 10,
      scheduling: "fifo",
    });

    this.httpsAgent = new https.Agent({
      keepAlive: true,
      keepAliveMsecs: 30000,
      maxSockets: 50,
      maxFreeSockets: 10,
      scheduling: "fifo",
      rejectUnauthorized: !options.upstreamTlsInsecure,
    });
  }

  forward(target: string, request: ExecutionRequest, signal: AbortSignal): Promise<UpstreamResponse> {
    return new Promise((resolve, reject) => {
      let url: URL;
      try {
        url = new URL(target);
      } catch (err) {
        reject(new UpstreamError(target, toError(err)));
        return;
      }

      const useHttps = url.protocol === "https:";
      const requestModule = useHttps ? https : http;

      const outbound = requestModule.request(
        url,
        {
          method: request.method,
          headers: this.outboundHeaders(request),
          agent: useHttps ? this.httpsAgent : this.httpAgent,
          signal,
        },
        (response) => {
          resolve({ statusCode: response.statusCode ?? 502, headers: response.headers, body: response });
        }
      );

      outbound.on("error", (err) => {
        const cause = signal.aborted && signal.reason instanceof Error ? signal.reason : err;
        reject(new UpstreamError(target, cause));
      });

      if (this.options.timeoutMs > 0) {
        outbound.setTimeout(this.options.timeoutMs, () => {
          outbound.destroy(new Error(`request timed out after ${this.options.timeoutMs}ms`));
        });
      }

      request.body.pipe(outbound);
    });
  }

  private outboundHeaders(request: ExecutionRequest): http.OutgoingHttpHeaders {
    const headers: http.OutgoingHttpHeaders = { "x-request-id": request.requestId };
    for (const name of FORWARDED_HEADERS) {
      const value = firstHeaderValue(request.headers[name]);
      if (value !== undefined) headers[name] = value;
    }
    return headers;
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
