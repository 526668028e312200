import { randomUUID } from "node:crypto";
import http from "node:http";
import https from "node:https";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import { ParseError, toError } from "../core/errors";
import type { IHttpServer, IPathInterpreter, IRequestExecutor, IResponseWriter } from "../core/interfaces";
import type { Directive, TlsCredentials } from "../core/models";
import { decodePath, firstHeaderValue, summarizeDirective } from "../core/utils";
import { CertificateManager } from "../ssl/certificateManager";
import { createDeadline } from "./deadline";

export interface HttpServerOptions {
  port: number;
  host?: string;
  serviceName: string;
  timeoutMs: number;
  tls?: TlsCredentials;
  /** Runs after the listener has closed. */
  onStop?: () => void;
}

export class HttpServer implements IHttpServer {
  readonly app: Express;
  private server?: http.Server | https.Server;

  constructor(
    private options: HttpServerOptions,
    private interpreter: IPathInterpreter,
    private executor: IRequestExecutor,
    private writer: IResponseWriter,
    private logger: Logger,
    private certificateManager: CertificateManager = new CertificateManager()
  ) {
    this.app = this.createApp();
  }

  async start(): Promise<void> {
    const { tls } = this.options;
    const server = tls
      ? https.createServer({ cert: tls.cert, key: tls.key, ...this.certificateManager.getDefaultSSLOptions() }, this.app)
      : http.createServer(this.app);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    this.logger.info({ port: this.port, tls: Boolean(tls) }, "Server listening");
  }

  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    throw new Error("Server is not listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      this.server = undefined;
      this.logger.info("Server stopped");
    }
    this.options.onStop?.();
  }

  private createApp(): Express {
    const app = express();
    app.disable("x-powered-by");
    // only the exact /health is reserved; /HEALTH and /health/ are directives
    app.set("case sensitive routing", true);
    app.set("strict routing", true);

    app.all("/health", (req, res) => {
      this.logger.debug(
        { remote_addr: req.socket.remoteAddress, user_agent: req.get("user-agent") },
        "Health check request"
      );
      res.status(200).json({ status: "healthy", service: this.options.serviceName });
    });

    app.use((req: Request, res: Response, next: NextFunction) => {
      this.handleRequest(req, res).catch(next);
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      this.logger.error({ error: toError(err).message }, "Error handling request");
      this.writer
        .write(res, { kind: "error", status: 500, message: "Internal server error" }, this.logger)
        .catch((writeErr: unknown) => {
          this.logger.error({ error: toError(writeErr).message }, "Failed to write error response");
        });
    });

    return app;
  }

  private async handleRequest(req: Request, res: Response): Promise<void> {
    const startedAt = Date.now();
    const requestId = firstHeaderValue(req.headers["x-request-id"]) ?? randomUUID();
    res.setHeader("x-request-id", requestId);

    const logger = this.logger.child({
      request_id: requestId,
      method: req.method,
      path: req.path,
      remote_addr: req.socket.remoteAddress,
    });
    logger.info({ user_agent: req.get("user-agent"), query: req.query }, "Incoming request");

    let directive: Directive;
    try {
      directive = this.interpreter.parse(decodePath(req.path));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      logger.error({ error: err.message, kind: err.kind }, "Path parsing failed");
      await this.writer.write(res, { kind: "error", status: err.statusCode, message: err.message }, logger);
      return;
    }
    logger.debug(summarizeDirective(directive), "Path parsed successfully");

    const deadline = createDeadline(res, this.options.timeoutMs);
    try {
      const result = await this.executor.execute(
        { requestId, method: req.method, headers: req.headers, body: req },
        directive,
        { serviceName: this.options.serviceName, signal: deadline.signal, logger }
      );
      await this.writer.write(res, result, logger);
    } finally {
      deadline.dispose();
    }

    logger.info({ duration_ms: Date.now() - startedAt, status_code: res.statusCode }, "Request completed");
  }
}
