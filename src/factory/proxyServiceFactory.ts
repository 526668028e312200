import type { Logger } from "pino";
import type { IProxyClient, IRandomSource, IRequestExecutor, IResponseWriter } from "../core/interfaces";
import type { TlsCredentials } from "../core/models";
import { HeaderLoggingExecutor } from "../handlers/headerLoggingExecutor";
import { HeaderLoggingWriter } from "../handlers/headerLoggingWriter";
import { RequestExecutor } from "../handlers/requestExecutor";
import { ResponseWriter } from "../handlers/responseWriter";
import { HttpProxyClient } from "../proxy/httpProxyClient";
import { MathRandomSource } from "../random/mathRandom";
import { PathInterpreter } from "../rules/path-interpreter";
import type { ServeConfig } from "../schemas/config-schema";
import { HttpServer } from "../server/httpServer";

export interface ProxyServiceOverrides {
  random?: IRandomSource;
  proxyClient?: IProxyClient;
  host?: string;
}

export class ProxyServiceFactory {
  static createServer(
    config: ServeConfig,
    logger: Logger,
    tls?: TlsCredentials,
    overrides: ProxyServiceOverrides = {}
  ): HttpServer {
    const interpreter = new PathInterpreter();
    const proxyClient = overrides.proxyClient ?? new HttpProxyClient({
      timeoutMs: config.timeoutMs,
      upstreamTlsInsecure: config.upstreamTlsInsecure,
    });
    const executor = this.createExecutor(
      new RequestExecutor(interpreter, proxyClient, overrides.random ?? new MathRandomSource()),
      config.logHeaders
    );

    return new HttpServer(
      {
        port: config.port,
        host: overrides.host,
        serviceName: config.serviceName,
        timeoutMs: config.timeoutMs,
        tls,
        onStop: () => proxyClient.destroy(),
      },
      interpreter,
      executor,
      this.createWriter(config.logHeaders),
      logger
    );
  }

  private static createExecutor(executor: RequestExecutor, logHeaders: boolean): IRequestExecutor {
    return logHeaders ? new HeaderLoggingExecutor(executor) : executor;
  }

  private static createWriter(logHeaders: boolean): IResponseWriter {
    const writer = new ResponseWriter();
    return logHeaders ? new HeaderLoggingWriter(writer) : writer;
  }
}
