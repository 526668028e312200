import { Command } from "commander";
import { resolveServeConfig, type ServeFlags } from "./core/config";
import { ProxyServiceFactory } from "./factory/proxyServiceFactory";
import { createLogger } from "./logging/logger";
import type { ServeConfig } from "./schemas/config-schema";
import { CertificateManager } from "./ssl/certificateManager";

export const VERSION = process.env.HOPCHAIN_VERSION ?? "dev";
export const COMMIT = process.env.HOPCHAIN_COMMIT ?? "unknown";
export const BUILD_DATE = process.env.HOPCHAIN_BUILD_DATE ?? "unknown";

export interface CliHandlers {
  serve(config: ServeConfig): Promise<void>;
  print(line: string): void;
}

export function versionLines(): string[] {
  return [`hopchain version ${VERSION}`, `  commit: ${COMMIT}`, `  built:  ${BUILD_DATE}`];
}

export async function runServer(config: ServeConfig): Promise<void> {
  const logger = createLogger({
    level: config.logLevel,
    format: config.logFormat,
    serviceName: config.serviceName,
  });

  logger.info(
    {
      port: config.port,
      timeout_ms: config.timeoutMs,
      log_level: config.logLevel,
      log_format: config.logFormat,
      log_headers: config.logHeaders,
      tls: Boolean(config.tls),
      upstream_tls_insecure: config.upstreamTlsInsecure,
    },
    "Starting microservice"
  );

  const tls = config.tls
    ? await new CertificateManager().loadCertificate(config.tls.cert, config.tls.key)
    : undefined;

  const server = ProxyServiceFactory.createServer(config, logger, tls);
  await server.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ error: String(err) }, "Shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

const defaultHandlers: CliHandlers = {
  serve: runServer,
  print: (line) => console.log(line),
};

function parsePort(value: string): number {
  return Number(value);
}

export function buildProgram(handlers: CliHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("hopchain")
    .description("A composable HTTP proxy node for building mock microservice topologies")
    .version(VERSION, "-v, --version", "Print the version number");

  program
    .command("serve")
    .description(
      "Start the HTTP proxy server.\n\n" +
        "Paths are read as a chain of directives:\n" +
        "  /proxy/[http[s]://]host[:port]/...   forward the rest of the path to host\n" +
        "  /fault/<code>[/<percentage>]/...     answer with <code>, percentage of the time"
    )
    .option("-p, --port <port>", "HTTP server port (default 8080)", parsePort)
    .option("-t, --timeout <duration>", "Request timeout, e.g. 30s or 500ms (default 30s)")
    .option("-s, --service-name <name>", "Service identifier in responses (default proxy)")
    .option("-l, --log-level <level>", "Log level: debug, info, warn, error (default info)")
    .option("-f, --log-format <format>", "Log output format: json, text (default json)")
    .option("--log-headers", "Log request and response headers with sensitive values redacted")
    .option("--tls-cert <path>", "PEM certificate to serve HTTPS with")
    .option("--tls-key <path>", "PEM private key to serve HTTPS with")
    .option("--upstream-tls-insecure", "Skip certificate verification on HTTPS next hops")
    .option("--config <path>", "YAML file with default values for the options above")
    .action(async (flags: ServeFlags) => {
      const config = await resolveServeConfig(flags);
      await handlers.serve(config);
    });

  program
    .command("version")
    .description("Print version information")
    .action(() => {
      for (const line of versionLines()) handlers.print(line);
    });

  return program;
}
