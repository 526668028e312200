import { z } from "zod";
import { parseDuration } from "../core/utils";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export const LOG_FORMATS = ["json", "text"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

const portSchema = z
  .number({ invalid_type_error: "port must be a number" })
  .int("port must be an integer")
  .superRefine((port, ctx) => {
    if (port < 1 || port > 65535) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `port must be between 1 and 65535, got ${port}` });
    }
  });

const timeoutSchema = z
  .union([z.string(), z.number()], {
    errorMap: () => ({ message: "timeout must be a duration such as 30s or 500ms" }),
  })
  .transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `timeout must be a duration such as 30s or 500ms, got ${JSON.stringify(value)}` });
      return z.NEVER;
    }
    if (ms < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `timeout must be positive, got ${value}` });
      return z.NEVER;
    }
    return ms;
  });

const logLevelSchema = z.enum(LOG_LEVELS, {
  errorMap: (_issue, ctx) => ({
    message: `log-level must be one of [${LOG_LEVELS.join(", ")}], got ${JSON.stringify(ctx.data)}`,
  }),
});

const logFormatSchema = z.enum(LOG_FORMATS, {
  errorMap: (_issue, ctx) => ({
    message: `log-format must be one of [${LOG_FORMATS.join(", ")}], got ${JSON.stringify(ctx.data)}`,
  }),
});

const tlsSchema = z
  .object({
    cert: z.string().min(1, "tls-cert must not be empty").optional(),
    key: z.string().min(1, "tls-key must not be empty").optional(),
  })
  .strict();

export const serveConfigSchema = z
  .object({
    port: portSchema.default(8080),
    timeout: timeoutSchema.default("30s"),
    serviceName: z.string().trim().min(1, "service-name must not be empty").default("proxy"),
    logLevel: logLevelSchema.default("info"),
    logFormat: logFormatSchema.default("json"),
    logHeaders: z.boolean().default(false),
    tls: tlsSchema.optional(),
    upstreamTlsInsecure: z.boolean().default(false),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (Boolean(config.tls?.cert) !== Boolean(config.tls?.key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tls"],
        message: "tls-cert and tls-key must be provided together",
      });
    }
  })
  .transform(({ timeout, tls, ...rest }) => ({
    ...rest,
    timeoutMs: timeout,
    tls: tls?.cert && tls.key ? { cert: tls.cert, key: tls.key } : undefined,
  }));

export type ServeConfig = z.output<typeof serveConfigSchema>;
