import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { type ServeConfig, serveConfigSchema } from "../schemas/config-schema";
import { ConfigError, toError } from "./errors";

/** Option values as commander hands them over; unset flags are undefined. */
export interface ServeFlags {
  port?: number;
  timeout?: string;
  serviceName?: string;
  logLevel?: string;
  logFormat?: string;
  logHeaders?: boolean;
  tlsCert?: string;
  tlsKey?: string;
  upstreamTlsInsecure?: boolean;
  config?: string;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function definedEntries(values: ConfigRecord): ConfigRecord {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export async function parseYAMLConfig(filepath: string): Promise<ConfigRecord> {
  let content: string;
  try {
    content = await readFile(filepath, "utf8");
  } catch (err) {
    throw new ConfigError(`failed to read config file ${filepath}: ${toError(err).message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ConfigError(`failed to parse config file ${filepath}: ${toError(err).message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`config file ${filepath} must contain a mapping`);
  }
  return parsed;
}

export async function validateConfig(raw: unknown): Promise<ServeConfig> {
  const result = await serveConfigSchema.safeParseAsync(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return result.data;
}

/** Flags win over the config file, which wins over the schema defaults. */
export function mergeConfig(fromFile: ConfigRecord, flags: ServeFlags): ConfigRecord {
  const { tlsCert, tlsKey, config: _configPath, ...rest } = flags;
  const merged: ConfigRecord = { ...fromFile, ...definedEntries({ ...rest }) };

  const tlsFlags = definedEntries({ cert: tlsCert, key: tlsKey });
  if (Object.keys(tlsFlags).length > 0) {
    merged.tls = { ...(isRecord(fromFile.tls) ? fromFile.tls : {}), ...tlsFlags };
  }

  return merged;
}

export async function resolveServeConfig(flags: ServeFlags): Promise<ServeConfig> {
  const fromFile = flags.config ? await parseYAMLConfig(flags.config) : {};
  return validateConfig(mergeConfig(fromFile, flags));
}
