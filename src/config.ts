import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";

// Load environment variables from .env
dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const commaList = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATA_DIR: z.string().default("data"),
  CITY_DB_PATH: z.string().optional(),
  ASN_DB_PATH: z.string().optional(),
  PROXY_DB_PATH: z.string().optional(),
  ATTRIBUTION_DIR: z.string().optional(),
  REVERSE_DNS_ENABLED: booleanFlag,
  DNS_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  REDIS_HOST: z.string().optional(),
  ATTRIBUTION_REDIS_DATASETS: commaList,
});

export interface AppConfig {
  port: number;
  dataDir: string;
  cityDbPath: string;
  asnDbPath: string;
  proxyDbPath: string;
  attributionDir: string;
  reverseDns: {
    enabled: boolean;
    timeoutMs: number;
  };
  // Connection details are read by the redis client itself
  redis: {
    host: string | null;
    attributionDatasets: string[];
  };
}

/**
 * Build the runtime configuration from an environment map.
 * Database paths default to well-known file names inside DATA_DIR.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const dataDir = path.resolve(process.cwd(), vars.DATA_DIR);

  return {
    port: vars.PORT,
    dataDir,
    cityDbPath: vars.CITY_DB_PATH || path.join(dataDir, "GeoLite2-City.mmdb"),
    asnDbPath: vars.ASN_DB_PATH || path.join(dataDir, "GeoLite2-ASN.mmdb"),
    proxyDbPath:
      vars.PROXY_DB_PATH || path.join(dataDir, "IP2PROXY-LITE-PX11.CSV"),
    attributionDir: vars.ATTRIBUTION_DIR || path.join(dataDir, "org"),
    reverseDns: {
      enabled: vars.REVERSE_DNS_ENABLED,
      timeoutMs: vars.DNS_TIMEOUT_MS,
    },
    redis: {
      host: vars.REDIS_HOST || null,
      attributionDatasets: vars.ATTRIBUTION_REDIS_DATASETS,
    },
  };
}
