import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

dotenv.config();

const DEPLOYMENT_ID_REGEX = /^[a-zA-Z0-9._-]+$/;

const ConfigSchema = z.object({
  MICROSOFT_CLIENT_ID: z.string().min(1),
  MICROSOFT_CLIENT_SECRET: z.string().min(1),
  MICROSOFT_TENANT_ID: z.string().min(1).default("common"),

  PUBLIC_BASE_URL: z.string().url(),
  OAUTH_REDIRECT_PATH: z.string().startsWith("/").default("/auth/microsoft/callback"),
  WEBHOOK_PATH: z.string().startsWith("/").default("/webhooks/graph"),
  WEBHOOK_CLIENT_STATE: z.string().min(1).max(128).default("MeetingBridgeSyncV1"),
  DEPLOYMENT_ID: z.string().regex(DEPLOYMENT_ID_REGEX).default("default"),

  TOKEN_ENCRYPTION_KEY: z.string().min(16),
  SQLITE_PATH: z.string().min(1).default("./data/bridge.db"),
  HTTP_HOST: z.string().min(1).default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().positive().default(8080),
  SUBSCRIPTION_RENEWAL_INTERVAL_HOURS: z.coerce.number().positive().default(24),
  LOCAL_TIME_ZONE: z
    .string()
    .min(1)
    .default("UTC")
    .refine(isSupportedTimeZone, { message: "Unknown IANA time zone" }),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface AppConfig {
  microsoftClientId: string;
  microsoftClientSecret: string;
  microsoftTenantId: string;

  publicBaseUrl: string;
  oauthRedirectPath: string;
  webhookPath: string;
  webhookClientState: string;
  deploymentId: string;

  tokenEncryptionKey: string;
  sqlitePath: string;
  httpHost: string;
  httpPort: number;
  subscriptionRenewalIntervalHours: number;
  localTimeZone: string;
  logLevel: string;
}

type ParsedRawConfig = z.infer<typeof ConfigSchema>;

function isSupportedTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone }).format();
    return true;
  } catch {
    return false;
  }
}

function parseRaw(env: NodeJS.ProcessEnv): ParsedRawConfig {
  const result = ConfigSchema.safeParse({
    MICROSOFT_CLIENT_ID: env.MICROSOFT_CLIENT_ID,
    MICROSOFT_CLIENT_SECRET: env.MICROSOFT_CLIENT_SECRET,
    MICROSOFT_TENANT_ID: env.MICROSOFT_TENANT_ID,

    PUBLIC_BASE_URL: env.PUBLIC_BASE_URL,
    OAUTH_REDIRECT_PATH: env.OAUTH_REDIRECT_PATH,
    WEBHOOK_PATH: env.WEBHOOK_PATH,
    WEBHOOK_CLIENT_STATE: env.WEBHOOK_CLIENT_STATE,
    DEPLOYMENT_ID: env.DEPLOYMENT_ID,

    TOKEN_ENCRYPTION_KEY: env.TOKEN_ENCRYPTION_KEY,
    SQLITE_PATH: env.SQLITE_PATH,
    HTTP_HOST: env.HTTP_HOST,
    HTTP_PORT: env.HTTP_PORT,
    SUBSCRIPTION_RENEWAL_INTERVAL_HOURS: env.SUBSCRIPTION_RENEWAL_INTERVAL_HOURS,
    LOCAL_TIME_ZONE: env.LOCAL_TIME_ZONE,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseRaw(env);

  return {
    microsoftClientId: parsed.MICROSOFT_CLIENT_ID,
    microsoftClientSecret: parsed.MICROSOFT_CLIENT_SECRET,
    microsoftTenantId: parsed.MICROSOFT_TENANT_ID,

    publicBaseUrl: parsed.PUBLIC_BASE_URL.replace(/\/+$/, ""),
    oauthRedirectPath: parsed.OAUTH_REDIRECT_PATH,
    webhookPath: parsed.WEBHOOK_PATH,
    webhookClientState: parsed.WEBHOOK_CLIENT_STATE,
    deploymentId: parsed.DEPLOYMENT_ID,

    tokenEncryptionKey: parsed.TOKEN_ENCRYPTION_KEY,
    sqlitePath: parsed.SQLITE_PATH === ":memory:" ? ":memory:" : path.resolve(parsed.SQLITE_PATH),
    httpHost: parsed.HTTP_HOST,
    httpPort: parsed.HTTP_PORT,
    subscriptionRenewalIntervalHours: parsed.SUBSCRIPTION_RENEWAL_INTERVAL_HOURS,
    localTimeZone: parsed.LOCAL_TIME_ZONE,
    logLevel: parsed.LOG_LEVEL,
  };
}

export function webhookUrl(config: Pick<AppConfig, "publicBaseUrl" | "webhookPath">): string {
  return `${config.publicBaseUrl}${config.webhookPath}`;
}

export function oauthRedirectUri(
  config: Pick<AppConfig, "publicBaseUrl" | "oauthRedirectPath">,
): string {
  return `${config.publicBaseUrl}${config.oauthRedirectPath}`;
}
