/**
 * Azure Log Analytics Configuration Module
 *
 * @module config
 */

import { z } from "zod";
import { ConfigurationError, type ConfigurationErrorCode } from "../errors.js";

/** Data collector API version. */
export const API_VERSION = "2016-04-01";

/** Public cloud ingestion host; sovereign clouds use their own. */
export const DEFAULT_INGESTION_HOST = "ods.opinsights.azure.com";

/** Maximum Log-Type length accepted by the service. */
export const MAX_LOG_TYPE_LENGTH = 100;

/**
 * Retry configuration for batches the service rejected.
 */
export interface RetryConfig {
  /** Retries per batch after the first failed post. 0 disables retrying. */
  readonly maxAttempts: number;
  /** Delay before the first retry, in milliseconds. */
  readonly initialDelayMs: number;
  /** Upper bound for the backoff delay, in milliseconds. */
  readonly maxDelayMs: number;
  /** Backoff multiplier. */
  readonly multiplier: number;
  /** Add up to 25% random jitter to each delay. */
  readonly jitter: boolean;
  /** Batches allowed to wait for a retry at once. */
  readonly maxPending: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 15000,
  maxDelayMs: 120000,
  multiplier: 2,
  jitter: false,
  maxPending: 100,
};

/**
 * Log Analytics client configuration.
 */
export interface LogAnalyticsConfig {
  /** Workspace (customer) id; host segment and signature key id. */
  readonly workspaceId: string;
  /** Base64 primary or secondary workspace key. */
  readonly workspaceKey: string;
  /** Custom log table name, sent as the Log-Type header. */
  readonly logType: string;
  /** Static fields merged into every record. */
  readonly metadata: Readonly<Record<string, string>>;
  /** Ingestion host below the workspace id. */
  readonly ingestionHost: string;
  /** Data collector API version. */
  readonly apiVersion: string;
  /** Retry configuration. */
  readonly retry: RetryConfig;
}

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  workspaceId: z
    .string()
    .min(1, "workspace id is required")
    .regex(/^[A-Za-z0-9-]+$/, "workspace id may only contain letters, digits and '-'"),
  workspaceKey: z.string().min(1, "workspace key is required"),
  logType: z
    .string()
    .min(1, "log type is required")
    .max(MAX_LOG_TYPE_LENGTH)
    .regex(/^[A-Za-z0-9_]+$/, "log type may only contain letters, digits and '_'"),
  metadata: z.record(z.string()),
  ingestionHost: z.string().min(1),
  apiVersion: z.string().min(1),
  retry: z.object({
    maxAttempts: z.number().int().nonnegative().max(20),
    initialDelayMs: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
    multiplier: z.number().min(1),
    jitter: z.boolean(),
    maxPending: z.number().int().positive(),
  }),
});

const ISSUE_CODES: Partial<Record<string, ConfigurationErrorCode>> = {
  workspaceId: "InvalidWorkspaceId",
  workspaceKey: "InvalidWorkspaceKey",
  logType: "InvalidLogType",
  metadata: "InvalidMetadata",
};

/**
 * Validates a configuration.
 *
 * @throws ConfigurationError naming the first offending field
 */
export function validateConfig(config: LogAnalyticsConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    const field = String(result.error.issues[0]?.path[0] ?? "");
    throw new ConfigurationError(
      `Invalid configuration: ${issues.join(", ")}`,
      ISSUE_CODES[field] ?? "InvalidConfig"
    );
  }
}

/**
 * Ingestion URL for a configuration.
 */
export function buildIngestionUrl(
  config: Pick<LogAnalyticsConfig, "workspaceId" | "ingestionHost" | "apiVersion">
): string {
  return `https://${config.workspaceId}.${config.ingestionHost}/api/logs?api-version=${config.apiVersion}`;
}

/**
 * Partial configuration for builder and `from`.
 */
export type PartialLogAnalyticsConfig = Partial<{
  workspaceId: string;
  workspaceKey: string;
  logType: string;
  metadata: Record<string, string>;
  ingestionHost: string;
  apiVersion: string;
  retry: Partial<RetryConfig>;
}>;

function createDefaultConfig(): LogAnalyticsConfig {
  return {
    workspaceId: "",
    workspaceKey: "",
    logType: "",
    metadata: {},
    ingestionHost: DEFAULT_INGESTION_HOST,
    apiVersion: API_VERSION,
    retry: { ...DEFAULT_RETRY_CONFIG },
  };
}

/**
 * Configuration builder.
 */
export class LogAnalyticsConfigBuilder {
  private config: LogAnalyticsConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  workspaceId(value: string): this {
    this.config = { ...this.config, workspaceId: value };
    return this;
  }

  workspaceKey(value: string): this {
    this.config = { ...this.config, workspaceKey: value };
    return this;
  }

  logType(value: string): this {
    this.config = { ...this.config, logType: value };
    return this;
  }

  /**
   * Merges fields into the static metadata.
   */
  metadata(value: Record<string, string>): this {
    this.config = { ...this.config, metadata: { ...this.config.metadata, ...value } };
    return this;
  }

  ingestionHost(value: string): this {
    this.config = { ...this.config, ingestionHost: value };
    return this;
  }

  apiVersion(value: string): this {
    this.config = { ...this.config, apiVersion: value };
    return this;
  }

  retry(value: Partial<RetryConfig>): this {
    this.config = {
      ...this.config,
      retry: { ...this.config.retry, ...value },
    };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): LogAnalyticsConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

function parseMetadataEnv(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Metadata is not valid JSON: ${reason}`, "InvalidMetadata");
  }

  const result = z.record(z.string()).safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError("Metadata must be a JSON object of string values", "InvalidMetadata");
  }
  return result.data;
}

/**
 * LogAnalyticsConfig namespace with factory methods.
 */
export const LogAnalyticsConfig = {
  builder(): LogAnalyticsConfigBuilder {
    return new LogAnalyticsConfigBuilder();
  },

  /**
   * Creates a validated configuration from partial values.
   */
  from(partial: PartialLogAnalyticsConfig): LogAnalyticsConfig {
    const defaults = createDefaultConfig();
    const config: LogAnalyticsConfig = {
      workspaceId: partial.workspaceId ?? defaults.workspaceId,
      workspaceKey: partial.workspaceKey ?? defaults.workspaceKey,
      logType: partial.logType ?? defaults.logType,
      metadata: { ...(partial.metadata ?? defaults.metadata) },
      ingestionHost: partial.ingestionHost ?? defaults.ingestionHost,
      apiVersion: partial.apiVersion ?? defaults.apiVersion,
      retry: { ...defaults.retry, ...partial.retry },
    };
    validateConfig(config);
    return config;
  },

  /**
   * Creates configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): LogAnalyticsConfig {
    const builder = new LogAnalyticsConfigBuilder();

    builder.workspaceId(env["AZURE_LOG_ANALYTICS_WORKSPACE_ID"] ?? "");
    builder.workspaceKey(env["AZURE_LOG_ANALYTICS_WORKSPACE_KEY"] ?? "");
    builder.logType(env["AZURE_LOG_ANALYTICS_LOG_TYPE"] ?? "");

    if (env["AZURE_LOG_ANALYTICS_METADATA"]) {
      builder.metadata(parseMetadataEnv(env["AZURE_LOG_ANALYTICS_METADATA"]));
    }

    if (env["AZURE_LOG_ANALYTICS_INGESTION_HOST"]) {
      builder.ingestionHost(env["AZURE_LOG_ANALYTICS_INGESTION_HOST"]);
    }

    if (env["AZURE_LOG_ANALYTICS_MAX_RETRIES"]) {
      builder.retry({ maxAttempts: parseInt(env["AZURE_LOG_ANALYTICS_MAX_RETRIES"], 10) });
    }

    if (env["AZURE_LOG_ANALYTICS_RETRY_DELAY_MS"]) {
      builder.retry({ initialDelayMs: parseInt(env["AZURE_LOG_ANALYTICS_RETRY_DELAY_MS"], 10) });
    }

    return builder.build();
  },
};
