import fs from "node:fs";
import path from "node:path";
import * as toml from "toml";
import { z } from "zod";
import { ConfigError, describeCause } from "../errors";

export const CONFIG_FILE_NAME = "insights.config.toml";

const LoggingSchema = z
  .object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    color: z.boolean().default(true),
    /** JSON lines on stderr instead of human-readable output */
    structured: z.boolean().default(false),
  })
  .default({});

const OrdersSchema = z
  .object({
    orders_file: z.string().min(1).default("customer_orders.json"),
    vip_file: z.string().min(1).default("vip_customers.txt"),
    output_csv: z.string().min(1).optional(),
  })
  .default({});

const ChatLogsSchema = z
  .object({
    logfile: z.string().min(1).default("logs.json"),
    histogram_bins: z.number().int().positive().default(30),
  })
  .default({});

const CostModelSchema = z
  .object({
    extra_chunks: z.number().nonnegative().default(6),
    tokens_per_chunk: z.number().nonnegative().default(400),
    queries_per_month: z.number().nonnegative().default(100_000),
    cost_per_million_tokens: z.number().nonnegative().default(3.0),
    option_a_latency_ms: z.number().nonnegative().default(600),
    option_b_latency_ms: z.number().nonnegative().default(250),
  })
  .default({});

export const ProjectConfigSchema = z.object({
  logging: LoggingSchema,
  orders: OrdersSchema,
  chat_logs: ChatLogsSchema,
  cost_model: CostModelSchema,
});

/**
 * Project configuration from insights.config.toml, with defaults filled in
 */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}

/**
 * Walks up the directory tree to find insights.config.toml
 */
export function findConfigFile(
  startDir: string = process.cwd(),
): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root directory
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Parses and validates TOML text.
 */
export function parseProjectConfig(
  content: string,
  source = CONFIG_FILE_NAME,
): ProjectConfig {
  let raw: unknown;
  try {
    raw = toml.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${source}: ${describeCause(error)}`,
      { cause: error },
    );
  }

  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Reads the project configuration. An explicit path must exist; without one
 * the file is looked up from the working directory, and defaults apply when
 * none is found.
 */
export function readProjectConfig(explicitPath?: string): ProjectConfig {
  const configPath =
    explicitPath ? path.resolve(explicitPath) : findConfigFile();
  if (!configPath) {
    return defaultProjectConfig();
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${configPath}: ${describeCause(error)}`,
      { cause: error },
    );
  }
  return parseProjectConfig(content, configPath);
}
