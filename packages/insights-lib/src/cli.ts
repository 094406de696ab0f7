#!/usr/bin/env node

// Entry point of the `insights` binary: resolves configuration, then runs
// the order extraction or the chat log analysis.

import path from "node:path";
import process from "process";
import { Command } from "commander";
import { readProjectConfig, type ProjectConfig } from "./config/configFile";
import { runChatLogAnalysis } from "./chatLogs/runner";
import { runOrderExtraction } from "./orders/runner";
import { LogLevel, logger, parseLogLevel } from "./utils/logger";

interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

function loadConfig(options: GlobalOptions): ProjectConfig {
  const config = readProjectConfig(options.config);
  logger.configure({
    level:
      parseLogLevel(options.logLevel) ??
      parseLogLevel(process.env.INSIGHTS_LOG_LEVEL) ??
      parseLogLevel(config.logging.level) ??
      LogLevel.INFO,
    useColor: config.logging.color,
    structured: config.logging.structured,
  });
  return config;
}

const resolvePath = (filePath: string) => path.resolve(process.cwd(), filePath);

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("insights")
    .description("Flatten customer orders and analyze chatbot logs")
    .version("1.0.0")
    .option("--config <path>", "Path to insights.config.toml")
    .option("--log-level <level>", "debug, info, warn or error");

  program
    .command("orders")
    .description("Flatten nested customer orders into a typed table")
    .option("--orders <file>", "Customer orders snapshot (JSON)")
    .option("--vip <file>", "VIP customer ids, one per line")
    .option("--out <csv>", "Write the flattened table as CSV")
    .action((options: { orders?: string; vip?: string; out?: string }) => {
      const config = loadConfig(program.opts<GlobalOptions>());
      const outputCsv = options.out ?? config.orders.output_csv;
      runOrderExtraction({
        ordersFile: resolvePath(options.orders ?? config.orders.orders_file),
        vipFile: resolvePath(options.vip ?? config.orders.vip_file),
        outputCsv: outputCsv ? resolvePath(outputCsv) : undefined,
      });
    });

  program
    .command("chat-logs")
    .description("Analyze chatbot logs and write report data")
    .option("--logfile <file>", "Path to the logs JSON file")
    .action((options: { logfile?: string }) => {
      const config = loadConfig(program.opts<GlobalOptions>());
      const costModel = config.cost_model;
      runChatLogAnalysis({
        logfile: resolvePath(options.logfile ?? config.chat_logs.logfile),
        histogramBins: config.chat_logs.histogram_bins,
        costModel: {
          extraChunks: costModel.extra_chunks,
          tokensPerChunk: costModel.tokens_per_chunk,
          queriesPerMonth: costModel.queries_per_month,
          costPerMillionTokens: costModel.cost_per_million_tokens,
          optionALatencyMs: costModel.option_a_latency_ms,
          optionBLatencyMs: costModel.option_b_latency_ms,
        },
      });
    });

  return program;
}

/**
 * Runs the CLI. A failure is logged and sets the process exit code to 1,
 * which is also returned.
 */
export function main(argv: readonly string[] = process.argv): number {
  try {
    buildProgram().parse([...argv]);
    return 0;
  } catch (error) {
    logger.error("Error during processing", error);
    process.exitCode = 1;
    return 1;
  }
}

if (require.main === module) {
  main();
}
