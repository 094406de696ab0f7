import fs from "node:fs";
import path from "node:path";
import { writeCsv } from "../export/csv";
import { logger } from "../utils/logger";
import {
  DEFAULT_HISTOGRAM_BINS,
  chunkSourceMeans,
  latencyByCorrectness,
  latencyHistogram,
  summarizeLogs,
  type ChunkSourceMean,
  type LatencyDistribution,
} from "./analysis";
import {
  DEFAULT_COST_MODEL,
  estimateRetrievalCost,
  type RetrievalCostEstimate,
  type RetrievalCostModel,
} from "./costModel";
import { loadChatLogs, preprocessLogs } from "./preprocess";
import { formatSummaryReport, formatTradeOffReport } from "./report";
import { CHAT_LOG_COLUMNS, type ChatLogSummary } from "./types";

const log = logger.scope("chat-logs");

export const LATENCY_CHART_FILE = "latency_distribution.json";
export const CHUNK_CHART_FILE = "chunk_source_counts.json";
export const SUMMARY_CSV_FILE = "log_analysis_summary.csv";

export interface ChatLogAnalysisArgs {
  logfile: string;
  /** Defaults to the log file's directory. */
  outputDir?: string;
  histogramBins?: number;
  costModel?: RetrievalCostModel;
  /** Receives the report lines; defaults to stdout. */
  print?: (line: string) => void;
}

export interface ChatLogAnalysisResult {
  summary: ChatLogSummary;
  estimate: RetrievalCostEstimate;
  files: {
    latencyChart: string;
    chunkChart: string;
    summaryCsv: string;
  };
}

function writeJson(filePath: string, value: unknown): void {
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

export function runChatLogAnalysis(
  args: ChatLogAnalysisArgs,
): ChatLogAnalysisResult {
  const print = args.print ?? ((line: string) => console.log(line));
  const costModel = args.costModel ?? DEFAULT_COST_MODEL;
  const outputDir = args.outputDir ?? path.dirname(args.logfile);
  fs.mkdirSync(outputDir, { recursive: true });

  const records = preprocessLogs(loadChatLogs(args.logfile));
  const summary = summarizeLogs(records);
  formatSummaryReport(summary).forEach(print);

  const latencyChart = path.join(outputDir, LATENCY_CHART_FILE);
  const distribution: LatencyDistribution = {
    histogram: latencyHistogram(
      records,
      args.histogramBins ?? DEFAULT_HISTOGRAM_BINS,
    ),
    byCorrectness: latencyByCorrectness(records),
  };
  writeJson(latencyChart, distribution);
  log.info(`Latency distribution data saved to ${latencyChart}`);

  const chunkChart = path.join(outputDir, CHUNK_CHART_FILE);
  const chunkMeans: ChunkSourceMean[] = chunkSourceMeans(records);
  writeJson(chunkChart, chunkMeans);
  log.info(`Chunk source data saved to ${chunkChart}`);

  const estimate = estimateRetrievalCost(costModel);
  print("");
  formatTradeOffReport(summary, costModel, estimate).forEach(print);

  const summaryCsv = path.join(outputDir, SUMMARY_CSV_FILE);
  writeCsv(summaryCsv, { columns: CHAT_LOG_COLUMNS, rows: records });
  log.info(`Summary CSV saved as ${summaryCsv}`);

  return {
    summary,
    estimate,
    files: { latencyChart, chunkChart, summaryCsv },
  };
}
