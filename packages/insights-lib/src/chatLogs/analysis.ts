import { boxStats, histogram, mean, percentile } from "./stats";
import type { BoxStats, Histogram } from "./stats";
import {
  CHUNK_SOURCES,
  type ChatLogRecord,
  type ChatLogSummary,
  type ChunkMeans,
  type ChunkSource,
} from "./types";

export const DEFAULT_HISTOGRAM_BINS = 30;

function chunkMeans(records: readonly ChatLogRecord[]): ChunkMeans | null {
  if (records.length === 0) return null;
  const avg = (source: ChunkSource) =>
    mean(records.map((record) => record[source])) ?? 0;
  return {
    wiki_chunks: avg("wiki_chunks"),
    pdf_chunks: avg("pdf_chunks"),
    conf_chunks: avg("conf_chunks"),
  };
}

function withCorrectness(
  records: readonly ChatLogRecord[],
  correct: boolean,
): ChatLogRecord[] {
  return records.filter((record) => record.answer_correct === correct);
}

export function summarizeLogs(
  records: readonly ChatLogRecord[],
): ChatLogSummary {
  const feedback = records.flatMap((record) =>
    record.answer_correct === null ? [] : [record.answer_correct ? 1 : 0],
  );
  return {
    totalEntries: records.length,
    p99LatencyMs: percentile(
      records.map((record) => record.latency_ms),
      99,
    ),
    avgGenerationInputTokens: mean(
      records.map((record) => record.generation_input_tokens),
    ),
    correctnessRate: mean(feedback),
    chunkMeansCorrect: chunkMeans(withCorrectness(records, true)),
    chunkMeansIncorrect: chunkMeans(withCorrectness(records, false)),
  };
}

export interface LatencyDistribution {
  histogram: Histogram;
  byCorrectness: Partial<Record<"true" | "false", BoxStats>>;
}

export function latencyHistogram(
  records: readonly ChatLogRecord[],
  bins: number = DEFAULT_HISTOGRAM_BINS,
): Histogram {
  return histogram(
    records.map((record) => record.latency_ms),
    bins,
  );
}

/**
 * Box statistics of latency per feedback group. Entries without feedback
 * belong to neither group; an empty group is omitted.
 */
export function latencyByCorrectness(
  records: readonly ChatLogRecord[],
): LatencyDistribution["byCorrectness"] {
  const groups: LatencyDistribution["byCorrectness"] = {};
  for (const correct of [false, true]) {
    const stats = boxStats(
      withCorrectness(records, correct).map((record) => record.latency_ms),
    );
    if (stats) groups[correct ? "true" : "false"] = stats;
  }
  return groups;
}

export interface ChunkSourceMean {
  answerCorrect: "True" | "False";
  source: ChunkSource;
  avgChunks: number;
}

/**
 * Mean chunk count per source and feedback group, one entry per
 * (source, group), sources outermost.
 */
export function chunkSourceMeans(
  records: readonly ChatLogRecord[],
): ChunkSourceMean[] {
  const groups = [
    {
      answerCorrect: "False",
      means: chunkMeans(withCorrectness(records, false)),
    },
    {
      answerCorrect: "True",
      means: chunkMeans(withCorrectness(records, true)),
    },
  ] as const;
  return CHUNK_SOURCES.flatMap((source) =>
    groups.flatMap(({ answerCorrect, means }) =>
      means ? [{ answerCorrect, source, avgChunks: means[source] }] : [],
    ),
  );
}
