import type { RetrievalCostEstimate, RetrievalCostModel } from "./costModel";
import type { ChatLogSummary, ChunkMeans } from "./types";

const formatFixed = (value: number | null, digits: number): string =>
  value === null ? "n/a" : value.toFixed(digits);

function formatChunkMeans(means: ChunkMeans | null): string {
  return means === null ? "n/a" : JSON.stringify(means);
}

export function formatSummaryReport(summary: ChatLogSummary): string[] {
  const lines = [
    "==== Chatbot Performance Summary ====",
    `Total log entries analyzed: ${summary.totalEntries}`,
    `P99 Latency: ${formatFixed(summary.p99LatencyMs, 1)} ms`,
    `Average generation input tokens: ${formatFixed(summary.avgGenerationInputTokens, 1)}`,
    summary.correctnessRate === null ?
      "No answer correctness feedback available."
    : `Answer correctness rate: ${(summary.correctnessRate * 100).toFixed(2)}%`,
    "",
    "Average chunk counts for incorrect answers:",
    formatChunkMeans(summary.chunkMeansIncorrect),
    "",
    "Average chunk counts for correct answers:",
    formatChunkMeans(summary.chunkMeansCorrect),
  ];
  return lines;
}

export function formatTradeOffReport(
  summary: ChatLogSummary,
  model: RetrievalCostModel,
  estimate: RetrievalCostEstimate,
): string[] {
  return [
    `Option B estimated monthly cost increase: $${estimate.monthlyCostIncrease.toFixed(2)}`,
    `Current P99 latency: ${formatFixed(summary.p99LatencyMs, 1)} ms`,
    `Option A adds ${model.optionALatencyMs}ms fixed latency.`,
    `Option B adds ${model.optionBLatencyMs}ms retrieval latency.`,
  ];
}
