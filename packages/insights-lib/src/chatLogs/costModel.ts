/**
 * Inputs of the retrieval trade-off estimate: what it costs per month to
 * feed `extraChunks` more retrieved chunks into every generation.
 */
export interface RetrievalCostModel {
  extraChunks: number;
  tokensPerChunk: number;
  queriesPerMonth: number;
  /** USD */
  costPerMillionTokens: number;
  /** Fixed latency added by the reranking option. */
  optionALatencyMs: number;
  /** Retrieval latency added by the extra-chunks option. */
  optionBLatencyMs: number;
}

export const DEFAULT_COST_MODEL: Readonly<RetrievalCostModel> = Object.freeze({
  extraChunks: 6,
  tokensPerChunk: 400,
  queriesPerMonth: 100_000,
  costPerMillionTokens: 3.0,
  optionALatencyMs: 600,
  optionBLatencyMs: 250,
});

export interface RetrievalCostEstimate {
  extraTokensPerQuery: number;
  extraTokensPerMonth: number;
  extraTokensMillions: number;
  monthlyCostIncrease: number;
}

export function estimateRetrievalCost(
  model: RetrievalCostModel = DEFAULT_COST_MODEL,
): RetrievalCostEstimate {
  const extraTokensPerQuery = model.extraChunks * model.tokensPerChunk;
  const extraTokensPerMonth = extraTokensPerQuery * model.queriesPerMonth;
  const extraTokensMillions = extraTokensPerMonth / 1_000_000;
  return {
    extraTokensPerQuery,
    extraTokensPerMonth,
    extraTokensMillions,
    monthlyCostIncrease: extraTokensMillions * model.costPerMillionTokens,
  };
}
