/**
 * One interaction as logged by the chatbot. Fields are optional and loosely
 * typed; see {@link preprocessLogs}.
 */
export interface RawLogEntry {
  response_latency_ms?: unknown;
  retrieval_time_ms?: unknown;
  generation_time_ms?: unknown;
  generation_input_tokens?: unknown;
  generation_output_tokens?: unknown;
  user_feedback?: unknown;
  retrieved_chunks?: unknown;
  [key: string]: unknown;
}

export interface ChunkCounts {
  wiki_chunks: number;
  pdf_chunks: number;
  conf_chunks: number;
}

export type ChunkSource = keyof ChunkCounts;

export const CHUNK_SOURCES: readonly ChunkSource[] = [
  "wiki_chunks",
  "pdf_chunks",
  "conf_chunks",
];

export interface ChatLogRecord extends ChunkCounts {
  latency_ms: number;
  retrieval_time_ms: number | null;
  generation_time_ms: number | null;
  generation_input_tokens: number | null;
  generation_output_tokens: number | null;
  answer_correct: boolean | null;
}

export const CHAT_LOG_COLUMNS: readonly (keyof ChatLogRecord)[] = [
  "latency_ms",
  "retrieval_time_ms",
  "generation_time_ms",
  "generation_input_tokens",
  "generation_output_tokens",
  "answer_correct",
  "wiki_chunks",
  "pdf_chunks",
  "conf_chunks",
];

export type ChunkMeans = Record<ChunkSource, number>;

export interface ChatLogSummary {
  totalEntries: number;
  p99LatencyMs: number | null;
  avgGenerationInputTokens: number | null;
  /** Share of `thumb_up` among entries with feedback, or null without any. */
  correctnessRate: number | null;
  chunkMeansCorrect: ChunkMeans | null;
  chunkMeansIncorrect: ChunkMeans | null;
}
