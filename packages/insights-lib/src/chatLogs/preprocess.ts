import fs from "node:fs";
import { z } from "zod";
import { SourceLoadError } from "../errors";
import { logger } from "../utils/logger";
import type {
  ChatLogRecord,
  ChunkCounts,
  RawLogEntry,
} from "./types";

const log = logger.scope("chat-logs");

const LogFileSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Reads a JSON array of log entries.
 *
 * @throws {SourceLoadError} with `source: "chat-logs"`
 */
export function loadChatLogs(filePath: string): RawLogEntry[] {
  let entries: RawLogEntry[];
  try {
    entries = LogFileSchema.parse(
      JSON.parse(fs.readFileSync(filePath, "utf-8")),
    );
  } catch (error) {
    log.error(`Failed to load logs from ${filePath}`, error);
    throw new SourceLoadError("chat-logs", filePath, error);
  }
  log.info(`Loaded ${entries.length} log entries from ${filePath}`);
  if (entries.length > 0) {
    log.debug(`Sample entry keys: ${Object.keys(entries[0]).join(", ")}`);
  }
  return entries;
}

/**
 * Numeric coercion of a log field: absent → `absent`, numbers and numeric
 * text → number, everything else → null.
 */
export function toNumeric(
  value: unknown,
  absent: number | null = 0,
): number | null {
  if (value === undefined) return absent;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function feedbackToCorrectness(feedback: unknown): boolean | null {
  if (typeof feedback !== "string") return null;
  switch (feedback.toLowerCase()) {
    case "thumb_up":
      return true;
    case "thumb_down":
      return false;
    default:
      return null;
  }
}

export function countChunkSources(chunks: unknown): ChunkCounts {
  const counts: ChunkCounts = { wiki_chunks: 0, pdf_chunks: 0, conf_chunks: 0 };
  if (!Array.isArray(chunks)) return counts;
  const list: unknown[] = chunks;
  for (const chunk of list) {
    const source =
      typeof chunk === "object" && chunk !== null && "source" in chunk ?
        chunk.source
      : undefined;
    if (typeof source !== "string") continue;
    if (source.includes("Wiki")) counts.wiki_chunks += 1;
    if (source.includes("PDF")) counts.pdf_chunks += 1;
    if (source.includes("Confluence")) counts.conf_chunks += 1;
  }
  return counts;
}

/**
 * Turns raw entries into records. Entries without a latency, or whose
 * latency is not numeric, are dropped.
 */
export function preprocessLogs(
  entries: readonly RawLogEntry[],
): ChatLogRecord[] {
  const records: ChatLogRecord[] = [];
  for (const entry of entries) {
    if (
      entry.response_latency_ms === undefined ||
      entry.response_latency_ms === null
    ) {
      continue;
    }
    const latency = toNumeric(entry.response_latency_ms, null);
    if (latency === null) continue;
    records.push({
      latency_ms: latency,
      retrieval_time_ms: toNumeric(entry.retrieval_time_ms),
      generation_time_ms: toNumeric(entry.generation_time_ms),
      generation_input_tokens: toNumeric(entry.generation_input_tokens),
      generation_output_tokens: toNumeric(entry.generation_output_tokens),
      answer_correct: feedbackToCorrectness(entry.user_feedback),
      ...countChunkSources(entry.retrieved_chunks),
    });
  }
  log.info(`Processed ${records.length} of ${entries.length} log entries`);
  return records;
}
