import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { SourceLoadError } from "../src/errors";
import {
  chunkSourceMeans,
  latencyByCorrectness,
  latencyHistogram,
  summarizeLogs,
} from "../src/chatLogs/analysis";
import { estimateRetrievalCost } from "../src/chatLogs/costModel";
import {
  countChunkSources,
  feedbackToCorrectness,
  loadChatLogs,
  preprocessLogs,
  toNumeric,
} from "../src/chatLogs/preprocess";
import { formatSummaryReport, formatTradeOffReport } from "../src/chatLogs/report";
import {
  CHUNK_CHART_FILE,
  SUMMARY_CSV_FILE,
  runChatLogAnalysis,
} from "../src/chatLogs/runner";
import { boxStats, histogram, mean, percentile } from "../src/chatLogs/stats";
import { LogLevel, logger } from "../src/utils/logger";

const logFixture = path.resolve(__dirname, "fixtures", "chat_logs.json");

describe("Chat log analysis", () => {
  let previousLevel: LogLevel;

  before(() => {
    previousLevel = logger.getLevel();
    logger.setLevel(LogLevel.ERROR);
  });

  after(() => {
    logger.setLevel(previousLevel);
  });

  describe("stats", () => {
    it("should interpolate percentiles between ranks", () => {
      expect(percentile([10, 20, 30, 40, 50], 50)).to.equal(30);
      expect(percentile([1, 2], 50)).to.equal(1.5);
      expect(percentile([100, 200, 300, 400], 99)).to.be.closeTo(397, 1e-9);
      expect(percentile([], 99)).to.equal(null);
    });

    it("should average only present values", () => {
      expect(mean([1, null, 3])).to.equal(2);
      expect(mean([null])).to.equal(null);
    });

    it("should bin values with an inclusive last edge", () => {
      expect(histogram([100, 200, 300, 400], 3)).to.deep.equal({
        binEdges: [100, 200, 300, 400],
        counts: [1, 1, 2],
      });
    });

    it("should widen a single-valued sample around its value", () => {
      expect(histogram([5, 5], 2)).to.deep.equal({
        binEdges: [4.5, 5, 5.5],
        counts: [0, 2],
      });
    });

    it("should bin samples larger than the engine's argument limit", () => {
      const values = Array.from({ length: 200_000 }, (_, i) => i % 5000);
      const result = histogram(values, 30);
      expect(result.binEdges[0]).to.equal(0);
      expect(result.binEdges[30]).to.equal(4999);
      expect(result.counts).to.have.length(30);
      expect(result.counts.reduce((sum, count) => sum + count, 0)).to.equal(
        200_000,
      );
    });

    it("should round a fractional bin count down", () => {
      expect(histogram([100, 200, 300, 400], 3.7)).to.deep.equal({
        binEdges: [100, 200, 300, 400],
        counts: [1, 1, 2],
      });
      expect(histogram([100, 200], 0.5)).to.deep.equal({
        binEdges: [],
        counts: [],
      });
      expect(histogram([100, 200], Number.NaN)).to.deep.equal({
        binEdges: [],
        counts: [],
      });
    });

    it("should compute box statistics", () => {
      expect(boxStats([100, 200])).to.deep.equal({
        count: 2,
        min: 100,
        q1: 125,
        median: 150,
        q3: 175,
        max: 200,
      });
      expect(boxStats([])).to.equal(null);
    });
  });

  describe("preprocessing", () => {
    it("should coerce numeric fields", () => {
      expect(toNumeric(undefined)).to.equal(0);
      expect(toNumeric(undefined, null)).to.equal(null);
      expect(toNumeric(null)).to.equal(null);
      expect(toNumeric(" 12 ")).to.equal(12);
      expect(toNumeric("fast")).to.equal(null);
    });

    it("should map feedback to correctness", () => {
      expect(feedbackToCorrectness("thumb_up")).to.equal(true);
      expect(feedbackToCorrectness("Thumb_Down")).to.equal(false);
      expect(feedbackToCorrectness("meh")).to.equal(null);
      expect(feedbackToCorrectness(undefined)).to.equal(null);
    });

    it("should count chunks per source", () => {
      expect(
        countChunkSources([
          { source: "Wiki" },
          { source: "PDF / Wiki mirror" },
          { source: "Confluence" },
          { title: "untitled" },
          "stray",
        ]),
      ).to.deep.equal({ wiki_chunks: 2, pdf_chunks: 1, conf_chunks: 1 });
      expect(countChunkSources(undefined)).to.deep.equal({
        wiki_chunks: 0,
        pdf_chunks: 0,
        conf_chunks: 0,
      });
    });

    it("should drop entries without a numeric latency", () => {
      const records = preprocessLogs(loadChatLogs(logFixture));
      expect(records.map((r) => r.latency_ms)).to.deep.equal([
        100, 300, 200, 400,
      ]);
      expect(records[1]).to.deep.equal({
        latency_ms: 300,
        retrieval_time_ms: 0,
        generation_time_ms: 0,
        generation_input_tokens: 3000,
        generation_output_tokens: 0,
        answer_correct: false,
        wiki_chunks: 1,
        pdf_chunks: 0,
        conf_chunks: 2,
      });
      expect(records[3].generation_input_tokens).to.equal(null);
      expect(records[3].answer_correct).to.equal(null);
    });

    it("should label an unreadable log file", () => {
      expect(() => loadChatLogs(path.join(os.tmpdir(), "no-such-logs.json")))
        .to.throw(SourceLoadError, "Failed to load chat logs")
        .with.property("source", "chat-logs");
    });
  });

  describe("summary", () => {
    const records = preprocessLogs(loadChatLogs(logFixture));

    it("should summarize latency, tokens and correctness", () => {
      const summary = summarizeLogs(records);
      expect(summary.totalEntries).to.equal(4);
      expect(summary.p99LatencyMs).to.be.closeTo(397, 1e-9);
      expect(summary.avgGenerationInputTokens).to.equal(2000);
      expect(summary.correctnessRate).to.be.closeTo(2 / 3, 1e-12);
      expect(summary.chunkMeansCorrect).to.deep.equal({
        wiki_chunks: 1,
        pdf_chunks: 0.5,
        conf_chunks: 0,
      });
      expect(summary.chunkMeansIncorrect).to.deep.equal({
        wiki_chunks: 1,
        pdf_chunks: 0,
        conf_chunks: 2,
      });
    });

    it("should report missing feedback", () => {
      const summary = summarizeLogs([{ ...records[3] }]);
      expect(summary.correctnessRate).to.equal(null);
      expect(formatSummaryReport(summary)[4]).to.equal(
        "No answer correctness feedback available.",
      );
    });

    it("should format the summary report", () => {
      expect(formatSummaryReport(summarizeLogs(records)).slice(0, 5)).to.deep.equal([
        "==== Chatbot Performance Summary ====",
        "Total log entries analyzed: 4",
        "P99 Latency: 397.0 ms",
        "Average generation input tokens: 2000.0",
        "Answer correctness rate: 66.67%",
      ]);
    });

    it("should build chart series", () => {
      expect(latencyHistogram(records, 3).counts).to.deep.equal([1, 1, 2]);
      const month = Array.from({ length: 250_000 }, (_, i) => ({
        ...records[0],
        latency_ms: 100 + (i % 900),
      }));
      expect(latencyHistogram(month).counts).to.have.length(30);
      expect(Object.keys(latencyByCorrectness(records))).to.deep.equal([
        "false",
        "true",
      ]);
      expect(latencyByCorrectness(records).true?.median).to.equal(150);
      expect(chunkSourceMeans(records)).to.deep.equal([
        { answerCorrect: "False", source: "wiki_chunks", avgChunks: 1 },
        { answerCorrect: "True", source: "wiki_chunks", avgChunks: 1 },
        { answerCorrect: "False", source: "pdf_chunks", avgChunks: 0 },
        { answerCorrect: "True", source: "pdf_chunks", avgChunks: 0.5 },
        { answerCorrect: "False", source: "conf_chunks", avgChunks: 2 },
        { answerCorrect: "True", source: "conf_chunks", avgChunks: 0 },
      ]);
    });
  });

  describe("cost model", () => {
    it("should estimate the monthly cost of extra chunks", () => {
      expect(estimateRetrievalCost()).to.deep.equal({
        extraTokensPerQuery: 2400,
        extraTokensPerMonth: 240_000_000,
        extraTokensMillions: 240,
        monthlyCostIncrease: 720,
      });
    });

    it("should format the trade-off lines", () => {
      const model = {
        extraChunks: 2,
        tokensPerChunk: 500,
        queriesPerMonth: 1_000_000,
        costPerMillionTokens: 1.5,
        optionALatencyMs: 100,
        optionBLatencyMs: 50,
      };
      const lines = formatTradeOffReport(
        summarizeLogs(preprocessLogs(loadChatLogs(logFixture))),
        model,
        estimateRetrievalCost(model),
      );
      expect(lines).to.deep.equal([
        "Option B estimated monthly cost increase: $1500.00",
        "Current P99 latency: 397.0 ms",
        "Option A adds 100ms fixed latency.",
        "Option B adds 50ms retrieval latency.",
      ]);
    });
  });

  describe("runChatLogAnalysis", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "insights-chat-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should print the report and write chart data and CSV", () => {
      const printed: string[] = [];
      const result = runChatLogAnalysis({
        logfile: logFixture,
        outputDir: tempDir,
        print: (line) => printed.push(line),
      });

      expect(printed[0]).to.equal("==== Chatbot Performance Summary ====");
      expect(printed).to.include(
        "Option B estimated monthly cost increase: $720.00",
      );
      expect(result.files.chunkChart).to.equal(path.join(tempDir, CHUNK_CHART_FILE));

      const chart: unknown = JSON.parse(
        fs.readFileSync(result.files.chunkChart, "utf-8"),
      );
      expect(chart).to.have.length(6);

      const csv = fs
        .readFileSync(path.join(tempDir, SUMMARY_CSV_FILE), "utf-8")
        .trimEnd()
        .split("\n");
      expect(csv[0]).to.equal(
        "latency_ms,retrieval_time_ms,generation_time_ms,generation_input_tokens,generation_output_tokens,answer_correct,wiki_chunks,pdf_chunks,conf_chunks",
      );
      expect(csv[1]).to.equal("100,20,80,1000,200,true,1,1,0");
      expect(csv[4]).to.equal("400,0,0,,0,,0,0,0");
    });
  });
});
