import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readdir, readFile, writeFile } from "fs/promises";
import type { CompletionFn } from "@/lib/ai/client";
import { RetryPolicy } from "@/lib/ai/retry-policy";
import type { ExamInfoConfig, PipelineConfig } from "@/lib/config";
import { ConfigurationError, ProgressStateError } from "@/lib/errors";
import type { VerifiedQuestionRecord } from "@/lib/extraction/types";
import { createMemoryLogger } from "@/lib/logger";
import { CostTracker } from "@/lib/metering/cost-tracker";
import { BatchDriver, chunk, selectRecords, type BatchDriverOptions } from "@/lib/pipeline/batch-driver";
import { BatchStore } from "@/lib/pipeline/batch-store";
import { ProgressStore } from "@/lib/pipeline/progress-store";
import { assembleQuestion } from "@/lib/structuring/assemble";
import {
  AIStructuringClient,
  type StructureOutcome,
  type StructuringClient,
} from "@/lib/structuring/structuring-client";
import { batchFileSchema, candidateSchema, datasetSchema, type QuestionDataset } from "@/lib/validation/schemas";
import {
  candidateReply,
  completion,
  createFakeClock,
  examPaper,
  makeWorkDir,
  numberedPaper,
  questionBlock,
  removeWorkDir,
  testConfig,
  verifiedRecord,
} from "../../fixtures/exam-paper";

/** Answers every record with a well-formed question unless `onCall` returns an outcome. */
class FakeStructuringClient implements StructuringClient {
  readonly calls: number[] = [];

  constructor(
    private readonly exam: ExamInfoConfig,
    private readonly onCall: (record: VerifiedQuestionRecord) => StructureOutcome | undefined = () => undefined,
  ) {}

  async structure(record: VerifiedQuestionRecord, signal?: AbortSignal): Promise<StructureOutcome> {
    if (signal?.aborted) {
      return { ok: false, error: { number: record.number, code: "INTERRUPTED", reason: "Run interrupted", attempts: 0 } };
    }
    this.calls.push(record.number);
    const outcome = this.onCall(record);
    if (outcome) return outcome;
    const candidate = candidateSchema.parse(candidateReply(record.correctLabel));
    return { ok: true, question: assembleQuestion(candidate, record, this.exam), anomalies: [], attempts: 1 };
  }
}

async function readDataset(config: PipelineConfig): Promise<QuestionDataset> {
  return datasetSchema.parse(JSON.parse(await readFile(config.paths.outputPath, "utf-8")));
}

describe("BatchDriver", () => {
  let workDir: string;
  let config: PipelineConfig;

  function driver(overrides: Partial<BatchDriverOptions> = {}): BatchDriver {
    return new BatchDriver({
      config,
      costTracker: new CostTracker(config.costs),
      logger: createMemoryLogger(),
      ...overrides,
    });
  }

  beforeEach(async () => {
    workDir = await makeWorkDir();
    config = testConfig(workDir);
  });

  afterEach(async () => {
    await removeWorkDir(workDir);
  });

  it("processes every question in fixed-size batches", async () => {
    const client = new FakeStructuringClient(config.exam);
    const d = driver({ client });

    const report = await d.run(numberedPaper(5));

    expect(client.calls).toEqual([1, 2, 3, 4, 5]);
    expect(report.batchesWritten).toEqual([1, 2, 3]);
    expect(report.succeeded).toBe(5);
    expect(report.failed).toBe(0);
    expect(report.pending).toBe(0);
    expect(report.interrupted).toBe(false);
    expect(report.failureLogPath).toBeUndefined();
    expect(d.state).toBe("done");

    expect((await readdir(config.paths.batchesDir)).sort()).toEqual(["batch_0001.json", "batch_0002.json", "batch_0003.json"]);
    const dataset = await readDataset(config);
    expect(dataset.questions.map((q) => q.questionNumber)).toEqual([1, 2, 3, 4, 5]);
    expect(dataset.metadata.processingMethod).toBe("ai-structured:claude");
    expect(dataset.metadata.totalQuestions).toBe(5);

    const progress = await new ProgressStore(config.paths.progressFile).load();
    expect(progress.completedNumbers).toEqual([1, 2, 3, 4, 5]);
    expect(progress.lastBatchIndex).toBe(3);
  });

  it("requires a client unless running dry", async () => {
    await expect(driver().run(numberedPaper(1))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("keeps the current batch and leaves the rest pending when interrupted", async () => {
    const controller = new AbortController();
    const client: FakeStructuringClient = new FakeStructuringClient(config.exam, () => {
      if (client.calls.length === 3) controller.abort();
      return undefined;
    });
    const d = driver({ client, signal: controller.signal });

    const report = await d.run(numberedPaper(5));

    expect(report.interrupted).toBe(true);
    expect(report.succeeded).toBe(3);
    expect(report.pending).toBe(2);
    expect(report.batchesWritten).toEqual([1, 2]);
    expect(d.recordState(3)).toBe("succeeded");
    expect(d.recordState(4)).toBe("pending");
    expect((await readDataset(config)).questions.map((q) => q.questionNumber)).toEqual([1, 2, 3]);
  });

  it("resumes to the same output as an uninterrupted run", async () => {
    const controller = new AbortController();
    const first: FakeStructuringClient = new FakeStructuringClient(config.exam, () => {
      if (first.calls.length === 3) controller.abort();
      return undefined;
    });
    await driver({ client: first, signal: controller.signal }).run(numberedPaper(5));

    const second = new FakeStructuringClient(config.exam);
    const resumed = await driver({ client: second }).run(numberedPaper(5));

    expect(second.calls).toEqual([4, 5]);
    expect(resumed.alreadyCompleted).toBe(3);
    expect(resumed.batchesWritten).toEqual([3]);

    const otherDir = await makeWorkDir();
    try {
      const otherConfig = testConfig(otherDir);
      await new BatchDriver({
        config: otherConfig,
        client: new FakeStructuringClient(otherConfig.exam),
        costTracker: new CostTracker(otherConfig.costs),
        logger: createMemoryLogger(),
      }).run(numberedPaper(5));

      expect((await readDataset(config)).questions).toEqual((await readDataset(otherConfig)).questions);
    } finally {
      await removeWorkDir(otherDir);
    }
  });

  it("continues batch numbering when starting without resume", async () => {
    await driver({ client: new FakeStructuringClient(config.exam) }).run(numberedPaper(5));

    const client = new FakeStructuringClient(config.exam);
    const report = await driver({ client }).run(numberedPaper(5), { resume: false });

    expect(client.calls).toEqual([1, 2, 3, 4, 5]);
    expect(report.batchesWritten).toEqual([4, 5, 6]);
    expect(report.aggregate?.duplicatesReplaced).toBe(5);
    expect(report.aggregate?.totalQuestions).toBe(5);
  });

  it("limits the run to a question range", async () => {
    const client = new FakeStructuringClient(config.exam);
    const report = await driver({ client }).run(numberedPaper(6), { startQuestion: 2, endQuestion: 4 });

    expect(client.calls).toEqual([2, 3, 4]);
    expect(report.selected).toBe(3);
  });

  it("validates without calling the service on a dry run", async () => {
    const client = new FakeStructuringClient(config.exam);
    const report = await driver({ client }).run(numberedPaper(5), { dryRun: true });

    expect(client.calls).toEqual([]);
    expect(report.dryRun).toBe(true);
    expect(report.extracted).toBe(5);
    expect(report.validation).toEqual({ total: 5, valid: 5, invalid: 0, errorBreakdown: {} });
    expect(report.dryRunRecords?.[0]).toEqual({ number: 1, correctLabel: "C", ok: true, violations: [] });
    expect(report.cost.totalCost).toBe(0);
    expect(await readdir(workDir)).toEqual([]);
  });

  it("does not need a client for a dry run", async () => {
    const report = await driver().run(numberedPaper(2), { dryRun: true });
    expect(report.validation?.valid).toBe(2);
  });

  it("leaves blocks without four options out of progress", async () => {
    const client = new FakeStructuringClient(config.exam);
    const paper = examPaper([questionBlock(1), questionBlock(2, { optionCount: 3 }), questionBlock(3)]);

    const report = await driver({ client }).run(paper);

    expect(report.extracted).toBe(2);
    expect(report.skippedBlocks.map((s) => [s.number, s.code])).toEqual([[2, "OPTION_COUNT"]]);
    expect(client.calls).toEqual([1, 3]);
    const progress = await new ProgressStore(config.paths.progressFile).load();
    expect(progress.completedNumbers).toEqual([1, 3]);
    expect(progress.failedNumbers).toEqual({});
  });

  it("fails a record that does not pass pre-validation without dispatching it", async () => {
    const client = new FakeStructuringClient(config.exam);
    const paper = examPaper([questionBlock(1), questionBlock(2, { stem: "Find the acceleration of the body." }), questionBlock(3)]);

    const report = await driver({ client }).run(paper);

    expect(client.calls).toEqual([1, 3]);
    expect(report.failedNumbers).toEqual([2]);
    expect(report.failureLogPath).toBe(config.paths.failedLog);
    const progress = await new ProgressStore(config.paths.progressFile).load();
    expect(progress.failedNumbers).toEqual({ "2": "Pre-validation: Question text too short: 34 chars (min 50)" });

    const log = await readFile(config.paths.failedLog, "utf-8");
    expect(log).toMatch(/^\S+ \| Q2 \| Pre-validation: Question text too short: 34 chars \(min 50\)\n$/);
  });

  it("records a service failure and carries on", async () => {
    const client = new FakeStructuringClient(config.exam, (record) =>
      record.number === 3
        ? { ok: false, error: { number: 3, code: "SERVER", reason: "Internal server error", attempts: 3 } }
        : undefined,
    );

    const report = await driver({ client }).run(numberedPaper(4));

    expect(report.succeeded).toBe(3);
    expect(report.failedNumbers).toEqual([3]);
    const progress = await new ProgressStore(config.paths.progressFile).load();
    expect(progress.completedNumbers).toEqual([1, 2, 4]);
    expect(progress.failedNumbers).toEqual({ "3": "SERVER after 3 attempts: Internal server error" });
  });

  it("retries previously failed records on resume", async () => {
    let failing = true;
    const flaky = (record: VerifiedQuestionRecord): StructureOutcome | undefined =>
      failing && record.number === 2
        ? { ok: false, error: { number: 2, code: "TIMEOUT", reason: "Request timed out", attempts: 3 } }
        : undefined;

    await driver({ client: new FakeStructuringClient(config.exam, flaky) }).run(numberedPaper(3));
    failing = false;
    const client = new FakeStructuringClient(config.exam, flaky);
    await driver({ client }).run(numberedPaper(3));

    expect(client.calls).toEqual([2]);
    const progress = await new ProgressStore(config.paths.progressFile).load();
    expect(progress.completedNumbers).toEqual([1, 2, 3]);
    expect(progress.failedNumbers).toEqual({});
    expect((await readDataset(config)).questions.map((q) => q.questionNumber)).toEqual([1, 2, 3]);
  });

  it("refuses to start on a corrupt progress file", async () => {
    await writeFile(config.paths.progressFile, "{not json", "utf-8");
    const client = new FakeStructuringClient(config.exam);

    await expect(driver({ client }).run(numberedPaper(2))).rejects.toBeInstanceOf(ProgressStateError);
    expect(client.calls).toEqual([]);
  });

  it("writes the paper's answer even when the service reports another", async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue(completion(JSON.stringify(candidateReply("A"))));
    const costTracker = new CostTracker(config.costs);
    const logger = createMemoryLogger();
    const client = new AIStructuringClient({
      complete,
      exam: config.exam,
      policy: new RetryPolicy(config.retry, createFakeClock().clock),
      costTracker,
      logger,
    });

    const report = await driver({ client, costTracker, logger }).run(numberedPaper(4));

    expect(report.anomalies.map((a) => a.number)).toEqual([1, 2, 3, 4]);
    expect(report.cost.totalCalls).toBe(4);
    const store = new BatchStore(config.paths.batchesDir, config.paths.failedLog);
    for (const index of await store.listBatchIndices()) {
      const questions = batchFileSchema.parse(JSON.parse(await readFile(store.batchPath(index), "utf-8")));
      for (const question of questions) {
        expect(question.correctOption).toBe("C");
        expect(question.options.filter((o) => o.isCorrect).map((o) => o.id)).toEqual(["C"]);
      }
    }
  });
});

describe("selectRecords", () => {
  it("applies the range and skips completed numbers in ascending order", () => {
    const records = [5, 1, 3, 2, 4].map((n) => verifiedRecord(n));
    const selected = selectRecords(records, { startQuestion: 2, endQuestion: 4 }, new Set([3]));
    expect(selected.map((r) => r.number)).toEqual([2, 4]);
  });
});

describe("chunk", () => {
  it("leaves the remainder in the last batch", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});
