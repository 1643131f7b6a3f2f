/**
 * Batch Driver
 *
 * Runs one extraction pass over a document and structures the selected
 * records in fixed-size batches, persisting after every batch so a run can
 * stop at any point and resume without losing or repeating work.
 *
 * Run:    loading → processing → finalizing → done
 *         (processing → finalizing on interrupt)
 * Record: pending → skipped | dispatching → succeeded | failed
 *
 * Records are handled one at a time in ascending question order. The
 * AbortSignal is checked before every record and inside every wait; the
 * current batch's finished records are flushed before finalizing, and
 * records not yet attempted stay pending for the next run.
 */

import { hintForError } from "@/lib/ai/error-utils";
import type { PipelineConfig } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";
import { extractRecords } from "@/lib/extraction/extract-records";
import {
  hasVerifiedAnswer,
  type ExtractionSkip,
  type QuestionRecord,
} from "@/lib/extraction/types";
import type { RunLogger } from "@/lib/logger";
import type { CostSummary, CostTracker } from "@/lib/metering/cost-tracker";
import type { IntegrityAnomaly } from "@/lib/structuring/integrity";
import type { StructuringClient } from "@/lib/structuring/structuring-client";
import {
  summarizeValidation,
  validateRecord,
  validateStructured,
  type ValidationResult,
  type ValidationSummary,
} from "@/lib/validation/question-validator";
import type { StructuredQuestion } from "@/lib/validation/schemas";
import { aggregateBatches, type AggregateResult } from "./aggregate";
import { BatchStore } from "./batch-store";
import { applyBatchOutcomes, emptyProgress, ProgressStore, type ProgressState } from "./progress-store";

// =====================================================
// TYPES
// =====================================================

export type RunState = "loading" | "processing" | "finalizing" | "done";
export type RecordState = "pending" | "skipped" | "dispatching" | "succeeded" | "failed";

export interface RunOptions {
  /** Skip numbers already completed in progress.json (default: true) */
  resume?: boolean;
  /** Extract and pre-validate only: no calls, no files written */
  dryRun?: boolean;
  startQuestion?: number;
  endQuestion?: number;
}

export interface BatchDriverOptions {
  config: PipelineConfig;
  /** Required unless every run is a dry run */
  client?: StructuringClient;
  costTracker: CostTracker;
  logger: RunLogger;
  signal?: AbortSignal;
  progressStore?: ProgressStore;
  batchStore?: BatchStore;
}

export interface DryRunRecord {
  number: number;
  correctLabel?: string;
  ok: boolean;
  violations: string[];
}

export interface RunReport {
  dryRun: boolean;
  interrupted: boolean;
  /** Records the extractor produced */
  extracted: number;
  skippedBlocks: ExtractionSkip[];
  /** Records left after range and resume filters */
  selected: number;
  alreadyCompleted: number;
  succeeded: number;
  failed: number;
  failedNumbers: number[];
  /** Selected records never attempted (interrupt) */
  pending: number;
  anomalies: IntegrityAnomaly[];
  batchesWritten: number[];
  cost: CostSummary;
  outputPath?: string;
  failureLogPath?: string;
  aggregate?: AggregateResult;
  /** Dry run only */
  validation?: ValidationSummary;
  dryRunRecords?: DryRunRecord[];
}

interface BatchTally {
  succeeded: StructuredQuestion[];
  failed: Map<number, string>;
  anomalies: IntegrityAnomaly[];
  interrupted: boolean;
}

// =====================================================
// HELPERS
// =====================================================

export function selectRecords(
  records: QuestionRecord[],
  options: Pick<RunOptions, "startQuestion" | "endQuestion">,
  completed: ReadonlySet<number>,
): QuestionRecord[] {
  const start = options.startQuestion ?? 1;
  const end = options.endQuestion ?? Number.POSITIVE_INFINITY;
  return records
    .filter((r) => r.number >= start && r.number <= end && !completed.has(r.number))
    .sort((a, b) => a.number - b.number);
}

export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

// =====================================================
// DRIVER
// =====================================================

export class BatchDriver {
  private runState: RunState = "loading";
  private readonly recordStates = new Map<number, RecordState>();
  private readonly progressStore: ProgressStore;
  private readonly batchStore: BatchStore;

  constructor(private readonly options: BatchDriverOptions) {
    const { paths } = options.config;
    this.progressStore = options.progressStore ?? new ProgressStore(paths.progressFile);
    this.batchStore = options.batchStore ?? new BatchStore(paths.batchesDir, paths.failedLog);
  }

  get state(): RunState {
    return this.runState;
  }

  recordState(number: number): RecordState | undefined {
    return this.recordStates.get(number);
  }

  private get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  async run(source: string | readonly string[], runOptions: RunOptions = {}): Promise<RunReport> {
    const { config, logger, costTracker } = this.options;
    const { resume = true, dryRun = false } = runOptions;
    this.runState = "loading";
    this.recordStates.clear();

    if (!dryRun && !this.options.client) {
      throw new ConfigurationError("A structuring client is required unless running dry");
    }

    const progress = resume ? await this.progressStore.load() : emptyProgress();
    const completed = new Set(progress.completedNumbers);

    const extraction = extractRecords(source, {
      markers: { start: config.extraction.sectionStartMarkers, end: config.extraction.sectionEndMarkers },
    });
    this.logExtraction(extraction.records.length, extraction.skipped, extraction.section.found);

    const inRange = selectRecords(extraction.records, runOptions, new Set());
    const selected = selectRecords(extraction.records, runOptions, completed);
    const alreadyCompleted = inRange.length - selected.length;
    for (const record of selected) this.recordStates.set(record.number, "pending");
    if (alreadyCompleted > 0) {
      logger.info("pipeline", "resume", `Skipping ${alreadyCompleted} already completed questions`);
    }

    const report: RunReport = {
      dryRun,
      interrupted: false,
      extracted: extraction.records.length,
      skippedBlocks: extraction.skipped,
      selected: selected.length,
      alreadyCompleted,
      succeeded: 0,
      failed: 0,
      failedNumbers: [],
      pending: selected.length,
      anomalies: [],
      batchesWritten: [],
      cost: costTracker.summary(),
    };

    if (dryRun) {
      return this.dryRun(selected, report);
    }

    this.runState = "processing";
    let state: ProgressState = progress;
    const batches = chunk(selected, config.batch.batchSize);
    logger.info("pipeline", "run", `Processing ${selected.length} questions in ${batches.length} batches`);

    for (let i = 0; i < batches.length; i++) {
      if (this.aborted) {
        report.interrupted = true;
        break;
      }

      const tally = await this.processBatch(batches[i]);
      state = await this.flush(state, tally, report);
      logger.print(this.progressLine(i + 1, batches.length, report));

      if (tally.interrupted) {
        report.interrupted = true;
        break;
      }
    }

    if (report.interrupted) {
      logger.warn("system", "run", `Interrupted: ${report.pending} questions left pending; progress saved`);
    }

    this.runState = "finalizing";
    report.aggregate = await aggregateBatches(this.batchStore, {
      outputPath: config.paths.outputPath,
      exam: config.exam,
      processingMethod: `ai-structured:${config.ai.engine}`,
      model: config.ai.model,
      logger,
    });
    report.outputPath = config.paths.outputPath;
    report.failureLogPath = report.failed > 0 ? this.batchStore.failedLogPath : undefined;
    report.cost = costTracker.summary();

    for (const line of costTracker.formatSummary()) logger.print(line);
    this.printSummary(report);

    this.runState = "done";
    return report;
  }

  // ---------------------------------------------------
  // Steps
  // ---------------------------------------------------

  private logExtraction(count: number, skipped: ExtractionSkip[], sectionFound: boolean): void {
    const { logger, config } = this.options;
    if (!sectionFound) {
      logger.warn("pipeline", "extract", `No ${config.exam.subject} section header found; using the whole document`);
    }
    for (const skip of skipped) {
      logger.debug("pipeline", "extract", `Skipped block ${skip.number} (${skip.code}): ${skip.reason}`, { preview: skip.preview });
    }
    logger.info("pipeline", "extract", `Extracted ${count} questions (${skipped.length} blocks skipped)`);
  }

  private dryRun(selected: QuestionRecord[], report: RunReport): RunReport {
    const { config, logger } = this.options;
    const results: ValidationResult[] = [];
    const records: DryRunRecord[] = [];

    for (const record of selected) {
      const result = validateRecord(record, config.validation);
      results.push(result);
      records.push({ number: record.number, correctLabel: record.correctLabel, ok: result.ok, violations: result.violations });
      this.recordStates.set(record.number, result.ok ? "pending" : "skipped");
      const status = result.ok ? "ok" : result.violations.join("; ");
      logger.info("pipeline", "dry-run", `Q${record.number} answer=${record.correctLabel ?? "?"} ${status}`);
    }

    report.validation = summarizeValidation(results);
    report.dryRunRecords = records;
    logger.print(`Dry run: ${report.validation.valid}/${report.validation.total} questions ready, no calls made`);
    this.runState = "done";
    return report;
  }

  private async processBatch(batch: QuestionRecord[]): Promise<BatchTally> {
    const { config, logger, signal } = this.options;
    const tally: BatchTally = { succeeded: [], failed: new Map(), anomalies: [], interrupted: false };

    for (const record of batch) {
      if (this.aborted) {
        tally.interrupted = true;
        break;
      }

      const pre = validateRecord(record, config.validation);
      if (!pre.ok || !hasVerifiedAnswer(record)) {
        const reason = `Pre-validation: ${pre.violations.join("; ") || "answer not verified"}`;
        this.fail(record.number, reason, tally);
        continue;
      }

      this.recordStates.set(record.number, "dispatching");
      const outcome = await this.requireClient().structure(record, signal);

      if (!outcome.ok) {
        if (outcome.error.code === "INTERRUPTED") {
          this.recordStates.set(record.number, "pending");
          tally.interrupted = true;
          break;
        }
        const { attempts, reason } = outcome.error;
        this.fail(record.number, `${outcome.error.code} after ${attempts} attempts: ${reason}`, tally);
        logger.info("pipeline", `structure:Q${record.number}`, hintForError(outcome.error.code));
        continue;
      }

      tally.anomalies.push(...outcome.anomalies);
      const post = validateStructured(outcome.question, record, config.validation);
      for (const anomaly of post.anomalies) {
        logger.warn("pipeline", `validate:Q${record.number}`, anomaly);
      }
      if (!post.ok) {
        this.fail(record.number, `Validation: ${post.violations.join("; ")}`, tally);
        continue;
      }

      this.recordStates.set(record.number, "succeeded");
      tally.succeeded.push(outcome.question);
      logger.info("pipeline", `structure:Q${record.number}`, `Structured in ${outcome.attempts} attempt(s)`);
    }

    return tally;
  }

  private fail(number: number, reason: string, tally: BatchTally): void {
    this.recordStates.set(number, "failed");
    tally.failed.set(number, reason);
    this.options.logger.warn("pipeline", `structure:Q${number}`, reason);
  }

  /** Persist one batch: batch file, then progress, then the failure log. */
  private async flush(state: ProgressState, tally: BatchTally, report: RunReport): Promise<ProgressState> {
    const { logger } = this.options;
    const completed = tally.succeeded.map((q) => q.questionNumber);
    if (completed.length === 0 && tally.failed.size === 0) return state;

    let batchIndex: number | null = null;
    if (completed.length > 0) {
      batchIndex = await this.batchStore.nextIndex(state.lastBatchIndex);
      const filePath = await this.batchStore.writeBatch(batchIndex, tally.succeeded);
      report.batchesWritten.push(batchIndex);
      logger.info("pipeline", "batch.saved", `Saved batch ${batchIndex} (${completed.length} questions) to ${filePath}`);
    }

    const next = applyBatchOutcomes(state, { batchIndex, completed, failed: tally.failed });
    await this.progressStore.save(next);
    await this.batchStore.appendFailures([...tally.failed].map(([number, reason]) => ({ number, reason })));

    report.succeeded += completed.length;
    report.failed += tally.failed.size;
    report.failedNumbers.push(...tally.failed.keys());
    report.pending -= completed.length + tally.failed.size;
    report.anomalies.push(...tally.anomalies);
    return next;
  }

  private requireClient(): StructuringClient {
    const { client } = this.options;
    if (!client) throw new ConfigurationError("No structuring client configured");
    return client;
  }

  // ---------------------------------------------------
  // Output
  // ---------------------------------------------------

  private progressLine(batchNumber: number, batchCount: number, report: RunReport): string {
    const done = report.succeeded + report.failed;
    const cost = this.options.costTracker.estimate().totalCost;
    return `Batch ${batchNumber}/${batchCount}: ${done}/${report.selected} processed (${report.succeeded} ok, ${report.failed} failed) | cost so far $${cost.toFixed(4)}`;
  }

  private printSummary(report: RunReport): void {
    const { logger } = this.options;
    logger.print(`Succeeded: ${report.succeeded}`);
    logger.print(`Failed: ${report.failed}${report.failedNumbers.length > 0 ? ` (${report.failedNumbers.join(", ")})` : ""}`);
    logger.print(`Answers overridden: ${report.anomalies.length}`);
    if (report.pending > 0) logger.print(`Pending: ${report.pending}`);
    if (report.outputPath) logger.print(`Output: ${report.outputPath}`);
    if (report.failureLogPath) logger.print(`Failure log: ${report.failureLogPath}`);
  }
}
