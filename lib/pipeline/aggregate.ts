/**
 * Final document assembly.
 *
 * Reads every batch file in index order. A question number seen again in
 * a later batch replaces the earlier entry, and the document lists
 * questions by number. The result is checked against the dataset schema
 * (warnings only) and written atomically.
 */

import type { ExamInfoConfig } from "@/lib/config";
import type { RunLogger } from "@/lib/logger";
import { writeJsonAtomic } from "@/lib/utils/atomic-file";
import { datasetSchema, type QuestionDataset, type StructuredQuestion } from "@/lib/validation/schemas";
import type { BatchStore } from "./batch-store";

export const DATASET_VERSION = "1.0";

export interface AggregateOptions {
  outputPath: string;
  exam: ExamInfoConfig;
  processingMethod: string;
  model?: string;
  logger: RunLogger;
  now?: () => Date;
}

export interface AggregateResult {
  outputPath: string;
  totalQuestions: number;
  batchCount: number;
  /** Entries superseded by a later batch */
  duplicatesReplaced: number;
  /** Batch entries dropped because they did not match the question schema */
  rejectedEntries: number;
  schemaIssues: string[];
}

export function mergeQuestions(batches: StructuredQuestion[][]): { questions: StructuredQuestion[]; duplicatesReplaced: number } {
  const byNumber = new Map<number, StructuredQuestion>();
  let duplicatesReplaced = 0;
  for (const batch of batches) {
    for (const question of batch) {
      if (byNumber.has(question.questionNumber)) duplicatesReplaced++;
      byNumber.set(question.questionNumber, question);
    }
  }
  const questions = [...byNumber.values()].sort((a, b) => a.questionNumber - b.questionNumber);
  return { questions, duplicatesReplaced };
}

export async function aggregateBatches(store: BatchStore, options: AggregateOptions): Promise<AggregateResult> {
  const { outputPath, exam, logger } = options;
  const now = options.now ?? (() => new Date());

  const indices = await store.listBatchIndices();
  const batches: StructuredQuestion[][] = [];
  let rejectedEntries = 0;
  for (const index of indices) {
    const read = await store.readBatch(index);
    if (read.rejected > 0) {
      logger.warn("pipeline", "aggregate", `Batch ${index}: dropped ${read.rejected} malformed entries`);
    }
    rejectedEntries += read.rejected;
    batches.push(read.questions);
  }

  const { questions, duplicatesReplaced } = mergeQuestions(batches);
  if (duplicatesReplaced > 0) {
    logger.info("pipeline", "aggregate", `Replaced ${duplicatesReplaced} earlier entries with later batches`);
  }

  const document: QuestionDataset = {
    metadata: {
      version: DATASET_VERSION,
      lastUpdated: now().toISOString(),
      totalQuestions: questions.length,
      subject: exam.subject,
      yearRange: `${exam.year}-${exam.year}`,
      processingMethod: options.processingMethod,
      model: options.model,
    },
    questions,
  };

  const check = datasetSchema.safeParse(document);
  const schemaIssues = check.success
    ? []
    : check.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
  for (const issue of schemaIssues.slice(0, 10)) {
    logger.warn("pipeline", "aggregate", `Schema: ${issue}`);
  }

  await writeJsonAtomic(outputPath, document);
  logger.info("pipeline", "aggregate", `Wrote ${questions.length} questions from ${indices.length} batches to ${outputPath}`);

  return {
    outputPath,
    totalQuestions: questions.length,
    batchCount: indices.length,
    duplicatesReplaced,
    rejectedEntries,
    schemaIssues,
  };
}
