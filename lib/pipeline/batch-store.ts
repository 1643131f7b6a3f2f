/**
 * Batch files and the failure log.
 *
 * Each processed batch with at least one success becomes
 * batches/batch_NNNN.json, written once and never modified. Indices keep
 * increasing across runs, also when a run starts without resuming.
 */

import { appendFile, mkdir, readdir, readFile } from "fs/promises";
import { dirname, join } from "path";
import { isNotFound, readTextIfExists, writeJsonAtomic } from "@/lib/utils/atomic-file";
import { structuredQuestionSchema, type StructuredQuestion } from "@/lib/validation/schemas";

const BATCH_FILE = /^batch_(\d+)\.json$/;

export interface BatchRead {
  index: number;
  questions: StructuredQuestion[];
  /** Entries that did not match the question schema */
  rejected: number;
}

export interface FailureEntry {
  number: number;
  reason: string;
}

export function batchFileName(index: number): string {
  return `batch_${String(index).padStart(4, "0")}.json`;
}

export function formatFailureLine(entry: FailureEntry, at: Date): string {
  return `${at.toISOString()} | Q${entry.number} | ${entry.reason.replace(/\s*\n\s*/g, " ")}`;
}

export class BatchStore {
  constructor(
    readonly batchesDir: string,
    readonly failedLogPath: string,
  ) {}

  batchPath(index: number): string {
    return join(this.batchesDir, batchFileName(index));
  }

  async listBatchIndices(): Promise<number[]> {
    let names: string[];
    try {
      names = await readdir(this.batchesDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const indices: number[] = [];
    for (const name of names) {
      const match = BATCH_FILE.exec(name);
      if (match) indices.push(parseInt(match[1], 10));
    }
    return indices.sort((a, b) => a - b);
  }

  /** Next unused index: past both the recorded last batch and any file on disk. */
  async nextIndex(lastBatchIndex: number): Promise<number> {
    const existing = await this.listBatchIndices();
    const highest = existing.length > 0 ? existing[existing.length - 1] : 0;
    return Math.max(lastBatchIndex, highest) + 1;
  }

  /**
   * @throws Error if a batch with this index already exists
   */
  async writeBatch(index: number, questions: StructuredQuestion[]): Promise<string> {
    const filePath = this.batchPath(index);
    if ((await readTextIfExists(filePath)) !== null) {
      throw new Error(`Batch file already exists: ${filePath}`);
    }
    await writeJsonAtomic(filePath, questions);
    return filePath;
  }

  async readBatch(index: number): Promise<BatchRead> {
    const filePath = this.batchPath(index);
    const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error(`Batch file is not an array: ${filePath}`);
    }

    const questions: StructuredQuestion[] = [];
    let rejected = 0;
    for (const entry of raw) {
      const parsed = structuredQuestionSchema.safeParse(entry);
      if (parsed.success) questions.push(parsed.data);
      else rejected++;
    }
    return { index, questions, rejected };
  }

  async appendFailures(entries: FailureEntry[], at: Date = new Date()): Promise<void> {
    if (entries.length === 0) return;
    await mkdir(dirname(this.failedLogPath), { recursive: true });
    const lines = entries.map((e) => formatFailureLine(e, at)).join("\n") + "\n";
    await appendFile(this.failedLogPath, lines, "utf-8");
  }
}
