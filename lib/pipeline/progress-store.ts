/**
 * Progress persistence for resumable runs.
 *
 * progress.json records which question numbers are done and which failed
 * (with the last reason), plus the index of the last batch file written.
 * It is rewritten atomically after every batch.
 */

import { z } from "zod";
import { ProgressStateError } from "@/lib/errors";
import { readTextIfExists, writeJsonAtomic } from "@/lib/utils/atomic-file";

const progressStateSchema = z.object({
  version: z.literal(1),
  completedNumbers: z.array(z.number().int().positive()),
  failedNumbers: z.record(z.string()),
  lastBatchIndex: z.number().int().min(0),
  updatedAt: z.string(),
});

export type ProgressState = z.infer<typeof progressStateSchema>;

export interface BatchOutcomes {
  batchIndex: number | null;
  completed: number[];
  failed: ReadonlyMap<number, string>;
}

export function emptyProgress(): ProgressState {
  return {
    version: 1,
    completedNumbers: [],
    failedNumbers: {},
    lastBatchIndex: 0,
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Fold one batch's outcomes into the state. A success clears an earlier
 * failure; a failure never displaces a completed number, so completed and
 * failed never overlap.
 */
export function applyBatchOutcomes(state: ProgressState, outcomes: BatchOutcomes): ProgressState {
  const completed = new Set(state.completedNumbers);
  const failed = new Map(Object.entries(state.failedNumbers).map(([n, reason]) => [Number(n), reason]));

  for (const n of outcomes.completed) {
    completed.add(n);
    failed.delete(n);
  }
  for (const [n, reason] of outcomes.failed) {
    if (!completed.has(n)) failed.set(n, reason);
  }

  return {
    version: 1,
    completedNumbers: [...completed].sort((a, b) => a - b),
    failedNumbers: Object.fromEntries([...failed].sort(([a], [b]) => a - b).map(([n, reason]) => [String(n), reason])),
    lastBatchIndex: Math.max(state.lastBatchIndex, outcomes.batchIndex ?? 0),
    updatedAt: new Date().toISOString(),
  };
}

export class ProgressStore {
  constructor(readonly filePath: string) {}

  /**
   * @throws ProgressStateError when the file exists but is not a valid progress document
   */
  async load(): Promise<ProgressState> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) return emptyProgress();

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ProgressStateError(`Progress file is not valid JSON: ${message}`, this.filePath);
    }

    const parsed = progressStateSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new ProgressStateError(`Progress file is malformed: ${issues.join("; ")}`, this.filePath);
    }

    const completed = new Set(parsed.data.completedNumbers);
    const overlap = Object.keys(parsed.data.failedNumbers).filter((n) => completed.has(Number(n)));
    if (overlap.length > 0) {
      throw new ProgressStateError(
        `Progress file lists questions as both completed and failed: ${overlap.join(", ")}`,
        this.filePath,
      );
    }
    return parsed.data;
  }

  async save(state: ProgressState): Promise<void> {
    await writeJsonAtomic(this.filePath, state);
  }
}
