/**
 * Answer integrity check.
 *
 * The paper's answer is authoritative. Whatever the service reports as
 * correct is replaced by the record's correctLabel; a disagreement is kept
 * as an anomaly for the run log and summary, never as a failure.
 */

import { ANSWER_INDEX_TO_LABEL, type OptionLabel, type VerifiedQuestionRecord } from "@/lib/extraction/types";
import type { StructuringCandidate } from "@/lib/validation/schemas";

export interface IntegrityAnomaly {
  kind: "answer_overridden";
  number: number;
  expected: OptionLabel;
  /** correctOption as the service sent it, null when missing */
  reported: string | null;
  /** Option ids the service flagged isCorrect */
  flagged: string[];
  message: string;
}

export interface IntegrityResult {
  candidate: StructuringCandidate;
  anomaly?: IntegrityAnomaly;
}

/** "(c)", "C." and the paper's own "3" all become "C". */
export function normalizeOptionId(id: string): string {
  const bare = id.trim().replace(/[().]/g, "").toUpperCase();
  return ANSWER_INDEX_TO_LABEL[Number(bare)] ?? bare;
}

export function enforceAnswerIntegrity(
  candidate: StructuringCandidate,
  record: VerifiedQuestionRecord,
): IntegrityResult {
  const expected = record.correctLabel;
  const reported = candidate.correctOption ? normalizeOptionId(candidate.correctOption) : null;
  const flagged = candidate.options.filter((o) => o.isCorrect).map((o) => normalizeOptionId(o.id));

  const corrected: StructuringCandidate = {
    ...candidate,
    correctOption: expected,
    options: candidate.options.map((o) => ({ ...o, isCorrect: normalizeOptionId(o.id) === expected })),
  };

  const agrees = reported === expected && flagged.length === 1 && flagged[0] === expected;
  if (agrees) {
    return { candidate: corrected };
  }

  return {
    candidate: corrected,
    anomaly: {
      kind: "answer_overridden",
      number: record.number,
      expected,
      reported,
      flagged,
      message: `Q${record.number}: service reported ${reported ?? "no answer"} (flagged [${flagged.join(",")}]); forced to ${expected} from Answer (${record.answerIndex})`,
    },
  };
}
