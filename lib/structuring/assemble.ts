/**
 * Build the importer-facing question from a service candidate.
 *
 * Identity, numbering, exam info, stem and option texts come from the
 * record and config. The service contributes the title, per-option
 * analysis, classification, steps and quick method.
 */

import type { ExamInfoConfig } from "@/lib/config";
import type { VerifiedQuestionRecord } from "@/lib/extraction/types";
import {
  BLOOMS_LEVELS,
  DIFFICULTIES,
  type Classification,
  type SolutionStep,
  type StructuredQuestion,
  type StructuringCandidate,
} from "@/lib/validation/schemas";
import { normalizeOptionId } from "./integrity";

/** e.g. neet_2024_phy_007 */
export function questionId(exam: Pick<ExamInfoConfig, "examType" | "year" | "subject">, number: number): string {
  const examType = exam.examType.toLowerCase().replace(/[^a-z0-9]/g, "");
  const subject = exam.subject.toLowerCase().replace(/[^a-z]/g, "").slice(0, 3);
  return `${examType}_${exam.year}_${subject}_${String(number).padStart(3, "0")}`;
}

function pick<T extends string>(allowed: readonly T[], value: string | undefined): T | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return allowed.find((a) => a.toLowerCase() === lower);
}

function ncertClass(value: number | undefined): 11 | 12 | undefined {
  if (value === 11) return 11;
  if (value === 12) return 12;
  return undefined;
}

function estimatedTime(value: number | undefined): number | undefined {
  return value !== undefined && value >= 1 && value <= 10 ? value : undefined;
}

function conceptTags(tags: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}

function classification(candidate: StructuringCandidate, exam: ExamInfoConfig): Classification {
  const c = candidate.classification;
  return {
    subject: exam.subject,
    chapter: c.chapter ?? "",
    topic: c.topic ?? "",
    subtopic: c.subtopic,
    ncertClass: ncertClass(c.ncertClass),
    difficulty: pick(DIFFICULTIES, c.difficulty),
    estimatedTime: estimatedTime(c.estimatedTime),
    conceptTags: conceptTags(c.conceptTags),
    bloomsLevel: pick(BLOOMS_LEVELS, c.bloomsLevel),
  };
}

function steps(candidate: StructuringCandidate): SolutionStep[] {
  const result: SolutionStep[] = [];
  for (const step of candidate.stepByStep) {
    if (!step.content) continue;
    result.push({
      title: step.title ?? `Step ${result.length + 1}`,
      content: step.content,
      formula: step.formula,
      insight: step.insight,
    });
  }
  return result;
}

/**
 * @param candidate - Already passed through enforceAnswerIntegrity()
 */
export function assembleQuestion(
  candidate: StructuringCandidate,
  record: VerifiedQuestionRecord,
  exam: ExamInfoConfig,
): StructuredQuestion {
  const byId = new Map(candidate.options.map((o) => [normalizeOptionId(o.id), o]));

  return {
    id: questionId(exam, record.number),
    questionNumber: record.number,
    examInfo: {
      year: exam.year,
      examType: exam.examType,
      paperCode: exam.paperCode,
    },
    title: candidate.title ?? `Question ${record.number}`,
    questionText: record.text,
    options: record.options.map((option) => ({
      id: option.label,
      text: option.text,
      isCorrect: option.label === record.correctLabel,
      analysis: byId.get(option.label)?.analysis ?? "",
    })),
    correctOption: record.correctLabel,
    classification: classification(candidate, exam),
    stepByStep: steps(candidate),
    quickMethod: candidate.quickMethod ?? undefined,
    questionImages: [],
    solutionImages: [],
  };
}
