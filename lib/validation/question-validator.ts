/**
 * Question Quality Gates
 *
 * Pure checks, no I/O. Two stages:
 * - validateRecord(): before a record may be sent to the structuring
 *   service. A failure means the record is never dispatched.
 * - validateStructured(): on the service's result. Violations reject the
 *   result; an answer mismatch is reported as an anomaly for audit only,
 *   since the integrity check corrects it rather than rejecting.
 *
 * The placeholder list and thresholds are tunable (ValidationRules in
 * lib/config.ts). They are a content-shape heuristic, not a keyword filter
 * for what counts as a question.
 */

import type { ValidationRules } from "@/lib/config";
import {
  OPTION_LABELS,
  hasVerifiedAnswer,
  isOptionLabel,
  type OptionLabel,
  type QuestionRecord,
} from "@/lib/extraction/types";
import type { StructuredQuestion } from "./schemas";

export interface ValidationResult {
  ok: boolean;
  violations: string[];
  /** Audit-only findings that do not affect `ok` */
  anomalies: string[];
}

/** Values the service uses when it did not fill a field in. */
const PLACEHOLDER_CLASSIFICATION_VALUES = new Set([
  "unknown",
  "n/a",
  "na",
  "none",
  "tbd",
  "chapter name here",
  "topic name here",
  "specific ncert chapter name",
  "specific chapter name from ncert",
  "specific topic",
]);

const GENERIC_TAG = /^concept\s*\d+$/i;

export function compilePlaceholders(rules: ValidationRules): RegExp[] {
  return rules.placeholderPatterns.map((p) => new RegExp(p, "i"));
}

function isPlaceholder(text: string, patterns: RegExp[]): boolean {
  const trimmed = text.trim();
  return patterns.some((p) => p.test(trimmed));
}

function result(violations: string[], anomalies: string[] = []): ValidationResult {
  return { ok: violations.length === 0, violations, anomalies };
}

// ------------------------------------------------------------------
// Pre-dispatch
// ------------------------------------------------------------------

export function validateRecord(record: QuestionRecord, rules: ValidationRules): ValidationResult {
  const violations: string[] = [];
  const placeholders = compilePlaceholders(rules);

  const text = record.text.trim();
  if (text.length < rules.minQuestionLength) {
    violations.push(`Question text too short: ${text.length} chars (min ${rules.minQuestionLength})`);
  }
  if (isPlaceholder(text, placeholders)) {
    violations.push("Question text is placeholder content");
  }

  const labels = record.options.map((o) => o.label);
  const distinct = new Set(labels);
  if (record.options.length !== OPTION_LABELS.length || distinct.size !== OPTION_LABELS.length) {
    violations.push(`Expected 4 distinct options, got ${distinct.size} of ${record.options.length}`);
  } else if (!OPTION_LABELS.every((label, i) => labels[i] === label)) {
    violations.push(`Invalid option labels: ${labels.join(",")}`);
  }

  for (const option of record.options) {
    if (!option.text.trim()) {
      violations.push(`Option ${option.label} is empty`);
    } else if (isPlaceholder(option.text, placeholders)) {
      violations.push(`Placeholder found in option ${option.label}`);
    }
  }

  if (record.correctLabel === undefined) {
    violations.push("No verified answer from the document");
  } else if (!isOptionLabel(record.correctLabel) || !labels.includes(record.correctLabel)) {
    violations.push(`Invalid correct answer: ${String(record.correctLabel)}`);
  } else if (!hasVerifiedAnswer(record)) {
    violations.push(`Correct answer ${record.correctLabel} does not match Answer (${record.answerIndex ?? "?"})`);
  }

  return result(violations);
}

// ------------------------------------------------------------------
// Post-call
// ------------------------------------------------------------------

function isMissingClassification(value: string): boolean {
  const v = value.trim().toLowerCase();
  return !v || PLACEHOLDER_CLASSIFICATION_VALUES.has(v);
}

/** Labels the question marks as correct, in option order. */
export function flaggedCorrect(question: Pick<StructuredQuestion, "options">): OptionLabel[] {
  return question.options.filter((o) => o.isCorrect).map((o) => o.id);
}

export function validateStructured(
  question: StructuredQuestion,
  record: QuestionRecord,
  rules: ValidationRules,
): ValidationResult {
  const violations: string[] = [];
  const anomalies: string[] = [];
  const placeholders = compilePlaceholders(rules);
  const { classification } = question;

  if (isMissingClassification(classification.chapter)) {
    violations.push("Chapter is missing or placeholder");
  }
  if (isMissingClassification(classification.topic)) {
    violations.push("Topic is missing or placeholder");
  }

  const tags = new Set(classification.conceptTags.map((t) => t.trim().toLowerCase()).filter(Boolean));
  if (tags.size < rules.minConceptTags) {
    violations.push(`Insufficient concept tags: ${tags.size} (min ${rules.minConceptTags})`);
  } else if ([...tags].some((t) => GENERIC_TAG.test(t))) {
    violations.push("Placeholder concept tags found");
  }

  const steps = question.stepByStep.filter((s) => s.content.trim());
  if (steps.length === 0) {
    violations.push("Missing stepByStep solution");
  } else if (steps.length < rules.minSolutionSteps) {
    violations.push(`Solution too brief: ${steps.length} steps (min ${rules.minSolutionSteps})`);
  }

  const unexplained = question.options.find((o) => !o.analysis.trim());
  const placeholderOption = question.options.find((o) => o.analysis.trim() && isPlaceholder(o.analysis, placeholders));
  if (unexplained) {
    violations.push(`Missing analysis for option ${unexplained.id}`);
  }
  if (placeholderOption) {
    violations.push(`Placeholder analysis for option ${placeholderOption.id}`);
  }

  const flagged = flaggedCorrect(question);
  if (
    record.correctLabel !== undefined &&
    (question.correctOption !== record.correctLabel || flagged.length !== 1 || flagged[0] !== record.correctLabel)
  ) {
    anomalies.push(
      `Answer mismatch: expected ${record.correctLabel}, got correctOption=${question.correctOption}, flagged=[${flagged.join(",")}]`,
    );
  }

  return result(violations, anomalies);
}

// ------------------------------------------------------------------
// Summaries
// ------------------------------------------------------------------

export interface ValidationSummary {
  total: number;
  valid: number;
  invalid: number;
  errorBreakdown: Record<string, number>;
}

export function summarizeValidation(results: ValidationResult[]): ValidationSummary {
  const summary: ValidationSummary = { total: results.length, valid: 0, invalid: 0, errorBreakdown: {} };
  for (const r of results) {
    if (r.ok) {
      summary.valid++;
      continue;
    }
    summary.invalid++;
    for (const violation of r.violations) {
      summary.errorBreakdown[violation] = (summary.errorBreakdown[violation] ?? 0) + 1;
    }
  }
  return summary;
}
