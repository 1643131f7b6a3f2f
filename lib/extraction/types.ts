/**
 * Question record types shared by the extractor, validator and driver.
 */

export const OPTION_LABELS = ["A", "B", "C", "D"] as const;
export type OptionLabel = (typeof OPTION_LABELS)[number];

/** Fixed answer-key table: "Answer (N)" → option label. */
export const ANSWER_INDEX_TO_LABEL: Readonly<Record<number, OptionLabel>> = {
  1: "A",
  2: "B",
  3: "C",
  4: "D",
};

export interface QuestionOption {
  readonly label: OptionLabel;
  readonly text: string;
}

export interface QuestionRecord {
  /** Source-document ordinal */
  readonly number: number;
  /** Question stem, options removed, whitespace normalised */
  readonly text: string;
  readonly options: readonly QuestionOption[];
  /** From the document's "Answer (N)" annotation. Absent means not verified. */
  readonly correctLabel?: OptionLabel;
  /** The raw N of "Answer (N)" */
  readonly answerIndex?: number;
}

export type VerifiedQuestionRecord = QuestionRecord & {
  readonly correctLabel: OptionLabel;
  readonly answerIndex: number;
};

export function hasVerifiedAnswer(record: QuestionRecord): record is VerifiedQuestionRecord {
  return (
    record.correctLabel !== undefined &&
    record.answerIndex !== undefined &&
    ANSWER_INDEX_TO_LABEL[record.answerIndex] === record.correctLabel
  );
}

export function isOptionLabel(value: unknown): value is OptionLabel {
  return OPTION_LABELS.some((label) => label === value);
}

export type ExtractionSkipCode =
  | "NO_OPTIONS"
  | "OPTION_COUNT"
  | "NO_ANSWER"
  | "AMBIGUOUS_ANSWER"
  | "ANSWER_OUT_OF_RANGE"
  | "EMPTY_STEM"
  | "DUPLICATE_NUMBER";

/** A numbered block that was dropped during parsing. Informational, never fatal. */
export interface ExtractionSkip {
  number: number;
  code: ExtractionSkipCode;
  reason: string;
  /** First characters of the block, for the log */
  preview: string;
}

export interface SectionBounds {
  /** True when a start header for the subject was found */
  found: boolean;
  startLine: number;
  endLine: number;
  startHeader?: string;
  endHeader?: string;
}

export interface ExtractionResult {
  records: QuestionRecord[];
  skipped: ExtractionSkip[];
  section: SectionBounds;
}
