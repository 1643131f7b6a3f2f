/**
 * Question Record Extraction
 *
 * Turns raw exam-paper text into QuestionRecords, each carrying the answer
 * printed in the paper. Deterministic: no AI is involved and nothing is
 * inferred. A block that does not have the full four-option shape plus an
 * unambiguous "Answer (N)" annotation is dropped with a reason.
 *
 * Flow: pages → normalise → subject section → numbered blocks → options + answer
 */

import { findSubjectSection, type SectionMarkers } from "./find-section";
import {
  ANSWER_INDEX_TO_LABEL,
  OPTION_LABELS,
  type ExtractionResult,
  type ExtractionSkip,
  type ExtractionSkipCode,
  type QuestionOption,
  type QuestionRecord,
} from "./types";

// ------------------------------------------------------------------
// Patterns
// ------------------------------------------------------------------

/** "12. text" at line start; "2.5 m/s" is not a question marker. */
const QUESTION_START = /^(\d{1,3})\.(?!\d)\s*(.*)$/;

/** "(1)".."(4)" at line start or after whitespace. */
const OPTION_MARKER = /(^|\s)\(([1-4])\)/g;

const ANSWER_ANNOTATION = /Answer\s*\(\s*(\d+)\s*\)/gi;

/** Worked solutions follow the answer in some papers; they are not part of the question. */
const SOLUTION_MARKER = /(^|\n)\s*Sol(?:ution)?\s*[.:]/i;

const PREVIEW_CHARS = 80;

// ------------------------------------------------------------------
// Text normalisation
// ------------------------------------------------------------------

export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/ﬁ/g, "fi")
    .replace(/ﬂ/g, "fl")
    .replace(/（/g, "(")
    .replace(/）/g, ")")
    .replace(/[ \t ]+/g, " ")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n");
}

function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

// ------------------------------------------------------------------
// Blocks
// ------------------------------------------------------------------

interface RawBlock {
  number: number;
  body: string;
}

/**
 * Split section lines into numbered blocks. Lines before the first
 * marker (section instructions) belong to no block.
 */
export function splitIntoBlocks(lines: string[]): RawBlock[] {
  const blocks: RawBlock[] = [];
  let current: { number: number; lines: string[] } | null = null;

  for (const line of lines) {
    const match = QUESTION_START.exec(line.trim());
    if (match) {
      if (current) blocks.push({ number: current.number, body: current.lines.join("\n") });
      current = { number: parseInt(match[1], 10), lines: [match[2]] };
      continue;
    }
    current?.lines.push(line);
  }
  if (current) blocks.push({ number: current.number, body: current.lines.join("\n") });

  return blocks;
}

type BlockParse =
  | { ok: true; record: QuestionRecord }
  | { ok: false; code: ExtractionSkipCode; reason: string };

interface OptionSpan {
  index: number;
  markerStart: number;
  textStart: number;
}

/** Follow "(2)".."(4)" in order after a given "(1)". */
function chainFrom(markers: OptionSpan[], first: OptionSpan): OptionSpan[] {
  const chain = [first];
  let from = first.textStart;
  for (let expected = 2; expected <= OPTION_LABELS.length; expected++) {
    const next = markers.find((m) => m.index === expected && m.markerStart >= from);
    if (!next) break;
    chain.push(next);
    from = next.textStart;
  }
  return chain;
}

/**
 * Find "(1)".."(4)" in order. Options close the block, so the last "(1)"
 * that starts a full run wins: a stem that cites "case (1) and case (2)"
 * keeps those markers. Each later marker is looked for after the previous
 * one, so a stray "(3)" inside option 1's text is left in that text.
 * Without a full run, the longest partial one is reported.
 */
function locateOptions(body: string): OptionSpan[] {
  const markers: OptionSpan[] = [];
  for (const match of body.matchAll(OPTION_MARKER)) {
    const at = match.index ?? 0;
    markers.push({
      index: parseInt(match[2], 10),
      markerStart: at + match[1].length,
      textStart: at + match[0].length,
    });
  }

  const firsts = markers.filter((m) => m.index === 1);
  let longest: OptionSpan[] = [];
  for (let i = firsts.length - 1; i >= 0; i--) {
    const chain = chainFrom(markers, firsts[i]);
    if (chain.length === OPTION_LABELS.length) return chain;
    if (chain.length >= longest.length) longest = chain;
  }
  return longest;
}

export function parseBlock(block: RawBlock): BlockParse {
  const answers = [...block.body.matchAll(ANSWER_ANNOTATION)];
  const solution = SOLUTION_MARKER.exec(block.body);

  let questionEnd = block.body.length;
  if (answers.length > 0) questionEnd = Math.min(questionEnd, answers[0].index ?? questionEnd);
  if (solution) questionEnd = Math.min(questionEnd, solution.index);
  const body = block.body.slice(0, questionEnd);

  const spans = locateOptions(body);
  if (spans.length === 0) {
    return { ok: false, code: "NO_OPTIONS", reason: "no enumerated options (not a question block)" };
  }
  if (spans.length !== OPTION_LABELS.length) {
    return { ok: false, code: "OPTION_COUNT", reason: `found ${spans.length} of 4 options` };
  }

  const options: QuestionOption[] = spans.map((span, i) => ({
    label: OPTION_LABELS[i],
    text: collapseWhitespace(body.slice(span.textStart, i + 1 < spans.length ? spans[i + 1].markerStart : body.length)),
  }));
  const emptyOption = options.find((o) => !o.text);
  if (emptyOption) {
    return { ok: false, code: "OPTION_COUNT", reason: `option ${emptyOption.label} is empty` };
  }

  const text = collapseWhitespace(body.slice(0, spans[0].markerStart));
  if (!text) {
    return { ok: false, code: "EMPTY_STEM", reason: "question text is empty" };
  }

  const indices = [...new Set(answers.map((a) => parseInt(a[1], 10)))];
  if (indices.length === 0) {
    return { ok: false, code: "NO_ANSWER", reason: "no Answer (N) annotation" };
  }
  if (indices.length > 1) {
    return { ok: false, code: "AMBIGUOUS_ANSWER", reason: `conflicting answers: ${indices.map((n) => `(${n})`).join(", ")}` };
  }
  const answerIndex = indices[0];
  const correctLabel = ANSWER_INDEX_TO_LABEL[answerIndex];
  if (!correctLabel) {
    return { ok: false, code: "ANSWER_OUT_OF_RANGE", reason: `answer index ${answerIndex} is outside 1-4` };
  }

  const record: QuestionRecord = Object.freeze({
    number: block.number,
    text,
    options: Object.freeze(options.map((o) => Object.freeze(o))),
    correctLabel,
    answerIndex,
  });
  return { ok: true, record };
}

// ------------------------------------------------------------------
// Public API
// ------------------------------------------------------------------

export interface ExtractRecordsOptions {
  markers: SectionMarkers;
}

/**
 * Extract question records from document text.
 *
 * @param source - One string, or one string per page (joined with newlines)
 */
export function extractRecords(source: string | readonly string[], options: ExtractRecordsOptions): ExtractionResult {
  const raw = typeof source === "string" ? source : source.join("\n");
  const lines = normalizeText(raw).split("\n");
  const section = findSubjectSection(lines, options.markers);

  const records: QuestionRecord[] = [];
  const skipped: ExtractionSkip[] = [];
  const seen = new Set<number>();

  for (const block of splitIntoBlocks(lines.slice(section.startLine, section.endLine))) {
    const preview = collapseWhitespace(block.body).slice(0, PREVIEW_CHARS);

    if (seen.has(block.number)) {
      skipped.push({ number: block.number, code: "DUPLICATE_NUMBER", reason: `question ${block.number} already extracted`, preview });
      continue;
    }

    const parsed = parseBlock(block);
    if (!parsed.ok) {
      skipped.push({ number: block.number, code: parsed.code, reason: parsed.reason, preview });
      continue;
    }

    seen.add(block.number);
    records.push(parsed.record);
  }

  return { records, skipped, section };
}
