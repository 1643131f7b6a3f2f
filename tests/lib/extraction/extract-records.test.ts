import { describe, it, expect } from "vitest";
import { sectionMarkersFor } from "@/lib/config";
import { extractRecords, normalizeText, parseBlock, splitIntoBlocks } from "@/lib/extraction/extract-records";
import { ANSWER_INDEX_TO_LABEL } from "@/lib/extraction/types";
import { examPaper, numberedPaper, questionBlock, stemFor } from "../../fixtures/exam-paper";

const markers = sectionMarkersFor("Physics");

describe("extractRecords", () => {
  it("maps Answer (3) to option C and keeps the stem without options", () => {
    const text = "1.\nA car accelerates uniformly from rest and covers a distance in the time shown; find the acceleration.\n(1) 10 m/s²\n(2) 5 m/s²\n(3) 20 m/s²\n(4) 2 m/s²\nAnswer (3)";
    const { records, skipped } = extractRecords(text, { markers });

    expect(skipped).toEqual([]);
    expect(records).toHaveLength(1);
    expect(records[0]).toEqual({
      number: 1,
      text: "A car accelerates uniformly from rest and covers a distance in the time shown; find the acceleration.",
      options: [
        { label: "A", text: "10 m/s²" },
        { label: "B", text: "5 m/s²" },
        { label: "C", text: "20 m/s²" },
        { label: "D", text: "2 m/s²" },
      ],
      correctLabel: "C",
      answerIndex: 3,
    });
  });

  it.each([
    [1, "A"],
    [2, "B"],
    [3, "C"],
    [4, "D"],
  ])("maps Answer (%i) to %s", (answer, label) => {
    const { records } = extractRecords(questionBlock(7, { answer }), { markers });
    expect(records[0].correctLabel).toBe(label);
    expect(ANSWER_INDEX_TO_LABEL[answer]).toBe(label);
  });

  it("returns records frozen", () => {
    const { records } = extractRecords(questionBlock(1), { markers });
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0].options)).toBe(true);
  });

  it("extracts only the subject section and skips the cover page", () => {
    const { records, section } = extractRecords(numberedPaper(3), { markers });

    expect(section.found).toBe(true);
    expect(section.startHeader).toBe("PHYSICS");
    expect(section.endHeader).toBe("CHEMISTRY");
    expect(records.map((r) => r.number)).toEqual([1, 2, 3]);
    expect(records.map((r) => r.text)).toEqual([stemFor(1), stemFor(2), stemFor(3)]);
  });

  it("joins pages before splitting into blocks", () => {
    const pages = ["PHYSICS\n1. " + stemFor(1) + "\n(1) 10 m/s²\n(2) 5 m/s²", "(3) 20 m/s²\n(4) 2 m/s²\nAnswer (2)"];
    const { records } = extractRecords(pages, { markers });
    expect(records).toHaveLength(1);
    expect(records[0].correctLabel).toBe("B");
    expect(records[0].options[3].text).toBe("2 m/s²");
  });

  it("uses the whole text when there is no section header", () => {
    const { records, section } = extractRecords(questionBlock(4), { markers });
    expect(section.found).toBe(false);
    expect(section.startLine).toBe(0);
    expect(records.map((r) => r.number)).toEqual([4]);
  });

  it("drops a block with three options", () => {
    const paper = examPaper([questionBlock(1), questionBlock(2, { optionCount: 3 }), questionBlock(3)]);
    const { records, skipped } = extractRecords(paper, { markers });

    expect(records.map((r) => r.number)).toEqual([1, 3]);
    expect(skipped).toHaveLength(1);
    expect(skipped[0].number).toBe(2);
    expect(skipped[0].code).toBe("OPTION_COUNT");
    expect(skipped[0].reason).toBe("found 3 of 4 options");
  });

  it("keeps option markers cited in the stem", () => {
    const stem = "Two balls are thrown upward in case (1) and in case (2) with equal speeds; find the ratio of heights.";
    const { records, skipped } = extractRecords(questionBlock(6, { stem }), { markers });

    expect(skipped).toEqual([]);
    expect(records).toHaveLength(1);
    expect(records[0].text).toBe(stem);
    expect(records[0].options.map((o) => o.text)).toEqual(["10 m/s²", "5 m/s²", "20 m/s²", "2 m/s²"]);
    expect(records[0].correctLabel).toBe("C");
  });

  it("drops a block without an answer annotation", () => {
    const { records, skipped } = extractRecords(questionBlock(5, { answer: null }), { markers });
    expect(records).toEqual([]);
    expect(skipped.map((s) => s.code)).toEqual(["NO_ANSWER"]);
  });

  it("drops a block whose answer index is outside 1-4", () => {
    const { skipped } = extractRecords(questionBlock(5, { answer: 5 }), { markers });
    expect(skipped[0].code).toBe("ANSWER_OUT_OF_RANGE");
    expect(skipped[0].reason).toBe("answer index 5 is outside 1-4");
  });

  it("drops a block with conflicting answer annotations", () => {
    const text = questionBlock(6, { answer: 2 }) + "\nAnswer (4)";
    const { skipped } = extractRecords(text, { markers });
    expect(skipped[0].code).toBe("AMBIGUOUS_ANSWER");
    expect(skipped[0].reason).toBe("conflicting answers: (2), (4)");
  });

  it("accepts a repeated annotation for the same answer", () => {
    const text = questionBlock(6, { answer: 2 }) + "\nAnswer (2)";
    const { records } = extractRecords(text, { markers });
    expect(records[0].correctLabel).toBe("B");
  });

  it("skips a second block with the same number", () => {
    const { records, skipped } = extractRecords(examPaper([questionBlock(1), questionBlock(1, { answer: 1 })]), { markers });
    expect(records).toHaveLength(1);
    expect(records[0].correctLabel).toBe("C");
    expect(skipped[0].code).toBe("DUPLICATE_NUMBER");
  });

  it("treats an instruction block without options as a non-question", () => {
    const text = "2. Each question carries 4 marks.\nFor each correct response the candidate will get 4 marks.";
    const { records, skipped } = extractRecords(text, { markers });
    expect(records).toEqual([]);
    expect(skipped[0].code).toBe("NO_OPTIONS");
  });

  it("returns an empty list for an empty document", () => {
    const result = extractRecords("", { markers });
    expect(result.records).toEqual([]);
    expect(result.skipped).toEqual([]);
  });
});

describe("parseBlock", () => {
  it("does not split on decimals or parenthesised numbers inside text", () => {
    const body = "A mass of 2.5 kg (see figure (2)) slides down a rough incline; the coefficient of friction is 0.5.\n(1) 1 N\n(2) 2 N\n(3) 3 N\n(4) 4 N\nAnswer (4)";
    const parsed = parseBlock({ number: 9, body });

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.record.text).toBe(
      "A mass of 2.5 kg (see figure (2)) slides down a rough incline; the coefficient of friction is 0.5.",
    );
    expect(parsed.record.options.map((o) => o.text)).toEqual(["1 N", "2 N", "3 N", "4 N"]);
  });

  it("ignores the worked solution after the options", () => {
    const body = `${stemFor(3)}\n(1) 1 s\n(2) 2 s\n(3) 3 s\n(4) 4 s\nSol. Using (1) and (2) the time is 2 s.\nAnswer (2)`;
    const parsed = parseBlock({ number: 3, body });

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.record.options[3].text).toBe("4 s");
    expect(parsed.record.correctLabel).toBe("B");
  });

  it("reports an empty stem", () => {
    const parsed = parseBlock({ number: 3, body: "(1) a\n(2) b\n(3) c\n(4) d\nAnswer (1)" });
    expect(parsed).toEqual({ ok: false, code: "EMPTY_STEM", reason: "question text is empty" });
  });
});

describe("splitIntoBlocks", () => {
  it("starts blocks only at line-start numbers", () => {
    const blocks = splitIntoBlocks(["Read carefully.", "1. First stem with 2. inline", "more text", "2. Second stem", "1.5 m/s is not a marker"]);
    expect(blocks).toEqual([
      { number: 1, body: "First stem with 2. inline\nmore text" },
      { number: 2, body: "Second stem\n1.5 m/s is not a marker" },
    ]);
  });
});

describe("normalizeText", () => {
  it("normalises ligatures, full-width parentheses and line endings", () => {
    expect(normalizeText("ﬁeld\tﬂux\r\n（2）  x")).toBe("field flux\n(2) x");
  });
});
