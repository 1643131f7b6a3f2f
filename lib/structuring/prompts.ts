/**
 * Structuring prompts.
 *
 * The answer always comes from the paper. The service is told which
 * option is correct and asked to explain it; it is never asked to solve.
 */

import type { ExamInfoConfig } from "@/lib/config";
import type { VerifiedQuestionRecord } from "@/lib/extraction/types";

export interface StructuringPrompt {
  system: string;
  prompt: string;
}

function buildSystemPrompt(exam: ExamInfoConfig): string {
  return [
    `You are a ${exam.examType} ${exam.subject} expert.`,
    "Generate detailed step-by-step solutions explaining the provided correct answer.",
    "Never guess or change the correct answer provided. Your job is to explain, not to solve.",
    "Respond with a single JSON object and nothing else.",
  ].join(" ");
}

function buildUserPrompt(record: VerifiedQuestionRecord, exam: ExamInfoConfig): string {
  const options = record.options.map((o) => `${o.label}) ${o.text}`).join("\n");
  const label = record.correctLabel;

  return `Question ${record.number}: ${record.text}

Options:
${options}

CORRECT ANSWER FROM THE PAPER: Option ${label}
This is Answer (${record.answerIndex}) from the official ${exam.examType} ${exam.year} answer key.
Do not change or question this answer.

Your task:
1. Explain step by step WHY option ${label} is correct
2. Explain WHY each of the other three options is incorrect
3. Include relevant ${exam.subject.toLowerCase()} formulas and calculations with units
4. Name the NCERT chapter and topic the question belongs to

Return ONLY valid JSON with this structure:
{
  "title": "Brief descriptive title (max 80 chars)",
  "options": [
    { "id": "A", "isCorrect": ${label === "A"}, "analysis": "Why this option is or is not correct" },
    { "id": "B", "isCorrect": ${label === "B"}, "analysis": "..." },
    { "id": "C", "isCorrect": ${label === "C"}, "analysis": "..." },
    { "id": "D", "isCorrect": ${label === "D"}, "analysis": "..." }
  ],
  "correctOption": "${label}",
  "classification": {
    "subject": "${exam.subject}",
    "chapter": "NCERT chapter name",
    "topic": "Topic within the chapter",
    "subtopic": "If applicable",
    "ncertClass": 11 or 12,
    "difficulty": "Easy" | "Medium" | "Hard",
    "estimatedTime": minutes from 1 to 10,
    "conceptTags": ["at least two distinct concepts"],
    "bloomsLevel": "remember" | "understand" | "apply" | "analyze" | "evaluate" | "create"
  },
  "stepByStep": [
    { "title": "Step 1: ...", "content": "Explanation", "formula": "Optional", "insight": "Optional" }
  ],
  "quickMethod": { "trick": { "title": "Quick approach", "steps": ["..."] } }
}

correctOption MUST be "${label}".`;
}

export function buildStructuringPrompt(record: VerifiedQuestionRecord, exam: ExamInfoConfig): StructuringPrompt {
  return { system: buildSystemPrompt(exam), prompt: buildUserPrompt(record, exam) };
}
