/**
 * Shared Zod schemas for structured questions and the output dataset.
 *
 * Two layers:
 * - candidateSchema: what we accept back from the structuring service.
 *   Lenient (nulls, missing optionals, loose enums) so a usable answer is
 *   not thrown away over formatting.
 * - structuredQuestionSchema / datasetSchema: the importer-facing shape
 *   written to batch files and the final document.
 */

import { z } from "zod";
import { OPTION_LABELS } from "@/lib/extraction/types";

// ---------------------------------------------------------------------------
// Reusable atoms
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const looseNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined || v === "") return undefined;
    const n = typeof v === "number" ? v : parseFloat(v);
    return Number.isFinite(n) ? n : undefined;
  });

const looseBoolean = z
  .union([z.boolean(), z.string()])
  .nullish()
  .transform((v) => v === true || (typeof v === "string" && v.trim().toLowerCase() === "true"));

export const DIFFICULTIES = ["Easy", "Medium", "Hard"] as const;
export const BLOOMS_LEVELS = ["remember", "understand", "apply", "analyze", "evaluate", "create"] as const;

// ---------------------------------------------------------------------------
// Service response (candidate)
// ---------------------------------------------------------------------------

export const candidateOptionSchema = z.object({
  id: z.string(),
  text: optionalText,
  isCorrect: looseBoolean,
  analysis: optionalText,
});

export const candidateClassificationSchema = z.object({
  subject: optionalText,
  chapter: optionalText,
  topic: optionalText,
  subtopic: optionalText,
  ncertClass: looseNumber,
  difficulty: optionalText,
  estimatedTime: looseNumber,
  conceptTags: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []),
  bloomsLevel: optionalText,
});

export const candidateSchema = z.object({
  title: optionalText,
  questionText: optionalText,
  options: z.array(candidateOptionSchema).default([]),
  correctOption: optionalText,
  classification: candidateClassificationSchema
    .nullish()
    .transform((v) => v ?? candidateClassificationSchema.parse({})),
  stepByStep: z
    .array(
      z.object({
        title: optionalText,
        content: optionalText,
        formula: optionalText,
        insight: optionalText,
      }),
    )
    .nullish()
    .transform((v) => v ?? []),
  quickMethod: z.record(z.unknown()).nullish(),
});

export type StructuringCandidate = z.infer<typeof candidateSchema>;

// ---------------------------------------------------------------------------
// Importer-facing question
// ---------------------------------------------------------------------------

export const structuredOptionSchema = z.object({
  id: z.enum(OPTION_LABELS),
  text: z.string().min(1),
  isCorrect: z.boolean(),
  analysis: z.string(),
});

export const solutionStepSchema = z.object({
  title: z.string(),
  content: z.string().min(1),
  formula: z.string().optional(),
  insight: z.string().optional(),
});

export const classificationSchema = z.object({
  subject: z.string().min(1),
  chapter: z.string(),
  topic: z.string(),
  subtopic: z.string().optional(),
  ncertClass: z.union([z.literal(11), z.literal(12)]).optional(),
  difficulty: z.enum(DIFFICULTIES).optional(),
  estimatedTime: z.number().min(1).max(10).optional(),
  conceptTags: z.array(z.string()),
  bloomsLevel: z.enum(BLOOMS_LEVELS).optional(),
});

export const structuredQuestionSchema = z.object({
  id: z.string().regex(/^[a-z0-9]+_\d{4}_[a-z]{3}_\d{3,}$/),
  questionNumber: z.number().int().positive(),
  examInfo: z.object({
    year: z.number().int(),
    examType: z.string().min(1),
    paperCode: z.string().min(1),
  }),
  title: z.string(),
  questionText: z.string().min(1),
  options: z.array(structuredOptionSchema).length(4),
  correctOption: z.enum(OPTION_LABELS),
  classification: classificationSchema,
  stepByStep: z.array(solutionStepSchema),
  quickMethod: z.record(z.unknown()).optional(),
  questionImages: z.array(z.unknown()),
  solutionImages: z.array(z.unknown()),
});

export type SolutionStep = z.infer<typeof solutionStepSchema>;
export type Classification = z.infer<typeof classificationSchema>;
export type StructuredQuestion = z.infer<typeof structuredQuestionSchema>;

// ---------------------------------------------------------------------------
// Final dataset
// ---------------------------------------------------------------------------

export const datasetMetadataSchema = z.object({
  version: z.string(),
  lastUpdated: z.string().datetime(),
  totalQuestions: z.number().int().min(0),
  subject: z.string().min(1),
  yearRange: z.string().regex(/^\d{4}-\d{4}$/),
  processingMethod: z.string(),
  model: z.string().optional(),
});

export const datasetSchema = z.object({
  metadata: datasetMetadataSchema,
  questions: z.array(structuredQuestionSchema),
});

export type QuestionDataset = z.infer<typeof datasetSchema>;

/** Batch files are plain arrays of questions. */
export const batchFileSchema = z.array(structuredQuestionSchema);
